/**
 * @file Row Parser
 *
 * Turns raw CSV lines into numeric records. The first non-blank line fixes
 * the schema for the rest of the run: it is a header when every field is
 * non-numeric, otherwise it is the first data row. Rows that do not fit the
 * schema are skipped, never fatal.
 *
 * @module parse/RowParser
 */

export const DELIMITER: string = ',';

/** Plain decimal floats only: no hex, binary, octal or named values. */
const DECIMAL_PATTERN: RegExp = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export interface TableSchema {
    columnCount: number;
    /** Column names when the first line was a header. */
    header: readonly string[] | null;
}

export interface DataRecord {
    /** Position among accepted records, starting at 0. */
    seq: number;
    /** One entry per column; null where the field is empty or non-numeric. */
    values: readonly (number | null)[];
    columnCount: number;
}

export type SkipReason = 'blank' | 'column_count' | 'non_numeric';

export interface ParseHeader {
    kind: 'header';
    schema: TableSchema;
}

export interface ParseRecord {
    kind: 'record';
    record: DataRecord;
}

export interface ParseSkip {
    kind: 'skip';
    reason: SkipReason;
    /** Stable key for one malformed shape, used to rate-limit diagnostics. */
    pattern: string;
    detail: string;
}

export type ParseResult = ParseHeader | ParseRecord | ParseSkip;

/**
 * Invoked exactly once when the schema is fixed. Returns the indices of
 * the columns that every accepted record must carry as numbers.
 */
export type SchemaListener = (schema: TableSchema) => readonly number[];

export interface RowParserOptions {
    schemaListener?: SchemaListener;
}

/**
 * Stateful line-to-record parser.
 */
export class RowParser {
    private readonly schemaListener: SchemaListener | undefined;
    private schema: TableSchema | null = null;
    private required: readonly number[] = [];
    private nextSeq: number = 0;

    constructor(options: RowParserOptions = {}) {
        this.schemaListener = options.schemaListener;
    }

    /**
     * Parse one raw line (without its terminating newline).
     */
    public parse(line: string): ParseResult {
        if (line.trim().length === 0) {
            return { kind: 'skip', reason: 'blank', pattern: 'blank', detail: 'blank line' };
        }

        const raw: string[] = fields_split(line);
        const values: (number | null)[] = raw.map(field_parse);

        if (this.schema === null) {
            const fields: string[] = trailingEmpty_drop(raw);
            if (values.every((value: number | null): boolean => value === null)) {
                this.schema_establish({ columnCount: fields.length, header: fields });
                return { kind: 'header', schema: this.schema_require() };
            }
            this.schema_establish({ columnCount: fields.length, header: null });
        }

        const schema: TableSchema = this.schema_require();
        const fitted: (number | null)[] | null = width_fit(raw, values, schema.columnCount);
        if (fitted === null) {
            return {
                kind: 'skip',
                reason: 'column_count',
                pattern: `column_count:${values.length}`,
                detail: `expected ${schema.columnCount} columns, got ${values.length}`,
            };
        }

        const missing: number[] = this.required.filter((column: number): boolean => fitted[column] === null);
        if (missing.length > 0) {
            return {
                kind: 'skip',
                reason: 'non_numeric',
                pattern: `non_numeric:${missing.join('|')}`,
                detail: `non-numeric value in column ${missing.map((column: number): string => column_describe(schema, column)).join(', ')}`,
            };
        }

        const record: DataRecord = {
            seq: this.nextSeq,
            values: fitted,
            columnCount: schema.columnCount,
        };
        this.nextSeq += 1;
        return { kind: 'record', record };
    }

    /**
     * Current schema, or null before the first non-blank line.
     */
    public schema_get(): TableSchema | null {
        return this.schema;
    }

    private schema_establish(schema: TableSchema): void {
        this.schema = schema;
        this.required = this.schemaListener ? [...this.schemaListener(schema)] : [];
    }

    private schema_require(): TableSchema {
        if (this.schema === null) {
            throw new Error('RowParser schema accessed before it was established');
        }
        return this.schema;
    }
}

/**
 * Split on the delimiter and trim each field.
 */
export function fields_split(line: string): string[] {
    return line.split(DELIMITER).map((field: string): string => field.trim());
}

/**
 * Parse one trimmed field as a finite float, or null.
 */
export function field_parse(field: string): number | null {
    if (!DECIMAL_PATTERN.test(field)) return null;
    const value: number = Number(field);
    return Number.isFinite(value) ? value : null;
}

/**
 * Match a row to the schema width. One trailing empty field (a trailing
 * delimiter) is dropped when that makes the width match.
 */
function width_fit(raw: string[], values: (number | null)[], columnCount: number): (number | null)[] | null {
    if (values.length === columnCount) return values;
    if (values.length === columnCount + 1 && raw[raw.length - 1] === '') {
        return values.slice(0, columnCount);
    }
    return null;
}

/**
 * Drop one trailing empty field (a trailing delimiter) from the line that
 * fixes the schema.
 */
function trailingEmpty_drop(raw: string[]): string[] {
    return raw.length > 1 && raw[raw.length - 1] === '' ? raw.slice(0, -1) : raw;
}

function column_describe(schema: TableSchema, column: number): string {
    const name: string | undefined = schema.header?.[column];
    return name ? `${column} (${name})` : String(column);
}
