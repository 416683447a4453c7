import { describe, expect, it } from 'vitest';
import { RowParser, field_parse, fields_split, type ParseResult, type TableSchema } from './RowParser.js';

function record_values(result: ParseResult): readonly (number | null)[] {
    if (result.kind !== 'record') throw new Error(`expected a record, got ${result.kind}`);
    return result.record.values;
}

describe('RowParser', (): void => {
    it('treats an all non-numeric first line as the header', (): void => {
        const parser: RowParser = new RowParser();
        const result: ParseResult = parser.parse('time, voltage ,current');

        expect(result).toEqual({
            kind: 'header',
            schema: { columnCount: 3, header: ['time', 'voltage', 'current'] },
        });
        expect(record_values(parser.parse('0,1.5,2'))).toEqual([0, 1.5, 2]);
    });

    it('treats a numeric first line as data and fixes the width from it', (): void => {
        const parser: RowParser = new RowParser();
        const first: ParseResult = parser.parse('1,2,3');

        expect(first.kind).toBe('record');
        expect(parser.schema_get()).toEqual({ columnCount: 3, header: null });
    });

    it('numbers accepted records consecutively, ignoring skipped lines', (): void => {
        const parser: RowParser = new RowParser();
        const seqs: number[] = [];
        for (const line of ['x,y', '1,2', 'bad', '', '3,4']) {
            const result: ParseResult = parser.parse(line);
            if (result.kind === 'record') seqs.push(result.record.seq);
        }
        expect(seqs).toEqual([0, 1]);
    });

    it('skips blank lines before and after the schema is fixed', (): void => {
        const parser: RowParser = new RowParser();
        expect(parser.parse('   ')).toEqual({ kind: 'skip', reason: 'blank', pattern: 'blank', detail: 'blank line' });
        expect(parser.schema_get()).toBeNull();

        parser.parse('a,b');
        expect(parser.parse('').kind).toBe('skip');
    });

    it('skips rows whose width differs from the schema', (): void => {
        const parser: RowParser = new RowParser();
        parser.parse('1,2,3');

        expect(parser.parse('bad,line')).toEqual({
            kind: 'skip',
            reason: 'column_count',
            pattern: 'column_count:2',
            detail: 'expected 3 columns, got 2',
        });
    });

    it('accepts one trailing delimiter', (): void => {
        const parser: RowParser = new RowParser();
        parser.parse('a,b');

        expect(record_values(parser.parse('1,2,'))).toEqual([1, 2]);
        expect(parser.parse('1,2,,').kind).toBe('skip');
    });

    it('drops a trailing delimiter from the header line', (): void => {
        const parser: RowParser = new RowParser();

        expect(parser.parse('t,v,')).toEqual({ kind: 'header', schema: { columnCount: 2, header: ['t', 'v'] } });
        expect(record_values(parser.parse('3,4'))).toEqual([3, 4]);
        expect(record_values(parser.parse('5,6,'))).toEqual([5, 6]);
    });

    it('drops a trailing delimiter from a first data row', (): void => {
        const parser: RowParser = new RowParser();

        expect(record_values(parser.parse('1,2,'))).toEqual([1, 2]);
        expect(parser.schema_get()).toEqual({ columnCount: 2, header: null });
        expect(record_values(parser.parse('3,4'))).toEqual([3, 4]);
    });

    it('detects a header whose names look like non-decimal literals', (): void => {
        const parser: RowParser = new RowParser();

        expect(parser.parse('0b1,0x1A')).toEqual({ kind: 'header', schema: { columnCount: 2, header: ['0b1', '0x1A'] } });
    });

    it('keeps non-numeric fields as null when no column is required', (): void => {
        const parser: RowParser = new RowParser();
        parser.parse('a,b,c');

        expect(record_values(parser.parse('1,n/a,3'))).toEqual([1, null, 3]);
    });

    it('skips rows missing a required column', (): void => {
        const parser: RowParser = new RowParser({ schemaListener: (): readonly number[] => [0, 2] });
        parser.parse('t,a,b');

        expect(parser.parse('1,,x')).toEqual({
            kind: 'skip',
            reason: 'non_numeric',
            pattern: 'non_numeric:2',
            detail: 'non-numeric value in column 2 (b)',
        });
        expect(record_values(parser.parse('1,,3'))).toEqual([1, null, 3]);
    });

    it('describes unnamed columns by index', (): void => {
        const parser: RowParser = new RowParser({ schemaListener: (): readonly number[] => [0, 1] });
        parser.parse('1,2');

        const result: ParseResult = parser.parse('x,y');
        expect(result).toEqual({
            kind: 'skip',
            reason: 'non_numeric',
            pattern: 'non_numeric:0|1',
            detail: 'non-numeric value in column 0, 1',
        });
    });

    it('invokes the schema listener exactly once', (): void => {
        const seen: TableSchema[] = [];
        const parser: RowParser = new RowParser({
            schemaListener: (schema: TableSchema): readonly number[] => {
                seen.push(schema);
                return [];
            },
        });
        for (const line of ['', 'x,y', '1,2', 'a,b', '3,4']) parser.parse(line);

        expect(seen).toEqual([{ columnCount: 2, header: ['x', 'y'] }]);
    });

    it('parses later all-text rows as data, not as a new header', (): void => {
        const parser: RowParser = new RowParser();
        parser.parse('x,y');

        expect(record_values(parser.parse('a,b'))).toEqual([null, null]);
        expect(parser.schema_get()).toEqual({ columnCount: 2, header: ['x', 'y'] });
    });
});

describe('fields_split', (): void => {
    it('splits on commas and trims each field', (): void => {
        expect(fields_split(' 1 ,2,  3')).toEqual(['1', '2', '3']);
    });
});

describe('field_parse', (): void => {
    it('parses finite numbers in common notations', (): void => {
        expect(field_parse('1.5')).toBe(1.5);
        expect(field_parse('-2')).toBe(-2);
        expect(field_parse('1e3')).toBe(1000);
    });

    it('accepts signs, bare decimal points and exponents', (): void => {
        expect(field_parse('+1.5e3')).toBe(1500);
        expect(field_parse('.5')).toBe(0.5);
        expect(field_parse('1.')).toBe(1);
        expect(field_parse('-2E-1')).toBe(-0.2);
    });

    it('rejects hex, binary and octal literals', (): void => {
        expect(field_parse('0x1A')).toBeNull();
        expect(field_parse('0b101')).toBeNull();
        expect(field_parse('0o7')).toBeNull();
    });

    it('returns null for empty, textual and non-finite fields', (): void => {
        expect(field_parse('')).toBeNull();
        expect(field_parse('abc')).toBeNull();
        expect(field_parse('Infinity')).toBeNull();
        expect(field_parse('NaN')).toBeNull();
    });
});
