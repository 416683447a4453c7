/**
 * @file Series Router
 *
 * Resolves a configured SeriesSpec against the table schema exactly once,
 * then maps every accepted record to one (x, y) sample per series.
 *
 * Default layout when no y-columns are configured:
 *   - two columns: x = column 0, y = column 1
 *   - a header whose first column looks like a time/index field:
 *     x = column 0, y = column 1
 *   - otherwise: x = record sequence index, y = column 0
 * A single configured x-column without y-columns plots the first other
 * column against it.
 *
 * @module series/SeriesRouter
 */

import { ConfigurationError } from '../core/errors.js';
import type { DataRecord, TableSchema } from '../parse/RowParser.js';
import {
    selector_describe,
    type ColumnSelector,
    type SeriesSpec,
} from './selectors.js';

export interface SequenceAxis {
    kind: 'sequence';
}

export interface ColumnAxis {
    kind: 'column';
    index: number;
    name: string;
}

export type XAxisSource = SequenceAxis | ColumnAxis;

export interface ResolvedSeries {
    /** Stable identity for the run: s0, s1, ... in configuration order. */
    id: string;
    label: string;
    x: XAxisSource;
    y: ColumnAxis;
}

export interface RoutedSample {
    seriesId: string;
    x: number;
    y: number;
}

/** Header names that mark the first column as an explicit x-axis. */
const INDEX_LIKE_NAMES: ReadonlySet<string> = new Set<string>([
    't', 'time', 'timestamp', 'ts', 'x', 'index', 'idx', 'i', 'n', 'sample', 'step', 'tick', 'ms', 'us',
]);

/**
 * One-shot resolver and per-record router.
 */
export class SeriesRouter {
    private readonly spec: SeriesSpec;
    private resolved: ResolvedSeries[] | null = null;

    constructor(spec: SeriesSpec) {
        this.spec = spec;
    }

    /**
     * Resolve selectors against the schema. Repeated calls return the
     * first resolution unchanged.
     *
     * @throws ConfigurationError for an unknown name or out-of-range index.
     */
    public resolve(schema: TableSchema): readonly ResolvedSeries[] {
        if (this.resolved !== null) return this.resolved;

        const pairs: Array<{ x: XAxisSource; y: ColumnAxis }> = this.pairs_build(schema);
        this.resolved = pairs.map((pair, i: number): ResolvedSeries => ({
            id: `s${i}`,
            label: label_build(pair.x, pair.y),
            x: pair.x,
            y: pair.y,
        }));
        return this.resolved;
    }

    /**
     * Series resolved so far (empty before the schema is known).
     */
    public series_list(): readonly ResolvedSeries[] {
        return this.resolved ?? [];
    }

    /**
     * Column indices every record must carry as numbers.
     */
    public requiredColumns_get(): number[] {
        const columns: Set<number> = new Set<number>();
        for (const series of this.series_list()) {
            columns.add(series.y.index);
            if (series.x.kind === 'column') columns.add(series.x.index);
        }
        return Array.from(columns).sort((a: number, b: number): number => a - b);
    }

    /**
     * Map one record to a sample per series. Pairs with a missing value
     * are dropped.
     */
    public route(record: DataRecord): RoutedSample[] {
        const samples: RoutedSample[] = [];
        for (const series of this.series_list()) {
            const x: number | null = series.x.kind === 'sequence' ? record.seq : record.values[series.x.index] ?? null;
            const y: number | null = record.values[series.y.index] ?? null;
            if (x === null || y === null) continue;
            samples.push({ seriesId: series.id, x, y });
        }
        return samples;
    }

    private pairs_build(schema: TableSchema): Array<{ x: XAxisSource; y: ColumnAxis }> {
        const { x, y } = this.spec;

        if (y.length === 0) {
            if (x.length === 1) {
                const xAxis: ColumnAxis = column_resolve(x[0], schema, 'x-cols');
                return [{ x: xAxis, y: firstOther_resolve(schema, xAxis.index) }];
            }
            return [layout_default(schema)];
        }

        const yAxes: ColumnAxis[] = y.map((selector: ColumnSelector): ColumnAxis => column_resolve(selector, schema, 'y-cols'));
        if (x.length === 0) {
            return yAxes.map((yAxis: ColumnAxis) => ({ x: { kind: 'sequence' } as const, y: yAxis }));
        }
        const xAxes: ColumnAxis[] = x.map((selector: ColumnSelector): ColumnAxis => column_resolve(selector, schema, 'x-cols'));
        return yAxes.map((yAxis: ColumnAxis, i: number) => ({
            x: xAxes.length === 1 ? xAxes[0] : xAxes[i],
            y: yAxis,
        }));
    }
}

/**
 * Resolve one selector to a concrete column.
 */
export function column_resolve(selector: ColumnSelector, schema: TableSchema, option: string): ColumnAxis {
    if (selector.kind === 'index') {
        if (selector.index >= schema.columnCount) {
            throw new ConfigurationError(
                option,
                `column ${selector_describe(selector)} is out of range (table has ${schema.columnCount} columns)`,
            );
        }
        return { kind: 'column', index: selector.index, name: columnName_get(schema, selector.index) };
    }

    if (schema.header === null) {
        throw new ConfigurationError(option, `column ${selector_describe(selector)} named but the log has no header row`);
    }
    const index: number = schema.header.indexOf(selector.name);
    if (index < 0) {
        throw new ConfigurationError(
            option,
            `column ${selector_describe(selector)} not found (header: ${schema.header.join(', ')})`,
        );
    }
    return { kind: 'column', index, name: selector.name };
}

/**
 * Default single-series layout when nothing is configured.
 */
export function layout_default(schema: TableSchema): { x: XAxisSource; y: ColumnAxis } {
    const firstName: string | undefined = schema.header?.[0];
    const firstIsAxis: boolean = schema.columnCount === 2
        || (schema.columnCount > 2 && firstName !== undefined && indexLike_is(firstName));

    if (firstIsAxis) {
        return {
            x: { kind: 'column', index: 0, name: columnName_get(schema, 0) },
            y: { kind: 'column', index: 1, name: columnName_get(schema, 1) },
        };
    }
    return {
        x: { kind: 'sequence' },
        y: { kind: 'column', index: 0, name: columnName_get(schema, 0) },
    };
}

/**
 * Whether a header name reads like a time or sample-index column, e.g.
 * `t`, `Time`, `time(s)`.
 */
export function indexLike_is(name: string): boolean {
    const bare: string = name.replace(/\s*\(.*\)\s*$/, '').trim().toLowerCase();
    return INDEX_LIKE_NAMES.has(bare);
}

function firstOther_resolve(schema: TableSchema, exclude: number): ColumnAxis {
    for (let index = 0; index < schema.columnCount; index++) {
        if (index !== exclude) {
            return { kind: 'column', index, name: columnName_get(schema, index) };
        }
    }
    throw new ConfigurationError('y-cols', 'no column left to plot against the configured x-column');
}

function columnName_get(schema: TableSchema, index: number): string {
    return schema.header?.[index] ?? `col${index}`;
}

function label_build(x: XAxisSource, y: ColumnAxis): string {
    return x.kind === 'sequence' ? y.name : `${x.name} vs. ${y.name}`;
}
