/**
 * @file Sample Pipeline
 *
 * Parse → route → buffer for a batch of raw lines. Series resolution is
 * bound to the parser's schema event, so selectors are resolved exactly
 * once, before the first record is checked.
 *
 * @module pipeline/SamplePipeline
 */

import type { WindowBuffer } from '../buffer/WindowBuffer.js';
import type { Diagnostics } from '../core/logging/Diagnostics.js';
import { RowParser, type ParseResult, type TableSchema } from '../parse/RowParser.js';
import { SeriesRouter, type ResolvedSeries, type RoutedSample } from '../series/SeriesRouter.js';
import type { SeriesSpec } from '../series/selectors.js';

export interface BatchReport {
    lines: number;
    records: number;
    samples: number;
    skipped: number;
}

export class SamplePipeline {
    private readonly router: SeriesRouter;
    private readonly parser: RowParser;
    private readonly buffer: WindowBuffer;

    constructor(spec: SeriesSpec, buffer: WindowBuffer) {
        this.buffer = buffer;
        this.router = new SeriesRouter(spec);
        this.parser = new RowParser({
            schemaListener: (schema: TableSchema): readonly number[] => {
                for (const series of this.router.resolve(schema)) {
                    this.buffer.register(series.id);
                }
                return this.router.requiredColumns_get();
            },
        });
    }

    /**
     * Feed one line through the pipeline.
     *
     * @returns The parse result and the samples it pushed.
     * @throws ConfigurationError when the schema cannot satisfy the selectors.
     */
    public line_ingest(line: string): { result: ParseResult; samples: RoutedSample[] } {
        const result: ParseResult = this.parser.parse(line);
        if (result.kind !== 'record') {
            return { result, samples: [] };
        }
        const samples: RoutedSample[] = this.router.route(result.record);
        for (const sample of samples) {
            this.buffer.push(sample.seriesId, sample.x, sample.y);
        }
        return { result, samples };
    }

    /**
     * Feed a batch of lines, reporting skips to diagnostics.
     */
    public lines_ingest(lines: readonly string[], diagnostics?: Diagnostics): BatchReport {
        const report: BatchReport = { lines: lines.length, records: 0, samples: 0, skipped: 0 };
        for (const line of lines) {
            const { result, samples } = this.line_ingest(line);
            if (result.kind === 'record') {
                report.records += 1;
                report.samples += samples.length;
            } else if (result.kind === 'skip' && result.reason !== 'blank') {
                report.skipped += 1;
                diagnostics?.skip_report(result.reason, result.pattern, `skipped line: ${result.detail}`);
            }
        }
        return report;
    }

    public series_list(): readonly ResolvedSeries[] {
        return this.router.series_list();
    }

    public schema_get(): TableSchema | null {
        return this.parser.schema_get();
    }
}
