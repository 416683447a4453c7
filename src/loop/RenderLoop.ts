/**
 * @file Render Loop
 *
 * Fixed-cadence driver: each tick polls the line source, pushes new
 * samples through the pipeline into the window buffer, then redraws every
 * series from window snapshots. Cancellation is cooperative and checked
 * once per tick boundary.
 *
 * States:
 *   idle       → no sample routed yet (file missing or still empty)
 *   streaming  → samples arriving
 *   stalled    → `stallTicks` ticks without new samples; chart stays static
 *   terminated → stopped, or failed on a configuration/resource error
 *
 * @module loop/RenderLoop
 */

import type { WindowBuffer, Sample } from '../buffer/WindowBuffer.js';
import { ResourceError, visualizerError_is, type VisualizerError } from '../core/errors.js';
import type { Diagnostics } from '../core/logging/Diagnostics.js';
import type { BatchReport, SamplePipeline } from '../pipeline/SamplePipeline.js';
import { AxisScaler, extents_compute, type AxisExtents } from '../render/AxisScaler.js';
import { chart_render, type ChartSeries } from '../render/ChartRenderer.js';
import { seriesStyle_resolve } from '../render/palette.js';
import type { ChartSurface, SurfaceSize } from '../render/TerminalSurface.js';
import type { ResolvedSeries } from '../series/SeriesRouter.js';

export type LoopState = 'idle' | 'streaming' | 'stalled' | 'terminated';

/**
 * What the loop needs from a line source.
 */
export interface LineFeed {
    readonly path: string;
    poll(): string[];
    isOpen(): boolean;
    close(): void;
}

export interface RenderLoopOptions {
    intervalMs: number;
    fileTimeoutMs: number;
    stallTicks: number;
    title: string;
    palette: readonly string[];
    margin: number;
    rescaleSpeed: number;
}

export interface RenderLoopDeps {
    source: LineFeed;
    pipeline: SamplePipeline;
    buffer: WindowBuffer;
    surface: ChartSurface;
    diagnostics: Diagnostics;
    clock?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

export interface TickReport {
    tick: number;
    state: LoopState;
    lines: number;
    samples: number;
    skipped: number;
}

export interface LoopCancelled {
    kind: 'cancelled';
    ticks: number;
}

export interface LoopFailed {
    kind: 'failed';
    ticks: number;
    error: VisualizerError;
}

export type LoopOutcome = LoopCancelled | LoopFailed;

/** Sleep for specified milliseconds. */
export function sleep_ms(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RenderLoop {
    private readonly deps: RenderLoopDeps;
    private readonly options: RenderLoopOptions;
    private readonly clock: () => number;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly scaler: AxisScaler;
    private state: LoopState = 'idle';
    private ticks: number = 0;
    private quietTicks: number = 0;
    private startedAt: number | null = null;
    private stopRequested: boolean = false;
    private surfaceOpen: boolean = false;
    private outcome: LoopOutcome | null = null;

    constructor(deps: RenderLoopDeps, options: RenderLoopOptions) {
        this.deps = deps;
        this.options = options;
        this.clock = deps.clock ?? Date.now;
        this.sleep = deps.sleep ?? sleep_ms;
        this.scaler = new AxisScaler({ margin: options.margin, rescaleSpeed: options.rescaleSpeed });
    }

    /**
     * One poll-parse-route-buffer pass followed by one redraw.
     */
    public tick(): TickReport {
        if (this.state === 'terminated') {
            return this.report_build({ lines: 0, records: 0, samples: 0, skipped: 0 });
        }
        if (this.stopRequested) {
            this.terminate({ kind: 'cancelled', ticks: this.ticks });
            return this.report_build({ lines: 0, records: 0, samples: 0, skipped: 0 });
        }

        this.ticks += 1;
        if (this.startedAt === null) this.startedAt = this.clock();
        this.deps.diagnostics.tick_begin();

        let batch: BatchReport = { lines: 0, records: 0, samples: 0, skipped: 0 };
        try {
            this.surface_ensureOpen();
            const lines: string[] = this.deps.source.poll();
            if (!this.deps.source.isOpen()) {
                this.fileWait_check();
            }
            batch = this.deps.pipeline.lines_ingest(lines, this.deps.diagnostics);
        } catch (e: unknown) {
            if (visualizerError_is(e)) {
                this.terminate({ kind: 'failed', ticks: this.ticks, error: e });
                return this.report_build(batch);
            }
            this.deps.diagnostics.transient_report(`tick ${this.ticks} failed: ${e instanceof Error ? e.message : String(e)}`);
        }

        this.state_advance(batch.samples);
        try {
            this.frame_draw();
        } catch (e: unknown) {
            this.deps.diagnostics.transient_report(`tick ${this.ticks} redraw failed: ${e instanceof Error ? e.message : String(e)}`);
        }
        return this.report_build(batch);
    }

    /**
     * Tick on a fixed interval until stopped or failed. Resources are
     * released before the returned promise settles.
     */
    public async run(signal?: AbortSignal): Promise<LoopOutcome> {
        const onAbort = (): void => this.stop();
        if (signal?.aborted) {
            this.stop();
        } else {
            signal?.addEventListener('abort', onAbort, { once: true });
        }

        try {
            while (this.state !== 'terminated') {
                this.tick();
                if (this.state_get() === 'terminated') break;
                await this.sleep(this.options.intervalMs);
            }
        } finally {
            signal?.removeEventListener('abort', onAbort);
            this.resources_release();
        }
        return this.outcome ?? { kind: 'cancelled', ticks: this.ticks };
    }

    /**
     * Request termination at the next tick boundary.
     */
    public stop(): void {
        this.stopRequested = true;
    }

    public state_get(): LoopState {
        return this.state;
    }

    public outcome_get(): LoopOutcome | null {
        return this.outcome;
    }

    public limits_get(): AxisExtents | null {
        return this.scaler.limits_get();
    }

    // ─── Internals ─────────────────────────────────────────────────────────

    private surface_ensureOpen(): void {
        if (this.surfaceOpen) return;
        this.deps.surface.open();
        this.surfaceOpen = true;
    }

    private fileWait_check(): void {
        const waited: number = this.clock() - (this.startedAt ?? this.clock());
        if (waited > this.options.fileTimeoutMs) {
            throw new ResourceError(
                this.deps.source.path,
                `Timeout reached after ${(this.options.fileTimeoutMs / 1000).toFixed(1)}s, no log file found: ${this.deps.source.path}`,
            );
        }
    }

    private state_advance(samples: number): void {
        if (samples > 0) {
            this.state = 'streaming';
            this.quietTicks = 0;
            return;
        }
        if (this.state === 'idle') return;

        this.quietTicks += 1;
        if (this.quietTicks >= this.options.stallTicks) {
            this.state = 'stalled';
        }
    }

    private frame_draw(): void {
        const resolved: readonly ResolvedSeries[] = this.deps.pipeline.series_list();
        const series: ChartSeries[] = resolved.map((entry: ResolvedSeries, i: number): ChartSeries => ({
            id: entry.id,
            label: entry.label,
            style: seriesStyle_resolve(i, this.options.palette),
            samples: this.deps.buffer.snapshot(entry.id),
        }));
        const limits: AxisExtents | null = this.scaler.update(
            extents_compute(series.map((entry: ChartSeries): readonly Sample[] => entry.samples)),
        );

        const size: SurfaceSize = this.deps.surface.size_get();
        this.deps.surface.draw(chart_render({
            title: this.options.title,
            xLabel: xLabel_build(resolved),
            series,
            limits,
            status: this.status_build(),
        }, size));
    }

    private status_build(): string {
        const parts: string[] = [this.state.toUpperCase()];
        if (!this.deps.source.isOpen()) {
            parts.push(`waiting for ${this.deps.source.path}`);
        } else {
            parts.push(this.deps.source.path);
        }
        parts.push(`${this.deps.buffer.total_get()} samples`);
        const skipped: number = this.deps.diagnostics.skipped_get();
        if (skipped > 0) parts.push(`${skipped} skipped`);
        const latest: string | null = this.deps.diagnostics.latest_get();
        if (latest !== null) parts.push(latest);
        return parts.join(' · ');
    }

    private terminate(outcome: LoopOutcome): void {
        this.state = 'terminated';
        if (this.outcome === null) this.outcome = outcome;
        this.resources_release();
    }

    private resources_release(): void {
        try {
            this.deps.source.close();
        } finally {
            if (this.surfaceOpen) {
                this.surfaceOpen = false;
                this.deps.surface.close();
            }
        }
    }

    private report_build(batch: BatchReport): TickReport {
        return {
            tick: this.ticks,
            state: this.state,
            lines: batch.lines,
            samples: batch.samples,
            skipped: batch.skipped,
        };
    }
}

/**
 * Distinct x-axis names across series; the sequence index reads "Sample".
 */
export function xLabel_build(series: readonly ResolvedSeries[]): string {
    const names: string[] = series.map((entry: ResolvedSeries): string => (entry.x.kind === 'sequence' ? 'Sample' : entry.x.name));
    return Array.from(new Set(names)).join(', ');
}
