/**
 * @file Transient Data Diagnostics
 *
 * Collects skipped-line reports without flooding output: every distinct
 * malformed pattern is reported once, and a tick can surface at most
 * `maxPerTick` new patterns. Counters keep growing regardless.
 *
 * @module core/logging/Diagnostics
 */

import type { SkipReason } from '../../parse/RowParser.js';

export interface DiagnosticsOptions {
    /** When false, counts are kept but no message is recorded. */
    enabled: boolean;
    maxPerTick?: number;
    /** Receives each newly recorded message. */
    sink?: (message: string) => void;
}

export interface DiagnosticsSummary {
    skipped: number;
    byReason: Partial<Record<SkipReason, number>>;
    patterns: number;
    suppressed: number;
}

/**
 * Rate-limited collector for transient data errors.
 */
export class Diagnostics {
    private readonly enabled: boolean;
    private readonly maxPerTick: number;
    private readonly sink: ((message: string) => void) | undefined;
    private readonly seenPatterns: Set<string> = new Set<string>();
    private readonly byReason: Map<SkipReason, number> = new Map<SkipReason, number>();
    private skipped: number = 0;
    private suppressed: number = 0;
    private reportedThisTick: number = 0;
    private latest: string | null = null;

    constructor(options: DiagnosticsOptions) {
        this.enabled = options.enabled;
        this.maxPerTick = options.maxPerTick ?? 3;
        this.sink = options.sink;
    }

    /**
     * Record one skipped line.
     *
     * @returns True if a message was recorded for it.
     */
    public skip_report(reason: SkipReason, pattern: string, message: string): boolean {
        this.skipped += 1;
        this.byReason.set(reason, (this.byReason.get(reason) ?? 0) + 1);

        if (this.seenPatterns.has(pattern)) return false;
        if (this.reportedThisTick >= this.maxPerTick) {
            this.suppressed += 1;
            return false;
        }
        this.seenPatterns.add(pattern);
        if (!this.enabled) return false;

        this.reportedThisTick += 1;
        this.latest = message;
        this.sink?.(message);
        return true;
    }

    /**
     * Record a recoverable failure that is not a parser skip.
     */
    public transient_report(message: string): void {
        if (!this.enabled) return;
        this.latest = message;
        this.sink?.(message);
    }

    /**
     * Open a new per-tick reporting budget.
     */
    public tick_begin(): void {
        this.reportedThisTick = 0;
    }

    public latest_get(): string | null {
        return this.latest;
    }

    public skipped_get(): number {
        return this.skipped;
    }

    public summary_get(): DiagnosticsSummary {
        const byReason: Partial<Record<SkipReason, number>> = {};
        for (const [reason, count] of this.byReason) {
            byReason[reason] = count;
        }
        return {
            skipped: this.skipped,
            byReason,
            patterns: this.seenPatterns.size,
            suppressed: this.suppressed,
        };
    }
}
