/**
 * @file Window Buffer
 *
 * Per-series sliding windows of (x, y) samples. Written by the pipeline
 * phase of a tick, read by the redraw phase of the same tick.
 *
 * @module buffer/WindowBuffer
 */

import { ConfigurationError } from '../core/errors.js';
import { SlidingWindow } from './SlidingWindow.js';

export interface Sample {
    x: number;
    y: number;
}

export const DEFAULT_MAX_SAMPLES: number = 100;

export class WindowBuffer {
    public readonly capacity: number;
    private readonly windows: Map<string, SlidingWindow<Sample>> = new Map<string, SlidingWindow<Sample>>();
    private pushed: number = 0;

    /**
     * @throws ConfigurationError when capacity is not a positive integer.
     */
    constructor(capacity: number = DEFAULT_MAX_SAMPLES) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new ConfigurationError('max-samples', `must be a positive integer, got ${capacity}`);
        }
        this.capacity = capacity;
    }

    /**
     * Create the window for a series if it does not exist yet.
     */
    public register(seriesId: string): void {
        if (!this.windows.has(seriesId)) {
            this.windows.set(seriesId, new SlidingWindow<Sample>(this.capacity));
        }
    }

    public push(seriesId: string, x: number, y: number): void {
        this.register(seriesId);
        this.windows.get(seriesId)?.push({ x, y });
        this.pushed += 1;
    }

    /**
     * Current contents of one series, oldest first. Unknown ids are empty.
     */
    public snapshot(seriesId: string): Sample[] {
        return this.windows.get(seriesId)?.snapshot() ?? [];
    }

    public latest(seriesId: string): Sample | null {
        return this.windows.get(seriesId)?.latest() ?? null;
    }

    public series_list(): string[] {
        return Array.from(this.windows.keys());
    }

    /** Samples pushed over the whole run, including evicted ones. */
    public total_get(): number {
        return this.pushed;
    }
}
