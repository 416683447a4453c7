/**
 * @file Axis Scaler
 *
 * Auto-scaling axis limits with hysteresis: limits follow the data extents
 * plus a margin, but only move once the data leaves the current limits or
 * the limits become too loose, and then ease toward the target.
 *
 * @module render/AxisScaler
 */

import type { Sample } from '../buffer/WindowBuffer.js';

export interface Extent {
    min: number;
    max: number;
}

export interface AxisExtents {
    x: Extent;
    y: Extent;
}

export interface AxisScalerOptions {
    /** Fraction of the data range added on each side. */
    margin: number;
    /** Fraction of the distance moved toward the target per update, in (0, 1]. */
    rescaleSpeed: number;
    /** Looseness tolerated before limits shrink, as a fraction of the range. */
    slack?: number;
}

/**
 * Min/max over every sample of every series. Null when all are empty.
 */
export function extents_compute(series: readonly (readonly Sample[])[]): AxisExtents | null {
    let xMin: number = Infinity;
    let xMax: number = -Infinity;
    let yMin: number = Infinity;
    let yMax: number = -Infinity;

    for (const samples of series) {
        for (const sample of samples) {
            if (sample.x < xMin) xMin = sample.x;
            if (sample.x > xMax) xMax = sample.x;
            if (sample.y < yMin) yMin = sample.y;
            if (sample.y > yMax) yMax = sample.y;
        }
    }

    if (!Number.isFinite(xMin) || !Number.isFinite(yMin)) return null;
    return { x: { min: xMin, max: xMax }, y: { min: yMin, max: yMax } };
}

/**
 * Pad an extent by the margin; a zero-width extent is widened so the
 * axis never collapses. An extent whose span or padding overflows is
 * returned unpadded.
 */
export function extent_pad(extent: Extent, margin: number): Extent {
    const range: number = extent.max - extent.min;
    if (!Number.isFinite(range)) {
        return { min: extent.min, max: extent.max };
    }
    if (range === 0) {
        const pad: number = extent.min === 0 ? 1 : Math.abs(extent.min) * 0.05;
        return { min: extent.min - pad, max: extent.max + pad };
    }
    const padded: Extent = { min: extent.min - range * margin, max: extent.max + range * margin };
    return extent_isFinite(padded) ? padded : { min: extent.min, max: extent.max };
}

export class AxisScaler {
    private readonly margin: number;
    private readonly rescaleSpeed: number;
    private readonly slack: number;
    private limits: AxisExtents | null = null;

    constructor(options: AxisScalerOptions) {
        this.margin = options.margin;
        this.rescaleSpeed = options.rescaleSpeed;
        this.slack = options.slack ?? 0.2;
    }

    /**
     * Advance limits toward the current extents. Null extents leave the
     * limits as they are.
     */
    public update(extents: AxisExtents | null): AxisExtents | null {
        if (extents === null) return this.limits;

        const targetX: Extent = extent_pad(extents.x, this.margin);
        const targetY: Extent = extent_pad(extents.y, this.margin);
        if (!extent_isFinite(targetX) || !extent_isFinite(targetY)) return this.limits;
        if (this.limits === null) {
            this.limits = { x: targetX, y: targetY };
            return this.limits;
        }

        this.limits = {
            x: this.axis_step(this.limits.x, targetX),
            y: this.axis_step(this.limits.y, targetY),
        };
        return this.limits;
    }

    public limits_get(): AxisExtents | null {
        return this.limits;
    }

    private axis_step(current: Extent, target: Extent): Extent {
        const range: number = target.max - target.min;
        const lowOutside: boolean = target.min < current.min;
        const highOutside: boolean = target.max > current.max;
        const lowLoose: boolean = (target.min - current.min) / range > this.slack;
        const highLoose: boolean = (current.max - target.max) / range > this.slack;

        if (!lowOutside && !highOutside && !lowLoose && !highLoose) {
            return current;
        }
        // Weighted form stays finite for limits near ±Number.MAX_VALUE.
        return {
            min: current.min * (1 - this.rescaleSpeed) + target.min * this.rescaleSpeed,
            max: current.max * (1 - this.rescaleSpeed) + target.max * this.rescaleSpeed,
        };
    }
}

function extent_isFinite(extent: Extent): boolean {
    return Number.isFinite(extent.min) && Number.isFinite(extent.max);
}
