/**
 * @file Chart Renderer
 *
 * Pure frame builder: turns window snapshots and axis limits into the
 * lines of one terminal frame (title, plot grid, x range, legend, status).
 * Never touches the terminal itself; see TerminalSurface.
 *
 * @module render/ChartRenderer
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { Sample } from '../buffer/WindowBuffer.js';
import type { AxisExtents } from './AxisScaler.js';
import { styleCell_isOn, type SeriesStyle } from './palette.js';

export interface ChartSeries {
    id: string;
    label: string;
    style: SeriesStyle;
    samples: readonly Sample[];
}

export interface ChartModel {
    title: string;
    xLabel: string;
    series: readonly ChartSeries[];
    limits: AxisExtents | null;
    status: string;
}

export interface ChartRenderOptions {
    width: number;
    height: number;
    colors?: ChalkInstance;
}

interface Cell {
    glyph: string;
    color: string;
}

// ─── Glyphs & Layout ────────────────────────────────────────────────────────

export const GLYPHS = {
    line: '•',
    point: '●',
    axisVertical: '│',
    axisCorner: '└',
    axisHorizontal: '─',
} as const;

const Y_LABEL_WIDTH: number = 8;
const MIN_PLOT_ROWS: number = 3;

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Render one frame as an array of terminal lines.
 */
export function chart_render(model: ChartModel, options: ChartRenderOptions): string[] {
    const colors: ChalkInstance = options.colors ?? chalk;
    const plotWidth: number = Math.max(1, options.width - Y_LABEL_WIDTH - 1);
    const fixedRows: number = 4 + model.series.length;
    const plotRows: number = Math.max(MIN_PLOT_ROWS, options.height - fixedRows);

    const grid: (Cell | null)[][] = grid_create(plotRows, plotWidth);
    if (model.limits !== null) {
        for (const series of model.series) {
            series_plot(grid, series, model.limits);
        }
    }

    const lines: string[] = [];
    lines.push(colors.bold(text_fit(model.title, options.width)));
    lines.push(...plotRows_render(grid, model.limits, colors));
    lines.push(`${' '.repeat(Y_LABEL_WIDTH)}${GLYPHS.axisCorner}${GLYPHS.axisHorizontal.repeat(plotWidth)}`);
    lines.push(xRange_render(model, plotWidth));
    for (const series of model.series) {
        lines.push(legendEntry_render(series, options.width, colors));
    }
    lines.push(colors.gray(text_fit(model.status, options.width)));
    return lines;
}

/**
 * Compact numeric label for axes and legend.
 */
export function number_format(value: number): string {
    const magnitude: number = Math.abs(value);
    if (magnitude !== 0 && (magnitude >= 1e5 || magnitude < 1e-2)) {
        return value.toExponential(2);
    }
    const fixed: string = String(Number.parseFloat(value.toFixed(2)));
    return fixed === '-0' ? '0' : fixed;
}

/**
 * Truncate plain text to a visible width.
 */
export function text_fit(text: string, width: number): string {
    const chars: string[] = Array.from(text);
    if (chars.length <= width) return text;
    if (width <= 1) return chars.slice(0, width).join('');
    return `${chars.slice(0, width - 1).join('')}…`;
}

// ─── Grid Plotting ──────────────────────────────────────────────────────────

function grid_create(rows: number, cols: number): (Cell | null)[][] {
    return Array.from({ length: rows }, (): (Cell | null)[] => new Array<Cell | null>(cols).fill(null));
}

interface GridPoint {
    row: number;
    col: number;
}

/**
 * Position of a value between two limits as a fraction of their span.
 * Operands are halved first so spans near ±Number.MAX_VALUE stay finite.
 */
function axis_fraction(value: number, min: number, max: number): number {
    const span: number = max / 2 - min / 2;
    return span === 0 ? 0 : (value / 2 - min / 2) / span;
}

/**
 * Map a sample to grid coordinates, or null when it has no finite cell.
 * Coordinates may fall outside the grid while limits ease toward the
 * data; callers clip.
 */
function cell_locate(sample: Sample, limits: AxisExtents, rows: number, cols: number): GridPoint | null {
    const ySpan: number = limits.y.max / 2 - limits.y.min / 2;
    const col: number = Math.round(axis_fraction(sample.x, limits.x.min, limits.x.max) * (cols - 1));
    const row: number = ySpan === 0
        ? rows - 1
        : Math.round((1 - axis_fraction(sample.y, limits.y.min, limits.y.max)) * (rows - 1));
    if (!Number.isInteger(row) || !Number.isInteger(col)) return null;
    return { row, col };
}

function cell_set(grid: (Cell | null)[][], row: number, col: number, cell: Cell): void {
    if (!Number.isInteger(row) || !Number.isInteger(col)) return;
    if (row < 0 || row >= grid.length) return;
    const cells: (Cell | null)[] = grid[row];
    if (col < 0 || col >= cells.length) return;
    cells[col] = cell;
}

/**
 * Join consecutive samples with Bresenham segments, then mark the latest
 * sample with a point glyph. A sample without a cell breaks the line.
 */
function series_plot(grid: (Cell | null)[][], series: ChartSeries, limits: AxisExtents): void {
    const rows: number = grid.length;
    const cols: number = grid[0]?.length ?? 0;
    const line: Cell = { glyph: GLYPHS.line, color: series.style.color };
    let step: number = 0;
    let previous: GridPoint | null = null;

    for (const sample of series.samples) {
        const to: GridPoint | null = cell_locate(sample, limits, rows, cols);
        if (to === null) {
            previous = null;
            continue;
        }
        if (previous === null) {
            cell_set(grid, to.row, to.col, line);
        } else {
            for (const point of segment_cells(previous.col, previous.row, to.col, to.row)) {
                if (styleCell_isOn(series.style.lineStyle, step)) {
                    cell_set(grid, point.row, point.col, line);
                }
                step += 1;
            }
        }
        previous = to;
    }

    const last: Sample | undefined = series.samples[series.samples.length - 1];
    const at: GridPoint | null = last === undefined ? null : cell_locate(last, limits, rows, cols);
    if (at !== null) {
        cell_set(grid, at.row, at.col, { glyph: GLYPHS.point, color: series.style.color });
    }
}

/**
 * Cells of a Bresenham segment, excluding its starting cell. Empty
 * unless every endpoint coordinate is an integer.
 */
export function segment_cells(x0: number, y0: number, x1: number, y1: number): Array<{ col: number; row: number }> {
    const cells: Array<{ col: number; row: number }> = [];
    if (![x0, y0, x1, y1].every(Number.isInteger)) return cells;
    const dx: number = Math.abs(x1 - x0);
    const dy: number = -Math.abs(y1 - y0);
    const sx: number = x0 < x1 ? 1 : -1;
    const sy: number = y0 < y1 ? 1 : -1;
    let err: number = dx + dy;
    let x: number = x0;
    let y: number = y0;

    while (x !== x1 || y !== y1) {
        const e2: number = 2 * err;
        if (e2 >= dy) {
            err += dy;
            x += sx;
        }
        if (e2 <= dx) {
            err += dx;
            y += sy;
        }
        cells.push({ col: x, row: y });
    }
    return cells;
}

// ─── Frame Sections ─────────────────────────────────────────────────────────

function plotRows_render(grid: (Cell | null)[][], limits: AxisExtents | null, colors: ChalkInstance): string[] {
    const rows: number = grid.length;
    const middle: number = Math.floor(rows / 2);
    const lines: string[] = [];

    for (let row = 0; row < rows; row++) {
        let label: string = '';
        if (limits !== null) {
            if (row === 0) label = number_format(limits.y.max);
            else if (row === rows - 1) label = number_format(limits.y.min);
            else if (row === middle) label = number_format(limits.y.max / 2 + limits.y.min / 2);
        }
        const cells: string = grid[row]
            .map((cell: Cell | null): string => (cell === null ? ' ' : colors.hex(cell.color)(cell.glyph)))
            .join('');
        lines.push(`${text_fit(label, Y_LABEL_WIDTH).padStart(Y_LABEL_WIDTH)}${GLYPHS.axisVertical}${cells}`);
    }

    if (limits === null) {
        const message: string = text_fit('waiting for data…', grid[0]?.length ?? 0);
        lines[middle] = `${' '.repeat(Y_LABEL_WIDTH)}${GLYPHS.axisVertical}${colors.gray(message)}`;
    }
    return lines;
}

function xRange_render(model: ChartModel, plotWidth: number): string {
    const indent: string = ' '.repeat(Y_LABEL_WIDTH + 1);
    if (model.limits === null) {
        return `${indent}${text_fit(model.xLabel, plotWidth)}`;
    }
    const left: string = number_format(model.limits.x.min);
    const right: string = number_format(model.limits.x.max);
    const room: number = plotWidth - left.length - right.length;
    if (room <= 2) {
        return `${indent}${left}${' '.repeat(Math.max(1, room))}${right}`;
    }
    const label: string = text_fit(model.xLabel, room - 2);
    const before: number = Math.floor((room - label.length) / 2);
    const after: number = room - label.length - before;
    return `${indent}${left}${' '.repeat(before)}${label}${' '.repeat(after)}${right}`;
}

function legendEntry_render(series: ChartSeries, width: number, colors: ChalkInstance): string {
    const latest: Sample | undefined = series.samples[series.samples.length - 1];
    const value: string = latest === undefined ? '–' : number_format(latest.y);
    const style: string = series.style.lineStyle === 'solid' ? '' : ` [${series.style.lineStyle}]`;
    const text: string = text_fit(`${series.label}${style} = ${value}`, Math.max(1, width - 4));
    return `  ${colors.hex(series.style.color)(GLYPHS.point)} ${text}`;
}
