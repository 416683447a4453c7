/**
 * @file Series Palette
 *
 * Colour and line-style assignment: every colour is used with the first
 * line style before any colour repeats with the next style.
 *
 * @module render/palette
 */

export const DEFAULT_PALETTE: readonly string[] = ['#2d8ff3', '#fc585e', '#1aaf54', '#e05fba', '#e37529', '#f65394'];

export type LineStyle = 'solid' | 'dashed' | 'dotted' | 'dashdot';

export const LINE_STYLES: readonly LineStyle[] = ['solid', 'dashed', 'dotted', 'dashdot'];

/** On/off cell masks walked along each drawn segment. */
const STYLE_PATTERNS: Record<LineStyle, readonly boolean[]> = {
    solid: [true],
    dashed: [true, true, false],
    dotted: [true, false],
    dashdot: [true, true, false, true, false],
};

export interface SeriesStyle {
    color: string;
    lineStyle: LineStyle;
}

/**
 * Style for the i-th series.
 */
export function seriesStyle_resolve(index: number, palette: readonly string[] = DEFAULT_PALETTE): SeriesStyle {
    const colors: readonly string[] = palette.length > 0 ? palette : DEFAULT_PALETTE;
    const color: string = colors[index % colors.length];
    const lineStyle: LineStyle = LINE_STYLES[Math.floor(index / colors.length) % LINE_STYLES.length];
    return { color, lineStyle };
}

/**
 * Whether the n-th cell of a segment is inked for a line style.
 */
export function styleCell_isOn(style: LineStyle, step: number): boolean {
    const pattern: readonly boolean[] = STYLE_PATTERNS[style];
    return pattern[step % pattern.length];
}
