/**
 * @file Column Selectors
 *
 * Closed set of selector variants parsed from loosely-typed configuration,
 * plus the pairing rule between x and y selector lists.
 *
 * @module series/selectors
 */

import { ConfigurationError } from '../core/errors.js';

export interface IndexSelector {
    kind: 'index';
    index: number;
}

export interface NameSelector {
    kind: 'name';
    name: string;
}

export type ColumnSelector = IndexSelector | NameSelector;

/**
 * Configured series layout before resolution against a schema.
 *
 * An empty `x` list means the record sequence index drives the x-axis.
 * An empty `y` list means the default layout applies.
 */
export interface SeriesSpec {
    x: readonly ColumnSelector[];
    y: readonly ColumnSelector[];
}

/**
 * Parse one configuration token. Digit-only tokens are column indices;
 * anything else names a header column.
 */
export function selector_parse(token: string | number, option: string): ColumnSelector {
    if (typeof token === 'number') {
        if (!Number.isInteger(token) || token < 0) {
            throw new ConfigurationError(option, `column index must be a non-negative integer, got ${token}`);
        }
        return { kind: 'index', index: token };
    }

    const trimmed: string = token.trim();
    if (trimmed.length === 0) {
        throw new ConfigurationError(option, 'empty column selector');
    }
    if (/^\d+$/.test(trimmed)) {
        return { kind: 'index', index: Number.parseInt(trimmed, 10) };
    }
    if (/^-\d+$/.test(trimmed)) {
        throw new ConfigurationError(option, `column index must be a non-negative integer, got ${trimmed}`);
    }
    return { kind: 'name', name: trimmed };
}

/**
 * Build a series spec and enforce the pairing rule: either exactly one x
 * selector broadcast to every y, or parallel lists of equal length.
 */
export function seriesSpec_build(
    xTokens: readonly (string | number)[] = [],
    yTokens: readonly (string | number)[] = [],
): SeriesSpec {
    const x: ColumnSelector[] = xTokens.map((token: string | number): ColumnSelector => selector_parse(token, 'x-cols'));
    const y: ColumnSelector[] = yTokens.map((token: string | number): ColumnSelector => selector_parse(token, 'y-cols'));

    if (y.length === 0 && x.length > 1) {
        throw new ConfigurationError('x-cols', `${x.length} x-columns given without y-columns`);
    }
    if (x.length > 1 && x.length !== y.length) {
        throw new ConfigurationError(
            'x-cols',
            `number of x-columns (${x.length}) must be 1 or match the number of y-columns (${y.length})`,
        );
    }
    return { x, y };
}

export function selector_describe(selector: ColumnSelector): string {
    return selector.kind === 'index' ? `#${selector.index}` : `"${selector.name}"`;
}
