import { describe, expect, it } from 'vitest';
import { DEFAULT_PALETTE, seriesStyle_resolve, styleCell_isOn } from './palette.js';

describe('seriesStyle_resolve', (): void => {
    it('walks the palette with a solid line first', (): void => {
        expect(seriesStyle_resolve(0)).toEqual({ color: '#2d8ff3', lineStyle: 'solid' });
        expect(seriesStyle_resolve(5)).toEqual({ color: '#f65394', lineStyle: 'solid' });
    });

    it('switches line style once every colour has been used', (): void => {
        expect(seriesStyle_resolve(DEFAULT_PALETTE.length)).toEqual({ color: '#2d8ff3', lineStyle: 'dashed' });
        expect(seriesStyle_resolve(1, ['#000000', '#ffffff'])).toEqual({ color: '#ffffff', lineStyle: 'solid' });
        expect(seriesStyle_resolve(5, ['#000000', '#ffffff'])).toEqual({ color: '#ffffff', lineStyle: 'dotted' });
    });

    it('falls back to the default palette when given an empty one', (): void => {
        expect(seriesStyle_resolve(1, [])).toEqual({ color: '#fc585e', lineStyle: 'solid' });
    });
});

describe('styleCell_isOn', (): void => {
    it('inks every cell of a solid line', (): void => {
        expect([0, 1, 2, 3].map((step: number): boolean => styleCell_isOn('solid', step))).toEqual([true, true, true, true]);
    });

    it('repeats the dash pattern along a segment', (): void => {
        expect([0, 1, 2, 3, 4, 5].map((step: number): boolean => styleCell_isOn('dashed', step)))
            .toEqual([true, true, false, true, true, false]);
        expect([0, 1, 2].map((step: number): boolean => styleCell_isOn('dotted', step))).toEqual([true, false, true]);
    });
});
