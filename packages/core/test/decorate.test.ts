/**
 * Tests for the styling-and-layout pipeline.
 *
 * @module test/decorate
 */
import { describe, test, expect } from 'vitest';
import { decorate } from '../src/layout/decorate.js';
import { createStyle } from '../src/style/style.js';
import { ALIGNMENTS, BORDER_STYLES } from '../src/types.js';

const RED = '#ff0000';
const GREEN = '#00ff00';
const BLUE = '#0000ff';

describe('decorate', () => {
    test('leaves an undecorated block unchanged and uncolored', () => {
        // Act
        const banner = decorate(['ab', 'cd'], createStyle());

        // Assert
        expect(banner.lines).toEqual(['ab', 'cd']);
        expect(banner.colors).toEqual([[undefined, undefined], [undefined, undefined]]);
        expect(banner.width).toBe(2);
        expect(banner.height).toBe(2);
    });

    test('normalizes ragged glyph output', () => {
        expect(decorate(['abc', 'a'], createStyle()).lines).toEqual(['abc', 'a  ']);
    });

    test('drops blank lines when compact', () => {
        expect(decorate(['ab', '  ', 'cd'], createStyle({ compact: true })).lines).toEqual(['ab', 'cd']);
    });

    test('centers the block within the style width', () => {
        // Act
        const banner = decorate(['ab'], createStyle({ width: 10, alignment: 'center' }));

        // Assert
        expect(banner.lines).toEqual(['    ab    ']);
        expect(banner.colors[0]).toHaveLength(10);
    });

    describe('colors', () => {
        test('gives glyph cells the solid color and leaves blanks uncolored', () => {
            expect(decorate(['a b'], createStyle({ color: 'red' })).colors).toEqual([[RED, undefined, RED]]);
        });

        test('spreads a gradient across the glyph columns', () => {
            expect(decorate(['abc'], createStyle({ color: 'gradient:red-blue' })).colors)
                .toEqual([[RED, '#800080', BLUE]]);
        });

        test('keeps the gradient tied to glyph columns after alignment', () => {
            // Act
            const banner = decorate(['abc'], createStyle({ color: 'gradient:red-blue', width: 10, alignment: 'right' }));

            // Assert
            expect(banner.colors[0]?.slice(7)).toEqual([RED, '#800080', BLUE]);
            expect(banner.colors[0]?.slice(0, 7).every(c => c === undefined)).toBe(true);
        });

        test('borders fall back to the text color', () => {
            // Act
            const banner = decorate(['ab'], createStyle({ border: 'single', padding: 1, color: 'green' }));

            // Assert
            expect(banner.lines).toEqual([
                '┌──────┐',
                '│      │',
                '│  ab  │',
                '│      │',
                '└──────┘',
            ]);
            expect(banner.colors[0]?.every(c => c === GREEN)).toBe(true);
            expect(banner.colors[2]).toEqual([
                GREEN, undefined, undefined, GREEN, GREEN, undefined, undefined, GREEN,
            ]);
        });

        test('borders fall back to the first gradient stop', () => {
            // Act
            const banner = decorate(['ab'], createStyle({ border: 'ascii', color: 'gradient:red-blue' }));

            // Assert
            expect(banner.colors[0]?.every(c => c === RED)).toBe(true);
        });

        test('an explicit border color wins', () => {
            // Act
            const banner = decorate(['ab'], createStyle({ border: 'ascii', color: 'red', borderColor: 'blue' }));

            // Assert
            expect(banner.colors[1]).toEqual([BLUE, undefined, RED, RED, undefined, BLUE]);
        });
    });

    describe('shadow', () => {
        test('adds shadow cells in the shadow color', () => {
            // Act
            const banner = decorate(['ab'], createStyle({ shadow: true }));

            // Assert
            expect(banner.lines).toEqual(['ab ', ' ░░']);
            expect(banner.colors).toEqual([
                [undefined, undefined, undefined],
                [undefined, '#808080', '#808080'],
            ]);
        });

        test('is applied before padding and border', () => {
            expect(decorate(['ab'], createStyle({ shadow: true, border: 'ascii' })).lines).toEqual([
                '+-----+',
                '| ab  |',
                '|  ░░ |',
                '+-----+',
            ]);
        });

        test('takes a custom offset and character', () => {
            // Act
            const banner = decorate(['ab'], createStyle({ shadow: true }), {
                shadowOffset: { dx: 2, dy: 0 },
                shadowChar: '.',
            });

            // Assert
            expect(banner.lines).toEqual(['ab..']);
        });
    });

    test('every combination stays rectangular with a matching color map', () => {
        for (const border of BORDER_STYLES) {
            for (const alignment of ALIGNMENTS) {
                for (const padding of [0, 2]) {
                    // Arrange
                    const style = createStyle({
                        border, alignment, padding, width: 12, shadow: padding > 0, color: 'gradient:red-green',
                    });

                    // Act
                    const banner = decorate(['/\\_', '|  |', '\\/'], style);

                    // Assert
                    expect(banner.lines).toHaveLength(banner.height);
                    expect(banner.colors).toHaveLength(banner.height);
                    banner.lines.forEach((line, row) => {
                        expect(Array.from(line)).toHaveLength(banner.width);
                        expect(banner.colors[row]).toHaveLength(banner.width);
                    });
                }
            }
        }
    });
});
