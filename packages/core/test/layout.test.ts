/**
 * Tests for text block geometry.
 *
 * @module test/layout
 */
import { describe, test, expect } from 'vitest';
import {
    alignBlock,
    blockWidth,
    borderBlock,
    compactBlock,
    normalizeBlock,
    padBlock,
    shadowBlock,
    toBlock,
} from '../src/layout/text-block.js';
import { BORDER_STYLES } from '../src/types.js';
import { BannerError } from '../src/errors.js';

describe('toBlock', () => {
    test('drops the trailing empty lines and pads to a rectangle', () => {
        expect(toBlock('ab\nc\n\n')).toEqual(['ab', 'c ']);
    });

    test('accepts CRLF line endings', () => {
        expect(toBlock('ab\r\ncd\r\n')).toEqual(['ab', 'cd']);
    });
});

describe('normalizeBlock', () => {
    test('right-pads every line to the longest one', () => {
        expect(normalizeBlock(['a', 'abc', ''])).toEqual(['a  ', 'abc', '   ']);
    });

    test('counts multi-unit characters as one column', () => {
        expect(normalizeBlock(['░░', 'abc'])).toEqual(['░░ ', 'abc']);
    });
});

describe('compactBlock', () => {
    test('removes whitespace-only lines', () => {
        expect(compactBlock(['ab', '  ', 'cd', ''])).toEqual(['ab', 'cd']);
    });
});

describe('alignBlock', () => {
    const block = ['ab', 'cd'];

    test('left alignment returns the block itself', () => {
        expect(alignBlock(block, 10, 'left')).toBe(block);
    });

    test('centers with the odd column on the right', () => {
        expect(alignBlock(block, 7, 'center')).toEqual(['  ab   ', '  cd   ']);
    });

    test('right alignment pads on the left', () => {
        expect(alignBlock(block, 5, 'right')).toEqual(['   ab', '   cd']);
    });

    test('leaves blocks that already fill the width unchanged', () => {
        expect(alignBlock(['abcdef'], 4, 'center')).toEqual(['abcdef']);
    });

    test('keeps the glyph geometry intact', () => {
        // Arrange
        const glyphs = ['/\\ ', '\\/_'];

        // Act
        const aligned = alignBlock(glyphs, 9, 'center');

        // Assert
        expect(aligned.map(line => line.slice(3, 6))).toEqual(glyphs);
    });

    test.each([10, 11, 12, 13, 40])('centered padding is balanced within one column (width %i)', width => {
        // Act
        const [line = ''] = alignBlock(['abc'], width, 'center');

        // Assert
        const left = line.length - line.trimStart().length;
        const right = line.length - line.trimEnd().length;
        expect(line.length).toBe(width);
        expect(right - left).toBeGreaterThanOrEqual(0);
        expect(right - left).toBeLessThanOrEqual(1);
    });
});

describe('padBlock', () => {
    test('adds blank rows and columns on every side', () => {
        expect(padBlock(['ab'], 2)).toEqual([
            '      ',
            '      ',
            '  ab  ',
            '      ',
            '      ',
        ]);
    });

    test.each([0, 1, 3, 5])('padding %i gives width w + 2P and height h + 2P', padding => {
        // Arrange
        const block = ['abc', 'def'];

        // Act
        const padded = padBlock(block, padding);

        // Assert
        expect(padded).toHaveLength(2 + 2 * padding);
        expect(blockWidth(padded)).toBe(3 + 2 * padding);
    });
});

describe('borderBlock', () => {
    test('none returns the same lines', () => {
        // Arrange
        const block = ['ab', 'cd'];

        // Act & Assert
        expect(borderBlock(block, 'none')).toBe(block);
    });

    test('encloses the block with a one-column gutter', () => {
        expect(borderBlock(['ab', 'cd'], 'single')).toEqual([
            '┌────┐',
            '│ ab │',
            '│ cd │',
            '└────┘',
        ]);
    });

    test('uses plain characters for the ascii style', () => {
        expect(borderBlock(['x'], 'ascii')).toEqual(['+---+', '| x |', '+---+']);
    });

    test.each(BORDER_STYLES.filter(style => style !== 'none'))('%s border adds four columns and two rows', border => {
        // Act
        const framed = borderBlock(['abc', 'def', 'ghi'], border);

        // Assert
        expect(framed).toHaveLength(5);
        expect(framed.every(line => Array.from(line).length === 7)).toBe(true);
    });
});

describe('shadowBlock', () => {
    test('casts the shadow down and to the right by default', () => {
        // Act
        const { lines, mask } = shadowBlock(['ab']);

        // Assert
        expect(lines).toEqual(['ab ', ' ░░']);
        expect(mask).toEqual([[false, false, false], [false, true, true]]);
    });

    test('keeps every original character in place', () => {
        expect(shadowBlock(['a ', ' b']).lines).toEqual(['a  ', ' b ', '  ░']);
    });

    test('honors custom offsets and characters', () => {
        expect(shadowBlock(['ab'], { dx: 2, dy: 0 }, '#').lines).toEqual(['ab##']);
    });

    test('grows the block by the offset', () => {
        // Act
        const { lines } = shadowBlock(['abc', 'def'], { dx: 3, dy: 2 });

        // Assert
        expect(lines).toHaveLength(4);
        expect(blockWidth(lines)).toBe(6);
    });

    test('rejects negative offsets', () => {
        expect(() => shadowBlock(['ab'], { dx: -1, dy: 1 })).toThrow(BannerError);
    });
});
