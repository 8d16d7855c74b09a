/**
 * The styling-and-layout pipeline.
 *
 * Takes the raw glyph block from the font backend and applies, in order:
 * compaction → normalization → alignment → shadow → padding → border.
 * Color metadata travels with every cell through the same grid
 * operations, so the finished {@link DecoratedBanner} has one color entry
 * per character.
 *
 * @module layout/decorate
 */
import type { BannerStyle, DecoratedBanner, TextBlock } from '../types.js';
import { getBorderChars } from '../style/borders.js';
import { interpolateGradient, parseColorSpec, toHex } from '../style/colors.js';
import {
    alignGrid,
    frameGrid,
    gridWidth,
    normalizeGrid,
    padGrid,
    shadowGrid,
    type Grid,
    type ShadowOffset,
} from './grid.js';
import {
    DEFAULT_SHADOW_CHAR,
    DEFAULT_SHADOW_OFFSET,
    assertShadowOffset,
    compactBlock,
    isBlankChar,
} from './text-block.js';

/**
 * Tuning knobs that are not part of the persisted style.
 */
export interface DecorateOptions {
    shadowOffset?: ShadowOffset;
    shadowChar?: string;
}

interface Cell {
    readonly ch: string;
    readonly color: string | undefined;
}

const BLANK: Cell = { ch: ' ', color: undefined };

/**
 * Colors for each glyph column: one gradient step per column, a single
 * solid color, or nothing.
 */
function textColumnColors(color: string | undefined, width: number): Array<string | undefined> {
    if (color === undefined) {
        return Array.from({ length: width }, () => undefined);
    }
    const spec = parseColorSpec(color);
    if (spec.kind === 'gradient') {
        return interpolateGradient(spec.stops, width);
    }
    return Array.from({ length: width }, () => spec.hex);
}

/**
 * Border color: explicit, else the text's solid color, else the first
 * gradient stop.
 */
function resolveBorderColor(style: BannerStyle): string | undefined {
    const spec = style.borderColor ?? style.color;
    return spec === undefined ? undefined : toHex(spec);
}

function colorGlyphs(block: TextBlock, color: string | undefined): Cell[][] {
    const grid = normalizeGrid(block.map(line => Array.from(line)), ' ');
    const columns = textColumnColors(color, gridWidth(grid));
    return grid.map(row => row.map((ch, col) => ({
        ch,
        color: isBlankChar(ch) ? undefined : columns[col],
    })));
}

/**
 * Run the layout pipeline over a raw glyph block.
 */
export function decorate(
    glyphs: TextBlock,
    style: BannerStyle,
    options: DecorateOptions = {},
): DecoratedBanner {
    const source = style.compact ? compactBlock(glyphs) : glyphs;
    let grid: Grid<Cell> = colorGlyphs(source, style.color);

    grid = alignGrid(grid, style.width, style.alignment, BLANK);

    if (style.shadow) {
        const offset = options.shadowOffset ?? DEFAULT_SHADOW_OFFSET;
        assertShadowOffset(offset);
        const shadowCell: Cell = {
            ch: options.shadowChar ?? DEFAULT_SHADOW_CHAR,
            color: style.shadowColor === undefined ? undefined : toHex(style.shadowColor),
        };
        grid = shadowGrid(grid, offset, cell => isBlankChar(cell.ch), () => shadowCell, BLANK);
    }

    grid = padGrid(grid, style.padding, BLANK);

    if (style.border !== 'none') {
        const borderColor = resolveBorderColor(style);
        grid = frameGrid(
            grid,
            getBorderChars(style.border),
            (ch): Cell => ({ ch, color: borderColor }),
            BLANK,
        );
    }

    const lines = grid.map(row => row.map(cell => cell.ch).join(''));
    const colors = grid.map(row => row.map(cell => cell.color));
    return {
        lines,
        colors,
        width: gridWidth(grid),
        height: grid.length,
    };
}
