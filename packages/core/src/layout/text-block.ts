/**
 * Text block geometry: the string-level face of the layout grid.
 *
 * @module layout/text-block
 */
import type { Alignment, BorderStyle, TextBlock } from '../types.js';
import { BannerError } from '../errors.js';
import { getBorderChars } from '../style/borders.js';
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

const BLANK = ' ';

export const DEFAULT_SHADOW_OFFSET: Readonly<ShadowOffset> = { dx: 1, dy: 1 };
export const DEFAULT_SHADOW_CHAR = '░';

export function isBlankChar(ch: string): boolean {
    return ch.trim() === '';
}

function toGrid(block: TextBlock): string[][] {
    return block.map(line => Array.from(line));
}

function fromGrid(grid: Grid<string>): string[] {
    return grid.map(row => row.join(''));
}

/**
 * Number of columns in a line.
 */
export function lineWidth(line: string): number {
    return Array.from(line).length;
}

export function blockWidth(block: TextBlock): number {
    return gridWidth(toGrid(block));
}

/**
 * Split raw glyph output into a rectangular block. The empty line left
 * by a trailing newline is dropped.
 */
export function toBlock(raw: string): string[] {
    const lines = raw.split(/\r?\n/);
    while (lines.length > 0 && lines[lines.length - 1] === '') {
        lines.pop();
    }
    return normalizeBlock(lines);
}

/**
 * Right-pad every line to the width of the longest one.
 */
export function normalizeBlock(block: TextBlock): string[] {
    return fromGrid(normalizeGrid(toGrid(block), BLANK));
}

/**
 * Remove whitespace-only lines.
 */
export function compactBlock(block: TextBlock): string[] {
    return block.filter(line => line.trim() !== '');
}

/**
 * Place the block as a unit within `width` columns.
 */
export function alignBlock(block: TextBlock, width: number, alignment: Alignment): TextBlock {
    if (alignment === 'left') return block;
    return fromGrid(alignGrid(normalizeGrid(toGrid(block), BLANK), width, alignment, BLANK));
}

/**
 * Add `padding` blank rows above and below and `padding` spaces on each side.
 */
export function padBlock(block: TextBlock, padding: number): TextBlock {
    if (padding <= 0) return block;
    return fromGrid(padGrid(normalizeGrid(toGrid(block), BLANK), padding, BLANK));
}

/**
 * Enclose the block in a border. `none` returns the block unchanged.
 */
export function borderBlock(block: TextBlock, border: BorderStyle): TextBlock {
    if (border === 'none') return block;
    const chars = getBorderChars(border);
    return fromGrid(frameGrid(normalizeGrid(toGrid(block), BLANK), chars, ch => ch, BLANK));
}

/**
 * @throws {BannerError} `INVALID_OPTION` unless both deltas are non-negative integers
 */
export function assertShadowOffset(offset: ShadowOffset): void {
    for (const [name, value] of [['dx', offset.dx], ['dy', offset.dy]] as const) {
        if (!Number.isInteger(value) || value < 0) {
            throw new BannerError('INVALID_OPTION', `Shadow ${name} must be a non-negative integer (got ${value})`);
        }
    }
}

/**
 * Result of {@link shadowBlock}.
 */
export interface ShadowedBlock {
    readonly lines: TextBlock;
    /** `true` where a cell shows the shadow */
    readonly mask: ReadonlyArray<ReadonlyArray<boolean>>;
}

/**
 * Compose a shadow copy of the block shifted by `offset`.
 */
export function shadowBlock(
    block: TextBlock,
    offset: ShadowOffset = DEFAULT_SHADOW_OFFSET,
    shadowChar: string = DEFAULT_SHADOW_CHAR,
): ShadowedBlock {
    assertShadowOffset(offset);
    type Cell = { ch: string; shadow: boolean };
    const cells: Cell[][] = toGrid(block).map(row => row.map(ch => ({ ch, shadow: false })));
    const composed = shadowGrid<Cell>(
        normalizeGrid(cells, { ch: BLANK, shadow: false }),
        offset,
        cell => isBlankChar(cell.ch),
        () => ({ ch: shadowChar, shadow: true }),
        { ch: BLANK, shadow: false },
    );
    return {
        lines: composed.map(row => row.map(cell => cell.ch).join('')),
        mask: composed.map(row => row.map(cell => cell.shadow)),
    };
}
