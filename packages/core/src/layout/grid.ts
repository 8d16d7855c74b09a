/**
 * Rectangular grid operations shared by plain text blocks and colored
 * cell grids.
 *
 * Every operation returns a new grid; inputs are never mutated. Rows are
 * arrays of cells so multi-unit characters occupy a single column.
 *
 * @module layout/grid
 */
import type { Alignment } from '../types.js';
import type { BorderChars } from '../style/borders.js';

export type Grid<T> = ReadonlyArray<ReadonlyArray<T>>;

/**
 * Width of the widest row.
 */
export function gridWidth<T>(grid: Grid<T>): number {
    return grid.reduce((max, row) => Math.max(max, row.length), 0);
}

function repeat<T>(cell: T, count: number): T[] {
    return Array.from({ length: Math.max(0, count) }, () => cell);
}

/**
 * Right-fill every row to the width of the widest one.
 */
export function normalizeGrid<T>(grid: Grid<T>, blank: T): T[][] {
    const width = gridWidth(grid);
    return grid.map(row => [...row, ...repeat(blank, width - row.length)]);
}

/**
 * Columns placed to the left of a block of width `blockWidth` aligned
 * within `width`. Zero when the block already fills the width.
 */
export function alignmentOffset(blockWidth: number, width: number, alignment: Alignment): number {
    const free = width - blockWidth;
    if (free <= 0) return 0;
    switch (alignment) {
        case 'center': return Math.floor(free / 2);
        case 'right': return free;
        default: return 0;
    }
}

/**
 * Place a normalized grid as a unit within `width` columns.
 * Left alignment and grids at least `width` wide are returned as-is.
 */
export function alignGrid<T>(grid: Grid<T>, width: number, alignment: Alignment, blank: T): Grid<T> {
    const blockWidth = gridWidth(grid);
    if (alignment === 'left' || blockWidth >= width || grid.length === 0) {
        return grid;
    }
    const left = alignmentOffset(blockWidth, width, alignment);
    const right = width - blockWidth - left;
    return grid.map(row => [...repeat(blank, left), ...row, ...repeat(blank, right)]);
}

/**
 * Surround a normalized grid with `padding` blank rows and columns.
 */
export function padGrid<T>(grid: Grid<T>, padding: number, blank: T): Grid<T> {
    if (padding <= 0) return grid;
    const width = gridWidth(grid) + padding * 2;
    const blankRows = Array.from({ length: padding }, () => repeat(blank, width));
    const side = repeat(blank, padding);
    return [
        ...blankRows,
        ...grid.map(row => [...side, ...row, ...side]),
        ...Array.from({ length: padding }, () => repeat(blank, width)),
    ];
}

/**
 * Enclose a normalized grid in border characters with a one-column
 * gutter on each side. The result is `width + 4` by `height + 2`.
 */
export function frameGrid<T>(
    grid: Grid<T>,
    chars: BorderChars,
    borderCell: (ch: string) => T,
    blank: T,
): Grid<T> {
    const inner = gridWidth(grid) + 2;
    const horizontal = (left: string, right: string): T[] => [
        borderCell(left),
        ...repeat(chars.h, inner).map(borderCell),
        borderCell(right),
    ];
    return [
        horizontal(chars.tl, chars.tr),
        ...grid.map(row => [borderCell(chars.v), blank, ...row, blank, borderCell(chars.v)]),
        horizontal(chars.bl, chars.br),
    ];
}

/**
 * Offset for the shadow copy, in rows and columns.
 */
export interface ShadowOffset {
    dx: number;
    dy: number;
}

/**
 * Compose a copy of the grid shifted by `(dy, dx)` behind the original.
 *
 * The result is `(height + dy)` by `(width + dx)`. Non-blank cells of the
 * original keep their position; a cell shows the shadow only where the
 * original is blank and the shifted copy is not.
 */
export function shadowGrid<T>(
    grid: Grid<T>,
    offset: ShadowOffset,
    isBlank: (cell: T) => boolean,
    toShadow: (cell: T) => T,
    blank: T,
): T[][] {
    const height = grid.length;
    const width = gridWidth(grid);
    const cellAt = (r: number, c: number): T | undefined =>
        r >= 0 && r < height && c >= 0 ? grid[r]?.[c] : undefined;

    const result: T[][] = [];
    for (let r = 0; r < height + offset.dy; r++) {
        const row: T[] = [];
        for (let c = 0; c < width + offset.dx; c++) {
            const original = cellAt(r, c);
            const source = cellAt(r - offset.dy, c - offset.dx);
            if (original !== undefined && !isBlank(original)) {
                row.push(original);
            } else if (source !== undefined && !isBlank(source)) {
                row.push(toShadow(source));
            } else {
                row.push(original ?? blank);
            }
        }
        result.push(row);
    }
    return result;
}
