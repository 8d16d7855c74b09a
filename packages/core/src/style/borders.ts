/**
 * Border character sets.
 *
 * @module style/borders
 */
import type { BorderStyle } from '../types.js';

/**
 * Corner and edge characters of a border style.
 */
export interface BorderChars {
    readonly tl: string;
    readonly tr: string;
    readonly bl: string;
    readonly br: string;
    /** Horizontal edge */
    readonly h: string;
    /** Vertical edge */
    readonly v: string;
}

export const BORDER_CHARS: Readonly<Record<BorderStyle, BorderChars>> = {
    none: { tl: '', tr: '', bl: '', br: '', h: '', v: '' },
    single: { tl: '┌', tr: '┐', bl: '└', br: '┘', h: '─', v: '│' },
    double: { tl: '╔', tr: '╗', bl: '╚', br: '╝', h: '═', v: '║' },
    rounded: { tl: '╭', tr: '╮', bl: '╰', br: '╯', h: '─', v: '│' },
    bold: { tl: '┏', tr: '┓', bl: '┗', br: '┛', h: '━', v: '┃' },
    ascii: { tl: '+', tr: '+', bl: '+', br: '+', h: '-', v: '|' },
    star: { tl: '*', tr: '*', bl: '*', br: '*', h: '*', v: '*' },
    hash: { tl: '#', tr: '#', bl: '#', br: '#', h: '#', v: '#' },
};

export function getBorderChars(border: BorderStyle): BorderChars {
    return BORDER_CHARS[border];
}
