/**
 * Terminal output for decorated banners.
 *
 * @module render/ansi
 */
import { Chalk, type ChalkInstance } from 'chalk';
import type { DecoratedBanner } from '../types.js';
import { toHex } from '../style/colors.js';
import { colorRuns, type ColorRun } from './runs.js';

export interface AnsiOptions {
    bold?: boolean;
    /** Background color spec applied behind every line */
    backgroundColor?: string;
    /**
     * Chalk color level. Defaults to 3 (truecolor); callers decide whether
     * the terminal gets color at all.
     */
    level?: 0 | 1 | 2 | 3;
}

function paintLine(chalk: ChalkInstance, runs: ColorRun[], bold: boolean): string {
    return runs.map(run => {
        if (run.color === undefined) return run.text;
        const paint = bold ? chalk.hex(run.color).bold : chalk.hex(run.color);
        return paint(run.text);
    }).join('');
}

/**
 * Color each cell with chalk, one escape sequence per run of equal color.
 * A banner without colors comes back as its plain text.
 */
export function renderAnsi(banner: DecoratedBanner, options: AnsiOptions = {}): string {
    const chalk = new Chalk({ level: options.level ?? 3 });
    const background = options.backgroundColor === undefined
        ? undefined
        : chalk.bgHex(toHex(options.backgroundColor));

    return banner.lines.map((line, row) => {
        const painted = paintLine(chalk, colorRuns(line, banner.colors[row] ?? []), options.bold ?? false);
        return background ? background(painted) : painted;
    }).join('\n');
}

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1B\[[0-9;]*[a-zA-Z]/g;

/**
 * Remove ANSI escape sequences.
 */
export function stripAnsi(text: string): string {
    return text.replace(ANSI_PATTERN, '');
}
