/**
 * Output mode detection.
 *
 * The global `--json`, `--quiet` and `--no-color` flags are read straight
 * from argv so the context exists before yargs has parsed anything.
 *
 * @module utils/output-mode
 */
import type { OutputConfig } from '../commands/types.js';

/**
 * Derive the output configuration from raw arguments and the environment.
 */
export function parseOutputConfig(
    args: readonly string[],
    env: NodeJS.ProcessEnv = process.env,
): OutputConfig {
    let mode: OutputConfig['mode'] = 'rich';
    if (args.includes('--json')) {
        mode = 'json';
    } else if (args.includes('--quiet') || args.includes('-q')) {
        mode = 'quiet';
    }

    const noColor = args.includes('--no-color')
        || (env['NO_COLOR'] !== undefined && env['NO_COLOR'] !== '')
        || env['TERM'] === 'dumb';

    return { mode, noColor, cwd: process.cwd() };
}

/**
 * Ink renders only in rich mode.
 */
export function shouldUseInk(config: OutputConfig): boolean {
    return config.mode === 'rich';
}

export function shouldUseColors(config: OutputConfig): boolean {
    return config.mode === 'rich' && !config.noColor;
}
