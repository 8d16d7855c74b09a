/**
 * Shared types for CLI commands.
 *
 * @module commands/types
 */

/**
 * How a command writes its output.
 * - `rich`: Ink components with colors and emoji
 * - `json`: a single JSON document on stdout
 * - `quiet`: plain, undecorated lines (CI and pipes)
 */
export type OutputMode = 'rich' | 'json' | 'quiet';

/**
 * Output settings derived from argv and the environment.
 */
export interface OutputConfig {
    mode: OutputMode;
    /** Disable colors (--no-color, NO_COLOR, TERM=dumb) */
    noColor: boolean;
    cwd: string;
}

/**
 * Context handed to every command.
 */
export interface CommandContext extends OutputConfig {
    /** CLI package version */
    version: string;
    /** No earlier run has been recorded in the banner home directory */
    isFirstRun: boolean;
}
