/**
 * Unified non-Ink command runner.
 *
 * `runDirect` handles everything the `--json` and `--quiet` paths of a
 * command have in common:
 *  - JSON output formatting
 *  - Quiet output formatting
 *  - Error serialisation (message, code, hint, suggestions)
 *  - Exit codes
 *
 * Commands only need to supply a business-logic executor and optional
 * formatting callbacks.
 *
 * @module utils/run-direct
 */
import { errorMessage, isBannerError } from '@ascii-banner/core';
import type { CommandContext } from '../commands/types.js';
import { EXIT, exitCodeFor } from './exit-codes.js';

/**
 * Options for customising output formatting per command.
 *
 * @typeParam T - The success-result type.
 */
export interface RunDirectOptions<T> {
    /**
     * Produce the text for `--quiet` mode.
     * If omitted, quiet mode prints nothing on success.
     */
    quiet?: (result: T) => string;

    /**
     * Produce the JSON payload for `--json` mode.
     * Defaults to `{ success: true, ...result }` when omitted.
     */
    json?: (result: T) => unknown;

    /**
     * Override the exit code on success.
     * Defaults to `0`.
     */
    exitCode?: (result: T) => number;
}

/**
 * JSON shape of a failed command.
 */
export interface ErrorPayload {
    success: false;
    error: string;
    code?: string;
    hint?: string;
    suggestions?: string[];
}

export function errorPayload(error: unknown): ErrorPayload {
    const payload: ErrorPayload = { success: false, error: errorMessage(error) };
    if (isBannerError(error)) {
        payload.code = error.code;
        if (error.hint !== undefined) payload.hint = error.hint;
        if (error.suggestions.length > 0) payload.suggestions = [...error.suggestions];
    }
    return payload;
}

/**
 * `Error: …` followed by the hint, for stderr.
 */
export function errorLines(error: unknown): string[] {
    const lines = [`Error: ${errorMessage(error)}`];
    if (isBannerError(error) && error.hint !== undefined) {
        lines.push(`Hint: ${error.hint}`);
    }
    return lines;
}

/**
 * Execute a command's business logic and write output for non-Ink modes
 * (json / quiet).  Terminates the process with the appropriate exit code.
 *
 * @typeParam T - The success-result type.
 * @param execute - Async function that performs the command's work.
 * @param context - CLI output context (mode, noColor, cwd …).
 * @param options - Optional formatting overrides.
 */
export async function runDirect<T extends object>(
    execute: () => Promise<T>,
    context: CommandContext,
    options?: RunDirectOptions<T>,
): Promise<never> {
    let result: T;
    try {
        result = await execute();
    } catch (error: unknown) {
        if (context.mode === 'json') {
            process.stdout.write(JSON.stringify(errorPayload(error)) + '\n');
        } else {
            process.stderr.write(errorLines(error).join('\n') + '\n');
        }
        return process.exit(exitCodeFor(error));
    }

    const code = options?.exitCode?.(result) ?? EXIT.SUCCESS;
    if (context.mode === 'json') {
        const data = options?.json?.(result) ?? { success: code === EXIT.SUCCESS, ...result };
        process.stdout.write(JSON.stringify(data) + '\n');
    } else {
        const text = options?.quiet?.(result);
        if (text) {
            process.stdout.write(text + '\n');
        }
    }
    return process.exit(code);
}
