/**
 * Process exit codes.
 *
 * Every {@link BannerError} code maps to one of these, so scripts can tell
 * a typo in a font name from a full disk without parsing messages.
 *
 * @module utils/exit-codes
 */
import { isBannerError, type BannerErrorCode } from '@ascii-banner/core';

export const EXIT = {
    SUCCESS: 0,
    GENERAL_ERROR: 1,
    /** Empty text, bad style value, unknown color or format */
    INVALID_INPUT: 2,
    /** Unknown font or template */
    NOT_FOUND: 3,
    /** Malformed template, export, config or font file */
    PARSE_ERROR: 4,
    /** Output could not be written */
    WRITE_ERROR: 5,
    UNKNOWN_COMMAND: 64,
} as const;

export type ExitCode = typeof EXIT[keyof typeof EXIT];

const DESCRIPTIONS: Readonly<Record<ExitCode, string>> = {
    [EXIT.SUCCESS]: 'Success',
    [EXIT.GENERAL_ERROR]: 'General error',
    [EXIT.INVALID_INPUT]: 'Invalid input',
    [EXIT.NOT_FOUND]: 'Not found',
    [EXIT.PARSE_ERROR]: 'Malformed file',
    [EXIT.WRITE_ERROR]: 'Write failed',
    [EXIT.UNKNOWN_COMMAND]: 'Unknown command',
};

const ERROR_EXIT_CODES: Readonly<Record<BannerErrorCode, ExitCode>> = {
    EMPTY_TEXT: EXIT.INVALID_INPUT,
    INVALID_STYLE: EXIT.INVALID_INPUT,
    INVALID_COLOR: EXIT.INVALID_INPUT,
    INVALID_OPTION: EXIT.INVALID_INPUT,
    UNSUPPORTED_FORMAT: EXIT.INVALID_INPUT,
    UNKNOWN_FONT: EXIT.NOT_FOUND,
    UNKNOWN_TEMPLATE: EXIT.NOT_FOUND,
    INVALID_TEMPLATE: EXIT.PARSE_ERROR,
    INVALID_EXPORT: EXIT.PARSE_ERROR,
    INVALID_FONT_FILE: EXIT.PARSE_ERROR,
    WRITE_FAILED: EXIT.WRITE_ERROR,
};

export function getExitCodeDescription(code: ExitCode): string {
    return DESCRIPTIONS[code] ?? 'Unknown error';
}

/**
 * Exit code for a thrown value; anything that is not a BannerError is a
 * general error.
 */
export function exitCodeFor(error: unknown): ExitCode {
    return isBannerError(error) ? ERROR_EXIT_CODES[error.code] : EXIT.GENERAL_ERROR;
}

/**
 * Exit code for a yargs parse failure: an unrecognised first word is an
 * unknown command, anything else is invalid input.
 */
export function parseFailureExitCode(args: readonly string[], knownCommands: ReadonlySet<string>): ExitCode {
    const first = args.find(a => !a.startsWith('-'));
    return first !== undefined && !knownCommands.has(first) ? EXIT.UNKNOWN_COMMAND : EXIT.INVALID_INPUT;
}
