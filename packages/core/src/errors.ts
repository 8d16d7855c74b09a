/**
 * Error type shared by every banner operation.
 *
 * @module errors
 */

/**
 * Machine-readable failure reason.
 */
export type BannerErrorCode =
    | 'EMPTY_TEXT'
    | 'UNKNOWN_FONT'
    | 'INVALID_FONT_FILE'
    | 'UNKNOWN_TEMPLATE'
    | 'INVALID_TEMPLATE'
    | 'INVALID_STYLE'
    | 'INVALID_COLOR'
    | 'INVALID_OPTION'
    | 'UNSUPPORTED_FORMAT'
    | 'INVALID_EXPORT'
    | 'WRITE_FAILED';

/**
 * Structured error for banner failures.
 *
 * Carries a reason code, an optional hint and a list of suggestions
 * (close font names, available templates) so the CLI can print precise
 * messages and pick an exit code without parsing message strings.
 */
export class BannerError extends Error {
    /** Machine-readable failure reason. */
    readonly code: BannerErrorCode;
    /** Human-readable suggestion for fixing the problem. */
    readonly hint: string | undefined;
    /** Candidate values the user may have meant. */
    readonly suggestions: readonly string[];

    constructor(
        code: BannerErrorCode,
        message: string,
        opts: { hint?: string; suggestions?: string[]; cause?: unknown } = {},
    ) {
        super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
        this.name = 'BannerError';
        this.code = code;
        this.hint = opts.hint;
        this.suggestions = Object.freeze(opts.suggestions ?? []);
    }
}

/**
 * Type guard for {@link BannerError}.
 */
export function isBannerError(value: unknown): value is BannerError {
    return value instanceof BannerError;
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
