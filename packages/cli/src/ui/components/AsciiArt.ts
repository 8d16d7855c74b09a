/**
 * ASCII art for the CLI's own header.
 * Logo: a framed `A` (receives the brand gradient) + the wordmark.
 *
 * @module ui/components/AsciiArt
 */

/**
 * Logo for wide terminals (≥100 cols).
 */
export const ASCII_LOGO_WIDE = `
╔═══╗
║ A ║
╚═══╝
`.trim();

/**
 * Wordmark for wide terminals (≥100 cols).
 */
export const ASCII_WORDMARK_WIDE = `
▄▀█ █▀ █▀▀ █ █   █▄▄ ▄▀█ █▄ █ █▄ █ █▀▀ █▀█
█▀█ ▄█ █▄▄ █ █   █▄█ █▀█ █ ▀█ █ ▀█ ██▄ █▀▄
`.trim();

/**
 * Logo for medium terminals (60-99 cols).
 */
export const ASCII_LOGO_MEDIUM = `
╭───╮
│ A │
╰───╯
`.trim();

export const ASCII_WORDMARK_MEDIUM = 'ASCII BANNER';

/**
 * Logo for narrow terminals (<60 cols).
 */
export const ASCII_LOGO_NARROW = '[A]';

export const ASCII_WORDMARK_NARROW = 'ascii-banner';

/**
 * Logo and wordmark for a terminal width.
 * @param width - Terminal width in columns
 */
export function getAsciiArt(width: number): { logo: string; wordmark: string } {
    if (width >= 100) {
        return { logo: ASCII_LOGO_WIDE, wordmark: ASCII_WORDMARK_WIDE };
    }
    if (width >= 60) {
        return { logo: ASCII_LOGO_MEDIUM, wordmark: ASCII_WORDMARK_MEDIUM };
    }
    return { logo: ASCII_LOGO_NARROW, wordmark: ASCII_WORDMARK_NARROW };
}

/**
 * Where a header is being shown.
 */
export type BannerContext = 'first-run' | 'help' | 'none';

/**
 * Decide whether a command shows the header.
 * @param command - The CLI command being executed
 * @param isFirstRun - Whether this is the first time the CLI is run
 */
export function getBannerContext(command: string | undefined, isFirstRun: boolean): BannerContext {
    if (isFirstRun) {
        return 'first-run';
    }
    if (!command || command === 'help' || command === '--help' || command === '-h') {
        return 'help';
    }
    return 'none';
}
