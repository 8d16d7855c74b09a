/**
 * Glyph rendering backends.
 *
 * @module fonts/renderer
 */
import figlet from 'figlet';
import { BannerError } from '../errors.js';

/**
 * Turns text into raw multi-line glyph output.
 *
 * The layout pipeline only depends on this interface, so tests can swap in
 * a renderer with predictable glyphs.
 */
export interface GlyphRenderer {
    /** Names of every font the backend can render. */
    listFonts(): string[];
    /**
     * Render `text` in `font`. `width` is the column budget; the backend
     * wraps on whitespace when the text does not fit.
     */
    render(text: string, font: string, options: { width: number }): string;
    /** Register a font from the contents of a `.flf` file. */
    loadFont(name: string, contents: string): void;
}

type FigletFont = ReturnType<typeof figlet.fontsSync>[number];

/**
 * {@link GlyphRenderer} backed by the figlet package and its bundled fonts.
 */
export class FigletRenderer implements GlyphRenderer {
    private bundled: readonly string[] | undefined;
    private readonly registered = new Set<string>();

    listFonts(): string[] {
        this.bundled ??= figlet.fontsSync();
        return [...this.bundled, ...this.registered];
    }

    render(text: string, font: string, options: { width: number }): string {
        if (!this.isFont(font)) {
            throw new BannerError('UNKNOWN_FONT', `Font '${font}' is not loaded`);
        }
        return figlet.textSync(text, {
            font,
            width: options.width,
            whitespaceBreak: true,
        });
    }

    loadFont(name: string, contents: string): void {
        try {
            figlet.parseFont(name, contents);
        } catch (error) {
            throw new BannerError('INVALID_FONT_FILE', `Could not parse font '${name}'`, { cause: error });
        }
        this.registered.add(name);
    }

    // Bundled names and names registered through parseFont are both
    // accepted by textSync.
    private isFont(name: string): name is FigletFont {
        return this.listFonts().includes(name);
    }
}
