/**
 * Banner generation: glyphs → layout pipeline → terminal output.
 *
 * @module generator
 */
import { BannerError } from './errors.js';
import { FontManager } from './fonts/font-manager.js';
import { decorate, type DecorateOptions } from './layout/decorate.js';
import { toBlock } from './layout/text-block.js';
import { createLogger } from './logger.js';
import { renderAnsi } from './render/ansi.js';
import { createStyle, mergeStyle, styleToRecord } from './style/style.js';
import type { BannerStyle, RenderedBanner, StyleInput, StyleRecord } from './types.js';

const log = createLogger('Generator');

export const DEFAULT_PREVIEW_FONTS: readonly string[] = [
    'standard', 'slant', '3-d', 'banner', 'big', 'block', 'bubble', 'digital',
];

export interface GeneratorOptions {
    fonts?: FontManager;
    decorate?: DecorateOptions;
}

/**
 * Serializable summary of a generated banner.
 */
export interface BannerRecord {
    text: string;
    style: StyleRecord;
    output: {
        plain: string;
        ansi: string;
    };
}

export interface FontPreview {
    font: string;
    output: string;
}

/**
 * Renders one piece of text with a style.
 *
 * ```ts
 * const generator = new BannerGenerator('Hello', { font: 'slant', border: 'rounded' });
 * const { plain } = await generator.render();
 * ```
 */
export class BannerGenerator {
    readonly text: string;
    readonly style: BannerStyle;
    readonly fonts: FontManager;
    private readonly decorateOptions: DecorateOptions;

    /**
     * @throws {BannerError} `EMPTY_TEXT` for empty or whitespace-only text,
     *         or a style error for invalid style input
     */
    constructor(text: string, style: StyleInput = {}, options: GeneratorOptions = {}) {
        if (text.trim() === '') {
            throw new BannerError('EMPTY_TEXT', 'Banner text must not be empty', {
                hint: 'Pass the text to render, e.g. ascii-banner generate "Hello"',
            });
        }
        this.text = text;
        this.style = createStyle(style);
        this.fonts = options.fonts ?? new FontManager();
        this.decorateOptions = options.decorate ?? {};
    }

    /**
     * Render with `overrides` applied on top of the generator's style.
     *
     * @throws {BannerError} `UNKNOWN_FONT` when the style names a missing font
     */
    async render(overrides: StyleInput = {}): Promise<RenderedBanner> {
        const style = mergeStyle(this.style, overrides);
        return log.timed(`render '${style.font}'`, async () => {
            const font = await this.fonts.resolveFont(style.font);
            const glyphs = toBlock(this.fonts.renderer.render(this.text, font, { width: style.width }));
            const banner = decorate(glyphs, style, this.decorateOptions);
            return {
                text: this.text,
                style,
                glyphs,
                banner,
                plain: banner.lines.join('\n'),
                ansi: renderAnsi(banner, { bold: style.bold, backgroundColor: style.backgroundColor }),
            };
        });
    }

    async toRecord(): Promise<BannerRecord> {
        const rendered = await this.render();
        return {
            text: this.text,
            style: styleToRecord(rendered.style),
            output: { plain: rendered.plain, ansi: rendered.ansi },
        };
    }

    /**
     * The text (or `sampleText`) in each font of the list that is
     * available. Missing fonts are skipped.
     */
    async previewFonts(
        fonts: readonly string[] = DEFAULT_PREVIEW_FONTS,
        sampleText?: string,
    ): Promise<FontPreview[]> {
        const generator = sampleText === undefined || sampleText.trim() === ''
            ? this
            : new BannerGenerator(sampleText, this.style, { fonts: this.fonts, decorate: this.decorateOptions });

        const previews: FontPreview[] = [];
        for (const name of fonts) {
            if (!await this.fonts.validateFont(name)) {
                log.info('preview font unavailable', { font: name });
                continue;
            }
            const font = await this.fonts.resolveFont(name);
            const rendered = await generator.render({ font });
            previews.push({ font, output: rendered.plain });
        }
        return previews;
    }
}
