/**
 * Tests for BannerGenerator with a fake glyph renderer.
 *
 * @module test/generator
 */
import { describe, test, expect, beforeEach } from 'vitest';
import { BannerGenerator } from '../src/generator.js';
import { FontManager } from '../src/fonts/font-manager.js';
import { BannerError } from '../src/errors.js';
import { stripAnsi } from '../src/render/ansi.js';
import { FAKE_CATALOG, FakeRenderer } from './fakes.js';

describe('BannerGenerator', () => {
    let renderer: FakeRenderer;
    let fonts: FontManager;

    beforeEach(() => {
        renderer = new FakeRenderer();
        fonts = new FontManager({ renderer, catalog: FAKE_CATALOG });
    });

    test.each(['', '   ', '\n'])('rejects the text %j', text => {
        try {
            new BannerGenerator(text, {}, { fonts });
            expect.unreachable();
        } catch (error) {
            expect(error instanceof BannerError && error.code).toBe('EMPTY_TEXT');
        }
    });

    test('rejects invalid style input up front', () => {
        expect(() => new BannerGenerator('Hi', { padding: -1 }, { fonts })).toThrow(BannerError);
    });

    test('renders glyphs through the layout pipeline', async () => {
        // Arrange
        const generator = new BannerGenerator('Hi', { border: 'ascii' }, { fonts });

        // Act
        const rendered = await generator.render();

        // Assert
        expect(rendered.glyphs).toEqual(['Hi', '  ', '==']);
        expect(rendered.banner.lines).toEqual(['+----+', '| Hi |', '|    |', '| == |', '+----+']);
        expect(rendered.plain).toBe('+----+\n| Hi |\n|    |\n| == |\n+----+');
        expect(renderer.calls).toEqual([{ text: 'Hi', font: 'Standard', width: 80 }]);
    });

    test('applies overrides for a single render', async () => {
        // Arrange
        const generator = new BannerGenerator('Hi', { font: 'slant' }, { fonts });

        // Act
        const rendered = await generator.render({ compact: true, width: 40 });

        // Assert
        expect(rendered.plain).toBe('Hi\n==');
        expect(rendered.style.font).toBe('slant');
        expect(renderer.calls.at(-1)).toEqual({ text: 'Hi', font: 'Slant', width: 40 });
        expect(generator.style.compact).toBe(false);
    });

    test('colors the terminal output only', async () => {
        // Arrange
        const generator = new BannerGenerator('Hi', { color: 'red', compact: true }, { fonts });

        // Act
        const rendered = await generator.render();

        // Assert
        expect(rendered.plain).toBe('Hi\n==');
        expect(rendered.ansi).not.toBe(rendered.plain);
        expect(stripAnsi(rendered.ansi)).toBe(rendered.plain);
    });

    test('fails with suggestions for an unknown font', async () => {
        // Arrange
        const generator = new BannerGenerator('Hi', { font: 'slnt' }, { fonts });

        // Act
        const error = await generator.render().catch((e: unknown) => e);

        // Assert
        expect(error instanceof BannerError && error.code).toBe('UNKNOWN_FONT');
        expect(error instanceof BannerError && error.suggestions).toEqual(['Slant']);
    });

    test('summarizes itself as a record', async () => {
        // Arrange
        const generator = new BannerGenerator('Hi', { border: 'ascii', compact: true }, { fonts });

        // Act
        const record = await generator.toRecord();

        // Assert
        expect(record).toEqual({
            text: 'Hi',
            style: {
                font: 'standard',
                border: 'ascii',
                padding: 0,
                width: 80,
                alignment: 'left',
                compact: true,
                shadow: false,
                shadowColor: 'bright_black',
                bold: false,
            },
            output: {
                plain: '+----+\n| Hi |\n| == |\n+----+',
                ansi: '+----+\n| Hi |\n| == |\n+----+',
            },
        });
    });

    test('previews available fonts and skips the rest', async () => {
        // Arrange
        const generator = new BannerGenerator('Hi', { compact: true }, { fonts });

        // Act
        const previews = await generator.previewFonts(['slant', 'missing', 'big']);

        // Assert
        expect(previews).toEqual([
            { font: 'Slant', output: 'Hi\n==' },
            { font: 'Big', output: 'Hi\n==' },
        ]);
    });

    test('previews sample text in place of its own', async () => {
        // Arrange
        const generator = new BannerGenerator('Hi', { compact: true }, { fonts });

        // Act
        const previews = await generator.previewFonts(['small'], 'Yo');

        // Assert
        expect(previews).toEqual([{ font: 'Small', output: 'Yo\n==' }]);
    });

    test('uses the default preview fonts that are available', async () => {
        // Act
        const previews = await new BannerGenerator('Hi', {}, { fonts }).previewFonts();

        // Assert
        expect(previews.map(p => p.font)).toEqual(['Standard', 'Slant', '3-D', 'Big']);
    });
});
