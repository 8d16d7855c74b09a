/**
 * Test doubles for the banner engine.
 *
 * @module test/fakes
 */
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { GlyphRenderer } from '../src/fonts/renderer.js';
import { parseFontCatalog, type FontCatalog } from '../src/fonts/catalog.js';

/**
 * Renders text as three rows: the text itself, a blank row and a row of
 * `=` the same width. Fonts only change which names are accepted.
 */
export class FakeRenderer implements GlyphRenderer {
    readonly loaded = new Map<string, string>();
    readonly calls: Array<{ text: string; font: string; width: number }> = [];

    constructor(private readonly fonts: readonly string[] = FAKE_FONTS) {}

    listFonts(): string[] {
        return [...this.fonts, ...this.loaded.keys()];
    }

    render(text: string, font: string, options: { width: number }): string {
        this.calls.push({ text, font, width: options.width });
        const width = Array.from(text).length;
        return `${text}\n${' '.repeat(width)}\n${'='.repeat(width)}\n`;
    }

    loadFont(name: string, contents: string): void {
        if (!contents.startsWith('flf2a')) {
            throw new Error(`bad font header in ${name}`);
        }
        this.loaded.set(name, contents);
    }
}

export const FAKE_FONTS: readonly string[] = ['Standard', 'Slant', 'Big', 'Larry 3D', '3-D', 'Small'];

export const FAKE_CATALOG: FontCatalog = parseFontCatalog({
    categories: {
        standard: ['standard', 'small', 'big', 'banner'],
        retro: ['larry3d', 'doom'],
    },
    recommended: {
        logos: ['3-d', 'larry3d'],
    },
});

/** Minimal FIGlet header accepted by {@link FakeRenderer}. */
export const FAKE_FLF = 'flf2a$ 1 1 10 -1 1\ntest font\n';

/**
 * Create an isolated temp directory; returns it with a cleanup callback.
 */
export async function makeTempDir(prefix: string): Promise<{ dir: string; cleanup: () => Promise<void> }> {
    const dir = await mkdtemp(join(tmpdir(), `${prefix}-`));
    return {
        dir,
        cleanup: () => rm(dir, { recursive: true, force: true }),
    };
}
