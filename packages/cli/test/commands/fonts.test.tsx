/**
 * Tests for the fonts command and `fonts add`.
 *
 * @module commands/fonts.test
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { render, waitFor, defaultTestContext } from '../../src/test-utils/render.js';
import { AddFont, Fonts, addFont, listFonts, runAddFont, runFonts } from '../../src/commands/fonts.js';
import type { Engine } from '../../src/commands/engine.js';
import type { CommandContext } from '../../src/commands/types.js';
import { FAKE_FLF, captureOutput, makeEngine, makeTempDir } from '../fakes.js';

describe('Fonts command', () => {
    let dir: string;
    let cleanupDir: () => Promise<void>;
    let engine: Engine;

    const quiet: CommandContext = { ...defaultTestContext, mode: 'quiet' };
    const json: CommandContext = { ...defaultTestContext, mode: 'json' };

    beforeEach(async () => {
        ({ dir, cleanup: cleanupDir } = await makeTempDir('fonts'));
        engine = await makeEngine(dir);
    });

    afterEach(async () => {
        await cleanupDir();
    });

    describe('listFonts', () => {
        it('lists every available font, sorted', async () => {
            // Act
            const result = await listFonts({}, engine);

            // Assert
            expect(result.kind).toBe('list');
            if (result.kind !== 'list') return;
            expect(result.title).toBe('All available fonts');
            expect(result.fonts.map(f => f.name)).toEqual(['Banner', 'Big', 'Larry 3D', 'Slant', 'Small', 'Standard']);
        });

        it('lists the fonts of a category in catalog order', async () => {
            // Act
            const result = await listFonts({ category: 'standard' }, engine);

            // Assert
            expect(result.kind === 'list' && result.fonts.map(f => f.name)).toEqual(['Standard', 'Small', 'Big', 'Banner']);
        });

        it('prefers the category over a search', async () => {
            // Act
            const result = await listFonts({ category: 'retro', search: 'sl' }, engine);

            // Assert
            expect(result.kind === 'list' && result.title).toBe("Fonts in category 'retro'");
            expect(result.kind === 'list' && result.fonts.map(f => f.name)).toEqual(['Larry 3D']);
        });

        it('searches names without regard to case', async () => {
            // Act
            const result = await listFonts({ search: 'S' }, engine);

            // Assert
            expect(result.kind === 'list' && result.fonts.map(f => f.name)).toEqual(['Slant', 'Small', 'Standard']);
        });

        it('reports catalog membership for each font', async () => {
            // Act
            const result = await listFonts({ search: 'larry' }, engine);

            // Assert
            expect(result.kind === 'list' && result.fonts[0]).toMatchObject({
                name: 'Larry 3D',
                categories: ['retro'],
                recommendedFor: ['logos'],
                custom: false,
            });
        });

        it('renders samples with the sample text', async () => {
            // Act
            const result = await listFonts({ category: 'slanted', sample: true, sampleText: 'Yo' }, engine);

            // Assert
            expect(result).toEqual({
                kind: 'samples',
                title: "Fonts in category 'slanted'",
                samples: [{ font: 'Slant', sample: 'Yo\n  \n==\n' }],
                total: 1,
            });
        });

        it('lists the categories and use cases', async () => {
            // Act
            const result = await listFonts({ categories: true, category: 'retro' }, engine);

            // Assert
            expect(result.kind).toBe('categories');
            if (result.kind !== 'categories') return;
            expect(result.categories).toContain('slanted');
            expect(result.useCases).toEqual(['headers', 'titles', 'code', 'logos', 'fun']);
        });

        it('gives an empty list for an unknown category', async () => {
            // Act
            const result = await listFonts({ category: 'nope' }, engine);

            // Assert
            expect(result.kind === 'list' && result.fonts).toEqual([]);
        });
    });

    describe('Fonts component', () => {
        it('shows a table of fonts with a count', async () => {
            // Act
            const { lastFrame } = render(
                <Fonts options={{ category: 'standard' }} context={defaultTestContext} engine={engine} autoExit={false} />,
            );
            await waitFor(() => (lastFrame() ?? '').includes('4 fonts'));

            // Assert
            const frame = lastFrame() ?? '';
            expect(frame).toContain("Fonts in category 'standard'");
            expect(frame).toContain('Recommended for');
            expect(frame).toContain('4 fonts');
        });

        it('warns when nothing matches', async () => {
            // Act
            const { lastFrame } = render(
                <Fonts options={{ search: 'zzz' }} context={defaultTestContext} engine={engine} autoExit={false} />,
            );
            await waitFor(() => (lastFrame() ?? '').includes('No fonts found'));

            // Assert
            expect(lastFrame()).toContain("Run 'ascii-banner fonts --categories' to see the categories");
        });
    });

    describe('runFonts', () => {
        it('prints one name per line in quiet mode', async () => {
            // Arrange
            const output = captureOutput();

            // Act
            await runFonts({ category: 'retro' }, quiet, engine);

            // Assert
            expect(output.stdout()).toBe('Larry 3D\n');
            expect(output.exitCode()).toBe(0);
        });

        it('prints the listing as JSON', async () => {
            // Arrange
            const output = captureOutput();

            // Act
            await runFonts({ search: 'larry' }, json, engine);

            // Assert
            expect(JSON.parse(output.stdout())).toEqual({
                success: true,
                title: "Fonts matching 'larry'",
                count: 1,
                fonts: [{ name: 'Larry 3D', categories: ['retro'], recommendedFor: ['logos'], custom: false }],
            });
        });

        it('prints each sample under its font name in quiet mode', async () => {
            // Arrange
            const output = captureOutput();

            // Act
            await runFonts({ category: 'slanted', sample: true, sampleText: 'Yo' }, quiet, engine);

            // Assert
            expect(output.stdout()).toBe('Slant\nYo\n  \n==\n\n');
        });
    });

    describe('fonts add', () => {
        it('copies the font into the font directory and stores its description', async () => {
            // Arrange
            const file = join(dir, 'Mine.flf');
            await writeFile(file, FAKE_FLF);

            // Act
            const result = await addFont(file, 'hand drawn', engine);

            // Assert
            expect(result).toEqual({ name: 'Mine' });
            expect(await readFile(join(dir, 'fonts', 'Mine.flf'), 'utf-8')).toBe(FAKE_FLF);
            const listed = await listFonts({ search: 'mine' }, engine);
            expect(listed.kind === 'list' && listed.fonts[0]).toMatchObject({
                name: 'Mine',
                custom: true,
                metadata: { description: 'hand drawn' },
            });
        });

        it('rejects a file that is not a FIGlet font', async () => {
            // Arrange
            const output = captureOutput();
            const file = join(dir, 'notes.txt');
            await writeFile(file, 'hello');

            // Act
            await runAddFont(file, undefined, quiet, engine);

            // Assert
            expect(output.stderr()).toBe(
                `Error: Not a FIGlet font file: ${file}\nHint: Custom fonts must be existing .flf files\n`,
            );
            expect(output.exitCode()).toBe(4);
        });

        it('prints the font name in quiet mode', async () => {
            // Arrange
            const output = captureOutput();
            const file = join(dir, 'Mine.flf');
            await writeFile(file, FAKE_FLF);

            // Act
            await runAddFont(file, undefined, quiet, engine);

            // Assert
            expect(output.stdout()).toBe('Mine\n');
        });

        it('suggests trying the new font', async () => {
            // Arrange
            const file = join(dir, 'Mine.flf');
            await writeFile(file, FAKE_FLF);

            // Act
            const { lastFrame } = render(
                <AddFont file={file} context={defaultTestContext} engine={engine} autoExit={false} />,
            );
            await waitFor(() => (lastFrame() ?? '').includes('Added'));

            // Assert
            expect(lastFrame()).toContain("Added font 'Mine'");
            expect(lastFrame()).toContain('Try: ascii-banner generate "Hello" --font "Mine"');
        });
    });
});
