/**
 * Tests for style resolution shared by the banner commands.
 *
 * @module commands/engine.test
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { bannerOutput, resolveStyle, styleFlags, type Engine } from '../../src/commands/engine.js';
import { makeEngine, makeTempDir } from '../fakes.js';

let home: string;
let cleanupHome: () => Promise<void>;

beforeEach(async () => {
    ({ dir: home, cleanup: cleanupHome } = await makeTempDir('engine'));
});

afterEach(async () => {
    await cleanupHome();
});

async function engineWithConfig(config?: string): Promise<Engine> {
    if (config !== undefined) {
        await writeFile(join(home, 'config.yaml'), config);
    }
    return makeEngine(home);
}

describe('styleFlags', () => {
    it('maps flag names onto style fields and drops unset flags', () => {
        expect(styleFlags({ background: 'black', align: 'right', shadow: false, template: 'retro' }))
            .toEqual({ backgroundColor: 'black', alignment: 'right', shadow: false });
    });
});

describe('createEngine', () => {
    it('places templates and fonts under the home directory', async () => {
        // Act
        const engine = await engineWithConfig();

        // Assert
        expect(engine.config.templatesDir).toBe(join(home, 'templates'));
        expect(engine.config.fontsDir).toBe(join(home, 'fonts'));
        expect(engine.config.defaults).toEqual({});
    });
});

describe('resolveStyle', () => {
    it('layers config defaults, scheme and flags', async () => {
        // Arrange
        const engine = await engineWithConfig('defaults:\n  font: slant\n  padding: 3\n');

        // Act
        const { style, template } = await resolveStyle(engine, { scheme: 'ocean', padding: 1 });

        // Assert
        expect(template).toBeUndefined();
        expect(style).toMatchObject({
            font: 'slant',
            padding: 1,
            color: 'gradient:blue-cyan',
            borderColor: 'blue',
            shadowColor: 'bright_blue',
        });
    });

    it('keeps template values that no flag overrides', async () => {
        // Arrange
        const engine = await engineWithConfig();

        // Act
        const { style, template } = await resolveStyle(engine, { template: 'neon', shadow: undefined, border: 'ascii' });

        // Assert
        expect(template?.name).toBe('neon');
        expect(style).toMatchObject({ font: 'big', border: 'ascii', shadow: true, shadowColor: 'bright_magenta' });
    });

    it('lets --no-shadow turn off a template shadow', async () => {
        // Arrange
        const engine = await engineWithConfig();

        // Act
        const { style } = await resolveStyle(engine, { template: 'neon', shadow: false });

        // Assert
        expect(style.shadow).toBe(false);
    });

    it('rejects unknown schemes', async () => {
        // Arrange
        const engine = await engineWithConfig();

        // Act
        const error = await resolveStyle(engine, { scheme: 'lava' }).catch((e: unknown) => e);

        // Assert
        expect(error).toBeInstanceOf(Error);
    });
});

describe('bannerOutput', () => {
    it('picks the plain text when colors are off', () => {
        expect(bannerOutput({ plain: 'a', ansi: '\u001b[31ma\u001b[0m' }, true)).toBe('a');
        expect(bannerOutput({ plain: 'a', ansi: '\u001b[31ma\u001b[0m' }, false)).toBe('\u001b[31ma\u001b[0m');
    });
});
