/**
 * Tests for loading the user configuration file.
 *
 * @module test/config
 */
import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { loadConfig, resolveHome } from '../src/config.js';
import { BannerError } from '../src/errors.js';
import { makeTempDir } from './fakes.js';

describe('resolveHome', () => {
    test('prefers the environment variable', () => {
        expect(resolveHome({ ASCII_BANNER_HOME: '/tmp/banner-home' })).toBe(resolve('/tmp/banner-home'));
    });

    test.each([undefined, '', '  '])('falls back to ~/.ascii-banner for %j', value => {
        expect(resolveHome({ ASCII_BANNER_HOME: value })).toBe(join(homedir(), '.ascii-banner'));
    });
});

describe('loadConfig', () => {
    let home: string;
    let cleanup: () => Promise<void>;

    beforeEach(async () => {
        ({ dir: home, cleanup } = await makeTempDir('config-test'));
    });

    afterEach(async () => {
        await cleanup();
    });

    async function configError(content: string): Promise<BannerError> {
        await writeFile(join(home, 'config.yaml'), content);
        const error = await loadConfig({ home }).catch((e: unknown) => e);
        if (!(error instanceof BannerError)) {
            throw new Error('expected a BannerError');
        }
        return error;
    }

    test('uses directories under home when there is no file', async () => {
        // Act
        const config = await loadConfig({ home });

        // Assert
        expect(config).toEqual({
            home,
            configPath: join(home, 'config.yaml'),
            templatesDir: join(home, 'templates'),
            fontsDir: join(home, 'fonts'),
            defaults: {},
        });
    });

    test('reads the home directory from the environment', async () => {
        const config = await loadConfig({ env: { ASCII_BANNER_HOME: home } });

        expect(config.home).toBe(resolve(home));
    });

    test('treats an empty file as no configuration', async () => {
        // Arrange
        await writeFile(join(home, 'config.yaml'), '');

        // Act & Assert
        expect((await loadConfig({ home })).defaults).toEqual({});
    });

    test('resolves directories against home and reads defaults', async () => {
        // Arrange
        await writeFile(join(home, 'config.yaml'), [
            'templates_dir: my-templates',
            'fontsDir: /opt/fonts',
            'defaults:',
            '  font: slant',
            '  border_color: cyan',
            '',
        ].join('\n'));

        // Act
        const config = await loadConfig({ home });

        // Assert
        expect(config.templatesDir).toBe(join(home, 'my-templates'));
        expect(config.fontsDir).toBe(resolve('/opt/fonts'));
        expect(config.defaults).toEqual({ font: 'slant', borderColor: 'cyan' });
    });

    test.each([
        ['malformed YAML', 'defaults: [slant'],
        ['a list', '- a\n- b\n'],
        ['a directory that is not a path', 'fonts_dir: 3\n'],
        ['invalid defaults', 'defaults:\n  border: wavy\n'],
    ])('rejects %s', async (_label, content) => {
        const error = await configError(content);

        expect(error.code).toBe('INVALID_OPTION');
        expect(error.message.startsWith(`Invalid configuration in ${join(home, 'config.yaml')}`)).toBe(true);
    });
});
