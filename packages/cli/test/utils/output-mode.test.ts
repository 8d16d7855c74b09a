/**
 * Tests for output mode utilities.
 *
 * @module utils/output-mode.test
 */
import { describe, test, expect, afterEach, vi } from 'vitest';
import {
    parseOutputConfig,
    shouldUseInk,
    shouldUseColors,
} from '../../src/utils/output-mode.js';

describe('Output mode utilities', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    describe('parseOutputConfig', () => {
        test('defaults to rich mode with colors', () => {
            // Arrange
            const args: string[] = [];

            // Act
            const config = parseOutputConfig(args);

            // Assert
            expect(config.mode).toBe('rich');
            expect(config.noColor).toBe(false);
        });

        test('detects --json flag', () => {
            // Arrange
            const args = ['generate', '--json', 'Hello'];

            // Act
            const config = parseOutputConfig(args);

            // Assert
            expect(config.mode).toBe('json');
        });

        test('detects --quiet flag', () => {
            // Arrange
            const args = ['generate', '--quiet'];

            // Act
            const config = parseOutputConfig(args);

            // Assert
            expect(config.mode).toBe('quiet');
        });

        test('detects -q short flag', () => {
            // Arrange
            const args = ['-q', 'generate'];

            // Act
            const config = parseOutputConfig(args);

            // Assert
            expect(config.mode).toBe('quiet');
        });

        test('detects --no-color flag', () => {
            // Arrange
            const args = ['generate', '--no-color'];

            // Act
            const config = parseOutputConfig(args);

            // Assert
            expect(config.noColor).toBe(true);
        });

        test('detects NO_COLOR environment variable', () => {
            // Arrange
            vi.stubEnv('NO_COLOR', '1');
            const args: string[] = [];

            // Act
            const config = parseOutputConfig(args);

            // Assert
            expect(config.noColor).toBe(true);
        });

        test('detects TERM=dumb environment', () => {
            // Arrange
            vi.stubEnv('TERM', 'dumb');
            const args: string[] = [];

            // Act
            const config = parseOutputConfig(args);

            // Assert
            expect(config.noColor).toBe(true);
        });

        test('includes cwd in config', () => {
            // Arrange
            const args: string[] = [];

            // Act
            const config = parseOutputConfig(args);

            // Assert
            expect(config.cwd).toBe(process.cwd());
        });
    });

    describe('shouldUseInk', () => {
        test.each([
            { mode: 'rich' as const, expected: true },
            { mode: 'json' as const, expected: false },
            { mode: 'quiet' as const, expected: false },
        ])('returns $expected for $mode mode', ({ mode, expected }) => {
            // Arrange
            const config = { mode, noColor: false, cwd: '/test' };

            // Act / Assert
            expect(shouldUseInk(config)).toBe(expected);
        });
    });

    describe('shouldUseColors', () => {
        test.each([
            { mode: 'rich' as const, noColor: false, expected: true },
            { mode: 'rich' as const, noColor: true, expected: false },
            { mode: 'json' as const, noColor: false, expected: false },
        ])('returns $expected for $mode mode (noColor=$noColor)', ({ mode, noColor, expected }) => {
            // Arrange
            const config = { mode, noColor, cwd: '/test' };

            // Act / Assert
            expect(shouldUseColors(config)).toBe(expected);
        });
    });
});
