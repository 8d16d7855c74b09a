/**
 * Tests for the structured logger.
 *
 * @module test/logger
 */
import { describe, test, expect, afterEach, vi } from 'vitest';
import { createLogger } from '../src/logger.js';
import { getRuntimeSettings, setRuntimeSettings } from '../src/runtime-settings.js';

describe('createLogger', () => {
    const initial = getRuntimeSettings();

    afterEach(() => {
        setRuntimeSettings(initial);
    });

    test('writes warnings to stderr with the component prefix', () => {
        // Arrange
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        // Act
        createLogger('Fonts').warn('skipped', { path: '/home/user/fonts/odd.flf', reason: 'bad header' });

        // Assert
        expect(warn).toHaveBeenCalledWith('[ascii-banner:Fonts] WARN skipped {"path":"odd.flf","reason":"bad header"}');
    });

    test('writes errors without context', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        createLogger('Export').error('failed');

        expect(error).toHaveBeenCalledWith('[ascii-banner:Export] ERROR failed');
    });

    test('keeps info messages quiet unless enabled', () => {
        // Arrange
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const log = createLogger('Config');

        // Act
        setRuntimeSettings({ infoLogs: false });
        log.info('hidden');
        setRuntimeSettings({ infoLogs: true });
        log.info('shown');

        // Assert
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn).toHaveBeenCalledWith('[ascii-banner:Config] shown');
    });

    test('timed returns the result and rethrows failures', async () => {
        // Arrange
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const log = createLogger('Render');

        // Act & Assert
        expect(await log.timed('ok', () => 42)).toBe(42);
        await expect(log.timed('boom', () => Promise.reject(new Error('nope')))).rejects.toThrow('nope');
        expect(error).toHaveBeenCalledTimes(1);
    });
});
