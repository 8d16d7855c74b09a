/**
 * Tests for first-run detection utilities (non-React functions only).
 *
 * @module ui/useFirstRun.test
 */
import { describe, test, expect } from 'vitest';
import { MemoryFileSystem } from '../fakes.js';
import { isFirstRun, markFirstRunComplete } from '../../src/ui/hooks/useFirstRun.js';

const HOME = '/home/test/.ascii-banner';

describe('First-run detection (filesystem logic)', () => {
    test('isFirstRun returns true when marker file is missing', () => {
        // Arrange
        const fs = new MemoryFileSystem();

        // Act
        const result = isFirstRun(fs, HOME);

        // Assert
        expect(result).toBe(true);
    });

    test('markFirstRunComplete makes subsequent isFirstRun false', async () => {
        // Arrange
        const fs = new MemoryFileSystem();

        // Act
        await markFirstRunComplete(fs, HOME);

        // Assert
        expect(isFirstRun(fs, HOME)).toBe(false);
        expect(fs.files.has(`${HOME}/.first-run-complete`)).toBe(true);
    });

    test('markFirstRunComplete logs instead of throwing on filesystem errors', async () => {
        // Arrange
        const fs = new MemoryFileSystem();
        fs.mkdir = async () => {
            throw new Error('permission denied');
        };

        // Act / Assert
        await expect(markFirstRunComplete(fs, HOME)).resolves.toBeUndefined();
        expect(isFirstRun(fs, HOME)).toBe(true);
    });
});
