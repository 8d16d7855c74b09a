/**
 * Tests for exit code utilities.
 *
 * @module utils/exit-codes.test
 */
import { describe, test, expect } from 'vitest';
import { BannerError, type BannerErrorCode } from '@ascii-banner/core';
import {
    EXIT,
    exitCodeFor,
    getExitCodeDescription,
    parseFailureExitCode,
} from '../../src/utils/exit-codes.js';

describe('Exit code utilities', () => {
    describe('getExitCodeDescription', () => {
        test.each([
            [EXIT.SUCCESS, 'Success'],
            [EXIT.GENERAL_ERROR, 'General error'],
            [EXIT.INVALID_INPUT, 'Invalid input'],
            [EXIT.NOT_FOUND, 'Not found'],
            [EXIT.PARSE_ERROR, 'Malformed file'],
            [EXIT.WRITE_ERROR, 'Write failed'],
            [EXIT.UNKNOWN_COMMAND, 'Unknown command'],
        ])('describes exit code %i as %s', (code, expected) => {
            // Act
            const result = getExitCodeDescription(code);

            // Assert
            expect(result).toBe(expected);
        });
    });

    describe('exitCodeFor', () => {
        test.each<[BannerErrorCode, number]>([
            ['EMPTY_TEXT', 2],
            ['INVALID_COLOR', 2],
            ['UNSUPPORTED_FORMAT', 2],
            ['UNKNOWN_FONT', 3],
            ['UNKNOWN_TEMPLATE', 3],
            ['INVALID_TEMPLATE', 4],
            ['INVALID_EXPORT', 4],
            ['WRITE_FAILED', 5],
        ])('maps %s to %i', (code, expected) => {
            // Arrange
            const error = new BannerError(code, 'test failure');

            // Act / Assert
            expect(exitCodeFor(error)).toBe(expected);
        });

        test('maps any other error to a general error', () => {
            // Act / Assert
            expect(exitCodeFor(new TypeError('boom'))).toBe(EXIT.GENERAL_ERROR);
            expect(exitCodeFor('boom')).toBe(EXIT.GENERAL_ERROR);
        });
    });

    describe('parseFailureExitCode', () => {
        const known = new Set(['generate', 'fonts', 'i']);

        test('reports an unrecognised first word as an unknown command', () => {
            // Act / Assert
            expect(parseFailureExitCode(['--json', 'genrate', 'Hi'], known)).toBe(EXIT.UNKNOWN_COMMAND);
        });

        test('reports bad arguments to a known command as invalid input', () => {
            // Act / Assert
            expect(parseFailureExitCode(['generate', '--border', 'wavy'], known)).toBe(EXIT.INVALID_INPUT);
        });

        test('treats a flag-only invocation as invalid input', () => {
            // Act / Assert
            expect(parseFailureExitCode(['--bogus'], known)).toBe(EXIT.INVALID_INPUT);
        });
    });
});
