/**
 * Tests for ANSI terminal output.
 *
 * @module test/ansi
 */
import { describe, test, expect } from 'vitest';
import { renderAnsi, stripAnsi } from '../src/render/ansi.js';
import { colorRuns } from '../src/render/runs.js';
import { decorate } from '../src/layout/decorate.js';
import { createStyle } from '../src/style/style.js';

const ESC = '\u001b';
const RED_OPEN = `${ESC}[38;2;255;0;0m`;
const FG_CLOSE = `${ESC}[39m`;

describe('colorRuns', () => {
    test('groups neighbouring cells of the same color', () => {
        expect(colorRuns('aab c', ['#f00000', '#f00000', '#00f000', undefined, undefined])).toEqual([
            { text: 'aa', color: '#f00000' },
            { text: 'b', color: '#00f000' },
            { text: ' c', color: undefined },
        ]);
    });
});

describe('renderAnsi', () => {
    test('equals the plain text when nothing is colored', () => {
        // Arrange
        const banner = decorate(['ab', 'cd'], createStyle({ border: 'ascii' }));

        // Act
        const output = renderAnsi(banner);

        // Assert
        expect(output).toBe(banner.lines.join('\n'));
    });

    test('wraps each run of a color in one truecolor sequence', () => {
        // Arrange
        const banner = decorate(['a b'], createStyle({ color: 'red' }));

        // Act
        const output = renderAnsi(banner);

        // Assert
        expect(output).toBe(`${RED_OPEN}a${FG_CLOSE} ${RED_OPEN}b${FG_CLOSE}`);
    });

    test('adds bold to colored runs', () => {
        // Arrange
        const banner = decorate(['ab'], createStyle({ color: 'red', bold: true }));

        // Act
        const output = renderAnsi(banner, { bold: true });

        // Assert
        expect(output).toContain(`${ESC}[1m`);
        expect(stripAnsi(output)).toBe('ab');
    });

    test('emits no escapes at color level 0', () => {
        // Arrange
        const banner = decorate(['ab'], createStyle({ color: 'gradient:red-blue', shadow: true }));

        // Act
        const output = renderAnsi(banner, { level: 0 });

        // Assert
        expect(output).toBe('ab \n ░░');
    });

    test('stripping the escapes gives back the plain lines', () => {
        // Arrange
        const banner = decorate(['/\\', '\\/'], createStyle({
            color: 'gradient:red-yellow-blue', border: 'double', shadow: true, backgroundColor: 'black',
        }));

        // Act
        const output = renderAnsi(banner, { backgroundColor: 'black' });

        // Assert
        expect(stripAnsi(output)).toBe(banner.lines.join('\n'));
    });
});
