/**
 * Tests for style construction, validation and serialization.
 *
 * @module test/style
 */
import { describe, test, expect } from 'vitest';
import {
    applyColorScheme,
    createStyle,
    DEFAULT_STYLE,
    mergeStyle,
    readStyleInput,
    styleFromRecord,
    styleToRecord,
    styleToTemplateFields,
} from '../src/style/style.js';
import { getBorderChars } from '../src/style/borders.js';
import { BannerError, type BannerErrorCode } from '../src/errors.js';

function errorCode(fn: () => unknown): BannerErrorCode | undefined {
    try {
        fn();
    } catch (error) {
        return error instanceof BannerError ? error.code : undefined;
    }
    return undefined;
}

describe('createStyle', () => {
    test('fills every field from the defaults', () => {
        // Act
        const style = createStyle();

        // Assert
        expect(style).toEqual({
            font: 'standard',
            border: 'none',
            padding: 0,
            width: 80,
            alignment: 'left',
            compact: false,
            shadow: false,
            shadowColor: 'bright_black',
            bold: false,
        });
        expect(style).toEqual(DEFAULT_STYLE);
    });

    test('normalizes the case of enums and colors', () => {
        // Act
        const style = createStyle({ border: 'DOUBLE', alignment: 'Center', color: 'Blue' });

        // Assert
        expect(style.border).toBe('double');
        expect(style.alignment).toBe('center');
        expect(style.color).toBe('blue');
    });

    test('rejects an unknown border and lists the valid ones', () => {
        // Act
        let caught: unknown;
        try {
            createStyle({ border: 'wavy' });
        } catch (error) {
            caught = error;
        }

        // Assert
        expect(caught).toBeInstanceOf(BannerError);
        if (caught instanceof BannerError) {
            expect(caught.code).toBe('INVALID_STYLE');
            expect(caught.message).toBe("Unknown border style 'wavy'");
            expect(caught.suggestions).toContain('rounded');
        }
    });

    test('rejects an unknown alignment instead of falling back to left', () => {
        expect(errorCode(() => createStyle({ alignment: 'middle' }))).toBe('INVALID_STYLE');
    });

    test.each([
        [{ padding: 21 }],
        [{ padding: -1 }],
        [{ padding: 1.5 }],
        [{ width: 9 }],
        [{ width: 1001 }],
        [{ font: '   ' }],
    ])('rejects out-of-range value %j', input => {
        expect(errorCode(() => createStyle(input))).toBe('INVALID_STYLE');
    });

    test('rejects invalid colors', () => {
        expect(errorCode(() => createStyle({ borderColor: 'purple' }))).toBe('INVALID_COLOR');
    });
});

describe('mergeStyle', () => {
    test('applies only the defined overrides', () => {
        // Arrange
        const base = createStyle({ font: 'slant', padding: 2, color: 'red' });

        // Act
        const merged = mergeStyle(base, { padding: undefined, border: 'single' });

        // Assert
        expect(merged).toEqual(createStyle({ font: 'slant', padding: 2, color: 'red', border: 'single' }));
        expect(base.border).toBe('none');
    });
});

describe('style records', () => {
    test('round trip reproduces the style', () => {
        // Arrange
        const style = createStyle({
            font: 'Larry 3D',
            color: 'gradient:red-yellow',
            backgroundColor: 'black',
            border: 'rounded',
            borderColor: '#00ff88',
            padding: 3,
            width: 120,
            alignment: 'right',
            compact: true,
            shadow: true,
            shadowColor: 'bright_blue',
            bold: true,
        });

        // Act
        const restored = styleFromRecord(styleToRecord(style));

        // Assert
        expect(restored).toEqual(style);
    });

    test('treats a blank shadow color as the default and keeps the round trip', () => {
        // Arrange
        const style = createStyle({ shadowColor: '' });

        // Act
        const restored = styleFromRecord(styleToRecord(style));

        // Assert
        expect(style.shadowColor).toBe('bright_black');
        expect(restored).toEqual(style);
        expect(mergeStyle(style, {})).toEqual(style);
    });

    test('omits unset optional fields', () => {
        // Act
        const record = styleToRecord(createStyle());

        // Assert
        expect('color' in record).toBe(false);
        expect('borderColor' in record).toBe(false);
        expect(record.shadowColor).toBe('bright_black');
    });

    test('reads snake_case keys from template files', () => {
        expect(readStyleInput({ background_color: 'black', shadow: true })).toEqual({
            backgroundColor: 'black',
            shadow: true,
        });
    });

    test.each([
        [{ colour: 'red' }],
        [{ padding: '2' }],
        [{ shadow: 'yes' }],
        [['font', 'slant']],
    ])('rejects malformed input %j', input => {
        expect(errorCode(() => readStyleInput(input))).toBe('INVALID_STYLE');
    });

    test('template fields keep only non-default values', () => {
        // Act
        const fields = styleToTemplateFields(createStyle({ font: 'slant', padding: 2, backgroundColor: 'black' }));

        // Assert
        expect(fields).toEqual({ font: 'slant', background_color: 'black', padding: 2 });
    });
});

describe('applyColorScheme', () => {
    test('overwrites the color fields', () => {
        // Act
        const style = applyColorScheme(createStyle({ border: 'single' }), 'ocean');

        // Assert
        expect(style.color).toBe('gradient:blue-cyan');
        expect(style.borderColor).toBe('blue');
        expect(style.shadowColor).toBe('bright_blue');
        expect(style.border).toBe('single');
    });

    test('rainbow is a red to yellow gradient', () => {
        // Act
        const style = applyColorScheme(createStyle(), 'rainbow');

        // Assert
        expect(style.color).toBe('gradient:red-yellow');
        expect(style.borderColor).toBe('magenta');
        expect(style.shadowColor).toBe('bright_black');
    });

    test('rejects unknown schemes', () => {
        expect(errorCode(() => applyColorScheme(createStyle(), 'pastel'))).toBe('INVALID_STYLE');
    });
});

describe('getBorderChars', () => {
    test('maps each style to its corners', () => {
        expect(getBorderChars('rounded')).toEqual({ tl: '╭', tr: '╮', bl: '╰', br: '╯', h: '─', v: '│' });
        expect(getBorderChars('none').tl).toBe('');
    });
});
