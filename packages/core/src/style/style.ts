/**
 * Style construction, validation and serialization.
 *
 * A {@link BannerStyle} is always built through {@link createStyle}, so
 * every style that reaches the layout pipeline has been validated and
 * normalized. Templates, CLI flags and structured exports all funnel
 * through here, which is what makes "apply template" and "specify the
 * same fields by hand" produce identical styles.
 *
 * @module style/style
 */
import { BannerError } from '../errors.js';
import { isRecord } from '../guards.js';
import {
    ALIGNMENTS,
    BORDER_STYLES,
    type Alignment,
    type BannerStyle,
    type BorderStyle,
    type StyleInput,
    type StyleRecord,
} from '../types.js';
import { normalizeColorSpec } from './colors.js';

export const PADDING_RANGE = { min: 0, max: 20 } as const;
export const WIDTH_RANGE = { min: 10, max: 1000 } as const;

const DEFAULT_SHADOW_COLOR = 'bright_black';

export const DEFAULT_STYLE: Readonly<BannerStyle> = Object.freeze({
    font: 'standard',
    border: 'none',
    padding: 0,
    width: 80,
    alignment: 'left',
    compact: false,
    shadow: false,
    shadowColor: DEFAULT_SHADOW_COLOR,
    bold: false,
});

/**
 * Keys accepted in style records, with the snake_case spelling used by
 * template files.
 */
const STYLE_KEYS: ReadonlyArray<readonly [keyof BannerStyle, string]> = [
    ['font', 'font'],
    ['color', 'color'],
    ['backgroundColor', 'background_color'],
    ['border', 'border'],
    ['borderColor', 'border_color'],
    ['padding', 'padding'],
    ['width', 'width'],
    ['alignment', 'alignment'],
    ['compact', 'compact'],
    ['shadow', 'shadow'],
    ['shadowColor', 'shadow_color'],
    ['bold', 'bold'],
];

const STRING_KEYS = new Set<keyof BannerStyle>([
    'font', 'color', 'backgroundColor', 'border', 'borderColor', 'alignment', 'shadowColor',
]);
const NUMBER_KEYS = new Set<keyof BannerStyle>(['padding', 'width']);

function invalidStyle(message: string, suggestions?: readonly string[]): BannerError {
    return new BannerError('INVALID_STYLE', message, {
        suggestions: suggestions ? [...suggestions] : undefined,
    });
}

function isBorderStyle(value: string): value is BorderStyle {
    return (BORDER_STYLES as readonly string[]).includes(value);
}

function isAlignment(value: string): value is Alignment {
    return (ALIGNMENTS as readonly string[]).includes(value);
}

function parseBorder(value: string): BorderStyle {
    const border = value.trim().toLowerCase();
    if (!isBorderStyle(border)) {
        throw invalidStyle(`Unknown border style '${value}'`, BORDER_STYLES);
    }
    return border;
}

function parseAlignment(value: string): Alignment {
    const alignment = value.trim().toLowerCase();
    if (!isAlignment(alignment)) {
        throw invalidStyle(`Unknown alignment '${value}'`, ALIGNMENTS);
    }
    return alignment;
}

function parseInteger(name: string, value: number, range: { min: number; max: number }): number {
    if (!Number.isInteger(value) || value < range.min || value > range.max) {
        throw invalidStyle(`${name} must be an integer between ${range.min} and ${range.max} (got ${value})`);
    }
    return value;
}

function parseFont(value: string): string {
    const font = value.trim();
    if (font === '') {
        throw invalidStyle('Font name must not be empty');
    }
    return font;
}

function optionalColor(value: string | undefined): string | undefined {
    if (value === undefined || value.trim() === '') return undefined;
    return normalizeColorSpec(value);
}

/**
 * Build a validated style from loose input, filling defaults.
 *
 * @throws {BannerError} `INVALID_STYLE` or `INVALID_COLOR`
 */
export function createStyle(input: StyleInput = {}): BannerStyle {
    const style: BannerStyle = {
        font: parseFont(input.font ?? DEFAULT_STYLE.font),
        border: parseBorder(input.border ?? DEFAULT_STYLE.border),
        padding: parseInteger('Padding', input.padding ?? DEFAULT_STYLE.padding, PADDING_RANGE),
        width: parseInteger('Width', input.width ?? DEFAULT_STYLE.width, WIDTH_RANGE),
        alignment: parseAlignment(input.alignment ?? DEFAULT_STYLE.alignment),
        compact: input.compact ?? DEFAULT_STYLE.compact,
        shadow: input.shadow ?? DEFAULT_STYLE.shadow,
        // always set; blank means the default
        shadowColor: optionalColor(input.shadowColor) ?? DEFAULT_SHADOW_COLOR,
        bold: input.bold ?? DEFAULT_STYLE.bold,
    };

    const color = optionalColor(input.color);
    if (color !== undefined) style.color = color;
    const backgroundColor = optionalColor(input.backgroundColor);
    if (backgroundColor !== undefined) style.backgroundColor = backgroundColor;
    const borderColor = optionalColor(input.borderColor);
    if (borderColor !== undefined) style.borderColor = borderColor;

    return style;
}

/**
 * Return only the fields of `input` that are defined.
 */
export function definedFields(input: StyleInput): StyleInput {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
        if (value !== undefined) result[key] = value;
    }
    return readStyleInput(result);
}

/**
 * Apply the defined override fields on top of a style and re-validate.
 */
export function mergeStyle(base: BannerStyle, overrides: StyleInput): BannerStyle {
    return createStyle({ ...styleToRecord(base), ...definedFields(overrides) });
}

/**
 * Plain-object form of a style; unset optional fields are omitted.
 */
export function styleToRecord(style: BannerStyle): StyleRecord {
    const record: StyleRecord = {};
    for (const [key] of STYLE_KEYS) {
        copyField(record, style, key);
    }
    return record;
}

function copyField<K extends keyof BannerStyle>(target: StyleRecord, source: BannerStyle, key: K): void {
    const value = source[key];
    if (value !== undefined) target[key] = value;
}

/**
 * Rebuild a style from its record form. Inverse of {@link styleToRecord}.
 */
export function styleFromRecord(record: unknown): BannerStyle {
    return createStyle(readStyleInput(record));
}

/**
 * Validate the shape of an untyped style mapping (parsed YAML or JSON).
 * Accepts camelCase and the snake_case spelling of template files.
 *
 * @throws {BannerError} `INVALID_STYLE` for unknown keys or wrongly-typed values
 */
export function readStyleInput(value: unknown): StyleInput {
    if (!isRecord(value)) {
        throw invalidStyle('Style must be a mapping of option names to values');
    }

    const input: StyleInput = {};
    for (const [rawKey, rawValue] of Object.entries(value)) {
        const entry = STYLE_KEYS.find(([camel, snake]) => rawKey === camel || rawKey === snake);
        if (!entry) {
            throw invalidStyle(
                `Unknown style option '${rawKey}'`,
                STYLE_KEYS.map(([, snake]) => snake),
            );
        }
        const key = entry[0];
        if (rawValue === null || rawValue === undefined) continue;

        if (STRING_KEYS.has(key)) {
            if (typeof rawValue !== 'string') {
                throw invalidStyle(`Style option '${rawKey}' must be a string`);
            }
            assignString(input, key, rawValue);
        } else if (NUMBER_KEYS.has(key)) {
            if (typeof rawValue !== 'number') {
                throw invalidStyle(`Style option '${rawKey}' must be a number`);
            }
            if (key === 'padding') input.padding = rawValue;
            else input.width = rawValue;
        } else {
            if (typeof rawValue !== 'boolean') {
                throw invalidStyle(`Style option '${rawKey}' must be true or false`);
            }
            if (key === 'compact') input.compact = rawValue;
            else if (key === 'shadow') input.shadow = rawValue;
            else input.bold = rawValue;
        }
    }
    return input;
}

function assignString(input: StyleInput, key: keyof BannerStyle, value: string): void {
    switch (key) {
        case 'font': input.font = value; break;
        case 'color': input.color = value; break;
        case 'backgroundColor': input.backgroundColor = value; break;
        case 'border': input.border = value; break;
        case 'borderColor': input.borderColor = value; break;
        case 'alignment': input.alignment = value; break;
        case 'shadowColor': input.shadowColor = value; break;
        default: break;
    }
}

/**
 * Record form using the snake_case keys of template files, keeping only
 * fields that differ from {@link DEFAULT_STYLE}.
 */
export function styleToTemplateFields(style: BannerStyle): Record<string, string | number | boolean> {
    const fields: Record<string, string | number | boolean> = {};
    for (const [camel, snake] of STYLE_KEYS) {
        const value = style[camel];
        if (value !== undefined && value !== DEFAULT_STYLE[camel]) {
            fields[snake] = value;
        }
    }
    return fields;
}

// ─────────────────────────────────────────────────────────────────────────────
// Color schemes
// ─────────────────────────────────────────────────────────────────────────────

export const COLOR_SCHEMES = {
    rainbow: { color: 'gradient:red-yellow', borderColor: 'magenta' },
    ocean: { color: 'gradient:blue-cyan', borderColor: 'blue', shadowColor: 'bright_blue' },
    fire: { color: 'gradient:red-yellow', borderColor: 'red', shadowColor: 'bright_red' },
    forest: { color: 'gradient:green-bright_green', borderColor: 'green', shadowColor: 'green' },
    sunset: { color: 'gradient:magenta-yellow', borderColor: 'magenta' },
    neon: { color: 'gradient:bright_magenta-bright_cyan', borderColor: 'bright_magenta', shadow: true },
    monochrome: { color: 'white', borderColor: 'bright_black', shadowColor: 'bright_black' },
} as const satisfies Record<string, StyleInput>;

export type ColorSchemeName = keyof typeof COLOR_SCHEMES;

export function isColorSchemeName(name: string): name is ColorSchemeName {
    return Object.hasOwn(COLOR_SCHEMES, name);
}

/**
 * Overwrite the color fields of a style with a predefined scheme.
 *
 * @throws {BannerError} `INVALID_STYLE` for an unknown scheme
 */
export function applyColorScheme(style: BannerStyle, scheme: string): BannerStyle {
    const name = scheme.trim().toLowerCase();
    if (!isColorSchemeName(name)) {
        throw invalidStyle(`Unknown color scheme '${scheme}'`, Object.keys(COLOR_SCHEMES));
    }
    return mergeStyle(style, COLOR_SCHEMES[name]);
}
