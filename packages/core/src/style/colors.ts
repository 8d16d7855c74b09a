/**
 * Color specs: named colors, hex colors and multi-stop gradients.
 *
 * @module style/colors
 */
import { BannerError } from '../errors.js';

/**
 * Named terminal colors and the hex value each maps to in truecolor,
 * HTML and image output.
 */
export const NAMED_COLORS: Readonly<Record<string, string>> = {
    black: '#000000',
    red: '#ff0000',
    green: '#00ff00',
    yellow: '#ffff00',
    blue: '#0000ff',
    magenta: '#ff00ff',
    cyan: '#00ffff',
    white: '#ffffff',
    bright_black: '#808080',
    bright_red: '#ff6666',
    bright_green: '#66ff66',
    bright_yellow: '#ffff66',
    bright_blue: '#6666ff',
    bright_magenta: '#ff66ff',
    bright_cyan: '#66ffff',
    bright_white: '#ffffff',
    gray: '#808080',
    grey: '#808080',
};

const GRADIENT_PREFIX = 'gradient:';
const HEX_PATTERN = /^#(?:[0-9a-f]{3}|[0-9a-f]{6})$/i;

export type RGB = readonly [number, number, number];

/**
 * Parsed color spec.
 */
export type ColorSpec =
    | { kind: 'solid'; hex: string }
    | { kind: 'gradient'; stops: string[] };

function invalidColor(value: string, hint?: string): BannerError {
    return new BannerError(
        'INVALID_COLOR',
        `Invalid color '${value}'`,
        {
            hint: hint ?? 'Use a color name, a hex value like #ff8800, or gradient:<color>-<color>',
            suggestions: Object.keys(NAMED_COLORS),
        },
    );
}

/**
 * Expand `#rgb` to `#rrggbb` and lowercase.
 */
function expandHex(hex: string): string {
    const body = hex.slice(1).toLowerCase();
    if (body.length === 3) {
        return '#' + [...body].map(c => c + c).join('');
    }
    return '#' + body;
}

function isNamedColor(value: string): boolean {
    return Object.hasOwn(NAMED_COLORS, value);
}

function normalizeStop(stop: string): string {
    const value = stop.trim().toLowerCase();
    if (isNamedColor(value) || HEX_PATTERN.test(value)) {
        return value;
    }
    throw invalidColor(stop);
}

function stopToHex(stop: string): string {
    const named = isNamedColor(stop) ? NAMED_COLORS[stop] : undefined;
    return named ?? expandHex(stop);
}

/**
 * Canonical textual form of a color spec (lowercased names and hex, a
 * single `gradient:` prefix). Idempotent.
 *
 * @throws {BannerError} `INVALID_COLOR` for anything that is not a color
 */
export function normalizeColorSpec(spec: string): string {
    const value = spec.trim();
    if (value.toLowerCase().startsWith(GRADIENT_PREFIX)) {
        const stops = value.slice(GRADIENT_PREFIX.length).split('-');
        if (stops.length < 2 || stops.some(s => s.trim() === '')) {
            throw invalidColor(spec, 'A gradient needs at least two colors, e.g. gradient:red-yellow');
        }
        return GRADIENT_PREFIX + stops.map(normalizeStop).join('-');
    }
    if (value === '') {
        throw invalidColor(spec);
    }
    return normalizeStop(value);
}

/**
 * Parse a color spec into a solid color or gradient stops (all `#rrggbb`).
 *
 * @throws {BannerError} `INVALID_COLOR`
 */
export function parseColorSpec(spec: string): ColorSpec {
    const normalized = normalizeColorSpec(spec);
    if (normalized.startsWith(GRADIENT_PREFIX)) {
        return {
            kind: 'gradient',
            stops: normalized.slice(GRADIENT_PREFIX.length).split('-').map(stopToHex),
        };
    }
    return { kind: 'solid', hex: stopToHex(normalized) };
}

/**
 * Resolve a solid color spec to hex; gradients resolve to their first stop.
 */
export function toHex(spec: string): string {
    const parsed = parseColorSpec(spec);
    return parsed.kind === 'solid' ? parsed.hex : parsed.stops[0] ?? '#000000';
}

export function hexToRgb(hex: string): RGB {
    const n = Number.parseInt(expandHex(hex).slice(1), 16);
    return [(n >> 16) & 0xff, (n >> 8) & 0xff, n & 0xff];
}

export function rgbToHex(r: number, g: number, b: number): string {
    return '#' + [r, g, b].map(x => Math.round(x).toString(16).padStart(2, '0')).join('');
}

function lerp(a: RGB, b: RGB, t: number): RGB {
    return [a[0] + (b[0] - a[0]) * t, a[1] + (b[1] - a[1]) * t, a[2] + (b[2] - a[2]) * t];
}

/**
 * Distribute `count` colors evenly across the gradient stops.
 * The first color is the first stop and the last color is the last stop.
 */
export function interpolateGradient(stops: readonly string[], count: number): string[] {
    if (count <= 0 || stops.length === 0) return [];
    const first = stops[0] ?? '#000000';
    if (count === 1 || stops.length === 1) {
        return Array.from({ length: count }, () => expandHex(first));
    }

    const rgbStops = stops.map(hexToRgb);
    const segments = rgbStops.length - 1;
    const result: string[] = [];

    for (let i = 0; i < count; i++) {
        const position = (i / (count - 1)) * segments;
        const index = Math.min(Math.floor(position), segments - 1);
        const from = rgbStops[index];
        const to = rgbStops[index + 1];
        if (!from || !to) continue;
        const [r, g, b] = lerp(from, to, position - index);
        result.push(rgbToHex(r, g, b));
    }
    return result;
}
