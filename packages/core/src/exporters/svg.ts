/**
 * SVG export, also the source image for PNG rasterization.
 *
 * @module exporters/svg
 */
import { BannerError } from '../errors.js';
import { colorRuns } from '../render/runs.js';
import { toHex } from '../style/colors.js';
import type { RenderedBanner } from '../types.js';
import { escapeXml } from './escape.js';
import type { ExportOptions, Exporter } from './types.js';

export const DEFAULT_FONT_SIZE = 14;
export const FONT_SIZE_RANGE = { min: 6, max: 200 } as const;
const MARGIN = 20;
const CHAR_WIDTH = 0.6;
const LINE_HEIGHT = 1.2;

const SHADOW_FILTER = `    <defs>
        <filter id="shadow" x="-50%" y="-50%" width="200%" height="200%">
            <feGaussianBlur in="SourceAlpha" stdDeviation="2"/>
            <feOffset dx="2" dy="2" result="offsetblur"/>
            <feComponentTransfer>
                <feFuncA type="linear" slope="0.5"/>
            </feComponentTransfer>
            <feMerge>
                <feMergeNode/>
                <feMergeNode in="SourceGraphic"/>
            </feMerge>
        </filter>
    </defs>
`;

/**
 * @throws {BannerError} `INVALID_OPTION` unless an integer within {@link FONT_SIZE_RANGE}
 */
export function parseFontSize(value: number | undefined): number {
    const size = value ?? DEFAULT_FONT_SIZE;
    if (!Number.isInteger(size) || size < FONT_SIZE_RANGE.min || size > FONT_SIZE_RANGE.max) {
        throw new BannerError(
            'INVALID_OPTION',
            `Font size must be an integer between ${FONT_SIZE_RANGE.min} and ${FONT_SIZE_RANGE.max} (got ${size})`,
        );
    }
    return size;
}

/**
 * Pixel size of the image: 0.6em per column and 1.2em per line plus a
 * 20px margin on every side.
 */
export function svgDimensions(lines: readonly string[], fontSize: number): { width: number; height: number } {
    const columns = lines.reduce((max, line) => Math.max(max, Array.from(line).length), 0);
    return {
        width: Math.ceil(columns * fontSize * CHAR_WIDTH + MARGIN * 2),
        height: Math.ceil(lines.length * fontSize * LINE_HEIGHT + MARGIN * 2),
    };
}

// Two decimals keep baselines stable across floating point noise
function coordinate(value: number): string {
    return String(Number(value.toFixed(2)));
}

export function svgDocument(rendered: RenderedBanner, options: ExportOptions = {}): string {
    const { banner, style } = rendered;
    const fontSize = parseFontSize(options.fontSize);
    const { width, height } = svgDimensions(banner.lines, fontSize);
    const background = style.backgroundColor === undefined ? 'white' : toHex(style.backgroundColor);
    const filter = style.shadow ? ' filter="url(#shadow)"' : '';
    const weight = style.bold ? '\n            font-weight: bold;' : '';

    const texts = banner.lines.map((line, row) => {
        const y = coordinate(MARGIN + fontSize + row * fontSize * LINE_HEIGHT);
        const content = colorRuns(line, banner.colors[row] ?? [])
            .map(run => run.color === undefined
                ? escapeXml(run.text)
                : `<tspan fill="${run.color}">${escapeXml(run.text)}</tspan>`)
            .join('');
        return `    <text x="${MARGIN}" y="${y}" class="ascii-text" xml:space="preserve"${filter}>${content}</text>\n`;
    });

    return `<?xml version="1.0" encoding="UTF-8"?>
<svg width="${width}" height="${height}" xmlns="http://www.w3.org/2000/svg">
${style.shadow ? SHADOW_FILTER : ''}    <rect width="100%" height="100%" fill="${background}"/>
    <style>
        .ascii-text {
            font-family: 'Courier New', Courier, monospace;
            font-size: ${fontSize}px;
            fill: black;${weight}
        }
    </style>
${texts.join('')}</svg>
`;
}

export const svgExporter: Exporter = {
    format: 'svg',
    extension: '.svg',
    serialize: svgDocument,
};
