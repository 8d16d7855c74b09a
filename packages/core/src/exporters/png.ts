/**
 * PNG export: the SVG export rasterized with sharp.
 *
 * @module exporters/png
 */
import sharp from 'sharp';
import type { RenderedBanner } from '../types.js';
import { svgDocument } from './svg.js';
import type { ExportOptions, Exporter } from './types.js';

export async function pngImage(rendered: RenderedBanner, options: ExportOptions = {}): Promise<Uint8Array> {
    const svg = svgDocument(rendered, options);
    return sharp(Buffer.from(svg, 'utf-8')).png().toBuffer();
}

export const pngExporter: Exporter = {
    format: 'png',
    extension: '.png',
    serialize: pngImage,
};
