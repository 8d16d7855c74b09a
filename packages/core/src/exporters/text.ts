/**
 * Plain-text export.
 *
 * @module exporters/text
 */
import type { RenderedBanner } from '../types.js';
import type { ExportOptions, Exporter } from './types.js';

export const METADATA_RULE = '# ' + '='.repeat(60);

/**
 * `# key: value` comment lines describing how the banner was made.
 * Color, border and padding appear only when set.
 */
export function metadataHeader(rendered: RenderedBanner): string[] {
    const { style } = rendered;
    const lines = [
        '# ASCII Banner Generator Output',
        `# Text: ${rendered.text}`,
        `# Font: ${style.font}`,
    ];
    if (style.color !== undefined) lines.push(`# Color: ${style.color}`);
    if (style.border !== 'none') lines.push(`# Border: ${style.border}`);
    if (style.padding > 0) lines.push(`# Padding: ${style.padding}`);
    lines.push(METADATA_RULE);
    return lines;
}

export const textExporter: Exporter = {
    format: 'text',
    extension: '.txt',
    serialize(rendered: RenderedBanner, options: ExportOptions): string {
        const body = options.includeColors ? rendered.ansi : rendered.plain;
        const parts = options.metadata ? [...metadataHeader(rendered), body] : [body];
        return parts.join('\n') + '\n';
    },
};
