/**
 * Exporter contract and shared options.
 *
 * @module exporters/types
 */
import type { RenderedBanner } from '../types.js';

export const EXPORT_FORMATS = ['text', 'html', 'svg', 'png', 'json', 'yaml'] as const;

export type ExportFormat = typeof EXPORT_FORMATS[number];

export const HTML_THEMES = ['default', 'dark', 'terminal', 'paper', 'neon', 'retro'] as const;

export type HtmlTheme = typeof HTML_THEMES[number];

/**
 * Options understood by the exporters. Each exporter reads the ones that
 * apply to it and ignores the rest.
 */
export interface ExportOptions {
    /** text: write ANSI color codes */
    includeColors?: boolean;
    /** text: prefix a `# key: value` header */
    metadata?: boolean;
    /** html: CSS theme (default `default`) */
    theme?: string;
    /** html: full document rather than a snippet (default true) */
    standalone?: boolean;
    /** html: embed the stylesheet (default true) */
    includeCss?: boolean;
    /** html: background gradient and floating animation */
    animated?: boolean;
    /** svg/png: font size in pixels (default 14) */
    fontSize?: number;
}

export type ExportContent = string | Uint8Array;

/**
 * Turns a rendered banner into the bytes of one file format.
 */
export interface Exporter {
    readonly format: ExportFormat;
    /** Preferred file extension, with the dot */
    readonly extension: string;
    serialize(rendered: RenderedBanner, options: ExportOptions): ExportContent | Promise<ExportContent>;
}
