/**
 * Exporter registry and file output.
 *
 * @module exporters
 */
import { dirname, extname, resolve } from 'node:path';
import { BannerError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { defaultFileSystem, type FileSystemService } from '../services/filesystem.js';
import type { RenderedBanner } from '../types.js';
import { htmlExporter } from './html.js';
import { pngExporter } from './png.js';
import { jsonExporter, yamlExporter } from './structured.js';
import { svgExporter } from './svg.js';
import { textExporter } from './text.js';
import { EXPORT_FORMATS, type ExportFormat, type ExportOptions, type Exporter } from './types.js';

export * from './types.js';
export { metadataHeader, METADATA_RULE } from './text.js';
export { bannerElement, htmlDocument, parseHtmlTheme, themeStylesheet } from './html.js';
export { DEFAULT_FONT_SIZE, FONT_SIZE_RANGE, parseFontSize, svgDimensions, svgDocument } from './svg.js';
export { pngImage } from './png.js';
export {
    DOCUMENT_FORMAT,
    DOCUMENT_VERSION,
    parseStructuredExport,
    toBannerDocument,
    type BannerDocument,
    type ParsedExport,
    type StructuredFormat,
} from './structured.js';

const log = createLogger('Exporter');

export const EXPORTERS: Readonly<Record<ExportFormat, Exporter>> = {
    text: textExporter,
    html: htmlExporter,
    svg: svgExporter,
    png: pngExporter,
    json: jsonExporter,
    yaml: yamlExporter,
};

const EXTENSION_FORMATS: Readonly<Record<string, ExportFormat>> = {
    '.txt': 'text',
    '.html': 'html',
    '.htm': 'html',
    '.svg': 'svg',
    '.png': 'png',
    '.json': 'json',
    '.yaml': 'yaml',
    '.yml': 'yaml',
};

/**
 * Format implied by a file extension, or undefined.
 */
export function detectFormat(path: string): ExportFormat | undefined {
    return EXTENSION_FORMATS[extname(path).toLowerCase()];
}

function isExportFormat(value: string): value is ExportFormat {
    return (EXPORT_FORMATS as readonly string[]).includes(value);
}

/**
 * @throws {BannerError} `UNSUPPORTED_FORMAT`
 */
export function parseExportFormat(value: string): ExportFormat {
    const format = value.trim().toLowerCase();
    if (format === 'txt') return 'text';
    if (format === 'yml') return 'yaml';
    if (!isExportFormat(format)) {
        throw new BannerError('UNSUPPORTED_FORMAT', `Unsupported export format '${value}'`, {
            suggestions: [...EXPORT_FORMATS],
        });
    }
    return format;
}

export interface ExportBannerOptions extends ExportOptions {
    /** Defaults to the format implied by the extension, else `text` */
    format?: ExportFormat;
    fs?: FileSystemService;
}

export interface ExportResult {
    path: string;
    format: ExportFormat;
    bytes: number;
}

/**
 * Serialize a banner and write it to `path`, creating parent directories.
 * Nothing is written when serialization fails.
 *
 * @throws {BannerError} `WRITE_FAILED` naming the path and the cause
 */
export async function exportBanner(
    rendered: RenderedBanner,
    path: string,
    options: ExportBannerOptions = {},
): Promise<ExportResult> {
    const fs = options.fs ?? defaultFileSystem;
    const format = options.format ?? detectFormat(path) ?? 'text';
    const target = resolve(path);

    const content = await EXPORTERS[format].serialize(rendered, options);
    const bytes = typeof content === 'string' ? Buffer.byteLength(content, 'utf-8') : content.byteLength;

    try {
        await fs.mkdir(dirname(target), { recursive: true });
        await fs.writeFile(target, content);
    } catch (error) {
        throw new BannerError('WRITE_FAILED', `Could not write ${target}: ${errorMessage(error)}`, {
            cause: error,
            hint: 'Check that the directory is writable',
        });
    }

    log.info('banner exported', { path: target, format, bytes });
    return { path: target, format, bytes };
}
