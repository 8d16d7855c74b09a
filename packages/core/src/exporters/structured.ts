/**
 * JSON and YAML export of a banner and the style that produced it.
 *
 * The document carries the full style record, so parsing it back gives
 * the same style and rendering that style reproduces the banner.
 *
 * @module exporters/structured
 */
import YAML from 'yaml';
import { BannerError, errorMessage } from '../errors.js';
import { isRecord } from '../guards.js';
import { styleFromRecord, styleToRecord } from '../style/style.js';
import type { BannerStyle, RenderedBanner, StyleRecord } from '../types.js';
import type { Exporter } from './types.js';

export const DOCUMENT_FORMAT = 'ascii-banner';
export const DOCUMENT_VERSION = 1;

export type StructuredFormat = 'json' | 'yaml';

export interface BannerDocument {
    format: typeof DOCUMENT_FORMAT;
    version: typeof DOCUMENT_VERSION;
    text: string;
    style: StyleRecord;
    banner: {
        width: number;
        height: number;
        lines: string[];
    };
    output: {
        plain: string;
    };
}

/**
 * Text and style recovered from a structured export.
 */
export interface ParsedExport {
    text: string;
    style: BannerStyle;
}

export function toBannerDocument(rendered: RenderedBanner): BannerDocument {
    return {
        format: DOCUMENT_FORMAT,
        version: DOCUMENT_VERSION,
        text: rendered.text,
        style: styleToRecord(rendered.style),
        banner: {
            width: rendered.banner.width,
            height: rendered.banner.height,
            lines: [...rendered.banner.lines],
        },
        output: { plain: rendered.plain },
    };
}

function invalidExport(message: string, cause?: unknown): BannerError {
    return new BannerError('INVALID_EXPORT', message, { cause });
}

/**
 * Validate a structured export and recover its text and style.
 *
 * @throws {BannerError} `INVALID_EXPORT` for unparsable content, a
 *         foreign document, or an invalid style
 */
export function parseStructuredExport(content: string, format: StructuredFormat): ParsedExport {
    let document: unknown;
    try {
        document = format === 'json' ? JSON.parse(content) : YAML.parse(content);
    } catch (error) {
        throw invalidExport(`Not a valid ${format.toUpperCase()} document: ${errorMessage(error)}`, error);
    }

    if (!isRecord(document) || document['format'] !== DOCUMENT_FORMAT) {
        throw invalidExport(`Not an ${DOCUMENT_FORMAT} export (missing "format: ${DOCUMENT_FORMAT}")`);
    }
    if (document['version'] !== DOCUMENT_VERSION) {
        throw invalidExport(`Unsupported export version ${String(document['version'])}`);
    }
    const text = document['text'];
    if (typeof text !== 'string' || text.trim() === '') {
        throw invalidExport('Export has no banner text');
    }

    try {
        return { text, style: styleFromRecord(document['style']) };
    } catch (error) {
        throw invalidExport(`Export has an invalid style: ${errorMessage(error)}`, error);
    }
}

export const jsonExporter: Exporter = {
    format: 'json',
    extension: '.json',
    serialize: rendered => JSON.stringify(toBannerDocument(rendered), null, 2) + '\n',
};

export const yamlExporter: Exporter = {
    format: 'yaml',
    extension: '.yaml',
    serialize: rendered => YAML.stringify(toBannerDocument(rendered)),
};
