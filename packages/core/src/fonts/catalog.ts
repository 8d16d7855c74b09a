/**
 * Font categories and use-case recommendations.
 *
 * The catalog lists font keys (lowercase, no spaces) so it matches figlet
 * names regardless of how a font file capitalizes them.
 *
 * @module fonts/catalog
 */
import { BannerError } from '../errors.js';
import { isRecord } from '../guards.js';
import { FONT_CATALOG_PATH } from '../paths.js';
import { defaultFileSystem, type FileSystemService } from '../services/filesystem.js';

export interface FontCatalog {
    /** Category name → font keys */
    readonly categories: Readonly<Record<string, readonly string[]>>;
    /** Use case name → font keys */
    readonly recommended: Readonly<Record<string, readonly string[]>>;
}

/**
 * Comparison key for font names: `Larry 3D`, `larry3d` and `LARRY 3D`
 * all map to `larry3d`.
 */
export function fontKey(name: string): string {
    return name.toLowerCase().replace(/\s+/g, '');
}

function readFontLists(value: unknown, field: string): Record<string, string[]> {
    if (!isRecord(value)) {
        throw new BannerError('INVALID_OPTION', `Font catalog field '${field}' must be a mapping`);
    }
    const lists: Record<string, string[]> = {};
    for (const [name, fonts] of Object.entries(value)) {
        if (!Array.isArray(fonts) || !fonts.every((f): f is string => typeof f === 'string')) {
            throw new BannerError('INVALID_OPTION', `Font catalog entry '${field}.${name}' must be a list of font names`);
        }
        lists[name] = fonts.map(fontKey);
    }
    return lists;
}

/**
 * Validate a parsed catalog document.
 */
export function parseFontCatalog(data: unknown): FontCatalog {
    if (!isRecord(data)) {
        throw new BannerError('INVALID_OPTION', 'Font catalog must be an object');
    }
    return {
        categories: readFontLists(data['categories'], 'categories'),
        recommended: readFontLists(data['recommended'], 'recommended'),
    };
}

let cachedCatalog: FontCatalog | undefined;

/**
 * Load the catalog shipped in `data/font-catalog.json`.
 */
export function loadFontCatalog(
    path: string = FONT_CATALOG_PATH,
    fs: FileSystemService = defaultFileSystem,
): FontCatalog {
    if (path === FONT_CATALOG_PATH && cachedCatalog) return cachedCatalog;
    const catalog = parseFontCatalog(JSON.parse(fs.readFileSync(path, 'utf-8')));
    if (path === FONT_CATALOG_PATH) cachedCatalog = catalog;
    return catalog;
}
