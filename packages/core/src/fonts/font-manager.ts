/**
 * Font discovery, lookup and the user font directory.
 *
 * @module fonts/font-manager
 */
import { basename, extname, join } from 'node:path';
import { BannerError, errorMessage } from '../errors.js';
import { isRecord } from '../guards.js';
import { createLogger } from '../logger.js';
import { defaultFileSystem, type FileSystemService } from '../services/filesystem.js';
import { closestMatches } from '../suggest.js';
import { fontKey, loadFontCatalog, type FontCatalog } from './catalog.js';
import { FigletRenderer, type GlyphRenderer } from './renderer.js';

const log = createLogger('FontManager');

const FONT_EXTENSION = '.flf';
const METADATA_FILE = 'font_metadata.json';

/** Free-form description stored alongside a custom font. */
export type FontMetadata = Readonly<Record<string, unknown>>;

export interface FontInfo {
    name: string;
    categories: string[];
    recommendedFor: string[];
    /** Loaded from the user font directory */
    custom: boolean;
    /** Rows of a rendered `A`; undefined when the font cannot render it */
    height: number | undefined;
    approxWidth: number | undefined;
    metadata: FontMetadata;
}

export interface FontManagerOptions {
    renderer?: GlyphRenderer;
    /** Directory of user `.flf` files */
    fontsDir?: string;
    catalog?: FontCatalog;
    fs?: FileSystemService;
}

function catalogList(
    lists: Readonly<Record<string, readonly string[]>>,
    name: string,
): readonly string[] | undefined {
    const key = name.toLowerCase();
    return Object.hasOwn(lists, key) ? lists[key] : undefined;
}

function trimBlankLines(lines: string[]): string[] {
    let start = 0;
    let end = lines.length;
    while (start < end && lines[start]?.trim() === '') start++;
    while (end > start && lines[end - 1]?.trim() === '') end--;
    return lines.slice(start, end);
}

/**
 * Lists, resolves and describes the fonts a {@link GlyphRenderer} can use.
 *
 * Font names are matched without regard to case or spaces, so `larry3d`
 * finds figlet's `Larry 3D`. The font list is cached until a custom font
 * is added.
 */
export class FontManager {
    readonly renderer: GlyphRenderer;
    private readonly fontsDir: string | undefined;
    private readonly catalog: FontCatalog;
    private readonly fs: FileSystemService;

    private available: string[] | undefined;
    private readonly customFonts = new Set<string>();
    private metadata: Record<string, FontMetadata> | undefined;

    constructor(options: FontManagerOptions = {}) {
        this.fs = options.fs ?? defaultFileSystem;
        this.renderer = options.renderer ?? new FigletRenderer();
        this.fontsDir = options.fontsDir;
        this.catalog = options.catalog ?? loadFontCatalog(undefined, this.fs);
    }

    /**
     * Sorted, de-duplicated names of every usable font, including `.flf`
     * files from the user font directory.
     */
    async getAvailableFonts(): Promise<string[]> {
        if (this.available) return this.available;
        await this.loadCustomFonts();
        this.available = [...new Set(this.renderer.listFonts())].sort();
        log.info('fonts indexed', { count: this.available.length });
        return this.available;
    }

    /**
     * Canonical name of a font.
     *
     * @throws {BannerError} `UNKNOWN_FONT` with up to five close matches
     */
    async resolveFont(name: string): Promise<string> {
        const fonts = await this.getAvailableFonts();
        const found = this.findFont(fonts, name);
        if (found !== undefined) return found;
        const suggestions = closestMatches(name, fonts, 5, fontKey);
        throw new BannerError('UNKNOWN_FONT', `Font '${name}' not found`, {
            hint: suggestions.length > 0
                ? `Did you mean: ${suggestions.join(', ')}?`
                : "Run 'ascii-banner fonts' to list available fonts",
            suggestions,
        });
    }

    async validateFont(name: string): Promise<boolean> {
        return this.findFont(await this.getAvailableFonts(), name) !== undefined;
    }

    /**
     * Fonts whose name contains `query`, ignoring case.
     */
    async searchFonts(query: string): Promise<string[]> {
        const needle = query.toLowerCase();
        return (await this.getAvailableFonts()).filter(font => font.toLowerCase().includes(needle));
    }

    /**
     * Available fonts of a catalog category. Unknown categories give an
     * empty list.
     */
    async getFontsByCategory(category: string): Promise<string[]> {
        return this.availableFromCatalog(catalogList(this.catalog.categories, category));
    }

    async getRecommendedFonts(useCase: string): Promise<string[]> {
        return this.availableFromCatalog(catalogList(this.catalog.recommended, useCase));
    }

    getAllCategories(): string[] {
        return Object.keys(this.catalog.categories);
    }

    getAllUseCases(): string[] {
        return Object.keys(this.catalog.recommended);
    }

    /**
     * Catalog membership, custom metadata and glyph size of a font.
     *
     * @throws {BannerError} `UNKNOWN_FONT`
     */
    async getFontInfo(name: string): Promise<FontInfo> {
        const font = await this.resolveFont(name);
        const key = fontKey(font);
        const memberOf = (lists: Readonly<Record<string, readonly string[]>>): string[] =>
            Object.entries(lists).filter(([, fonts]) => fonts.includes(key)).map(([list]) => list);

        let height: number | undefined;
        let approxWidth: number | undefined;
        try {
            const lines = trimBlankLines(this.renderer.render('A', font, { width: 80 }).split(/\r?\n/));
            height = lines.length;
            approxWidth = lines.reduce((max, line) => Math.max(max, line.length), 0);
        } catch (error) {
            log.warn('could not measure font', { font, error: errorMessage(error) });
        }

        const metadata = await this.loadMetadata();
        return {
            name: font,
            categories: memberOf(this.catalog.categories),
            recommendedFor: memberOf(this.catalog.recommended),
            custom: this.customFonts.has(font),
            height,
            approxWidth,
            metadata: (Object.hasOwn(metadata, font) ? metadata[font] : undefined) ?? {},
        };
    }

    /**
     * `text` rendered in the font, unstyled.
     *
     * @throws {BannerError} `UNKNOWN_FONT`
     */
    async getFontSample(name: string, text = 'SAMPLE', width = 80): Promise<string> {
        const font = await this.resolveFont(name);
        return this.renderer.render(text, font, { width });
    }

    /**
     * Copy a `.flf` file into the user font directory and make it
     * available. Returns the new font's name.
     *
     * @throws {BannerError} `INVALID_FONT_FILE` for a missing or non-`.flf` file
     */
    async addCustomFont(path: string, metadata?: FontMetadata): Promise<string> {
        if (extname(path).toLowerCase() !== FONT_EXTENSION || !this.fs.existsSync(path)) {
            throw new BannerError('INVALID_FONT_FILE', `Not a FIGlet font file: ${path}`, {
                hint: `Custom fonts must be existing ${FONT_EXTENSION} files`,
            });
        }
        const fontsDir = this.requireFontsDir();
        const name = basename(path, extname(path));
        const target = join(fontsDir, basename(path));

        this.renderer.loadFont(name, await this.fs.readFile(path, 'utf-8'));
        this.customFonts.add(name);

        await this.fs.mkdir(fontsDir, { recursive: true });
        await this.fs.copyFile(path, target);

        if (metadata) {
            const all = await this.loadMetadata();
            all[name] = metadata;
            await this.fs.writeFile(join(fontsDir, METADATA_FILE), JSON.stringify(all, null, 2) + '\n');
        }

        this.available = undefined;
        log.info('custom font added', { font: name, path: target });
        return name;
    }

    // ─────────────────────────────────────────────────────────────────────────
    // Internals
    // ─────────────────────────────────────────────────────────────────────────

    private findFont(fonts: readonly string[], name: string): string | undefined {
        const key = fontKey(name);
        return fonts.find(font => font === name) ?? fonts.find(font => fontKey(font) === key);
    }

    private async availableFromCatalog(keys: readonly string[] | undefined): Promise<string[]> {
        if (!keys) return [];
        const fonts = await this.getAvailableFonts();
        return keys.flatMap(key => {
            const font = fonts.find(f => fontKey(f) === key);
            return font === undefined ? [] : [font];
        });
    }

    private requireFontsDir(): string {
        if (this.fontsDir === undefined) {
            throw new BannerError('INVALID_OPTION', 'No user font directory is configured');
        }
        return this.fontsDir;
    }

    private async loadCustomFonts(): Promise<void> {
        const dir = this.fontsDir;
        if (dir === undefined || !this.fs.existsSync(dir)) return;

        for (const entry of await this.fs.readdir(dir)) {
            if (!entry.isFile() || extname(entry.name).toLowerCase() !== FONT_EXTENSION) continue;
            const name = basename(entry.name, extname(entry.name));
            if (this.customFonts.has(name)) continue;

            const path = join(dir, entry.name);
            try {
                this.renderer.loadFont(name, await this.fs.readFile(path, 'utf-8'));
                this.customFonts.add(name);
            } catch (error) {
                log.warn('skipping unreadable font file', { path, error: errorMessage(error) });
            }
        }
    }

    private async loadMetadata(): Promise<Record<string, FontMetadata>> {
        if (this.metadata) return this.metadata;
        const metadata: Record<string, FontMetadata> = {};
        this.metadata = metadata;
        if (this.fontsDir === undefined) return metadata;

        const path = join(this.fontsDir, METADATA_FILE);
        if (!this.fs.existsSync(path)) return metadata;
        try {
            const parsed: unknown = JSON.parse(await this.fs.readFile(path, 'utf-8'));
            if (isRecord(parsed)) {
                for (const [font, entry] of Object.entries(parsed)) {
                    if (isRecord(entry)) metadata[font] = entry;
                }
            }
        } catch (error) {
            log.warn('ignoring malformed font metadata', { path, error: errorMessage(error) });
        }
        return metadata;
    }
}
