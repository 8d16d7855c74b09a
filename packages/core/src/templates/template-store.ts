/**
 * Named style templates stored as flat YAML files.
 *
 * Built-in templates ship in the package's `templates/` directory; user
 * templates live in the configured templates directory and shadow
 * built-ins of the same name.
 *
 * @module templates/template-store
 */
import { basename, extname, join } from 'node:path';
import YAML from 'yaml';
import { BannerError, errorMessage, isBannerError } from '../errors.js';
import { isRecord } from '../guards.js';
import { createLogger } from '../logger.js';
import { BUILTIN_TEMPLATES_DIR } from '../paths.js';
import { defaultFileSystem, type FileSystemService } from '../services/filesystem.js';
import { createStyle, definedFields, readStyleInput, styleToTemplateFields } from '../style/style.js';
import { closestMatches } from '../suggest.js';
import type { BannerStyle, StyleInput, Template } from '../types.js';

const log = createLogger('TemplateStore');

export const TEMPLATE_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;
const TEMPLATE_EXTENSIONS = ['.yaml', '.yml'];

export interface TemplateStoreOptions {
    /** Directory for user templates; `save` writes here */
    userDir?: string;
    builtinDir?: string;
    fs?: FileSystemService;
}

export interface SavedTemplate {
    template: Template;
    path: string;
}

/**
 * Parse the contents of a template file.
 *
 * @throws {BannerError} `INVALID_TEMPLATE` for malformed YAML, a document
 *         that is not a mapping, or invalid style values
 */
export function parseTemplate(name: string, content: string, source: Template['source']): Template {
    let document: unknown;
    try {
        document = YAML.parse(content);
    } catch (error) {
        throw new BannerError('INVALID_TEMPLATE', `Template '${name}' is not valid YAML: ${errorMessage(error)}`, { cause: error });
    }
    if (!isRecord(document)) {
        throw new BannerError('INVALID_TEMPLATE', `Template '${name}' must be a mapping of style options`);
    }

    const rawDescription = document['description'];
    if (rawDescription !== undefined && typeof rawDescription !== 'string') {
        throw new BannerError('INVALID_TEMPLATE', `Template '${name}' has a non-text description`);
    }
    const description = typeof rawDescription === 'string' ? rawDescription : undefined;
    const fields = Object.fromEntries(
        Object.entries(document).filter(([key]) => key !== 'description' && key !== 'name'),
    );

    let style: StyleInput;
    try {
        style = readStyleInput(fields);
        // Reject values that would only fail later at render time
        createStyle(style);
    } catch (error) {
        throw new BannerError('INVALID_TEMPLATE', `Template '${name}': ${errorMessage(error)}`, {
            cause: error,
            suggestions: isBannerError(error) ? [...error.suggestions] : undefined,
        });
    }

    return Object.freeze({
        name,
        ...(description === undefined ? {} : { description }),
        style: Object.freeze(style),
        source,
    });
}

/**
 * Serialize a style as template file contents. Only fields that differ
 * from the defaults are written.
 */
export function formatTemplate(style: BannerStyle, description?: string): string {
    const document = {
        ...(description === undefined ? {} : { description }),
        ...styleToTemplateFields(style),
    };
    return YAML.stringify(document);
}

function templateName(file: string): string | undefined {
    const ext = extname(file).toLowerCase();
    return TEMPLATE_EXTENSIONS.includes(ext) ? basename(file, extname(file)) : undefined;
}

/**
 * Lists, loads and saves templates.
 */
export class TemplateStore {
    private readonly userDir: string | undefined;
    private readonly builtinDir: string;
    private readonly fs: FileSystemService;

    constructor(options: TemplateStoreOptions = {}) {
        this.userDir = options.userDir;
        this.builtinDir = options.builtinDir ?? BUILTIN_TEMPLATES_DIR;
        this.fs = options.fs ?? defaultFileSystem;
    }

    /**
     * Every template, sorted by name. User templates replace built-ins
     * with the same name.
     */
    async list(): Promise<Template[]> {
        const byName = new Map<string, Template>();
        for (const [source, path] of await this.templateFiles()) {
            const name = templateName(path);
            if (name === undefined) continue;
            try {
                byName.set(name, parseTemplate(name, await this.fs.readFile(path, 'utf-8'), source));
            } catch (error) {
                log.warn('skipping invalid template', { path, error: errorMessage(error) });
            }
        }
        return [...byName.values()].sort((a, b) => a.name.localeCompare(b.name));
    }

    async names(): Promise<string[]> {
        return (await this.list()).map(t => t.name);
    }

    /**
     * @throws {BannerError} `UNKNOWN_TEMPLATE` listing the available names,
     *         or `INVALID_TEMPLATE` for a malformed file
     */
    async load(name: string): Promise<Template> {
        const wanted = name.trim().toLowerCase();
        // names outside the pattern never reach the filesystem
        const directories = TEMPLATE_NAME_PATTERN.test(wanted) ? this.directories() : [];
        for (const [source, dir] of directories) {
            for (const ext of TEMPLATE_EXTENSIONS) {
                const path = join(dir, wanted + ext);
                if (this.fs.existsSync(path)) {
                    log.info('template loaded', { name: wanted, path });
                    return parseTemplate(wanted, await this.fs.readFile(path, 'utf-8'), source);
                }
            }
        }

        const available = await this.names();
        const close = closestMatches(wanted, available, 3);
        throw new BannerError('UNKNOWN_TEMPLATE', `Template '${name}' not found`, {
            hint: close.length > 0
                ? `Did you mean: ${close.join(', ')}?`
                : `Available templates: ${available.join(', ')}`,
            suggestions: available,
        });
    }

    /**
     * Write a template into the user directory.
     *
     * @throws {BannerError} `INVALID_OPTION` for a bad name or when no user
     *         directory is configured
     */
    async save(name: string, style: BannerStyle, description?: string): Promise<SavedTemplate> {
        if (!TEMPLATE_NAME_PATTERN.test(name)) {
            throw new BannerError('INVALID_OPTION', `Invalid template name '${name}'`, {
                hint: 'Use lowercase letters, digits, dashes and underscores',
            });
        }
        if (this.userDir === undefined) {
            throw new BannerError('INVALID_OPTION', 'No user template directory is configured');
        }

        const path = join(this.userDir, `${name}.yaml`);
        const content = formatTemplate(style, description);
        try {
            await this.fs.mkdir(this.userDir, { recursive: true });
            await this.fs.writeFile(path, content);
        } catch (error) {
            throw new BannerError('WRITE_FAILED', `Could not write template ${path}: ${errorMessage(error)}`, { cause: error });
        }
        log.info('template saved', { name, path });
        return { template: parseTemplate(name, content, 'user'), path };
    }

    /**
     * The template's fields with `overrides` applied on top, validated.
     * Same result as passing those fields to `createStyle` by hand.
     */
    async resolveStyle(name: string, overrides: StyleInput = {}): Promise<BannerStyle> {
        const template = await this.load(name);
        return applyTemplate(template, overrides);
    }

    private directories(): Array<[Template['source'], string]> {
        const dirs: Array<[Template['source'], string]> = [];
        if (this.userDir !== undefined) dirs.push(['user', this.userDir]);
        dirs.push(['builtin', this.builtinDir]);
        return dirs;
    }

    // Built-ins first so user files overwrite them in list()
    private async templateFiles(): Promise<Array<[Template['source'], string]>> {
        const files: Array<[Template['source'], string]> = [];
        for (const [source, dir] of this.directories().reverse()) {
            if (!this.fs.existsSync(dir)) continue;
            for (const entry of await this.fs.readdir(dir)) {
                if (entry.isFile()) files.push([source, join(dir, entry.name)]);
            }
        }
        return files;
    }
}

/**
 * Style for a template plus explicit overrides. Only defined override
 * fields replace template fields.
 */
export function applyTemplate(template: Template, overrides: StyleInput = {}): BannerStyle {
    return createStyle({ ...template.style, ...definedFields(overrides) });
}
