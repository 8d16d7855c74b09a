/**
 * User configuration: where templates and custom fonts live, and default
 * style values.
 *
 * ```yaml
 * # ~/.ascii-banner/config.yaml
 * templates_dir: templates
 * fonts_dir: /usr/share/figlet
 * defaults:
 *   font: slant
 *   border: rounded
 * ```
 *
 * @module config
 */
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import YAML from 'yaml';
import { BannerError, errorMessage } from './errors.js';
import { isRecord } from './guards.js';
import { createLogger } from './logger.js';
import { defaultFileSystem, type FileSystemService } from './services/filesystem.js';
import { createStyle, readStyleInput } from './style/style.js';
import type { StyleInput } from './types.js';

const log = createLogger('Config');

export const HOME_ENV_VAR = 'ASCII_BANNER_HOME';
export const CONFIG_FILE = 'config.yaml';

export interface BannerConfig {
    home: string;
    /** Path of config.yaml, whether or not it exists */
    configPath: string;
    templatesDir: string;
    fontsDir: string;
    /** Style values applied before templates and flags */
    defaults: StyleInput;
}

export interface LoadConfigOptions {
    /** Overrides the home directory lookup */
    home?: string;
    env?: Record<string, string | undefined>;
    fs?: FileSystemService;
}

/**
 * `$ASCII_BANNER_HOME`, else `~/.ascii-banner`.
 */
export function resolveHome(env: Record<string, string | undefined> = process.env): string {
    const fromEnv = env[HOME_ENV_VAR];
    return fromEnv !== undefined && fromEnv.trim() !== '' ? resolve(fromEnv) : join(homedir(), '.ascii-banner');
}

function invalidConfig(path: string, message: string, cause?: unknown): BannerError {
    return new BannerError('INVALID_OPTION', `Invalid configuration in ${path}: ${message}`, { cause });
}

function readDir(document: Record<string, unknown>, keys: readonly string[], home: string, path: string): string | undefined {
    for (const key of keys) {
        const value = document[key];
        if (value === undefined || value === null) continue;
        if (typeof value !== 'string' || value.trim() === '') {
            throw invalidConfig(path, `'${key}' must be a directory path`);
        }
        return resolve(home, value);
    }
    return undefined;
}

/**
 * Read `<home>/config.yaml`. A missing file yields the defaults.
 *
 * @throws {BannerError} `INVALID_OPTION` for a malformed file
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<BannerConfig> {
    const fs = options.fs ?? defaultFileSystem;
    const home = options.home ?? resolveHome(options.env);
    const configPath = join(home, CONFIG_FILE);

    const config: BannerConfig = {
        home,
        configPath,
        templatesDir: join(home, 'templates'),
        fontsDir: join(home, 'fonts'),
        defaults: {},
    };
    if (!fs.existsSync(configPath)) return config;

    let document: unknown;
    try {
        document = YAML.parse(await fs.readFile(configPath, 'utf-8'));
    } catch (error) {
        throw invalidConfig(configPath, errorMessage(error), error);
    }
    // An empty file parses to null
    if (document === null || document === undefined) return config;
    if (!isRecord(document)) {
        throw invalidConfig(configPath, 'expected a mapping');
    }

    config.templatesDir = readDir(document, ['templates_dir', 'templatesDir'], home, configPath) ?? config.templatesDir;
    config.fontsDir = readDir(document, ['fonts_dir', 'fontsDir'], home, configPath) ?? config.fontsDir;

    const defaults = document['defaults'];
    if (defaults !== undefined && defaults !== null) {
        try {
            config.defaults = readStyleInput(defaults);
            createStyle(config.defaults);
        } catch (error) {
            throw invalidConfig(configPath, `defaults: ${errorMessage(error)}`, error);
        }
    }

    log.info('configuration loaded', { path: configPath });
    return config;
}
