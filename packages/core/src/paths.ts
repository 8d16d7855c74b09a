/**
 * Locations of the data files shipped with the package.
 *
 * @module paths
 */
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { defaultFileSystem, type FileSystemService } from './services/filesystem.js';

/**
 * Resolve a directory shipped at the package root (`data`, `templates`).
 *
 * Walks up from this module to the directory holding package.json, which
 * covers both the source layout (`src/`) and the build layout (`dist/src/`).
 */
export function resolvePackageDir(name: string, fs: FileSystemService = defaultFileSystem): string {
    const moduleDir = dirname(fileURLToPath(import.meta.url));

    let current = moduleDir;
    const root = resolve('/');
    while (current !== root) {
        if (fs.existsSync(join(current, 'package.json'))) {
            return join(current, name);
        }
        current = dirname(current);
    }

    // Fall back to the source layout so callers can report the missing path
    return resolve(moduleDir, '..', name);
}

export const BUILTIN_TEMPLATES_DIR = resolvePackageDir('templates');
export const FONT_CATALOG_PATH = join(resolvePackageDir('data'), 'font-catalog.json');
