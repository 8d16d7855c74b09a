/**
 * Filesystem service abstraction for testability.
 *
 * Every module that touches disk (font directory, template store, config
 * loader, exporters) takes a {@link FileSystemService}, so tests can run
 * against an in-memory implementation instead of mocking node:fs.
 *
 * @module services/filesystem
 */
import {
    existsSync as nodeExistsSync,
    readFileSync as nodeReadFileSync,
} from 'node:fs';
import {
    readdir as nodeReaddir,
    readFile as nodeReadFile,
    writeFile as nodeWriteFile,
    mkdir as nodeMkdir,
    copyFile as nodeCopyFile,
} from 'node:fs/promises';
import type { Dirent } from 'node:fs';

/**
 * Directory entry returned by readdir with file types.
 */
export interface DirEntry {
    name: string;
    isDirectory(): boolean;
    isFile(): boolean;
}

/**
 * Options for mkdir operation.
 */
export interface MkdirOptions {
    recursive?: boolean;
}

/**
 * Filesystem operations used by the banner engine.
 */
export interface FileSystemService {
    // ─────────────────────────────────────────────────────────────────────────
    // Synchronous Operations
    // ─────────────────────────────────────────────────────────────────────────

    /**
     * Check if a path exists synchronously.
     */
    existsSync(path: string): boolean;

    /**
     * Read file contents synchronously.
     */
    readFileSync(path: string, encoding: BufferEncoding): string;

    // ─────────────────────────────────────────────────────────────────────────
    // Asynchronous Operations
    // ─────────────────────────────────────────────────────────────────────────

    /**
     * Read file contents asynchronously.
     */
    readFile(path: string, encoding: BufferEncoding): Promise<string>;

    /**
     * Write text or binary contents asynchronously.
     */
    writeFile(path: string, data: string | Uint8Array): Promise<void>;

    /**
     * Read directory contents with file types.
     */
    readdir(path: string): Promise<DirEntry[]>;

    /**
     * Create directory (with optional recursive creation).
     */
    mkdir(path: string, options?: MkdirOptions): Promise<void>;

    /**
     * Copy a file.
     */
    copyFile(src: string, dest: string): Promise<void>;
}

/**
 * Default filesystem service using Node.js fs operations.
 */
export class NodeFileSystemService implements FileSystemService {
    existsSync(path: string): boolean {
        return nodeExistsSync(path);
    }

    readFileSync(path: string, encoding: BufferEncoding): string {
        return nodeReadFileSync(path, encoding);
    }

    async readFile(path: string, encoding: BufferEncoding): Promise<string> {
        return nodeReadFile(path, encoding);
    }

    async writeFile(path: string, data: string | Uint8Array): Promise<void> {
        if (typeof data === 'string') {
            await nodeWriteFile(path, data, 'utf-8');
        } else {
            await nodeWriteFile(path, data);
        }
    }

    async readdir(path: string): Promise<DirEntry[]> {
        const entries = await nodeReaddir(path, { withFileTypes: true });
        return entries.map((e: Dirent) => ({
            name: e.name,
            isDirectory: () => e.isDirectory(),
            isFile: () => e.isFile(),
        }));
    }

    async mkdir(path: string, options?: MkdirOptions): Promise<void> {
        await nodeMkdir(path, options);
    }

    async copyFile(src: string, dest: string): Promise<void> {
        await nodeCopyFile(src, dest);
    }
}

/**
 * Default singleton instance for production use.
 */
export const defaultFileSystem = new NodeFileSystemService();
