/**
 * First-run detection and elapsed-time tracking.
 *
 * A marker file in the banner home directory records that the CLI has run
 * before; the help screen greets users who have no marker yet.
 *
 * @module ui/hooks/useFirstRun
 */
import { useEffect, useState } from 'react';
import { join } from 'node:path';
import {
    createLogger,
    defaultFileSystem,
    errorMessage,
    resolveHome,
    type FileSystemService,
} from '@ascii-banner/core';

const log = createLogger('FirstRun');

const MARKER_FILE = '.first-run-complete';

export function isFirstRun(fs: FileSystemService = defaultFileSystem, home: string = resolveHome()): boolean {
    return !fs.existsSync(join(home, MARKER_FILE));
}

/**
 * Write the marker file. Failing to write it only means the greeting shows
 * again, so errors are logged rather than thrown.
 */
export async function markFirstRunComplete(
    fs: FileSystemService = defaultFileSystem,
    home: string = resolveHome(),
): Promise<void> {
    try {
        await fs.mkdir(home, { recursive: true });
        await fs.writeFile(join(home, MARKER_FILE), new Date().toISOString() + '\n');
    } catch (error) {
        log.info('could not record first run', { path: home, error: errorMessage(error) });
    }
}

/**
 * Seconds since mount, updated every `intervalMs` while `active`.
 */
export function useElapsedTime(intervalMs = 100, active = true): number {
    const [start] = useState(() => Date.now());
    const [elapsed, setElapsed] = useState(0);

    useEffect(() => {
        if (!active) return undefined;
        const timer = setInterval(() => {
            setElapsed((Date.now() - start) / 1000);
        }, intervalMs);
        return () => clearInterval(timer);
    }, [active, intervalMs, start]);

    return elapsed;
}
