import { getRuntimeSettings } from './runtime-settings.js';

/**
 * Structured logger for the banner engine.
 *
 * Wraps console.warn/error with structured context (component name,
 * file path, timing data) so diagnostics from font loading, template
 * lookup and export can be told apart.
 *
 * Usage:
 * ```ts
 * const log = createLogger('TemplateStore');
 * log.info('template loaded', { name: 'retro', path });
 * log.warn('skipping unreadable font file', { path });
 * log.timed('render', () => generator.render());
 * ```
 *
 * Output goes to stderr because stdout carries the banner itself (and the
 * JSON document in `--json` mode).
 */

/** Structured context attached to log messages. */
export interface LogContext {
    /** File path, shortened to its basename for readability. */
    path?: string;
    /** Additional key → value pairs (serialised as JSON). */
    [key: string]: unknown;
}

export interface BannerLogger {
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
    /**
     * Measures and logs the duration of an operation.
     * Returns the operation's result.
     */
    timed<T>(label: string, fn: () => T | Promise<T>): Promise<T>;
}

function formatContext(ctx: LogContext | undefined): string {
    if (!ctx || Object.keys(ctx).length === 0) return '';
    const display = { ...ctx };
    if (typeof display.path === 'string') {
        const parts = display.path.split(/[\\/]/);
        display.path = parts.at(-1);
    }
    return ` ${JSON.stringify(display)}`;
}

/**
 * Creates a structured logger scoped to a named component.
 *
 * @param component - Short component name (e.g. 'FontManager', 'Exporter')
 */
export function createLogger(component: string): BannerLogger {
    const prefix = `[ascii-banner:${component}]`;

    return {
        info(message: string, context?: LogContext): void {
            if (getRuntimeSettings().infoLogs) {
                console.warn(`${prefix} ${message}${formatContext(context)}`);
            }
        },
        warn(message: string, context?: LogContext): void {
            console.warn(`${prefix} WARN ${message}${formatContext(context)}`);
        },
        error(message: string, context?: LogContext): void {
            console.error(`${prefix} ERROR ${message}${formatContext(context)}`);
        },
        async timed<T>(label: string, fn: () => T | Promise<T>): Promise<T> {
            const start = performance.now();
            try {
                const result = await fn();
                const elapsed = (performance.now() - start).toFixed(1);
                if (getRuntimeSettings().infoLogs) {
                    console.warn(`${prefix} ${label} completed in ${elapsed}ms`);
                }
                return result;
            } catch (err) {
                const elapsed = (performance.now() - start).toFixed(1);
                console.error(`${prefix} ${label} failed after ${elapsed}ms`);
                throw err;
            }
        }
    };
}
