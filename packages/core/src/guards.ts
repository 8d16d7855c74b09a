/**
 * Narrowing helpers for parsed YAML and JSON documents.
 *
 * @module guards
 */

/**
 * A plain key → value mapping (not null, not an array).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
