/**
 * Global test setup for CLI tests.
 *
 * Automatically cleans up after each test to prevent:
 * - React tree memory leaks from unmounted Ink components
 * - Active `setInterval` / `setTimeout` timers (e.g., from `useElapsedTime`, `Spinner`)
 * - Mock bleed between tests
 *
 * @module test/setup
 */
import { afterEach, vi } from 'vitest';
import { cleanup } from '../src/test-utils/render.js';

// Tests expect a color-capable environment; those that need NO_COLOR stub it
delete process.env['NO_COLOR'];

afterEach(() => {
    cleanup();
    vi.restoreAllMocks();
});
