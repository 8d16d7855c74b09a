/**
 * Test utilities for CLI components.
 * Provides render helpers for Ink components.
 *
 * Includes automatic cleanup of unmounted Ink renders to prevent memory leaks.
 * Import {@link cleanup} and call it in `afterEach`, or use the global setup
 * file (`test/setup.ts`) which does this automatically.
 *
 * @module test-utils/render
 */
import { render as inkRender } from 'ink-testing-library';
import { act, cloneElement } from 'react';
import type React from 'react';
import type { CommandContext } from '../commands/types.js';

export { stripAnsi } from '@ascii-banner/core';

type RenderResult = ReturnType<typeof inkRender>;

/**
 * Tracks all active Ink render instances for cleanup.
 */
const activeRenders: Array<() => void> = [];

/**
 * Unmount all active Ink render instances and clear the tracking list.
 * Call this in `afterEach` to prevent React tree and timer leaks.
 */
export function cleanup(): void {
    for (const unmountFn of activeRenders) {
        unmountFn();
    }
    activeRenders.length = 0;
}

/**
 * Wrapper around ink-testing-library's render that runs inside `act` and
 * registers the instance for {@link cleanup}.
 * @param tree - React element to render
 * @param terminalWidth - Optional terminal width to simulate
 */
export const render = (
    tree: React.ReactElement,
    terminalWidth?: number,
): RenderResult => {
    const rendered: RenderResult[] = [];
    act(() => {
        rendered.push(inkRender(tree));
    });
    const renderResult = rendered[0];
    if (renderResult === undefined) {
        throw new Error('Ink render did not complete');
    }

    if (terminalWidth !== undefined) {
        // Override the columns getter to simulate terminal width
        Object.defineProperty(renderResult.stdout, 'columns', {
            get: () => terminalWidth,
            configurable: true,
        });
        // A fresh element makes React re-render instead of bailing out
        act(() => {
            renderResult.rerender(cloneElement(tree));
        });
    }

    let unmounted = false;
    const wrappedUnmount = (): void => {
        if (!unmounted) {
            unmounted = true;
            act(() => {
                renderResult.unmount();
            });
        }
    };
    activeRenders.push(wrappedUnmount);

    return {
        ...renderResult,
        unmount: wrappedUnmount,
        rerender: (newTree: React.ReactElement) => {
            act(() => {
                renderResult.rerender(newTree);
            });
        },
    };
};

/**
 * Default test context values.
 */
export const defaultTestContext: CommandContext = {
    version: '1.0.0-test',
    isFirstRun: false,
    mode: 'rich',
    noColor: true,
    cwd: '/tmp',
};

/**
 * Wait for a condition to be true.
 * Useful for testing async state changes.
 */
export async function waitFor(
    condition: () => boolean,
    options: { timeout?: number; interval?: number } = {},
): Promise<void> {
    const { timeout = 1000, interval = 50 } = options;
    const start = Date.now();

    while (!condition()) {
        if (Date.now() - start > timeout) {
            throw new Error('waitFor timeout');
        }
        await act(async () => {
            await new Promise(resolve => setTimeout(resolve, interval));
        });
    }
}

/**
 * Flush pending async React effects.
 * Use this instead of waitUntilExit() in tests to let useEffect/useCommand settle.
 */
export async function flushAsync(): Promise<void> {
    await act(async () => {
        await new Promise(resolve => setTimeout(resolve, 50));
    });
}
