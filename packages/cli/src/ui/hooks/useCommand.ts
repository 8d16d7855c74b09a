/**
 * Shared command lifecycle hook for Ink components.
 *
 * Encapsulates the loading → success / error state machine that every
 * command component repeats.  Components call `useCommand` with an async
 * executor and receive reactive state they can render.
 *
 * @module ui/hooks/useCommand
 */
import { useState, useEffect } from 'react';
import { errorMessage, isBannerError } from '@ascii-banner/core';
import { useElapsedTime } from './useFirstRun.js';

/** Possible statuses of a command execution. */
export type CommandStatus = 'loading' | 'success' | 'error';

/** Reactive state returned by {@link useCommand}. */
export interface CommandState<T> {
    status: CommandStatus;
    /** The result value when `status === 'success'` */
    result: T | undefined;
    /** The error message when `status === 'error'` */
    error: string | undefined;
    /** Fix suggestion carried by a BannerError */
    hint: string | undefined;
    /** The thrown value itself, for exit code mapping */
    failure: unknown;
    /** Seconds elapsed since the hook mounted */
    elapsed: number;
}

/**
 * React hook that manages the async command lifecycle.
 *
 * @typeParam T - The success-result type produced by `execute`.
 * @param execute - Async function that performs the command's work.
 * @param deps    - React dependency array – re-runs `execute` when deps change.
 *
 * @example
 * ```tsx
 * const { status, result, error } = useCommand(
 *     () => generateBanner(text, options),
 *     [text],
 * );
 * ```
 */
export function useCommand<T>(
    execute: () => Promise<T>,
    deps: unknown[] = [],
): CommandState<T> {
    const [status, setStatus] = useState<CommandStatus>('loading');
    const [result, setResult] = useState<T | undefined>();
    const [error, setError] = useState<string | undefined>();
    const [hint, setHint] = useState<string | undefined>();
    const [failure, setFailure] = useState<unknown>();
    const elapsed = useElapsedTime(100, status === 'loading');

    useEffect(() => {
        let cancelled = false;

        setStatus('loading');
        setResult(undefined);
        setError(undefined);
        setHint(undefined);
        setFailure(undefined);

        execute()
            .then(r => {
                if (!cancelled) {
                    setResult(r);
                    setStatus('success');
                }
            })
            .catch((err: unknown) => {
                if (!cancelled) {
                    setError(errorMessage(err));
                    setHint(isBannerError(err) ? err.hint : undefined);
                    setFailure(err);
                    setStatus('error');
                }
            });

        return () => { cancelled = true; };
        // deps array intentionally controlled by caller, not by this hook
    }, deps);

    return { status, result, error, hint, failure, elapsed };
}

export interface ExitOnCompleteOptions {
    /** The thrown value when `status === 'error'` */
    failure?: unknown;
    /** False keeps the app mounted (tests) */
    enabled?: boolean;
    /** Delay in ms before calling exit (default: 100) */
    delay?: number;
}

/**
 * React hook that exits the Ink app after a command completes. A failed
 * command exits with its error so `waitUntilExit` rejects and the runner
 * can set the exit code.
 *
 * The timeout is cleared on unmount so no timer outlives the component.
 *
 * @param status - Current command status from {@link useCommand}.
 * @param exit   - Ink's `useApp().exit` callback.
 */
export function useExitOnComplete(
    status: CommandStatus,
    exit: (error?: Error) => void,
    { failure, enabled = true, delay = 100 }: ExitOnCompleteOptions = {},
): void {
    useEffect(() => {
        if (enabled && (status === 'success' || status === 'error')) {
            const timer = setTimeout(() => {
                if (status === 'error') {
                    exit(failure instanceof Error ? failure : new Error(errorMessage(failure)));
                } else {
                    exit();
                }
            }, delay);
            return () => clearTimeout(timer);
        }
        return undefined;
    }, [status, exit, failure, enabled, delay]);
}
