/**
 * Unified command runner that bridges yargs handlers to Ink/non-Ink execution.
 *
 * This module provides the infrastructure for executing commands in both
 * rich (Ink) and non-rich (JSON/quiet) modes. Yargs handles argument parsing
 * and validation, while this module handles the execution and output.
 *
 * @module commands/command-runner
 */
import type { ReactElement } from 'react';
import { render } from 'ink';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { defaultFileSystem, isRecord, type FileSystemService } from '@ascii-banner/core';
import type { CommandContext } from './types.js';
import { parseOutputConfig, shouldUseInk } from '../utils/output-mode.js';
import { exitCodeFor } from '../utils/exit-codes.js';
import { isFirstRun, markFirstRunComplete } from '../ui/hooks/useFirstRun.js';

// Get package version
const __dirname = dirname(fileURLToPath(import.meta.url));
const packagePath = resolve(__dirname, '..', '..', 'package.json');

let cachedVersion: string | undefined;

/**
 * Get the CLI version from package.json.
 */
export async function getVersion(fs: FileSystemService = defaultFileSystem): Promise<string> {
    if (cachedVersion) return cachedVersion;
    let pkg: unknown;
    try {
        pkg = JSON.parse(await fs.readFile(packagePath, 'utf-8'));
    } catch {
        // Running from a copy without its package.json
        return '0.0.0';
    }
    if (!isRecord(pkg) || typeof pkg['version'] !== 'string') {
        return '0.0.0';
    }
    cachedVersion = pkg['version'];
    return cachedVersion;
}

/**
 * Build a CommandContext from the current process state.
 * Used by yargs handlers to create the context for command execution.
 */
export async function buildContext(): Promise<CommandContext> {
    const outputConfig = parseOutputConfig(process.argv.slice(2));
    const version = await getVersion();
    const firstRun = isFirstRun();

    if (firstRun) {
        await markFirstRunComplete();
    }

    return {
        ...outputConfig,
        version,
        isFirstRun: firstRun,
    };
}

/**
 * Options for running a command.
 *
 * @typeParam TArgs - The type of parsed yargs arguments
 */
export interface RunCommandOptions<TArgs> {
    /**
     * Create the Ink component for rich mode.
     * Receives parsed args and context.
     */
    ink: (args: TArgs, context: CommandContext) => ReactElement;

    /**
     * Execute the command in non-rich mode (JSON/quiet).
     * Should use runDirect internally for consistent output handling.
     */
    direct: (args: TArgs, context: CommandContext) => Promise<void>;
}

/**
 * Execute a command, automatically choosing between Ink and non-Ink modes.
 *
 * In rich mode a component that exits with an error has already shown it;
 * only the exit code is left to set.
 *
 * @example
 * ```typescript
 * export const handler = async (argv: GenerateArgs) => {
 *     await runCommand(argv, {
 *         ink: (args, ctx) => <Generate text={args.text} options={args} context={ctx} />,
 *         direct: (args, ctx) => runGenerate(args.text, args, ctx),
 *     });
 * };
 * ```
 */
export async function runCommand<TArgs>(
    args: TArgs,
    options: RunCommandOptions<TArgs>,
): Promise<void> {
    const context = await buildContext();

    if (shouldUseInk(context)) {
        const element = options.ink(args, context);
        const { waitUntilExit } = render(element);
        try {
            await waitUntilExit();
        } catch (error: unknown) {
            process.exitCode = exitCodeFor(error);
        }
    } else {
        await options.direct(args, context);
    }
}

/**
 * Options every command accepts.
 */
export const globalOptions = {
    json: {
        type: 'boolean' as const,
        describe: 'Output in JSON format',
        default: false,
    },
    quiet: {
        alias: 'q',
        type: 'boolean' as const,
        describe: 'Print only the result (CI mode)',
        default: false,
    },
    'no-color': {
        type: 'boolean' as const,
        describe: 'Disable colors',
        default: false,
    },
    verbose: {
        type: 'boolean' as const,
        describe: 'Log font, template and export details to stderr',
        default: false,
    },
} as const;
