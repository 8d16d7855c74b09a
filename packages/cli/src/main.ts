#!/usr/bin/env node
/**
 * ascii-banner CLI entry point.
 *
 * Uses yargs for command parsing and routing, with Ink for rich terminal UI
 * and fallback to direct output for JSON/quiet modes.
 *
 * @module main
 */
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { render } from 'ink';
import React from 'react';
import { setRuntimeSettings } from '@ascii-banner/core';
import { getVersion, globalOptions, buildContext } from './commands/command-runner.js';
import {
    commandNames,
    fontsCommand,
    generateCommand,
    helpCommand,
    interactiveCommand,
    previewCommand,
    templatesCommand,
} from './commands/index.js';
import { Help, runHelp } from './commands/help.js';
import { shouldUseInk } from './utils/output-mode.js';
import { parseFailureExitCode } from './utils/exit-codes.js';

/**
 * Show the custom help screen based on output mode.
 */
async function showHelp(): Promise<void> {
    const context = await buildContext();
    if (shouldUseInk(context)) {
        const { waitUntilExit } = render(React.createElement(Help, { context }));
        await waitUntilExit();
    } else {
        runHelp(context);
    }
}

/**
 * Main entry point.
 */
async function main(): Promise<void> {
    const version = await getVersion();

    const args = hideBin(process.argv);
    const hasHelp = args.includes('--help') || args.includes('-h');
    const hasVersion = args.includes('--version') || args.includes('-v');

    // Top-level --help gets the custom screen; `<command> --help` gets yargs' own
    if (hasHelp && args.filter(a => !a.startsWith('-')).length === 0) {
        await showHelp();
        process.exit(0);
    }

    const parser = yargs(args)
        .scriptName('ascii-banner')
        .usage('$0 <command> [options]')
        .version(version)
        .alias('v', 'version')
        .help()
        .alias('h', 'help')
        .options(globalOptions)
        .middleware(argv => {
            if (argv.verbose) {
                setRuntimeSettings({ infoLogs: true });
            }
        })
        .command(generateCommand)
        .command(fontsCommand)
        .command(previewCommand)
        .command(templatesCommand)
        .command(interactiveCommand)
        .command(helpCommand)
        .strict()
        .demandCommand(0)
        .recommendCommands()
        .showHelpOnFail(false)
        .fail(async (msg, err) => {
            const context = await buildContext();
            const errorMsg = err?.message ?? msg ?? 'Unknown error';

            if (context.mode === 'json') {
                process.stdout.write(JSON.stringify({ success: false, error: errorMsg }) + '\n');
            } else {
                process.stderr.write(`Error: ${errorMsg}\n`);
                process.stderr.write("Run 'ascii-banner help' for available commands.\n");
            }
            process.exit(parseFailureExitCode(args, commandNames()));
        });

    const argv = await parser.parse();

    // Bare `ascii-banner` shows help
    if (!hasVersion && argv._.length === 0) {
        await showHelp();
    }
}

try {
    await main();
} catch (error: unknown) {
    process.stderr.write(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
}
