/**
 * Commands barrel export.
 *
 * Each command file exports a named `CommandModule` (e.g. `generateCommand`).
 * This module re-exports them and assembles the `commands` array, which
 * main.ts uses to tell unknown commands from bad arguments.
 *
 * Individual command components and `runXxx` functions are NOT re-exported
 * here — import them directly from their command file when needed (e.g. in
 * tests).
 *
 * @module commands
 */

// Named command modules
export { generateCommand } from './generate.js';
export { fontsCommand } from './fonts.js';
export { previewCommand } from './preview.js';
export { templatesCommand } from './templates.js';
export { interactiveCommand } from './interactive.js';
export { helpCommand } from './help.js';

// Shared types
export type { CommandContext, OutputConfig, OutputMode } from './types.js';

// Yargs command infrastructure
export { runCommand, buildContext, getVersion, globalOptions } from './command-runner.js';

// Assemble the commands array from named exports
import { generateCommand } from './generate.js';
import { fontsCommand } from './fonts.js';
import { previewCommand } from './preview.js';
import { templatesCommand } from './templates.js';
import { interactiveCommand } from './interactive.js';
import { helpCommand } from './help.js';

/**
 * All registered command modules.
 */
export const commands = [
    generateCommand,
    fontsCommand,
    previewCommand,
    templatesCommand,
    interactiveCommand,
    helpCommand,
] as const;

/**
 * Every name a command answers to, aliases included.
 */
export function commandNames(): Set<string> {
    const names = new Set<string>();
    for (const cmd of commands) {
        if (typeof cmd.command === 'string') names.add(cmd.command.split(' ')[0] ?? cmd.command);
        const aliases = typeof cmd.aliases === 'string' ? [cmd.aliases] : cmd.aliases ?? [];
        for (const alias of aliases) names.add(alias);
    }
    return names;
}
