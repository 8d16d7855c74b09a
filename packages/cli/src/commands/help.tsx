/**
 * Help command - displays help information.
 * Combines yargs CommandModule with Ink UI component.
 * Uses dynamic command discovery from exported commands array.
 *
 * @module commands/help
 */
import type { CommandModule } from 'yargs';
import React from 'react';
import { Box, Text } from 'ink';
import { Header, SectionHeader, getBannerContext } from '../ui/components/index.js';
import { theme } from '../ui/themes/colors.js';
import { EMOJI } from '../ui/themes/emoji.js';
import { runCommand } from './command-runner.js';
import type { CommandContext } from './types.js';

// Import command modules directly to avoid circular dependency with index.ts
import { generateCommand } from './generate.js';
import { fontsCommand } from './fonts.js';
import { previewCommand } from './preview.js';
import { templatesCommand } from './templates.js';
import { interactiveCommand } from './interactive.js';

/**
 * All command modules (excluding help itself).
 * Used to dynamically build the help list.
 */
const allCommands = [
    generateCommand,
    fontsCommand,
    previewCommand,
    templatesCommand,
    interactiveCommand,
] as const;

/**
 * Props for Help command component.
 */
export interface HelpProps {
    /** Command context (needed for version, mode) */
    context: CommandContext;
}

/**
 * Extract command list from yargs modules.
 */
export function getCommandList(): Array<{ name: string; description: string }> {
    return allCommands.map(cmd => ({
        name: typeof cmd.command === 'string' ? cmd.command : String(cmd.command),
        description: typeof cmd.describe === 'string' ? cmd.describe : '',
    }));
}

/**
 * Global options for help display.
 */
export const OPTIONS = [
    { flags: '--help, -h', description: 'Show help' },
    { flags: '--version, -v', description: 'Show version' },
    { flags: '--quiet, -q', description: 'Print only the result (CI mode)' },
    { flags: '--json', description: 'Output in JSON format' },
    { flags: '--no-color', description: 'Disable colors' },
    { flags: '--verbose', description: 'Log details to stderr' },
] as const;

export const EXAMPLES = [
    '$ ascii-banner generate "Hello World"',
    '$ ascii-banner generate "Launch" -f slant -c gradient:red-blue -b rounded',
    '$ ascii-banner generate "Docs" -t corporate -o banner.html --theme dark',
    '$ ascii-banner fonts --category 3d --sample',
    '$ ascii-banner preview "Hi" -f standard slant big',
] as const;

/**
 * Help command component (rich mode only).
 * Displays a styled help screen with banner and command list.
 */
export const Help: React.FC<HelpProps> = ({ context }) => {
    const commandList = getCommandList();
    const maxCommandWidth = Math.max(...commandList.map(c => c.name.length));

    return (
        <Box flexDirection="column">
            <Header version={context.version} context={getBannerContext('help', context.isFirstRun)} />

            <SectionHeader icon={EMOJI.book} title="USAGE" />
            <Box marginLeft={3} marginBottom={1}>
                <Text color={theme.text.secondary}>$ ascii-banner {'<command>'} [options]</Text>
            </Box>

            <SectionHeader icon={EMOJI.tools} title="COMMANDS" />
            <Box flexDirection="column" marginLeft={3} marginBottom={1}>
                {commandList.map(cmd => (
                    <Box key={cmd.name}>
                        <Box width={maxCommandWidth + 4}>
                            <Text color={theme.text.accent}>{cmd.name}</Text>
                        </Box>
                        <Text color={theme.text.secondary}>{cmd.description}</Text>
                    </Box>
                ))}
            </Box>

            <SectionHeader icon={EMOJI.gear} title="OPTIONS" />
            <Box flexDirection="column" marginLeft={3} marginBottom={1}>
                {OPTIONS.map(opt => (
                    <Box key={opt.flags}>
                        <Box width={20}>
                            <Text color={theme.ui.comment}>{opt.flags}</Text>
                        </Box>
                        <Text color={theme.text.secondary}>{opt.description}</Text>
                    </Box>
                ))}
            </Box>

            <SectionHeader icon={EMOJI.tip} title="EXAMPLES" />
            <Box flexDirection="column" marginLeft={3}>
                {EXAMPLES.map(example => (
                    <Text key={example} color={theme.ui.comment}>{example}</Text>
                ))}
            </Box>
        </Box>
    );
};

/**
 * Run help without Ink (for --json and --quiet modes).
 */
export function runHelp(context: CommandContext): void {
    const commandList = getCommandList();

    if (context.mode === 'json') {
        const data = {
            version: context.version,
            commands: commandList.map(c => ({ name: c.name, description: c.description })),
            options: OPTIONS.map(o => ({ flags: o.flags, description: o.description })),
        };
        process.stdout.write(JSON.stringify(data, null, 2) + '\n');
    } else {
        process.stdout.write(`ascii-banner v${context.version}\n`);
        const commandNames = commandList.map(c => c.name.split(' ')[0]).join(', ');
        process.stdout.write(`Commands: ${commandNames}\n`);
        process.stdout.write('Use --help for more information\n');
    }
    process.exit(0);
}

// ─────────────────────────────────────────────────────────────────────────────
// yargs CommandModule
// ─────────────────────────────────────────────────────────────────────────────

/** Help command module for yargs */
export const helpCommand: CommandModule = {
    command: 'help',
    describe: 'Display help information',
    handler: async (argv) => {
        await runCommand(argv, {
            ink: (_args, ctx) => <Help context={ctx} />,
            direct: (_args, ctx) => {
                runHelp(ctx);
                return Promise.resolve();
            },
        });
    },
};
