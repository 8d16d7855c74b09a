/**
 * Fonts command - lists, searches and samples fonts, and adds custom
 * FIGlet fonts.
 *
 * @module commands/fonts
 */
import type { CommandModule, Argv } from 'yargs';
import React from 'react';
import { Box, Text, useApp } from 'ink';
import type { FontInfo } from '@ascii-banner/core';
import { Panel, Spinner, StatusMessage, Table } from '../ui/components/index.js';
import { theme } from '../ui/themes/colors.js';
import { EMOJI } from '../ui/themes/emoji.js';
import { tokens } from '../ui/tokens.js';
import { useCommand, useExitOnComplete } from '../ui/hooks/useCommand.js';
import { runDirect } from '../utils/run-direct.js';
import { runCommand } from './command-runner.js';
import { createEngine, type Engine } from './engine.js';
import type { CommandContext } from './types.js';

export interface FontsOptions {
    category?: string;
    search?: string;
    sample?: boolean;
    sampleText?: string;
    /** List category and use-case names instead of fonts */
    categories?: boolean;
}

export interface FontSample {
    font: string;
    sample: string;
}

export type FontsResult =
    | { kind: 'categories'; categories: string[]; useCases: string[] }
    | { kind: 'list'; title: string; fonts: FontInfo[] }
    | { kind: 'samples'; title: string; samples: FontSample[]; total: number };

function listTitle(options: FontsOptions): string {
    if (options.category !== undefined) return `Fonts in category '${options.category}'`;
    if (options.search !== undefined) return `Fonts matching '${options.search}'`;
    return 'All available fonts';
}

/**
 * Font names selected by `--category` or `--search`, or every font.
 * `--category` wins when both are given.
 */
async function selectFonts(engine: Engine, options: FontsOptions): Promise<string[]> {
    if (options.category !== undefined) return engine.fonts.getFontsByCategory(options.category);
    if (options.search !== undefined) return engine.fonts.searchFonts(options.search);
    return engine.fonts.getAvailableFonts();
}

export async function listFonts(options: FontsOptions, engine?: Engine): Promise<FontsResult> {
    const env = engine ?? await createEngine();
    if (options.categories) {
        return {
            kind: 'categories',
            categories: env.fonts.getAllCategories(),
            useCases: env.fonts.getAllUseCases(),
        };
    }

    const names = await selectFonts(env, options);
    const title = listTitle(options);
    if (options.sample) {
        const samples: FontSample[] = [];
        for (const font of names.slice(0, tokens.limits.samples)) {
            samples.push({ font, sample: await env.fonts.getFontSample(font, options.sampleText) });
        }
        return { kind: 'samples', title, samples, total: names.length };
    }

    const fonts: FontInfo[] = [];
    for (const name of names) {
        fonts.push(await env.fonts.getFontInfo(name));
    }
    return { kind: 'list', title, fonts };
}

function isEmpty(result: FontsResult): boolean {
    return (result.kind === 'list' && result.fonts.length === 0)
        || (result.kind === 'samples' && result.samples.length === 0);
}

function fontRow(info: FontInfo): { name: string; categories: string; recommended: string } {
    return {
        name: info.custom ? `${info.name} (custom)` : info.name,
        categories: info.categories.join(', ') || '-',
        recommended: info.recommendedFor.join(', ') || '-',
    };
}

/**
 * Props for Fonts command component.
 */
export interface FontsProps {
    options: FontsOptions;
    context: CommandContext;
    engine?: Engine;
    autoExit?: boolean;
}

const FontsView: React.FC<{ result: FontsResult }> = ({ result }) => {
    if (result.kind === 'categories') {
        return (
            <Box flexDirection="column">
                <Text bold color={theme.text.primary}>{EMOJI.font}Categories</Text>
                <Box marginLeft={tokens.spacing.indent}>
                    <Text>{result.categories.join(', ')}</Text>
                </Box>
                <Box marginTop={tokens.spacing.section}>
                    <Text bold color={theme.text.primary}>{EMOJI.tip}Recommended for</Text>
                </Box>
                <Box marginLeft={tokens.spacing.indent}>
                    <Text>{result.useCases.join(', ')}</Text>
                </Box>
            </Box>
        );
    }

    if (result.kind === 'samples') {
        return (
            <Box flexDirection="column">
                <Text bold color={theme.text.primary}>{EMOJI.eyes}{result.title}</Text>
                {result.samples.map(s => <Panel key={s.font} title={s.font} content={s.sample} />)}
                {result.total > result.samples.length && (
                    <Text color={theme.text.secondary}>
                        Showing {result.samples.length} of {result.total} fonts
                    </Text>
                )}
            </Box>
        );
    }

    return (
        <Box flexDirection="column">
            <Table
                title={`${EMOJI.font}${result.title}`}
                columns={[
                    { key: 'name', header: 'Font', color: theme.text.accent },
                    { key: 'categories', header: 'Categories' },
                    { key: 'recommended', header: 'Recommended for' },
                ]}
                rows={result.fonts.map(fontRow)}
            />
            <Box marginTop={tokens.spacing.section}>
                <Text color={theme.text.secondary}>{result.fonts.length} fonts</Text>
            </Box>
        </Box>
    );
};

/**
 * Fonts command component.
 * Only renders in rich (Ink) mode.
 */
export const Fonts: React.FC<FontsProps> = ({ options, engine, autoExit = true }) => {
    const { status, result, error, hint, failure } = useCommand(
        () => listFonts(options, engine),
        [options.category, options.search, options.sample, options.categories],
    );
    const { exit } = useApp();
    useExitOnComplete(status, exit, { failure, enabled: autoExit });

    if (status === 'loading') {
        return <Spinner label="Loading fonts" emoji="search" />;
    }

    if (status === 'error') {
        return <StatusMessage type="error" message={error ?? 'Unknown error'} hint={hint} />;
    }

    if (!result) return null;
    if (isEmpty(result)) {
        return (
            <StatusMessage
                type="warning"
                message="No fonts found"
                hint="Run 'ascii-banner fonts --categories' to see the categories"
            />
        );
    }
    return <FontsView result={result} />;
};

/**
 * Run the fonts listing without Ink (for --json and --quiet modes).
 */
export async function runFonts(options: FontsOptions, context: CommandContext, engine?: Engine): Promise<void> {
    await runDirect(
        () => listFonts(options, engine),
        context,
        {
            json: r => {
                switch (r.kind) {
                    case 'categories':
                        return { success: true, categories: r.categories, useCases: r.useCases };
                    case 'samples':
                        return { success: true, title: r.title, total: r.total, samples: r.samples };
                    case 'list':
                        return {
                            success: true,
                            title: r.title,
                            count: r.fonts.length,
                            fonts: r.fonts.map(f => ({
                                name: f.name,
                                categories: f.categories,
                                recommendedFor: f.recommendedFor,
                                custom: f.custom,
                            })),
                        };
                }
            },
            quiet: r => {
                switch (r.kind) {
                    case 'categories':
                        return [...r.categories, ...r.useCases].join('\n');
                    case 'samples':
                        return r.samples.map(s => `${s.font}\n${s.sample}`).join('\n');
                    case 'list':
                        return r.fonts.map(f => f.name).join('\n');
                }
            },
        },
    );
}

// ─────────────────────────────────────────────────────────────────────────────
// fonts add
// ─────────────────────────────────────────────────────────────────────────────

export interface AddFontResult {
    name: string;
}

export async function addFont(file: string, description?: string, engine?: Engine): Promise<AddFontResult> {
    const env = engine ?? await createEngine();
    const name = await env.fonts.addCustomFont(file, description === undefined ? undefined : { description });
    return { name };
}

export interface AddFontProps {
    file: string;
    description?: string;
    context: CommandContext;
    engine?: Engine;
    autoExit?: boolean;
}

export const AddFont: React.FC<AddFontProps> = ({ file, description, engine, autoExit = true }) => {
    const { status, result, error, hint, failure } = useCommand(
        () => addFont(file, description, engine),
        [file],
    );
    const { exit } = useApp();
    useExitOnComplete(status, exit, { failure, enabled: autoExit });

    if (status === 'loading') {
        return <Spinner label={`Adding ${file}`} emoji="font" />;
    }
    if (status === 'error') {
        return <StatusMessage type="error" message={error ?? 'Unknown error'} hint={hint} />;
    }
    if (!result) return null;
    return (
        <StatusMessage
            type="success"
            message={`Added font '${result.name}'`}
            hint={`Try: ascii-banner generate "Hello" --font "${result.name}"`}
        />
    );
};

export async function runAddFont(
    file: string,
    description: string | undefined,
    context: CommandContext,
    engine?: Engine,
): Promise<void> {
    await runDirect(
        () => addFont(file, description, engine),
        context,
        { quiet: r => r.name },
    );
}

// ─────────────────────────────────────────────────────────────────────────────
// yargs CommandModule
// ─────────────────────────────────────────────────────────────────────────────

/** Command arguments */
export type FontsArgs = FontsOptions;

export interface AddFontArgs {
    file: string;
    description?: string;
}

export const addFontCommand: CommandModule<object, AddFontArgs> = {
    command: 'add <file>',
    describe: 'Install a FIGlet (.flf) font file',
    builder: (yargs: Argv) =>
        yargs
            .positional('file', {
                describe: 'Path to the .flf file',
                type: 'string',
                demandOption: true,
            })
            .option('description', {
                alias: 'd',
                type: 'string',
                describe: 'Description stored with the font',
            }) as Argv<AddFontArgs>,
    handler: async (argv) => {
        await runCommand(argv, {
            ink: (args, ctx) => <AddFont file={args.file} description={args.description} context={ctx} />,
            direct: (args, ctx) => runAddFont(args.file, args.description, ctx),
        });
    },
};

/** Fonts command module for yargs */
export const fontsCommand: CommandModule<object, FontsArgs> = {
    command: 'fonts',
    describe: 'List, search and sample fonts',
    builder: (yargs: Argv) =>
        yargs
            .command(addFontCommand)
            .options({
                category: {
                    alias: 'c',
                    type: 'string',
                    describe: 'Only fonts of a category',
                },
                search: {
                    alias: 's',
                    type: 'string',
                    describe: 'Only fonts whose name contains this text',
                },
                sample: {
                    type: 'boolean',
                    default: false,
                    describe: `Render samples (first ${tokens.limits.samples} fonts)`,
                },
                'sample-text': {
                    type: 'string',
                    describe: 'Text for samples',
                },
                categories: {
                    type: 'boolean',
                    default: false,
                    describe: 'List category and use-case names',
                },
            }) as Argv<FontsArgs>,
    handler: async (argv) => {
        await runCommand(argv, {
            ink: (args, ctx) => <Fonts options={args} context={ctx} />,
            direct: (args, ctx) => runFonts(args, ctx),
        });
    },
};
