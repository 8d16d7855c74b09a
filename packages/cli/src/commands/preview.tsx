/**
 * Preview command - renders one text in several fonts side by side.
 *
 * @module commands/preview
 */
import type { CommandModule, Argv } from 'yargs';
import React from 'react';
import { Box, Text, useApp } from 'ink';
import { BannerGenerator, DEFAULT_PREVIEW_FONTS, type FontPreview } from '@ascii-banner/core';
import { Panel, Spinner, StatusMessage } from '../ui/components/index.js';
import { theme } from '../ui/themes/colors.js';
import { EMOJI } from '../ui/themes/emoji.js';
import { useCommand, useExitOnComplete } from '../ui/hooks/useCommand.js';
import { runDirect } from '../utils/run-direct.js';
import { runCommand } from './command-runner.js';
import { createEngine, type Engine } from './engine.js';
import type { CommandContext } from './types.js';

export const DEFAULT_PREVIEW_TEXT = 'PREVIEW';
export const DEFAULT_PREVIEW_MAX = 5;

export interface PreviewOptions {
    /** Explicit font list; not limited by `max` */
    fonts?: string[];
    category?: string;
    max?: number;
}

export interface PreviewResult {
    text: string;
    previews: FontPreview[];
    /** Requested fonts that are not installed */
    missing: string[];
}

async function candidateFonts(engine: Engine, options: PreviewOptions): Promise<string[]> {
    const max = options.max ?? DEFAULT_PREVIEW_MAX;
    if (options.fonts !== undefined && options.fonts.length > 0) return options.fonts;
    if (options.category !== undefined) {
        return (await engine.fonts.getFontsByCategory(options.category)).slice(0, max);
    }
    return DEFAULT_PREVIEW_FONTS.slice(0, max);
}

/**
 * Render `text` in each candidate font. Unavailable fonts are reported in
 * `missing` rather than failing the preview.
 */
export async function previewFonts(
    text: string,
    options: PreviewOptions,
    engine?: Engine,
): Promise<PreviewResult> {
    const env = engine ?? await createEngine();
    const candidates = await candidateFonts(env, options);

    const missing: string[] = [];
    for (const font of candidates) {
        if (!await env.fonts.validateFont(font)) missing.push(font);
    }

    const generator = new BannerGenerator(text, env.config.defaults, { fonts: env.fonts });
    const previews = await generator.previewFonts(candidates);
    return { text, previews, missing };
}

/**
 * Props for Preview command component.
 */
export interface PreviewProps {
    text: string;
    options: PreviewOptions;
    context: CommandContext;
    engine?: Engine;
    autoExit?: boolean;
}

/**
 * Preview command component.
 * Only renders in rich (Ink) mode.
 */
export const Preview: React.FC<PreviewProps> = ({ text, options, engine, autoExit = true }) => {
    const { status, result, error, hint, failure } = useCommand(
        () => previewFonts(text, options, engine),
        [text],
    );
    const { exit } = useApp();
    useExitOnComplete(status, exit, { failure, enabled: autoExit });

    if (status === 'loading') {
        return <Spinner label="Rendering previews" emoji="eyes" />;
    }

    if (status === 'error') {
        return <StatusMessage type="error" message={error ?? 'Unknown error'} hint={hint} />;
    }

    if (!result) return null;

    return (
        <Box flexDirection="column">
            <Text bold color={theme.text.primary}>{EMOJI.eyes}Font preview: "{result.text}"</Text>
            {result.previews.map(p => <Panel key={p.font} title={p.font} content={p.output} />)}
            {result.missing.map(font => (
                <StatusMessage key={font} type="warning" message={`Font '${font}' not available`} />
            ))}
            {result.previews.length === 0 && (
                <StatusMessage type="warning" message="No fonts to preview" />
            )}
        </Box>
    );
};

/**
 * Run the preview without Ink (for --json and --quiet modes).
 */
export async function runPreview(
    text: string,
    options: PreviewOptions,
    context: CommandContext,
    engine?: Engine,
): Promise<void> {
    await runDirect(
        () => previewFonts(text, options, engine),
        context,
        {
            quiet: r => r.previews.map(p => `== ${p.font} ==\n${p.output}`).join('\n'),
        },
    );
}

// ─────────────────────────────────────────────────────────────────────────────
// yargs CommandModule
// ─────────────────────────────────────────────────────────────────────────────

/** Command arguments */
export interface PreviewArgs extends PreviewOptions {
    text: string;
}

/** Preview command module for yargs */
export const previewCommand: CommandModule<object, PreviewArgs> = {
    command: 'preview [text]',
    describe: 'Show text in several fonts',
    builder: (yargs: Argv) =>
        yargs
            .positional('text', {
                describe: 'Text to render',
                type: 'string',
                default: DEFAULT_PREVIEW_TEXT,
            })
            .options({
                fonts: {
                    alias: 'f',
                    type: 'array',
                    string: true,
                    describe: 'Fonts to preview',
                },
                category: {
                    alias: 'c',
                    type: 'string',
                    describe: 'Preview fonts of a category',
                },
                max: {
                    alias: 'm',
                    type: 'number',
                    default: DEFAULT_PREVIEW_MAX,
                    describe: 'Maximum fonts to show',
                },
            }) as Argv<PreviewArgs>,
    handler: async (argv) => {
        await runCommand(argv, {
            ink: (args, ctx) => <Preview text={args.text} options={args} context={ctx} />,
            direct: (args, ctx) => runPreview(args.text, args, ctx),
        });
    },
};
