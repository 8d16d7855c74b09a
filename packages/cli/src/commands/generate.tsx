/**
 * Generate command - renders text as an ASCII banner and optionally
 * exports it to a file.
 *
 * @module commands/generate
 */
import type { CommandModule, Argv } from 'yargs';
import React from 'react';
import { Box, Text, useApp } from 'ink';
import {
    BannerError,
    BannerGenerator,
    EXPORTERS,
    HTML_THEMES,
    exportBanner,
    parseExportFormat,
    parseFontSize,
    parseHtmlTheme,
    styleToRecord,
    type ExportFormat,
    type ExportOptions,
    type ExportResult,
    type RenderedBanner,
} from '@ascii-banner/core';
import { Spinner, StatusMessage } from '../ui/components/index.js';
import { theme } from '../ui/themes/colors.js';
import { useCommand, useExitOnComplete } from '../ui/hooks/useCommand.js';
import { runDirect } from '../utils/run-direct.js';
import { runCommand } from './command-runner.js';
import { bannerOutput, createEngine, resolveStyle, styleOptions, type Engine, type StyleArgs } from './engine.js';
import type { CommandContext } from './types.js';

export interface GenerateOptions extends StyleArgs {
    output?: string;
    format?: string;
    /** HTML theme */
    theme?: string;
    metadata?: boolean;
    includeColors?: boolean;
    animated?: boolean;
    fontSize?: number;
}

export interface GenerateResult {
    rendered: RenderedBanner;
    /** Name of the template the style started from */
    template: string | undefined;
    /** Set when the banner was written to `--output` */
    exported: ExportResult | undefined;
    /** `--format` without `--output`: the serialized document */
    document: string | undefined;
}

/**
 * Render `text` with the resolved style, then write or serialize it.
 *
 * @throws {BannerError} for empty text, unknown fonts or templates, invalid
 *         style values, unsupported formats and write failures
 */
export async function generateBanner(
    text: string,
    options: GenerateOptions,
    engine?: Engine,
): Promise<GenerateResult> {
    const format: ExportFormat | undefined = options.format === undefined
        ? undefined
        : parseExportFormat(options.format);
    if (options.output === undefined && format === 'png') {
        throw new BannerError('INVALID_OPTION', `The ${format} format needs a file to write to`, {
            hint: `Add --output banner${EXPORTERS[format].extension}`,
        });
    }
    if (options.theme !== undefined) parseHtmlTheme(options.theme);
    if (options.fontSize !== undefined) parseFontSize(options.fontSize);

    const env = engine ?? await createEngine();
    const { style, template } = await resolveStyle(env, options);
    const rendered = await new BannerGenerator(text, style, { fonts: env.fonts }).render();

    const exportOptions: ExportOptions = {
        includeColors: options.includeColors,
        metadata: options.metadata,
        theme: options.theme,
        animated: options.animated,
        fontSize: options.fontSize,
    };

    let exported: ExportResult | undefined;
    let document: string | undefined;
    if (options.output !== undefined) {
        exported = await exportBanner(rendered, options.output, { ...exportOptions, format });
    } else if (format !== undefined) {
        const content = await EXPORTERS[format].serialize(rendered, exportOptions);
        if (typeof content !== 'string') {
            throw new BannerError('INVALID_OPTION', `The ${format} format needs a file to write to`);
        }
        document = content;
    }

    return { rendered, template: template?.name, exported, document };
}

/**
 * Props for Generate command component.
 */
export interface GenerateProps {
    text: string;
    options: GenerateOptions;
    context: CommandContext;
    engine?: Engine;
    /** Whether to auto-exit when command completes (default: true) */
    autoExit?: boolean;
}

/**
 * Generate command component.
 * Only renders in rich (Ink) mode.
 */
export const Generate: React.FC<GenerateProps> = ({ text, options, context, engine, autoExit = true }) => {
    const { status, result, error, hint, failure } = useCommand(
        () => generateBanner(text, options, engine),
        [text],
    );
    const { exit } = useApp();
    useExitOnComplete(status, exit, { failure, enabled: autoExit });

    if (status === 'loading') {
        return <Spinner label="Rendering banner" emoji="art" />;
    }

    if (status === 'error') {
        return <StatusMessage type="error" message={error ?? 'Unknown error'} hint={hint} />;
    }

    if (!result) return null;
    const { rendered, exported, document } = result;

    return (
        <Box flexDirection="column">
            {result.template && (
                <Text color={theme.text.secondary}>Using template: {result.template}</Text>
            )}
            {exported ? (
                <StatusMessage
                    type="success"
                    message={`Banner saved to ${exported.path} (${exported.format.toUpperCase()}, ${exported.bytes} bytes)`}
                />
            ) : (
                <Text>{document ?? bannerOutput(rendered, context.noColor)}</Text>
            )}
        </Box>
    );
};

/**
 * Run generation without Ink (for --json and --quiet modes).
 */
export async function runGenerate(
    text: string,
    options: GenerateOptions,
    context: CommandContext,
    engine?: Engine,
): Promise<void> {
    await runDirect(
        () => generateBanner(text, options, engine),
        context,
        {
            json: r => ({
                success: true,
                text: r.rendered.text,
                style: styleToRecord(r.rendered.style),
                template: r.template,
                output: { plain: r.rendered.plain, ansi: r.rendered.ansi },
                ...(r.exported ? { file: r.exported } : {}),
                ...(r.document !== undefined ? { document: r.document } : {}),
            }),
            quiet: r => {
                if (r.exported) return r.exported.path;
                return r.document ?? bannerOutput(r.rendered, context.noColor);
            },
        },
    );
}

// ─────────────────────────────────────────────────────────────────────────────
// yargs CommandModule
// ─────────────────────────────────────────────────────────────────────────────

/** Command arguments */
export interface GenerateArgs extends GenerateOptions {
    text: string;
}

/** Generate command module for yargs */
export const generateCommand: CommandModule<object, GenerateArgs> = {
    command: 'generate <text>',
    describe: 'Render text as an ASCII banner',
    builder: (yargs: Argv) =>
        yargs
            .positional('text', {
                describe: 'Text to render',
                type: 'string',
                demandOption: true,
            })
            .options(styleOptions)
            .options({
                output: {
                    alias: 'o',
                    type: 'string',
                    describe: 'Write to a file (format from the extension)',
                },
                format: {
                    type: 'string',
                    describe: 'text, html, svg, png, json or yaml',
                },
                theme: {
                    type: 'string',
                    choices: HTML_THEMES,
                    describe: 'HTML theme',
                },
                metadata: {
                    type: 'boolean',
                    default: undefined,
                    describe: 'Prefix text exports with a comment header',
                },
                'include-colors': {
                    type: 'boolean',
                    default: undefined,
                    describe: 'Keep ANSI colors in text exports',
                },
                animated: {
                    type: 'boolean',
                    default: undefined,
                    describe: 'Animate HTML exports',
                },
                'font-size': {
                    type: 'number',
                    describe: 'Font size in pixels for SVG and PNG',
                },
            })
            .example('$0 generate "Hello"', 'Standard font, no decoration')
            .example('$0 generate "Hello" -t retro -c gradient:red-blue', 'Template with a color override')
            .example('$0 generate "Hello" -o hello.html --theme dark', 'HTML export') as Argv<GenerateArgs>,
    handler: async (argv) => {
        await runCommand(argv, {
            ink: (args, ctx) => <Generate text={args.text} options={args} context={ctx} />,
            direct: (args, ctx) => runGenerate(args.text, args, ctx),
        });
    },
};
