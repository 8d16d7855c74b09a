/**
 * Templates command - lists templates and saves new ones from style flags.
 *
 * @module commands/templates
 */
import type { CommandModule, Argv } from 'yargs';
import React from 'react';
import { Box, Text, useApp } from 'ink';
import type { SavedTemplate, StyleInput, Template } from '@ascii-banner/core';
import { Spinner, StatusMessage, Table } from '../ui/components/index.js';
import { theme } from '../ui/themes/colors.js';
import { EMOJI } from '../ui/themes/emoji.js';
import { tokens } from '../ui/tokens.js';
import { useCommand, useExitOnComplete } from '../ui/hooks/useCommand.js';
import { runDirect } from '../utils/run-direct.js';
import { runCommand } from './command-runner.js';
import { createEngine, resolveStyle, styleOptions, type Engine, type StyleArgs } from './engine.js';
import type { CommandContext } from './types.js';

/**
 * Short tags for the decorations a template turns on.
 */
export function templateFeatures(style: Readonly<StyleInput>): string[] {
    const features: string[] = [];
    if (style.shadow) features.push('shadow');
    if (style.padding !== undefined && style.padding > 0) features.push(`padding:${style.padding}`);
    if (style.alignment === 'center') features.push('centered');
    if (style.compact) features.push('compact');
    if (style.bold) features.push('bold');
    return features;
}

export interface TemplateRow {
    name: string;
    font: string;
    border: string;
    color: string;
    features: string;
    description: string;
}

export function templateRow(template: Template): TemplateRow {
    return {
        name: template.source === 'user' ? `${template.name} *` : template.name,
        font: template.style.font ?? 'standard',
        border: template.style.border ?? 'none',
        color: template.style.color ?? '-',
        features: templateFeatures(template.style).join(', ') || '-',
        description: template.description ?? '',
    };
}

export async function listTemplates(engine?: Engine): Promise<{ templates: Template[] }> {
    const env = engine ?? await createEngine();
    return { templates: await env.templates.list() };
}

/**
 * Props for Templates command component.
 */
export interface TemplatesProps {
    context: CommandContext;
    engine?: Engine;
    autoExit?: boolean;
}

/**
 * Templates command component.
 * Only renders in rich (Ink) mode.
 */
export const Templates: React.FC<TemplatesProps> = ({ engine, autoExit = true }) => {
    const { status, result, error, hint, failure } = useCommand(() => listTemplates(engine), []);
    const { exit } = useApp();
    useExitOnComplete(status, exit, { failure, enabled: autoExit });

    if (status === 'loading') {
        return <Spinner label="Loading templates" emoji="template" />;
    }

    if (status === 'error') {
        return <StatusMessage type="error" message={error ?? 'Unknown error'} hint={hint} />;
    }

    if (!result) return null;
    const hasUser = result.templates.some(t => t.source === 'user');

    return (
        <Box flexDirection="column">
            <Table
                title={`${EMOJI.template}Available templates`}
                columns={[
                    { key: 'name', header: 'Name', color: theme.text.accent },
                    { key: 'font', header: 'Font' },
                    { key: 'border', header: 'Border' },
                    { key: 'color', header: 'Color' },
                    { key: 'features', header: 'Features' },
                ]}
                rows={result.templates.map(templateRow)}
            />
            <Box marginTop={tokens.spacing.section} flexDirection="column">
                {hasUser && <Text color={theme.text.secondary}>* user template</Text>}
                <Text color={theme.text.secondary}>
                    {EMOJI.tip}Use one with: ascii-banner generate "Hello" --template {'<name>'}
                </Text>
            </Box>
        </Box>
    );
};

/**
 * List templates without Ink (for --json and --quiet modes).
 */
export async function runTemplates(context: CommandContext, engine?: Engine): Promise<void> {
    await runDirect(
        () => listTemplates(engine),
        context,
        {
            json: r => ({
                success: true,
                templates: r.templates.map(t => ({
                    name: t.name,
                    description: t.description,
                    source: t.source,
                    style: t.style,
                })),
            }),
            quiet: r => r.templates.map(t => t.name).join('\n'),
        },
    );
}

// ─────────────────────────────────────────────────────────────────────────────
// templates save
// ─────────────────────────────────────────────────────────────────────────────

export interface SaveTemplateOptions extends StyleArgs {
    description?: string;
}

/**
 * Resolve the style flags (including `--template` as a starting point) and
 * store the result under `name`.
 */
export async function saveTemplate(
    name: string,
    options: SaveTemplateOptions,
    engine?: Engine,
): Promise<SavedTemplate> {
    const env = engine ?? await createEngine();
    const { style } = await resolveStyle(env, options);
    return env.templates.save(name, style, options.description);
}

export interface SaveTemplateProps {
    name: string;
    options: SaveTemplateOptions;
    context: CommandContext;
    engine?: Engine;
    autoExit?: boolean;
}

export const SaveTemplate: React.FC<SaveTemplateProps> = ({ name, options, engine, autoExit = true }) => {
    const { status, result, error, hint, failure } = useCommand(
        () => saveTemplate(name, options, engine),
        [name],
    );
    const { exit } = useApp();
    useExitOnComplete(status, exit, { failure, enabled: autoExit });

    if (status === 'loading') {
        return <Spinner label={`Saving template ${name}`} emoji="save" />;
    }
    if (status === 'error') {
        return <StatusMessage type="error" message={error ?? 'Unknown error'} hint={hint} />;
    }
    if (!result) return null;
    return (
        <StatusMessage
            type="success"
            message={`Template '${result.template.name}' saved to ${result.path}`}
            hint={`Use it with: ascii-banner generate "Hello" --template ${result.template.name}`}
        />
    );
};

export async function runSaveTemplate(
    name: string,
    options: SaveTemplateOptions,
    context: CommandContext,
    engine?: Engine,
): Promise<void> {
    await runDirect(
        () => saveTemplate(name, options, engine),
        context,
        {
            json: r => ({ success: true, name: r.template.name, path: r.path, style: r.template.style }),
            quiet: r => r.path,
        },
    );
}

// ─────────────────────────────────────────────────────────────────────────────
// yargs CommandModule
// ─────────────────────────────────────────────────────────────────────────────

export interface SaveTemplateArgs extends SaveTemplateOptions {
    name: string;
}

export const saveTemplateCommand: CommandModule<object, SaveTemplateArgs> = {
    command: 'save <name>',
    describe: 'Save the given style flags as a template',
    builder: (yargs: Argv) =>
        yargs
            .positional('name', {
                describe: 'Template name (lowercase, digits, - and _)',
                type: 'string',
                demandOption: true,
            })
            .options(styleOptions)
            .option('description', {
                alias: 'd',
                type: 'string',
                describe: 'One-line description',
            }) as Argv<SaveTemplateArgs>,
    handler: async (argv) => {
        await runCommand(argv, {
            ink: (args, ctx) => <SaveTemplate name={args.name} options={args} context={ctx} />,
            direct: (args, ctx) => runSaveTemplate(args.name, args, ctx),
        });
    },
};

/** Templates command module for yargs */
export const templatesCommand: CommandModule = {
    command: 'templates',
    describe: 'List templates, or save one',
    builder: (yargs: Argv) => yargs.command(saveTemplateCommand),
    handler: async (argv) => {
        await runCommand(argv, {
            ink: (_args, ctx) => <Templates context={ctx} />,
            direct: (_args, ctx) => runTemplates(ctx),
        });
    },
};
