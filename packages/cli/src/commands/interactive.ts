/**
 * Interactive command - a prompt-driven wizard that builds a banner step
 * by step and can save it to a file.
 *
 * Runs outside Ink: the prompts own the terminal while the wizard is open.
 *
 * @module commands/interactive
 */
import type { CommandModule } from 'yargs';
import { confirm as confirmPrompt, input, number as numberPrompt, select } from '@inquirer/prompts';
import chalk, { Chalk, type ChalkInstance } from 'chalk';
import {
    BORDER_STYLES,
    BannerError,
    BannerGenerator,
    DEFAULT_PREVIEW_FONTS,
    EXPORT_FORMATS,
    PADDING_RANGE,
    createStyle,
    detectFormat,
    exportBanner,
    type BorderStyle,
    type ExportFormat,
    type ExportResult,
    type RenderedBanner,
} from '@ascii-banner/core';
import { errorLines } from '../utils/run-direct.js';
import { shouldUseColors } from '../utils/output-mode.js';
import { EXIT, exitCodeFor } from '../utils/exit-codes.js';
import { buildContext } from './command-runner.js';
import { bannerOutput, createEngine, type Engine } from './engine.js';
import type { CommandContext } from './types.js';

const POPULAR = 'popular';
const NO_COLOR = 'none';
const MAX_FONT_CHOICES = 10;

export interface Choice<T extends string> {
    name: string;
    value: T;
    description?: string;
}

/**
 * The questions the wizard asks. {@link inquirerPrompts} is the terminal
 * implementation.
 */
export interface WizardPrompts {
    text(message: string, defaultValue: string): Promise<string>;
    choose<T extends string>(message: string, choices: ReadonlyArray<Choice<T>>, defaultValue?: T): Promise<T>;
    confirm(message: string, defaultValue: boolean): Promise<boolean>;
    number(message: string, defaultValue: number, min: number, max: number): Promise<number>;
}

export const inquirerPrompts: WizardPrompts = {
    text: (message, defaultValue) => input({
        message,
        default: defaultValue,
        validate: value => value.trim() !== '' || 'Please enter some text',
    }),
    choose: (message, choices, defaultValue) => select({ message, choices, default: defaultValue }),
    confirm: (message, defaultValue) => confirmPrompt({ message, default: defaultValue }),
    number: async (message, defaultValue, min, max) =>
        (await numberPrompt({ message, default: defaultValue, min, max })) ?? defaultValue,
};

export const COLOR_CHOICES: ReadonlyArray<Choice<string>> = [
    { name: 'None', value: NO_COLOR },
    { name: 'Red', value: 'red' },
    { name: 'Green', value: 'green' },
    { name: 'Yellow', value: 'yellow' },
    { name: 'Blue', value: 'blue' },
    { name: 'Magenta', value: 'magenta' },
    { name: 'Cyan', value: 'cyan' },
    { name: 'White', value: 'white' },
    { name: 'Fire gradient', value: 'gradient:red-yellow' },
    { name: 'Ocean gradient', value: 'gradient:blue-cyan' },
    { name: 'Neon gradient', value: 'gradient:magenta-cyan' },
    { name: 'Rainbow gradient', value: 'gradient:red-yellow-green-cyan-blue-magenta' },
];

export interface InteractiveOptions {
    engine?: Engine;
    prompts?: WizardPrompts;
    /** Where wizard output goes; stdout by default */
    write?: (text: string) => void;
}

export interface InteractiveResult {
    rendered: RenderedBanner;
    saved: ExportResult | undefined;
}

async function popularFonts(engine: Engine): Promise<string[]> {
    const fonts: string[] = [];
    for (const name of DEFAULT_PREVIEW_FONTS) {
        if (await engine.fonts.validateFont(name)) fonts.push(await engine.fonts.resolveFont(name));
    }
    return fonts;
}

async function fontChoices(engine: Engine, category: string, text: string): Promise<Array<Choice<string>>> {
    let fonts = category === POPULAR ? [] : await engine.fonts.getFontsByCategory(category);
    if (fonts.length === 0) fonts = await popularFonts(engine);
    if (fonts.length === 0) fonts = await engine.fonts.getAvailableFonts();

    const choices: Array<Choice<string>> = [];
    for (const font of fonts.slice(0, MAX_FONT_CHOICES)) {
        choices.push({ name: font, value: font, description: await engine.fonts.getFontSample(font, text) });
    }
    return choices;
}

/**
 * Ask for text and style, show the banner, then offer to save it.
 */
export async function runWizard(
    context: CommandContext,
    options: InteractiveOptions = {},
): Promise<InteractiveResult> {
    const env = options.engine ?? await createEngine();
    const prompts = options.prompts ?? inquirerPrompts;
    const write = options.write ?? ((text: string) => { process.stdout.write(text); });
    const paint: ChalkInstance = shouldUseColors(context) ? chalk : new Chalk({ level: 0 });

    write(paint.bold.cyan('\nASCII Banner wizard\n\n'));

    const text = await prompts.text('Text for the banner:', 'HELLO');
    const category = await prompts.choose('Font category:', [
        { name: 'Popular fonts', value: POPULAR },
        ...env.fonts.getAllCategories().map(c => ({ name: c, value: c })),
    ]);
    const font = await prompts.choose('Font:', await fontChoices(env, category, text));
    const border = await prompts.choose<BorderStyle>(
        'Border:',
        BORDER_STYLES.map(b => ({ name: b, value: b })),
        'none',
    );
    const color = await prompts.choose('Color:', COLOR_CHOICES, NO_COLOR);
    const padding = await prompts.number('Padding:', 0, PADDING_RANGE.min, PADDING_RANGE.max);
    const shadow = await prompts.confirm('Add a shadow?', false);

    const style = createStyle({
        font,
        border,
        color: color === NO_COLOR ? undefined : color,
        padding,
        shadow,
        alignment: padding > 0 ? 'center' : 'left',
    });
    const rendered = await new BannerGenerator(text, style, { fonts: env.fonts }).render();

    write('\n' + paint.bold('Your banner:') + '\n\n' + bannerOutput(rendered, context.noColor) + '\n\n');

    let saved: ExportResult | undefined;
    if (await prompts.confirm('Save the banner to a file?', false)) {
        const file = await prompts.text('File name:', 'banner.txt');
        const format = await prompts.choose<ExportFormat>(
            'Format:',
            EXPORT_FORMATS.map(f => ({ name: f, value: f })),
            detectFormat(file) ?? 'text',
        );
        saved = await exportBanner(rendered, file, { format });
        write(paint.green(`Saved to ${saved.path} (${saved.format})`) + '\n');
    }

    write(paint.gray(`\nRecreate it with: ascii-banner generate "${text}" --font "${style.font}"`
        + `${style.border === 'none' ? '' : ` --border ${style.border}`}`
        + `${style.color === undefined ? '' : ` --color ${style.color}`}`
        + `${style.padding > 0 ? ` --padding ${style.padding} --align center` : ''}`
        + `${style.shadow ? ' --shadow' : ''}\n`));

    return { rendered, saved };
}

/**
 * Prompts throw this when the user presses Ctrl+C.
 */
export function isPromptCancel(error: unknown): boolean {
    return error instanceof Error && error.name === 'ExitPromptError';
}

/**
 * Run the wizard and translate failures into an exit code.
 * Returns undefined when the wizard did not finish.
 */
export async function runInteractive(
    context: CommandContext,
    options: InteractiveOptions = {},
): Promise<InteractiveResult | undefined> {
    if (context.mode !== 'rich') {
        process.stderr.write(errorLines(new BannerError(
            'INVALID_OPTION',
            'The interactive wizard cannot run with --json or --quiet',
            { hint: "Use 'ascii-banner generate' instead" },
        )).join('\n') + '\n');
        process.exitCode = EXIT.INVALID_INPUT;
        return undefined;
    }

    try {
        return await runWizard(context, options);
    } catch (error: unknown) {
        if (isPromptCancel(error)) {
            process.stderr.write('Cancelled\n');
            return undefined;
        }
        process.stderr.write(errorLines(error).join('\n') + '\n');
        process.exitCode = exitCodeFor(error);
        return undefined;
    }
}

// ─────────────────────────────────────────────────────────────────────────────
// yargs CommandModule
// ─────────────────────────────────────────────────────────────────────────────

/** Interactive command module for yargs */
export const interactiveCommand: CommandModule = {
    command: 'interactive',
    aliases: ['i'],
    describe: 'Build a banner step by step',
    handler: async () => {
        await runInteractive(await buildContext());
    },
};
