/**
 * Wiring shared by the banner commands: configuration, the font manager
 * and the template store, plus the style flags and how they combine.
 *
 * @module commands/engine
 */
import {
    ALIGNMENTS,
    BORDER_STYLES,
    COLOR_SCHEMES,
    FontManager,
    TemplateStore,
    applyColorScheme,
    createStyle,
    definedFields,
    loadConfig,
    mergeStyle,
    type BannerConfig,
    type BannerStyle,
    type FileSystemService,
    type GlyphRenderer,
    type StyleInput,
    type Template,
} from '@ascii-banner/core';

export interface Engine {
    config: BannerConfig;
    fonts: FontManager;
    templates: TemplateStore;
}

export interface EngineOptions {
    /** Banner home directory; defaults to `$ASCII_BANNER_HOME` or `~/.ascii-banner` */
    home?: string;
    renderer?: GlyphRenderer;
    fs?: FileSystemService;
}

export async function createEngine(options: EngineOptions = {}): Promise<Engine> {
    const config = await loadConfig({ home: options.home, fs: options.fs });
    return {
        config,
        fonts: new FontManager({ renderer: options.renderer, fontsDir: config.fontsDir, fs: options.fs }),
        templates: new TemplateStore({ userDir: config.templatesDir, fs: options.fs }),
    };
}

/**
 * Style flags as yargs parses them. Unset flags stay undefined so they
 * never override a template.
 */
export interface StyleArgs {
    font?: string;
    color?: string;
    border?: string;
    borderColor?: string;
    background?: string;
    padding?: number;
    width?: number;
    align?: string;
    compact?: boolean;
    shadow?: boolean;
    bold?: boolean;
    template?: string;
    scheme?: string;
}

export function styleFlags(args: StyleArgs): StyleInput {
    return definedFields({
        font: args.font,
        color: args.color,
        backgroundColor: args.background,
        border: args.border,
        borderColor: args.borderColor,
        padding: args.padding,
        width: args.width,
        alignment: args.align,
        compact: args.compact,
        shadow: args.shadow,
        bold: args.bold,
    });
}

export interface ResolvedStyle {
    style: BannerStyle;
    template: Template | undefined;
}

/**
 * Layers, lowest first: config defaults, template, color scheme, flags.
 *
 * @throws {BannerError} `UNKNOWN_TEMPLATE`, `INVALID_STYLE` or `INVALID_COLOR`
 */
export async function resolveStyle(engine: Engine, args: StyleArgs): Promise<ResolvedStyle> {
    const template = args.template === undefined ? undefined : await engine.templates.load(args.template);
    let style = createStyle({ ...engine.config.defaults, ...template?.style });
    if (args.scheme !== undefined) {
        style = applyColorScheme(style, args.scheme);
    }
    return { style: mergeStyle(style, styleFlags(args)), template };
}

/**
 * yargs definitions of the style flags. Booleans default to undefined so
 * an absent flag is distinguishable from `--no-shadow`.
 */
export const styleOptions = {
    font: {
        alias: 'f',
        type: 'string' as const,
        describe: 'Font name (see `ascii-banner fonts`)',
    },
    color: {
        alias: 'c',
        type: 'string' as const,
        describe: 'Text color: name, #hex or gradient:<a>-<b>',
    },
    border: {
        alias: 'b',
        type: 'string' as const,
        choices: BORDER_STYLES,
        describe: 'Border style',
    },
    'border-color': {
        type: 'string' as const,
        describe: 'Border color',
    },
    background: {
        type: 'string' as const,
        describe: 'Background color (HTML, SVG and PNG)',
    },
    padding: {
        alias: 'p',
        type: 'number' as const,
        describe: 'Blank cells around the text (0-20)',
    },
    width: {
        alias: 'w',
        type: 'number' as const,
        describe: 'Maximum glyph width, also used for alignment',
    },
    align: {
        alias: 'a',
        type: 'string' as const,
        choices: ALIGNMENTS,
        describe: 'Text alignment',
    },
    template: {
        alias: 't',
        type: 'string' as const,
        describe: 'Start from a template (see `ascii-banner templates`)',
    },
    scheme: {
        alias: 's',
        type: 'string' as const,
        choices: Object.keys(COLOR_SCHEMES),
        describe: 'Predefined color scheme',
    },
    shadow: {
        type: 'boolean' as const,
        default: undefined,
        describe: 'Add a drop shadow',
    },
    compact: {
        type: 'boolean' as const,
        default: undefined,
        describe: 'Drop blank glyph rows',
    },
    bold: {
        type: 'boolean' as const,
        default: undefined,
        describe: 'Bold text',
    },
} as const;

/**
 * The text to print for a rendered banner.
 */
export function bannerOutput(rendered: { plain: string; ansi: string }, noColor: boolean): string {
    return noColor ? rendered.plain : rendered.ansi;
}
