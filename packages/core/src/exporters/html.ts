/**
 * HTML export: a standalone page or an embeddable snippet.
 *
 * @module exporters/html
 */
import { BannerError } from '../errors.js';
import { colorRuns } from '../render/runs.js';
import { parseColorSpec, toHex } from '../style/colors.js';
import type { RenderedBanner } from '../types.js';
import { escapeHtml } from './escape.js';
import { HTML_THEMES, type ExportOptions, type Exporter, type HtmlTheme } from './types.js';

interface ThemeColors {
    text: string;
    border: string;
}

const THEME_DEFAULT_TEXT: Readonly<Record<HtmlTheme, string>> = {
    default: '#333333',
    dark: '#00ff00',
    terminal: '#00ff00',
    paper: '#222222',
    neon: '#00ffff',
    retro: '#f39c12',
};

const THEME_CSS: Readonly<Record<HtmlTheme, (colors: ThemeColors) => string>> = {
    default: ({ text }) => `
    body {
        background: linear-gradient(135deg, #667eea 0%, #764ba2 100%);
    }
    .ascii-banner {
        background: rgba(255, 255, 255, 0.95);
        color: ${text};
        box-shadow: 0 10px 40px rgba(0, 0, 0, 0.2);
    }`,
    dark: ({ text }) => `
    body {
        background: #1a1a1a;
    }
    .ascii-banner {
        background: #2d2d2d;
        color: ${text};
        border: 1px solid #444;
        box-shadow: 0 0 20px rgba(0, 255, 0, 0.1);
    }`,
    terminal: () => `
    body {
        background: #000;
    }
    .ascii-banner {
        background: #000;
        color: #00ff00;
        border: 1px solid #00ff00;
        text-shadow: 0 0 3px #00ff00;
    }`,
    paper: () => `
    body {
        background: #f5f5f5;
    }
    .ascii-banner {
        background: white;
        color: #222;
        border: 1px solid #ddd;
        box-shadow: 0 2px 4px rgba(0, 0, 0, 0.1);
    }`,
    neon: ({ text, border }) => `
    body {
        background: linear-gradient(45deg, #000428 0%, #004e92 100%);
    }
    .ascii-banner {
        background: rgba(0, 0, 0, 0.8);
        color: ${text};
        border: 2px solid ${border};
        box-shadow: 0 0 30px ${border}, inset 0 0 30px rgba(0, 255, 255, 0.1);
        text-shadow: 0 0 10px currentColor;
    }`,
    retro: () => `
    body {
        background: linear-gradient(180deg, #2d1b69 0%, #0f0c29 100%);
    }
    .ascii-banner {
        background: #1a1a2e;
        color: #f39c12;
        border: 3px double #f39c12;
        box-shadow: 0 0 20px rgba(243, 156, 18, 0.3);
    }`,
};

const BASE_CSS = `
    .ascii-banner-container {
        display: flex;
        justify-content: center;
        align-items: center;
        min-height: 100vh;
        margin: 0;
        padding: 20px;
        box-sizing: border-box;
    }
    .ascii-banner {
        font-family: 'Courier New', Courier, monospace;
        line-height: 1.2;
        white-space: pre;
        margin: 0;
        padding: 20px;
        border-radius: 8px;
        overflow-x: auto;
    }`;

const ANIMATION_CSS = `
    body {
        background: linear-gradient(270deg, #667eea, #764ba2, #f093fb, #f5576c);
        background-size: 800% 800%;
        animation: gradientShift 10s ease infinite;
    }
    @keyframes gradientShift {
        0% { background-position: 0% 50%; }
        50% { background-position: 100% 50%; }
        100% { background-position: 0% 50%; }
    }
    .ascii-banner {
        animation: float 3s ease-in-out infinite;
    }
    @keyframes float {
        0%, 100% { transform: translateY(0px); }
        50% { transform: translateY(-20px); }
    }`;

function isHtmlTheme(value: string): value is HtmlTheme {
    return (HTML_THEMES as readonly string[]).includes(value);
}

/**
 * @throws {BannerError} `INVALID_OPTION` for an unknown theme
 */
export function parseHtmlTheme(value: string | undefined): HtmlTheme {
    const theme = (value ?? 'default').trim().toLowerCase();
    if (!isHtmlTheme(theme)) {
        throw new BannerError('INVALID_OPTION', `Unknown HTML theme '${value}'`, {
            suggestions: [...HTML_THEMES],
        });
    }
    return theme;
}

function themeColors(rendered: RenderedBanner, theme: HtmlTheme): ThemeColors {
    const { color, borderColor } = rendered.style;
    const spec = color === undefined ? undefined : parseColorSpec(color);
    const text = spec?.kind === 'solid' ? spec.hex : THEME_DEFAULT_TEXT[theme];
    return {
        text,
        border: borderColor === undefined ? text : toHex(borderColor),
    };
}

/**
 * The `<style>` element for a theme.
 */
export function themeStylesheet(rendered: RenderedBanner, theme: HtmlTheme, animated = false): string {
    const css = BASE_CSS + THEME_CSS[theme](themeColors(rendered, theme)) + (animated ? ANIMATION_CSS : '');
    return `<style>${css}\n</style>`;
}

/**
 * The banner as a `<pre>` element, colored cells wrapped in spans.
 */
export function bannerElement(rendered: RenderedBanner): string {
    const { banner, style } = rendered;
    const body = banner.lines
        .map((line, row) => colorRuns(line, banner.colors[row] ?? [])
            .map(run => run.color === undefined
                ? escapeHtml(run.text)
                : `<span style="color:${run.color}">${escapeHtml(run.text)}</span>`)
            .join(''))
        .join('\n');
    const inline: string[] = [];
    if (style.backgroundColor !== undefined) inline.push(`background-color:${toHex(style.backgroundColor)}`);
    if (style.bold) inline.push('font-weight:bold');
    const styleAttr = inline.length > 0 ? ` style="${inline.join(';')}"` : '';
    return `<pre class="ascii-banner" data-font="${escapeHtml(style.font)}"${styleAttr}>${body}</pre>`;
}

export function htmlDocument(rendered: RenderedBanner, options: ExportOptions = {}): string {
    const theme = parseHtmlTheme(options.theme);
    const css = options.includeCss === false ? '' : themeStylesheet(rendered, theme, options.animated);
    const element = bannerElement(rendered);

    if (options.standalone === false) {
        return (css === '' ? element : `${css}\n${element}`) + '\n';
    }

    const title = `${options.animated ? 'Animated ' : ''}ASCII Banner - ${escapeHtml(rendered.text)}`;
    return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${title}</title>
    ${css}
</head>
<body>
    <div class="ascii-banner-container">
        ${element}
    </div>
</body>
</html>
`;
}

export const htmlExporter: Exporter = {
    format: 'html',
    extension: '.html',
    serialize: htmlDocument,
};
