/**
 * Shared types for the banner engine.
 *
 * @module types
 */

// ─────────────────────────────────────────────────────────────────────────────
// Text geometry
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Ordered lines of a banner. A finished block is rectangular: every line
 * has the same length.
 */
export type TextBlock = readonly string[];

/**
 * Per-cell color metadata, same shape as the block it describes.
 * Cells without color are `undefined`; colors are `#rrggbb`.
 */
export type ColorMap = ReadonlyArray<ReadonlyArray<string | undefined>>;

// ─────────────────────────────────────────────────────────────────────────────
// Style
// ─────────────────────────────────────────────────────────────────────────────

export const BORDER_STYLES = ['none', 'single', 'double', 'rounded', 'bold', 'ascii', 'star', 'hash'] as const;

/** Named set of corner/edge characters used to enclose a block. */
export type BorderStyle = typeof BORDER_STYLES[number];

export const ALIGNMENTS = ['left', 'center', 'right'] as const;

export type Alignment = typeof ALIGNMENTS[number];

/**
 * Fully-resolved style configuration.
 * Optional fields are color specs that may be left unset.
 */
export interface BannerStyle {
    font: string;
    /** Named color, hex color or `gradient:<a>-<b>` */
    color?: string;
    backgroundColor?: string;
    border: BorderStyle;
    borderColor?: string;
    padding: number;
    /** Maximum glyph width; also the alignment width */
    width: number;
    alignment: Alignment;
    /** Drop whitespace-only lines */
    compact: boolean;
    shadow: boolean;
    shadowColor?: string;
    bold: boolean;
}

/**
 * Loose style input from CLI flags, YAML templates or JSON documents.
 * Validated and normalized by `createStyle`.
 */
export interface StyleInput {
    font?: string;
    color?: string;
    backgroundColor?: string;
    border?: string;
    borderColor?: string;
    padding?: number;
    width?: number;
    alignment?: string;
    compact?: boolean;
    shadow?: boolean;
    shadowColor?: string;
    bold?: boolean;
}

/**
 * Plain-object form of a {@link BannerStyle}, as written to structured
 * exports and template files. Unset optional fields are omitted.
 */
export type StyleRecord = { [K in keyof BannerStyle]?: BannerStyle[K] };

// ─────────────────────────────────────────────────────────────────────────────
// Templates
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A named, persisted bundle of style options.
 */
export interface Template {
    readonly name: string;
    readonly description?: string;
    readonly style: Readonly<StyleInput>;
    /** Where the template was loaded from */
    readonly source: 'builtin' | 'user';
}

// ─────────────────────────────────────────────────────────────────────────────
// Rendering results
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Output of the layout pipeline.
 */
export interface DecoratedBanner {
    readonly lines: TextBlock;
    readonly colors: ColorMap;
    readonly width: number;
    readonly height: number;
}

/**
 * A rendered banner with everything exporters need.
 */
export interface RenderedBanner {
    readonly text: string;
    readonly style: BannerStyle;
    /** Raw glyph block from the font backend */
    readonly glyphs: TextBlock;
    readonly banner: DecoratedBanner;
    /** Lines joined with newlines, no color codes */
    readonly plain: string;
    /** Lines with ANSI truecolor escapes */
    readonly ansi: string;
}
