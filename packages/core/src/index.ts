/**
 * ASCII banner engine: fonts, styles, the layout pipeline, templates and
 * exporters.
 *
 * @module @ascii-banner/core
 */
export * from './types.js';
export * from './errors.js';
export { createLogger, type BannerLogger, type LogContext } from './logger.js';
export { getRuntimeSettings, setRuntimeSettings, type BannerRuntimeSettings } from './runtime-settings.js';
export {
    defaultFileSystem,
    NodeFileSystemService,
    type DirEntry,
    type FileSystemService,
    type MkdirOptions,
} from './services/filesystem.js';
export { BUILTIN_TEMPLATES_DIR, FONT_CATALOG_PATH, resolvePackageDir } from './paths.js';
export { closestMatches, levenshtein } from './suggest.js';
export { isRecord } from './guards.js';

// Style
export * from './style/colors.js';
export * from './style/borders.js';
export * from './style/style.js';

// Layout and rendering
export * from './layout/grid.js';
export * from './layout/text-block.js';
export { decorate, type DecorateOptions } from './layout/decorate.js';
export { renderAnsi, stripAnsi, type AnsiOptions } from './render/ansi.js';
export { colorRuns, type ColorRun } from './render/runs.js';

// Fonts
export { FigletRenderer, type GlyphRenderer } from './fonts/renderer.js';
export { fontKey, loadFontCatalog, parseFontCatalog, type FontCatalog } from './fonts/catalog.js';
export {
    FontManager,
    type FontInfo,
    type FontManagerOptions,
    type FontMetadata,
} from './fonts/font-manager.js';

// Templates
export {
    applyTemplate,
    formatTemplate,
    parseTemplate,
    TemplateStore,
    TEMPLATE_NAME_PATTERN,
    type SavedTemplate,
    type TemplateStoreOptions,
} from './templates/template-store.js';

// Generation and export
export {
    BannerGenerator,
    DEFAULT_PREVIEW_FONTS,
    type BannerRecord,
    type FontPreview,
    type GeneratorOptions,
} from './generator.js';
export * from './exporters/index.js';
export {
    CONFIG_FILE,
    HOME_ENV_VAR,
    loadConfig,
    resolveHome,
    type BannerConfig,
    type LoadConfigOptions,
} from './config.js';
