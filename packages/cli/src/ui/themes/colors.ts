/**
 * Color access for components.
 *
 * `theme` reads through the theme manager on every access, so a theme
 * switch (or NO_COLOR) applies to the next render.
 *
 * @module ui/themes/colors
 */
import type { SemanticColors } from './semantic-tokens.js';
import { themeManager } from './theme-manager.js';

/**
 * Brand colors; the header falls back to them when the theme has no
 * gradient (NO_COLOR).
 */
export const colors = {
    brand: {
        pink: '#ff5fd7',
        cyan: '#5fd7ff',
    },
} as const;

export const theme: SemanticColors = {
    get text() { return themeManager.getSemanticColors().text; },
    get status() { return themeManager.getSemanticColors().status; },
    get border() { return themeManager.getSemanticColors().border; },
    get ui() { return themeManager.getSemanticColors().ui; },
};
