/**
 * Theme manager for the banner CLI.
 * Manages the active theme and provides dynamic semantic color access.
 *
 * @module ui/themes/theme-manager
 */
import {
    type SemanticColors,
    type ThemeColors,
    darkTheme,
    lightTheme,
    createSemanticColors,
} from './semantic-tokens.js';

/**
 * Theme type identifier.
 */
export type ThemeType = 'dark' | 'light';

/**
 * Theme definition with colors and semantic mappings.
 */
export interface Theme {
    /** Theme display name */
    name: string;
    type: ThemeType;
    /** Base color palette */
    colors: ThemeColors;
    semanticColors: SemanticColors;
}

function createTheme(name: string, colors: ThemeColors): Theme {
    return {
        name,
        type: colors.type,
        colors,
        semanticColors: createSemanticColors(colors),
    };
}

/**
 * Built-in themes.
 */
export const themes = {
    dark: createTheme('Banner Dark', darkTheme),
    light: createTheme('Banner Light', lightTheme),
} as const;

type ThemeKey = keyof typeof themes;

function isThemeKey(name: string): name is ThemeKey {
    return Object.hasOwn(themes, name);
}

/**
 * Detect the terminal background from the environment.
 */
function detectTerminalTheme(): ThemeType {
    // COLORFGBG is "foreground;background"; backgrounds 0-7 are dark, 8-15 light
    const colorfgbg = process.env['COLORFGBG'];
    if (colorfgbg) {
        const parts = colorfgbg.split(';');
        if (parts.length >= 2) {
            const bg = Number.parseInt(parts[1] || '0', 10);
            return bg >= 8 ? 'light' : 'dark';
        }
    }

    // Terminal.app defaults to a light profile
    if (process.env['TERM_PROGRAM'] === 'Apple_Terminal' && process.platform === 'darwin') {
        return 'light';
    }

    return 'dark';
}

function getDefaultTheme(): Theme {
    return themes[detectTerminalTheme()];
}

const NO_COLOR_PALETTE: ThemeColors = {
    type: 'dark',
    Foreground: '',
    Background: '',
    AccentBlue: '',
    AccentPurple: '',
    AccentCyan: '',
    AccentGreen: '',
    AccentYellow: '',
    AccentRed: '',
    Comment: '',
    Gray: '',
    GradientColors: [],
};

/**
 * Holds the active theme; detects one lazily on first access.
 */
class ThemeManager {
    private activeTheme: Theme | null = null;

    /**
     * Set the active theme by key or display name. `undefined` re-runs
     * terminal detection.
     *
     * @returns false if no theme has that name
     */
    setActiveTheme(themeName: string | undefined): boolean {
        if (!themeName) {
            this.activeTheme = getDefaultTheme();
            return true;
        }

        const theme = this.findThemeByName(themeName);
        if (!theme) {
            return false;
        }
        this.activeTheme = theme;
        return true;
    }

    getActiveTheme(): Theme {
        if (process.env['NO_COLOR']) {
            return createTheme('No Color', NO_COLOR_PALETTE);
        }
        this.activeTheme ??= getDefaultTheme();
        return this.activeTheme;
    }

    getSemanticColors(): SemanticColors {
        return this.getActiveTheme().semanticColors;
    }

    getAvailableThemes(): Array<{ name: string; type: ThemeType }> {
        return Object.values(themes).map(theme => ({
            name: theme.name,
            type: theme.type,
        }));
    }

    private findThemeByName(name: string): Theme | undefined {
        const lowerName = name.toLowerCase();
        if (isThemeKey(lowerName)) {
            return themes[lowerName];
        }
        return Object.values(themes).find(t => t.name.toLowerCase() === lowerName);
    }
}

/** Singleton theme manager instance */
export const themeManager = new ThemeManager();
