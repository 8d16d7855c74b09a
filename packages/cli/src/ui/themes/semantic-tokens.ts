/**
 * Color palettes and the semantic roles the UI draws with.
 *
 * Components never use palette entries directly; they ask for a role
 * (`text.secondary`, `status.error`) so a theme can remap it.
 *
 * @module ui/themes/semantic-tokens
 */

/**
 * Base palette of a theme. Empty strings mean "terminal default".
 */
export interface ThemeColors {
    type: 'dark' | 'light';
    Foreground: string;
    Background: string;
    AccentBlue: string;
    AccentPurple: string;
    AccentCyan: string;
    AccentGreen: string;
    AccentYellow: string;
    AccentRed: string;
    Comment: string;
    Gray: string;
    GradientColors: string[];
}

export interface SemanticColors {
    text: {
        primary: string;
        secondary: string;
        accent: string;
    };
    status: {
        success: string;
        error: string;
        warning: string;
        info: string;
    };
    border: {
        default: string;
    };
    ui: {
        comment: string;
        gradient: string[];
    };
}

export const darkTheme: ThemeColors = {
    type: 'dark',
    Foreground: '#e6e6e6',
    Background: '#1e1e2e',
    AccentBlue: '#5fafff',
    AccentPurple: '#d787ff',
    AccentCyan: '#5fd7ff',
    AccentGreen: '#87d787',
    AccentYellow: '#ffd75f',
    AccentRed: '#ff5f87',
    Comment: '#8a8a8a',
    Gray: '#6c6c6c',
    GradientColors: ['#ff5fd7', '#5fd7ff'],
};

export const lightTheme: ThemeColors = {
    type: 'light',
    Foreground: '#1c1c1c',
    Background: '#fafafa',
    AccentBlue: '#005fd7',
    AccentPurple: '#8700af',
    AccentCyan: '#0087af',
    AccentGreen: '#008700',
    AccentYellow: '#af8700',
    AccentRed: '#d70000',
    Comment: '#6c6c6c',
    Gray: '#9e9e9e',
    GradientColors: ['#af00d7', '#0087d7'],
};

export function createSemanticColors(colors: ThemeColors): SemanticColors {
    return {
        text: {
            primary: colors.Foreground,
            secondary: colors.Gray,
            accent: colors.AccentCyan,
        },
        status: {
            success: colors.AccentGreen,
            error: colors.AccentRed,
            warning: colors.AccentYellow,
            info: colors.AccentBlue,
        },
        border: {
            default: colors.Gray,
        },
        ui: {
            comment: colors.Comment,
            gradient: colors.GradientColors,
        },
    };
}
