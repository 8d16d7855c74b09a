/**
 * Header component with responsive ASCII art.
 * Shows the wordmark with version and tagline.
 *
 * @module ui/components/Header
 */
import React from 'react';
import { Box, Text, useStdout } from 'ink';
import Gradient from 'ink-gradient';
import { tokens } from '../tokens.js';
import { colors, theme } from '../themes/colors.js';
import { getAsciiArt, type BannerContext } from './AsciiArt.js';

export interface HeaderProps {
    version: string;
    /** Where the header is shown; `none` renders nothing */
    context?: BannerContext;
}

const TAGLINE = 'Text to ASCII art banners';

/**
 * @example
 * ```tsx
 * <Header version="0.3.0" />
 * <Header version="0.3.0" context="first-run" />
 * ```
 */
export const Header: React.FC<HeaderProps> = ({ version, context = 'help' }) => {
    const { stdout } = useStdout();
    const width = stdout?.columns || 80;

    if (context === 'none') {
        return null;
    }

    const { logo, wordmark } = getAsciiArt(width);
    const gradientColors = theme.ui.gradient.length > 1
        ? theme.ui.gradient
        : [colors.brand.pink, colors.brand.cyan];
    const welcome = context === 'first-run'
        ? <Text color={theme.status.info}>Welcome! Try: ascii-banner generate "Hello" --template retro</Text>
        : null;

    if (width < 60) {
        return (
            <Box flexDirection="column" marginBottom={1}>
                <Text>
                    <Text bold>
                        <Gradient colors={gradientColors}>{logo}</Gradient>
                    </Text>
                    <Text> </Text>
                    <Text bold color={theme.text.primary}>{wordmark}</Text>
                    <Text color={theme.text.secondary}> v{version}</Text>
                </Text>
                {welcome}
            </Box>
        );
    }

    if (width < 100) {
        const logoLines = logo.split('\n');
        return (
            <Box
                flexDirection="column"
                borderStyle={tokens.borders.style}
                borderColor={theme.border.default}
                paddingX={2}
                marginBottom={1}
            >
                {logoLines.map((line, idx) => (
                    <Box key={`logo-${idx}`}>
                        <Text bold>
                            <Gradient colors={gradientColors}>{line}</Gradient>
                        </Text>
                        {idx === 1 && <Text>  <Text bold color={theme.text.primary}>{wordmark}</Text>  <Text color={theme.text.secondary}>v{version}</Text></Text>}
                    </Box>
                ))}
                {welcome}
            </Box>
        );
    }

    return (
        <Box
            flexDirection="column"
            borderStyle={tokens.borders.style}
            borderColor={theme.border.default}
            paddingX={2}
            paddingY={1}
            marginBottom={1}
        >
            <Box>
                <Text bold>
                    <Gradient colors={gradientColors}>{logo}</Gradient>
                </Text>
                <Text>  </Text>
                <Text bold color={theme.text.primary}>{wordmark}</Text>
            </Box>
            <Box marginTop={1} justifyContent="space-between" width={70}>
                <Text color={theme.text.secondary}>{TAGLINE}</Text>
                <Text color={theme.text.secondary}>v{version}</Text>
            </Box>
            {welcome}
        </Box>
    );
};
