/**
 * Bordered box with a title line, used for banners and font samples.
 *
 * @module ui/components/Panel
 */
import React from 'react';
import { Box, Text } from 'ink';
import { tokens } from '../tokens.js';
import { theme } from '../themes/colors.js';

export interface PanelProps {
    title?: string;
    /** Pre-rendered text; ANSI color codes pass through */
    content: string;
    borderColor?: string;
}

export const Panel: React.FC<PanelProps> = ({ title, content, borderColor }) => (
    <Box
        flexDirection="column"
        borderStyle={tokens.borders.style}
        borderColor={borderColor ?? theme.border.default}
        paddingX={1}
    >
        {title && <Text bold color={theme.text.accent}>{title}</Text>}
        <Text>{content}</Text>
    </Box>
);
