/**
 * Icon + bold title heading for help-style screens.
 *
 * @module ui/components/SectionHeader
 */
import React from 'react';
import { Box, Text } from 'ink';
import { theme } from '../themes/colors.js';

export interface SectionHeaderProps {
    icon: string;
    title: string;
}

export const SectionHeader: React.FC<SectionHeaderProps> = ({ icon, title }) => (
    <Box>
        <Text bold color={theme.text.primary}>{icon}{title}</Text>
    </Box>
);
