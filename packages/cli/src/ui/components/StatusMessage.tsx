/**
 * One-line status with an icon, and an optional hint below it.
 *
 * @module ui/components/StatusMessage
 */
import React from 'react';
import { Box, Text } from 'ink';
import { theme } from '../themes/colors.js';
import { EMOJI } from '../themes/emoji.js';

export type StatusType = 'success' | 'error' | 'warning' | 'info';

export interface StatusMessageProps {
    type: StatusType;
    message: string;
    hint?: string;
}

export const StatusMessage: React.FC<StatusMessageProps> = ({ type, message, hint }) => (
    <Box flexDirection="column">
        <Text color={theme.status[type]}>
            {EMOJI[type]}{message}
        </Text>
        {hint && (
            <Box marginLeft={3}>
                <Text color={theme.text.secondary}>{hint}</Text>
            </Box>
        )}
    </Box>
);
