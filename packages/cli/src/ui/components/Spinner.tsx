/**
 * Animated loading indicator.
 *
 * @module ui/components/Spinner
 */
import React, { useEffect, useState } from 'react';
import { Text } from 'ink';
import { theme } from '../themes/colors.js';
import { EMOJI, type EmojiKey } from '../themes/emoji.js';

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'] as const;

export interface SpinnerProps {
    label: string;
    emoji?: EmojiKey;
}

export const Spinner: React.FC<SpinnerProps> = ({ label, emoji }) => {
    const [frame, setFrame] = useState(0);

    useEffect(() => {
        const timer = setInterval(() => setFrame(f => (f + 1) % FRAMES.length), 80);
        return () => clearInterval(timer);
    }, []);

    return (
        <Text>
            <Text color={theme.text.accent}>{FRAMES[frame]} </Text>
            {emoji ? EMOJI[emoji] : ''}
            <Text>{label}…</Text>
        </Text>
    );
};
