/**
 * Emoji used as icons in rich output. Each carries its trailing space.
 *
 * @module ui/themes/emoji
 */

export const EMOJI = {
    success: '✅ ',
    error: '❌ ',
    warning: '⚠️ ',
    info: 'ℹ️ ',
    loading: '⏳ ',
    search: '🔍 ',
    rocket: '🚀 ',
    sparkles: '✨ ',
    art: '🎨 ',
    font: '🔤 ',
    template: '📋 ',
    save: '💾 ',
    eyes: '👀 ',
    book: '📖 ',
    tools: '🛠️ ',
    gear: '⚙️ ',
    tip: '💡 ',
} as const;

export type EmojiKey = keyof typeof EMOJI;

/**
 * Emoji for `key`, or `textFallback` when the table has no entry.
 */
export function getEmoji(key: EmojiKey, textFallback = ''): string {
    return EMOJI[key] || textFallback;
}
