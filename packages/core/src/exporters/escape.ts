/**
 * Markup escaping for the HTML and SVG exporters.
 *
 * @module exporters/escape
 */

const HTML_ENTITIES: Readonly<Record<string, string>> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
};

const XML_ENTITIES: Readonly<Record<string, string>> = {
    ...HTML_ENTITIES,
    "'": '&apos;',
};

export function escapeHtml(text: string): string {
    return text.replace(/[&<>"']/g, ch => HTML_ENTITIES[ch] ?? ch);
}

export function escapeXml(text: string): string {
    return text.replace(/[&<>"']/g, ch => XML_ENTITIES[ch] ?? ch);
}
