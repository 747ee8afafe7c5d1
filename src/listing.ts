// Directory index pages on the dump server are plain autoindex HTML, so
// targeted pattern extraction is enough; no HTML parser is involved.

export const YEAR_LINK = /<a href="(\d{4})\/"/g;
export const PERIOD_LINK = /<a href="(\d{4}-\d{2})\/"/g;

/**
 * Returns capture group 1 of every match of `pattern` in `html` (or the whole
 * match when the pattern has no group), in document order and without
 * deduplication. A body with no matches yields an empty array.
 */
export function extractLinks(html: string, pattern: RegExp): string[] {
    if (!html) return [];

    // Fresh instance so a shared global pattern's lastIndex never leaks between calls
    const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
    const matcher = new RegExp(pattern.source, flags);

    return Array.from(html.matchAll(matcher), match => match[1] ?? match[0]);
}
