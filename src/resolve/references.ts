import type { CandidatePools, ReferenceEntry, ResolvedLink, ResolverOptions } from '../types/index.js';
import { resolveReference } from './resolver.js';

/**
 * Text after the first match of the reference-list heading, or null when the
 * manuscript has no such heading.
 */
export function splitReferenceSection(content: string, heading: string | RegExp): string | null {
    const pattern = typeof heading === 'string' ? new RegExp(heading, 'i') : heading;
    const match = pattern.exec(content);
    if (!match) return null;

    return content.slice(match.index + match[0].length).trim();
}

/**
 * Parse `[n] text` entries. Each entry runs until the next `[m]` marker.
 */
export function parseReferenceEntries(section: string): ReferenceEntry[] {
    const entries: ReferenceEntry[] = [];
    const pattern = /\[(\d+)\]\s+([\s\S]*?)(?=\[\d+\]|$)/g;

    for (const match of section.matchAll(pattern)) {
        const [, number, text] = match;
        if (number === undefined || text === undefined) continue;
        entries.push({
            number: parseInt(number, 10),
            text: text.replace(/\s+/g, ' ').trim(),
        });
    }

    return entries;
}

/**
 * Resolve every entry; only resolved entries appear in the map.
 */
export function buildReferenceMap(
    entries: readonly ReferenceEntry[],
    pools: CandidatePools,
    options: Partial<ResolverOptions> = {}
): Map<number, ResolvedLink> {
    const links = new Map<number, ResolvedLink>();

    for (const entry of entries) {
        const link = resolveReference(entry.text, pools, options);
        if (link) links.set(entry.number, link);
    }

    return links;
}

/**
 * Replace resolved `[n]` markers in a line with `render(n, link)`.
 * Unresolved markers stay as written.
 */
export function linkCitationMarkers(
    line: string,
    links: ReadonlyMap<number, ResolvedLink>,
    render: (number: number, link: ResolvedLink) => string
): string {
    return line.replace(/\[(\d+)\]/g, (marker: string, digits: string) => {
        const number = parseInt(digits, 10);
        const link = links.get(number);
        return link ? render(number, link) : marker;
    });
}
