import type { AuthorEntry } from '../types/index.js';

/**
 * Canonicalize free text for comparison.
 * - Lowercase
 * - Every character other than a letter, digit, underscore or whitespace becomes a space
 * - Whitespace runs collapse to one space, ends trimmed
 *
 * Lowercasing runs first so that letters which expand into combining marks
 * are stripped in the same pass, keeping the function idempotent.
 */
export function normalizeText(value: string | null | undefined): string {
    if (!value) return '';

    return value
        .toLowerCase()
        .replace(/[^\p{L}\p{N}_\s]/gu, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Display name of an author entry.
 */
export function authorName(entry: AuthorEntry): string {
    if (typeof entry === 'string') return entry;
    return entry.name ?? '';
}

/**
 * Order-independent set of normalized author names. Empty names are dropped.
 */
export function buildAuthorSignature(authors: readonly AuthorEntry[] | null | undefined): Set<string> {
    const signature = new Set<string>();
    if (!authors) return signature;

    for (const entry of authors) {
        const name = normalizeText(authorName(entry));
        if (name) signature.add(name);
    }

    return signature;
}
