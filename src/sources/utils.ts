/**
 * Shared utilities for loaders.
 */

/**
 * Strip DOI resolver prefixes to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 * "doi:10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .trim()
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .replace(/^doi:\s*/i, '')
        .trim() || null;
}

/**
 * Narrow parsed JSON to a plain object.
 */
export function isRecordObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
