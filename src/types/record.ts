/**
 * Bibliographic record: one entry from a literature-search export.
 * Normalized from the source file into this common shape; any other fields
 * of the export are carried through untouched.
 */
export interface BibRecord {
    /** External identifier, usually a DOI. Compared case-insensitively. */
    identifier?: string | null;

    /** Paper title as exported */
    title?: string | null;

    /** Authors in publication order */
    authorList?: AuthorEntry[] | null;

    /** Paper object exactly as read from the export, written back unchanged */
    exported?: Readonly<Record<string, unknown>>;

    [field: string]: unknown;
}

/**
 * An author is either a plain name or a structured entry with a `name` field.
 */
export type AuthorEntry = string | { name?: string | null };

/**
 * Thresholds used by the duplicate classifier.
 */
export interface MatchThresholds {
    /** Minimum title similarity before authors are consulted */
    titleThreshold: number;

    /** Minimum share of the smaller author set that must overlap */
    authorOverlap: number;

    /** Title similarity required when author data is missing on either side */
    titleOnlyThreshold: number;
}

export type MatchReason =
    | 'identifier'
    | 'missing-title'
    | 'title-below-threshold'
    | 'author-overlap'
    | 'author-mismatch'
    | 'title-only'
    | 'title-only-below-threshold';

/**
 * Outcome of comparing two records.
 */
export interface MatchVerdict {
    duplicate: boolean;
    reason: MatchReason;
    titleSimilarity?: number;
    authorOverlap?: number;
}

/**
 * A record dropped by the deduplicator and the unique record it matched.
 */
export interface DuplicateMatch {
    /** Position of the dropped record in the input */
    inputIndex: number;

    /** Position of the matched record in the unique list */
    matchedIndex: number;

    reason: MatchReason;
}

export interface DeduplicationResult {
    unique: BibRecord[];
    duplicateCount: number;
    matches: DuplicateMatch[];
}
