/**
 * A full-text document a citation may resolve to.
 */
export interface CandidateDocument {
    /** Number taken from the leading `<n>-` of the file name */
    number: number;

    /** File name inside the document directory */
    file: string;

    /** Text searched by the token-overlap fallback (the file name) */
    text: string;
}

/**
 * A row of a screening sheet: paper number plus the title recorded for it.
 */
export interface MetadataEntry {
    number: number;
    title: string;
}

/**
 * Pools searched when resolving a citation.
 * `metadata` is ordered by priority, highest first.
 */
export interface CandidatePools {
    metadata: ReadonlyArray<readonly MetadataEntry[]>;
    documents: readonly CandidateDocument[];
}

export type ResolutionStrategy = 'metadata' | 'token-overlap';

/**
 * Association between a citation and exactly one document.
 * Absence (`null`) means no confident match.
 */
export interface ResolvedLink {
    document: CandidateDocument;
    strategy: ResolutionStrategy;

    /** Matching token count, set for the token-overlap strategy */
    score?: number;
}

export interface ResolverOptions {
    /** Minimum number of title tokens a document must contain */
    minTokenMatches: number;

    /** Tokens must be strictly longer than this */
    minTokenLength: number;
}

/**
 * A numbered entry of a manuscript's reference list.
 */
export interface ReferenceEntry {
    number: number;
    text: string;
}
