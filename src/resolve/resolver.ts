import type {
    CandidateDocument,
    CandidatePools,
    MetadataEntry,
    ResolvedLink,
    ResolverOptions,
} from '../types/index.js';
import { DEFAULT_RESOLVER_OPTIONS } from '../types/index.js';
import { extractQuotedTitle, titleTokens } from './title.js';

/**
 * Structural match: a metadata entry whose title contains the extracted title,
 * or is contained in it (case-insensitive), and whose number names a document.
 * Pools are searched in priority order.
 */
function matchMetadata(
    title: string,
    metadata: CandidatePools['metadata'],
    documentsByNumber: ReadonlyMap<number, CandidateDocument>
): CandidateDocument | null {
    const needle = title.toLowerCase();

    for (const pool of metadata) {
        for (const entry of pool) {
            if (!titleContains(needle, entry)) continue;

            const document = documentsByNumber.get(entry.number);
            if (document) return document;
        }
    }

    return null;
}

function titleContains(needle: string, entry: MetadataEntry): boolean {
    const known = entry.title.toLowerCase();
    if (!known) return false;
    return known.includes(needle) || needle.includes(known);
}

/**
 * Token-overlap fallback: score each document by how many title tokens occur
 * in its searchable text. Documents are visited by ascending number and only a
 * strictly higher score replaces the best, so ties go to the lowest number.
 */
export function scoreByTokenOverlap(
    tokens: readonly string[],
    documents: readonly CandidateDocument[],
    minMatches: number
): { document: CandidateDocument; score: number } | null {
    if (tokens.length === 0) return null;

    const lowered = tokens.map((token) => token.toLowerCase());
    const ordered = [...documents].sort((a, b) => a.number - b.number);

    let best: { document: CandidateDocument; score: number } | null = null;
    for (const document of ordered) {
        const haystack = document.text.toLowerCase();
        const score = lowered.filter((token) => haystack.includes(token)).length;

        if (score >= minMatches && score > (best?.score ?? 0)) {
            best = { document, score };
        }
    }

    return best;
}

/**
 * Resolve one reference-list entry to a document, or `null` when no
 * confident match exists. Unresolved is a normal outcome, never an error.
 */
export function resolveReference(
    citationText: string,
    pools: CandidatePools,
    options: Partial<ResolverOptions> = {}
): ResolvedLink | null {
    const minTokenMatches = options.minTokenMatches ?? DEFAULT_RESOLVER_OPTIONS.minTokenMatches;
    const minTokenLength = options.minTokenLength ?? DEFAULT_RESOLVER_OPTIONS.minTokenLength;

    const title = extractQuotedTitle(citationText);
    if (!title) return null;

    const documentsByNumber = new Map<number, CandidateDocument>();
    for (const document of pools.documents) {
        if (!documentsByNumber.has(document.number)) {
            documentsByNumber.set(document.number, document);
        }
    }

    const structural = matchMetadata(title, pools.metadata, documentsByNumber);
    if (structural) {
        return { document: structural, strategy: 'metadata' };
    }

    const fallback = scoreByTokenOverlap(titleTokens(title, minTokenLength), pools.documents, minTokenMatches);
    if (fallback) {
        return { document: fallback.document, strategy: 'token-overlap', score: fallback.score };
    }

    return null;
}
