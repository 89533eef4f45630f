import type { BibRecord, MatchThresholds, MatchVerdict } from '../types/index.js';
import { DEFAULT_MATCH_THRESHOLDS } from '../types/index.js';
import { buildAuthorSignature } from '../nlp/normalize.js';
import { titleSimilarity } from '../nlp/similarity.js';

function normalizeIdentifier(identifier: string | null | undefined): string {
    return typeof identifier === 'string' ? identifier.trim().toLowerCase() : '';
}

/**
 * Share of the smaller author set found in the larger one.
 */
export function authorOverlapRatio(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
    const [smaller, larger] = a.size <= b.size ? [a, b] : [b, a];
    if (smaller.size === 0) return 0;

    let overlap = 0;
    for (const name of smaller) {
        if (larger.has(name)) overlap++;
    }
    return overlap / smaller.size;
}

/**
 * Compare two records and report whether they describe the same paper, and why.
 *
 * Checks run in order and the first conclusive one wins:
 * 1. equal identifiers (trimmed, case-insensitive) → duplicate
 * 2. a missing title on either side → distinct
 * 3. title similarity below `titleThreshold` → distinct
 * 4. authors on both sides → duplicate iff overlap of the smaller set ≥ `authorOverlap`;
 *    otherwise duplicate iff title similarity ≥ `titleOnlyThreshold`
 *
 * Insufficient evidence always resolves to "distinct".
 */
export function explainMatch(
    a: BibRecord,
    b: BibRecord,
    thresholds: Partial<MatchThresholds> = {}
): MatchVerdict {
    // Per key, so a key present as undefined keeps its default
    const titleThreshold = thresholds.titleThreshold ?? DEFAULT_MATCH_THRESHOLDS.titleThreshold;
    const authorOverlap = thresholds.authorOverlap ?? DEFAULT_MATCH_THRESHOLDS.authorOverlap;
    const titleOnlyThreshold = thresholds.titleOnlyThreshold ?? DEFAULT_MATCH_THRESHOLDS.titleOnlyThreshold;

    const idA = normalizeIdentifier(a.identifier);
    const idB = normalizeIdentifier(b.identifier);
    if (idA && idB && idA === idB) {
        return { duplicate: true, reason: 'identifier' };
    }

    if (!a.title || !b.title) {
        return { duplicate: false, reason: 'missing-title' };
    }

    const similarity = titleSimilarity(a.title, b.title);
    if (similarity < titleThreshold) {
        return { duplicate: false, reason: 'title-below-threshold', titleSimilarity: similarity };
    }

    const authorsA = buildAuthorSignature(a.authorList);
    const authorsB = buildAuthorSignature(b.authorList);

    if (authorsA.size > 0 && authorsB.size > 0) {
        const ratio = authorOverlapRatio(authorsA, authorsB);
        return ratio >= authorOverlap
            ? { duplicate: true, reason: 'author-overlap', titleSimilarity: similarity, authorOverlap: ratio }
            : { duplicate: false, reason: 'author-mismatch', titleSimilarity: similarity, authorOverlap: ratio };
    }

    // No author corroboration available: only a near-identical title counts
    return similarity >= titleOnlyThreshold
        ? { duplicate: true, reason: 'title-only', titleSimilarity: similarity }
        : { duplicate: false, reason: 'title-only-below-threshold', titleSimilarity: similarity };
}

/**
 * True iff the two records describe the same paper.
 */
export function isDuplicate(
    a: BibRecord,
    b: BibRecord,
    thresholds: Partial<MatchThresholds> = {}
): boolean {
    return explainMatch(a, b, thresholds).duplicate;
}
