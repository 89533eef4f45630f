import type { BibRecord, DeduplicationResult, DuplicateMatch, MatchThresholds } from '../types/index.js';
import { explainMatch } from './classifier.js';

export interface DeduplicateOptions {
    thresholds?: Partial<MatchThresholds>;

    /** Called after every `progressInterval` records */
    onProgress?: (processed: number, total: number) => void;
    progressInterval?: number;
}

/**
 * Fold records into a unique set, keeping the first-seen copy of each paper.
 *
 * Every incoming record is compared against the records accepted so far and
 * dropped at the first match. Worst case (no duplicates) makes n²/2 classifier
 * calls, which is fine for the few hundred records a search export holds.
 * Input records are never mutated; `unique` holds the same object references.
 */
export function deduplicate(
    records: readonly BibRecord[],
    options: DeduplicateOptions = {}
): DeduplicationResult {
    const { thresholds = {}, onProgress, progressInterval = 100 } = options;

    const unique: BibRecord[] = [];
    const matches: DuplicateMatch[] = [];

    records.forEach((record, inputIndex) => {
        const processed = inputIndex + 1;
        if (onProgress && progressInterval > 0 && processed % progressInterval === 0) {
            onProgress(processed, records.length);
        }

        // Only previously accepted records are scanned, so a record never meets itself
        for (const [matchedIndex, candidate] of unique.entries()) {
            const verdict = explainMatch(record, candidate, thresholds);
            if (verdict.duplicate) {
                matches.push({ inputIndex, matchedIndex, reason: verdict.reason });
                return;
            }
        }

        unique.push(record);
    });

    return { unique, duplicateCount: matches.length, matches };
}
