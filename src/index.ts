/**
 * Library entry point.
 */
export { normalizeText, authorName, buildAuthorSignature } from './nlp/normalize.js';
export { sequenceRatio, titleSimilarity } from './nlp/similarity.js';
export { explainMatch, isDuplicate, authorOverlapRatio } from './dedup/classifier.js';
export { deduplicate, type DeduplicateOptions } from './dedup/deduplicator.js';
export { extractQuotedTitle, titleTokens } from './resolve/title.js';
export { resolveReference, scoreByTokenOverlap } from './resolve/resolver.js';
export {
    splitReferenceSection,
    parseReferenceEntries,
    buildReferenceMap,
    linkCitationMarkers,
} from './resolve/references.js';
export { loadPapertable, savePapertable, toBibRecord, fromBibRecord } from './sources/papertable.js';
export { loadDocumentPool, parseDocumentNumber } from './sources/documents.js';
export { loadMetadataPool } from './sources/metadata.js';
export { LoaderError } from './sources/errors.js';
export { runDeduplication, type DeduplicationStats } from './pipeline/dedup-run.js';
export { runReferenceLinking, type LinkingStats } from './pipeline/link-run.js';
export { BibmergeDatabase } from './storage/database.js';
export * from './types/index.js';
