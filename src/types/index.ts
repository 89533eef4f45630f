/**
 * Barrel export for all shared types.
 */
export type {
    BibRecord,
    AuthorEntry,
    MatchThresholds,
    MatchReason,
    MatchVerdict,
    DuplicateMatch,
    DeduplicationResult,
} from './record.js';
export type {
    CandidateDocument,
    MetadataEntry,
    CandidatePools,
    ResolutionStrategy,
    ResolvedLink,
    ResolverOptions,
    ReferenceEntry,
} from './document.js';
export { DEFAULT_CONFIG, DEFAULT_MATCH_THRESHOLDS, DEFAULT_RESOLVER_OPTIONS } from './config.js';
export type {
    BibmergeConfig,
    BibmergeConfigOverrides,
    LogLevel,
    SourcePrefixes,
    MetadataPoolConfig,
    RunKind,
    RunRecord,
} from './config.js';
