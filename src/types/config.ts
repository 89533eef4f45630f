import type { MatchThresholds } from './record.js';
import type { ResolverOptions } from './document.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Groups input files by the search source they were exported from.
 * Keys are display names, values are file-name prefixes.
 */
export type SourcePrefixes = Record<string, string>;

/**
 * A screening sheet used as a metadata pool.
 */
export interface MetadataPoolConfig {
    path: string;
    titleColumn: string;
    numberColumn: string;
}

/**
 * Full bibmerge configuration merged from CLI flags and config file.
 */
export interface BibmergeConfig {
    // Deduplication
    inputs: string[];
    workspace: string;
    output?: string;
    statsFile: string;
    sources: SourcePrefixes;

    // Reference linking
    manuscript?: string;
    documentDir: string;
    documentExtensions: string[];
    metadataPools: MetadataPoolConfig[];
    referenceHeading: string;
    linkPrefix: string;
    linkMapFile: string;
    linkedManuscript?: string;

    // Storage (run log)
    db?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    matching: MatchThresholds;
    resolver: ResolverOptions;
}

/**
 * Partial configuration as read from a config file or CLI flags.
 */
export type BibmergeConfigOverrides = Partial<Omit<BibmergeConfig, 'matching' | 'resolver'>> & {
    matching?: Partial<MatchThresholds>;
    resolver?: Partial<ResolverOptions>;
};

export const DEFAULT_MATCH_THRESHOLDS: MatchThresholds = {
    titleThreshold: 0.85,
    authorOverlap: 0.5,
    titleOnlyThreshold: 0.95,
};

export const DEFAULT_RESOLVER_OPTIONS: ResolverOptions = {
    minTokenMatches: 2,
    minTokenLength: 4,
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: BibmergeConfig = {
    inputs: [],
    workspace: '.',
    statsFile: 'deduplication_statistics.json',
    sources: {
        scispace: 'scispace',
        google_scholar: 'google_scholar',
        arxiv: 'arxiv',
    },
    documentDir: 'paper_for_full_text_review',
    documentExtensions: ['.pdf'],
    metadataPools: [],
    referenceHeading: '\\d+\\.\\s+References',
    linkPrefix: 'paper_for_full_text_review',
    linkMapFile: 'reference_links.json',
    logLevel: 'info',
    jsonLogs: false,
    matching: { ...DEFAULT_MATCH_THRESHOLDS },
    resolver: { ...DEFAULT_RESOLVER_OPTIONS },
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export type RunKind = 'dedup' | 'link';

export interface RunRecord {
    run_id?: number;
    created_at: string;
    bibmerge_version: string;
    kind: RunKind;
    config_json: string;
    stats_json: string;
}
