import { cosmiconfig } from 'cosmiconfig';
import {
    DEFAULT_CONFIG,
    type BibmergeConfig,
    type BibmergeConfigOverrides,
    type MatchThresholds,
    type ResolverOptions,
} from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Load configuration from bibmerge.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<BibmergeConfigOverrides | null> {
    const explorer = cosmiconfig('bibmerge', {
        searchPlaces: ['bibmerge.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return result.config as BibmergeConfigOverrides;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

const MATCH_THRESHOLD_KEYS = ['titleThreshold', 'authorOverlap', 'titleOnlyThreshold'] as const;
const RESOLVER_OPTION_KEYS = ['minTokenMatches', 'minTokenLength'] as const;

/**
 * Merge numeric settings key by key. Later layers win; absent and null values
 * fall through to the layer below. Anything left that is not a finite number
 * is rejected.
 */
function mergeNumeric<K extends string>(
    section: string,
    keys: readonly K[],
    defaults: Readonly<Record<K, number>>,
    layers: ReadonlyArray<Partial<Record<K, unknown>> | null | undefined>
): Record<K, number> {
    const merged: Record<K, number> = { ...defaults };
    for (const key of keys) {
        for (const layer of layers) {
            const value = layer?.[key];
            if (value === undefined || value === null) continue;
            if (typeof value !== 'number' || !Number.isFinite(value)) {
                throw new Error(`Invalid configuration: ${section}.${key} must be a finite number, got ${JSON.stringify(value)}`);
            }
            merged[key] = value;
        }
    }
    return merged;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > config file > defaults
 */
export async function resolveConfig(
    cliFlags: BibmergeConfigOverrides,
    searchFrom?: string
): Promise<BibmergeConfig> {
    const fileConfig = await loadConfigFile(searchFrom);

    const matching: MatchThresholds = mergeNumeric('matching', MATCH_THRESHOLD_KEYS, DEFAULT_CONFIG.matching, [
        fileConfig?.matching,
        cliFlags.matching,
    ]);
    const resolver: ResolverOptions = mergeNumeric('resolver', RESOLVER_OPTION_KEYS, DEFAULT_CONFIG.resolver, [
        fileConfig?.resolver,
        cliFlags.resolver,
    ]);

    // Deep merge with precedence. Callers leave unset flags out entirely.
    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...cliFlags,
        sources: cliFlags.sources ?? fileConfig?.sources ?? DEFAULT_CONFIG.sources,
        matching,
        resolver,
    };
}
