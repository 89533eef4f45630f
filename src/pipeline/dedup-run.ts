import { existsSync, writeFileSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import type { BibmergeConfig, BibRecord, DeduplicationResult } from '../types/index.js';
import { deduplicate } from '../dedup/deduplicator.js';
import { loadPapertable, savePapertable } from '../sources/papertable.js';
import { LoaderError } from '../sources/errors.js';
import { BibmergeDatabase } from '../storage/database.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../utils/version.js';

export interface DeduplicationStats {
    total_papers_before: number;
    unique_papers_after: number;
    duplicates_removed: number;
    deduplication_rate_percent: number;
    database_totals: Record<string, number>;
    file_statistics: Record<string, number>;
    output_file: string;
}

/**
 * Load every input file in order. Missing or unreadable files count as empty.
 */
function loadInputs(config: BibmergeConfig): { records: BibRecord[]; fileStats: Record<string, number> } {
    const records: BibRecord[] = [];
    const fileStats: Record<string, number> = {};

    for (const input of config.inputs) {
        const path = resolve(config.workspace, input);
        // Counts are keyed by the path as given, not the file name
        const name = input;

        if (!existsSync(path)) {
            getLogger().warn({ file: name }, 'Input file not found');
            fileStats[name] = 0;
            continue;
        }

        try {
            const loaded = loadPapertable(path);
            records.push(...loaded);
            fileStats[name] = loaded.length;
            getLogger().info({ file: name, records: loaded.length }, 'Loaded input file');
        } catch (error) {
            if (!(error instanceof LoaderError)) throw error;
            getLogger().error({ file: name, error: error.message }, 'Skipping unreadable input file');
            fileStats[name] = 0;
        }
    }

    return { records, fileStats };
}

/**
 * Sum per-file counts by the source each file name starts with.
 * Only the file name is matched, not its directory.
 */
export function totalsBySource(
    fileStats: Readonly<Record<string, number>>,
    sources: Readonly<Record<string, string>>
): Record<string, number> {
    const totals: Record<string, number> = {};
    for (const [source, prefix] of Object.entries(sources)) {
        totals[source] = Object.entries(fileStats)
            .filter(([file]) => basename(file).startsWith(prefix))
            .reduce((sum, [, count]) => sum + count, 0);
    }
    return totals;
}

/**
 * Build the statistics report for a finished deduplication.
 */
export function buildDeduplicationStats(
    totalBefore: number,
    result: DeduplicationResult,
    fileStats: Record<string, number>,
    sources: Readonly<Record<string, string>>,
    outputFile: string
): DeduplicationStats {
    const rate = totalBefore > 0 ? (result.duplicateCount / totalBefore) * 100 : 0;

    return {
        total_papers_before: totalBefore,
        unique_papers_after: result.unique.length,
        duplicates_removed: result.duplicateCount,
        deduplication_rate_percent: Math.round(rate * 100) / 100,
        database_totals: totalsBySource(fileStats, sources),
        file_statistics: fileStats,
        output_file: outputFile,
    };
}

/**
 * Deduplication pipeline:
 *
 * 1. Load all input papertables in the configured order
 * 2. Deduplicate (first-seen copy wins)
 * 3. Write the merged papertable and the statistics report
 * 4. Record the run in the database, when one is configured
 */
export function runDeduplication(config: BibmergeConfig): DeduplicationStats {
    getLogger().info({ inputs: config.inputs.length }, 'Loading input files');
    const { records, fileStats } = loadInputs(config);

    if (records.length === 0) {
        throw new LoaderError('No records found in any input file', config.workspace);
    }

    getLogger().info({ records: records.length }, 'Starting deduplication');
    const result = deduplicate(records, {
        thresholds: config.matching,
        onProgress: (processed, total) => getLogger().info({ processed, total }, 'Deduplication progress'),
    });
    getLogger().info(
        { unique: result.unique.length, duplicates: result.duplicateCount },
        'Deduplication complete'
    );

    const outputFile = config.output ?? `${result.unique.length}_papers_after_automated_deduplication.papertable`;
    const outputPath = resolve(config.workspace, outputFile);
    savePapertable(result.unique, outputPath);

    const stats = buildDeduplicationStats(records.length, result, fileStats, config.sources, basename(outputFile));
    const statsPath = resolve(config.workspace, config.statsFile);
    writeFileSync(statsPath, JSON.stringify(stats, null, 2), 'utf-8');
    getLogger().info({ outputPath, statsPath }, 'Results written');

    if (config.db) {
        const db = new BibmergeDatabase(config.db);
        try {
            db.transaction(() => {
                const runId = db.insertRun({
                    created_at: new Date().toISOString(),
                    bibmerge_version: VERSION,
                    kind: 'dedup',
                    config_json: JSON.stringify(config),
                    stats_json: JSON.stringify(stats),
                });
                db.insertDeduplication(runId, result.unique, result.matches);
            });
        } finally {
            db.close();
        }
    }

    return stats;
}
