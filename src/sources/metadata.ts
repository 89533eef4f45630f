import { existsSync, readFileSync } from 'node:fs';
import { parse } from 'csv-parse/sync';
import type { MetadataEntry, MetadataPoolConfig } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { LoaderError } from './errors.js';
import { errorMessage } from './utils.js';

/**
 * Load a screening sheet (CSV with a header row) as a metadata pool.
 * Rows whose number column is not a plain integer are skipped.
 */
export function loadMetadataPool(pool: MetadataPoolConfig): MetadataEntry[] {
    const { path, titleColumn, numberColumn } = pool;

    if (!existsSync(path)) {
        getLogger().warn({ path }, 'Metadata sheet not found');
        return [];
    }

    let rows: Array<Record<string, string>>;
    try {
        rows = parse(readFileSync(path, 'utf-8'), {
            columns: true,
            bom: true,
            skip_empty_lines: true,
            relax_column_count: true,
        });
    } catch (error) {
        throw new LoaderError(`Failed to parse metadata sheet ${path}: ${errorMessage(error)}`, path, { cause: error });
    }

    const entries: MetadataEntry[] = [];
    for (const row of rows) {
        const number = (row[numberColumn] ?? '').trim();
        if (!/^\d+$/.test(number)) continue;

        entries.push({ number: parseInt(number, 10), title: row[titleColumn] ?? '' });
    }

    getLogger().info({ path, entries: entries.length }, 'Metadata pool loaded');
    return entries;
}
