import { readFileSync, writeFileSync } from 'node:fs';
import type { AuthorEntry, BibRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { LoaderError } from './errors.js';
import { errorMessage, isRecordObject, stripDoiPrefix } from './utils.js';

/**
 * Column id used for the single column of a merged papertable.
 */
export const DEDUPLICATED_COLUMN_ID = 'papers_deduplicated';

/**
 * Papertable export format: a column list plus rows keyed by column id.
 */
export interface PapertableColumn {
    column_id: string;
    name: string;
    custom_instructions?: string | null;
}

export interface Papertable {
    columns: PapertableColumn[];
    data: Array<Record<string, unknown>>;
    search_metadata: Record<string, unknown>;
    filter_info: Record<string, unknown>;
    sort: unknown;
    read_only: boolean;
    disable_filters: boolean;
    disable_sorting: boolean;
}

/**
 * Id of the first column whose name mentions "paper", or null.
 */
export function findPapersColumn(columns: readonly unknown[]): string | null {
    for (const column of columns) {
        if (!isRecordObject(column)) continue;
        const name = typeof column['name'] === 'string' ? column['name'].toLowerCase() : '';
        if (name.includes('paper')) {
            return typeof column['column_id'] === 'string' ? column['column_id'] : '';
        }
    }
    return null;
}

function toAuthorList(value: unknown): AuthorEntry[] | null {
    if (!Array.isArray(value)) return null;

    const authors: AuthorEntry[] = [];
    for (const entry of value) {
        if (typeof entry === 'string') {
            authors.push(entry);
        } else if (isRecordObject(entry)) {
            authors.push({ name: typeof entry['name'] === 'string' ? entry['name'] : null });
        } else if (entry !== null && entry !== undefined) {
            authors.push(String(entry));
        }
    }
    return authors;
}

/**
 * Map an exported paper object onto a record.
 * `doi` → `identifier`, `authors` → `authorList`; other fields are kept, and
 * the paper itself is held in `exported` so it can be written back as read.
 */
export function toBibRecord(paper: Record<string, unknown>): BibRecord {
    const { doi, title, authors, ...rest } = paper;

    return {
        ...rest,
        identifier: typeof doi === 'string' ? stripDoiPrefix(doi) : null,
        title: typeof title === 'string' ? title : null,
        authorList: toAuthorList(authors),
        exported: paper,
    };
}

/**
 * Paper object to write for a record: the exported paper when the record was
 * loaded from one, otherwise the record's fields under the export's names.
 */
export function fromBibRecord(record: BibRecord): Readonly<Record<string, unknown>> {
    const { identifier, title, authorList, exported, ...rest } = record;
    if (exported) return exported;

    const paper: Record<string, unknown> = { ...rest };
    if (identifier !== null && identifier !== undefined) paper['doi'] = identifier;
    if (title !== null && title !== undefined) paper['title'] = title;
    if (authorList) paper['authors'] = authorList;
    return paper;
}

/**
 * Load the paper objects of a papertable file as records.
 * A table without a papers column yields no records.
 */
export function loadPapertable(path: string): BibRecord[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new LoaderError(`Failed to load papertable ${path}: ${errorMessage(error)}`, path, { cause: error });
    }

    if (!isRecordObject(parsed) || !Array.isArray(parsed['columns']) || !Array.isArray(parsed['data'])) {
        getLogger().warn({ path }, 'Not a papertable (missing columns or data)');
        return [];
    }

    const columnId = findPapersColumn(parsed['columns']);
    if (!columnId) {
        getLogger().warn({ path }, 'Could not find papers column');
        return [];
    }

    const records: BibRecord[] = [];
    for (const row of parsed['data']) {
        if (!isRecordObject(row)) continue;
        const paper = row[columnId];
        if (isRecordObject(paper)) {
            records.push(toBibRecord(paper));
        }
    }

    getLogger().debug({ path, records: records.length }, 'Papertable loaded');
    return records;
}

/**
 * Build a single-column papertable holding the given records.
 */
export function buildPapertable(records: readonly BibRecord[]): Papertable {
    return {
        columns: [
            {
                column_id: DEDUPLICATED_COLUMN_ID,
                name: `Papers (${records.length})`,
                custom_instructions: null,
            },
        ],
        data: records.map((record) => ({ [DEDUPLICATED_COLUMN_ID]: fromBibRecord(record) })),
        search_metadata: {
            description: 'Deduplicated papers from multiple searches',
        },
        filter_info: {},
        sort: null,
        read_only: false,
        disable_filters: false,
        disable_sorting: false,
    };
}

export function savePapertable(records: readonly BibRecord[], path: string): void {
    writeFileSync(path, JSON.stringify(buildPapertable(records), null, 2), 'utf-8');
    getLogger().debug({ path, records: records.length }, 'Papertable saved');
}
