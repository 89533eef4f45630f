import { readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { BibmergeConfig, CandidatePools, ResolvedLink } from '../types/index.js';
import { loadDocumentPool } from '../sources/documents.js';
import { loadMetadataPool } from '../sources/metadata.js';
import { LoaderError } from '../sources/errors.js';
import { errorMessage } from '../sources/utils.js';
import {
    buildReferenceMap,
    linkCitationMarkers,
    parseReferenceEntries,
    splitReferenceSection,
} from '../resolve/references.js';
import { BibmergeDatabase } from '../storage/database.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../utils/version.js';

export interface LinkingStats {
    total: number;
    resolved: number;
    unresolved: number[];
    byStrategy: Record<ResolvedLink['strategy'], number>;
    link_map_file: string;
}

/**
 * Href of a resolved document, relative to where the manuscript is published.
 */
export function linkHref(prefix: string, link: ResolvedLink): string {
    return prefix ? `${prefix.replace(/\/+$/, '')}/${link.document.file}` : link.document.file;
}

/**
 * `{ "<citation>": "<href>" }` in ascending citation order.
 */
export function toLinkMap(links: ReadonlyMap<number, ResolvedLink>, prefix: string): Record<string, string> {
    const map: Record<string, string> = {};
    const citations = [...links.keys()].sort((a, b) => a - b);
    for (const citation of citations) {
        const link = links.get(citation);
        if (link) map[String(citation)] = linkHref(prefix, link);
    }
    return map;
}

/**
 * Rewrite resolved `[n]` markers as markdown links, line by line.
 */
export function linkManuscript(
    content: string,
    links: ReadonlyMap<number, ResolvedLink>,
    prefix: string
): string {
    return content
        .split('\n')
        .map((line) => linkCitationMarkers(line, links, (n, link) => `[[${n}]](<${linkHref(prefix, link)}>)`))
        .join('\n');
}

function loadPools(config: BibmergeConfig): CandidatePools {
    const documents = loadDocumentPool(resolve(config.workspace, config.documentDir), config.documentExtensions);
    const metadata = config.metadataPools.map((pool) =>
        loadMetadataPool({ ...pool, path: resolve(config.workspace, pool.path) })
    );
    return { metadata, documents };
}

/**
 * Reference-linking pipeline:
 *
 * 1. Read the manuscript and parse its numbered reference list
 * 2. Load the document pool and metadata pools
 * 3. Resolve every reference entry to a document (or leave it unlinked)
 * 4. Write the link map, and the linked manuscript when configured
 * 5. Record the run in the database, when one is configured
 */
export function runReferenceLinking(config: BibmergeConfig): LinkingStats {
    if (!config.manuscript) {
        throw new Error('No manuscript configured (use --manuscript or "manuscript" in bibmerge.config.json)');
    }

    const manuscriptPath = resolve(config.workspace, config.manuscript);
    let content: string;
    try {
        content = readFileSync(manuscriptPath, 'utf-8');
    } catch (error) {
        throw new LoaderError(`Failed to read manuscript ${manuscriptPath}: ${errorMessage(error)}`, manuscriptPath, { cause: error });
    }

    const section = splitReferenceSection(content, config.referenceHeading);
    if (section === null) {
        getLogger().warn({ heading: config.referenceHeading }, 'Reference section not found');
    }
    const entries = section === null ? [] : parseReferenceEntries(section);
    getLogger().info({ references: entries.length }, 'Parsed reference list');

    const pools = loadPools(config);
    const links = buildReferenceMap(entries, pools, config.resolver);

    const byStrategy: LinkingStats['byStrategy'] = { metadata: 0, 'token-overlap': 0 };
    for (const link of links.values()) {
        byStrategy[link.strategy]++;
    }

    // A number listed twice is reported once, and only if no entry for it resolved
    const unresolved = [...new Set(entries.map((entry) => entry.number))].filter((number) => !links.has(number));
    for (const number of unresolved) {
        getLogger().debug({ citation: number }, 'No document found');
    }

    const linkMapPath = resolve(config.workspace, config.linkMapFile);
    writeFileSync(linkMapPath, JSON.stringify(toLinkMap(links, config.linkPrefix), null, 2), 'utf-8');

    if (config.linkedManuscript) {
        const linkedPath = resolve(config.workspace, config.linkedManuscript);
        writeFileSync(linkedPath, linkManuscript(content, links, config.linkPrefix), 'utf-8');
        getLogger().info({ linkedPath }, 'Linked manuscript written');
    }

    const stats: LinkingStats = {
        total: entries.length,
        resolved: links.size,
        unresolved,
        byStrategy,
        link_map_file: config.linkMapFile,
    };
    getLogger().info({ total: stats.total, resolved: stats.resolved, linkMapPath }, 'Reference linking complete');

    if (config.db) {
        const db = new BibmergeDatabase(config.db);
        try {
            db.transaction(() => {
                const runId = db.insertRun({
                    created_at: new Date().toISOString(),
                    bibmerge_version: VERSION,
                    kind: 'link',
                    config_json: JSON.stringify(config),
                    stats_json: JSON.stringify(stats),
                });
                db.insertReferenceLinks(runId, links);
            });
        } finally {
            db.close();
        }
    }

    return stats;
}
