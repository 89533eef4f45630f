import { existsSync, readdirSync } from 'node:fs';
import { extname } from 'node:path';
import type { CandidateDocument } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { LoaderError } from './errors.js';
import { errorMessage } from './utils.js';

/**
 * Leading number of a document file name.
 * "12-Drift Detection.pdf" → 12, "notes.pdf" → null
 */
export function parseDocumentNumber(fileName: string): number | null {
    const match = fileName.match(/^(\d+)-/);
    return match?.[1] ? parseInt(match[1], 10) : null;
}

/**
 * Scan a directory for numbered documents.
 * Only files with one of `extensions` (case-insensitive) and a leading `<n>-` are kept.
 * Result is sorted by number; on a clash the first file name in sort order wins.
 */
export function loadDocumentPool(dir: string, extensions: readonly string[] = ['.pdf']): CandidateDocument[] {
    if (!existsSync(dir)) {
        getLogger().warn({ dir }, 'Document directory not found');
        return [];
    }

    let files: string[];
    try {
        files = readdirSync(dir).sort();
    } catch (error) {
        throw new LoaderError(`Failed to read document directory ${dir}: ${errorMessage(error)}`, dir, { cause: error });
    }

    const allowed = new Set(extensions.map((ext) => ext.toLowerCase()));
    const byNumber = new Map<number, CandidateDocument>();

    for (const file of files) {
        if (!allowed.has(extname(file).toLowerCase())) continue;

        const number = parseDocumentNumber(file);
        if (number === null) continue;

        const existing = byNumber.get(number);
        if (existing) {
            getLogger().warn({ number, kept: existing.file, skipped: file }, 'Duplicate document number');
            continue;
        }

        byNumber.set(number, { number, file, text: file });
    }

    const documents = [...byNumber.values()].sort((a, b) => a.number - b.number);
    getLogger().info({ dir, documents: documents.length }, 'Document pool loaded');
    return documents;
}
