import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
    findPapersColumn,
    fromBibRecord,
    loadPapertable,
    savePapertable,
    toBibRecord,
} from '../sources/papertable.js';
import { loadDocumentPool, parseDocumentNumber } from '../sources/documents.js';
import { loadMetadataPool } from '../sources/metadata.js';
import { LoaderError } from '../sources/errors.js';
import { stripDoiPrefix } from '../sources/utils.js';

describe('Loaders', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bibmerge-sources-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    describe('stripDoiPrefix', () => {
        it('should strip resolver prefixes', () => {
            expect(stripDoiPrefix('https://doi.org/10.1234/test')).toBe('10.1234/test');
            expect(stripDoiPrefix('http://dx.doi.org/10.1/x')).toBe('10.1/x');
            expect(stripDoiPrefix('doi:10.1/x')).toBe('10.1/x');
        });

        it('should handle plain, empty and null DOIs', () => {
            expect(stripDoiPrefix('10.1234/test')).toBe('10.1234/test');
            expect(stripDoiPrefix('   ')).toBeNull();
            expect(stripDoiPrefix(null)).toBeNull();
        });
    });

    describe('papertable', () => {
        it('should find the papers column by name', () => {
            expect(findPapersColumn([
                { column_id: 'a', name: 'Search' },
                { column_id: 'b', name: 'Relevant PAPERS' },
            ])).toBe('b');
            expect(findPapersColumn([{ column_id: 'a', name: 'Search' }, 'junk'])).toBeNull();
        });

        it('should map exported papers onto records', () => {
            const paper = {
                doi: 'https://doi.org/10.1/ABC',
                title: 'Drift',
                authors: [{ name: 'A. Smith', affiliation: 'Lab' }, 'B. Lee', null],
                year: 2021,
            };
            expect(toBibRecord(paper)).toEqual({
                year: 2021,
                identifier: '10.1/ABC',
                title: 'Drift',
                authorList: [{ name: 'A. Smith' }, 'B. Lee'],
                exported: paper,
            });
            expect(toBibRecord({ title: 42 })).toEqual({
                identifier: null,
                title: null,
                authorList: null,
                exported: { title: 42 },
            });
        });

        it('should give back the exported paper unchanged', () => {
            const paper = {
                year: 2021,
                doi: 'https://doi.org/10.1/X',
                title: 'Drift',
                authors: [{ name: 'A. Smith', authorId: 'a-1', affiliation: 'Lab' }],
            };
            expect(fromBibRecord(toBibRecord(paper))).toEqual(paper);
            expect(fromBibRecord(toBibRecord({ title: 'Other' }))).toEqual({ title: 'Other' });
        });

        it('should build papers for records without an exported paper', () => {
            expect(fromBibRecord({ identifier: '10.1/x', title: 'T', authorList: null, venue: 'V' })).toEqual({
                venue: 'V',
                doi: '10.1/x',
                title: 'T',
            });
        });

        it('should load papers from the papers column only', () => {
            const file = path.join(tmpDir, 'scispace_query_1.papertable');
            fs.writeFileSync(file, JSON.stringify({
                columns: [{ column_id: 'c1', name: 'Query' }, { column_id: 'c2', name: 'Papers' }],
                data: [
                    { c2: { doi: '10.1/a', title: 'First', authors: ['A'] } },
                    { c1: 'no paper here' },
                    { c2: 'not an object' },
                    { c2: { title: 'Second' } },
                ],
            }));

            const records = loadPapertable(file);
            expect(records).toEqual([
                {
                    identifier: '10.1/a',
                    title: 'First',
                    authorList: ['A'],
                    exported: { doi: '10.1/a', title: 'First', authors: ['A'] },
                },
                { identifier: null, title: 'Second', authorList: null, exported: { title: 'Second' } },
            ]);
        });

        it('should return no records without a papers column', () => {
            const file = path.join(tmpDir, 'other.papertable');
            fs.writeFileSync(file, JSON.stringify({ columns: [{ column_id: 'c1', name: 'Query' }], data: [{ c1: {} }] }));
            expect(loadPapertable(file)).toEqual([]);
        });

        it('should throw LoaderError for invalid JSON', () => {
            const file = path.join(tmpDir, 'broken.papertable');
            fs.writeFileSync(file, '{ not json');
            expect(() => loadPapertable(file)).toThrow(LoaderError);
        });

        it('should throw LoaderError for a missing file', () => {
            const file = path.join(tmpDir, 'missing.papertable');
            let caught: unknown;
            try {
                loadPapertable(file);
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(LoaderError);
            expect(caught).toMatchObject({ name: 'LoaderError', path: file });
        });

        it('should save a single-column papertable that loads back', () => {
            const exported = {
                doi: 'https://doi.org/10.1/A',
                title: 'First',
                authors: [{ name: 'A', authorId: 'a-1' }],
                year: 2020,
            };
            const file = path.join(tmpDir, 'out.papertable');
            savePapertable([
                toBibRecord(exported),
                { identifier: null, title: 'Second', authorList: [{ name: 'B' }] },
            ], file);

            const saved = JSON.parse(fs.readFileSync(file, 'utf-8'));
            expect(saved.columns).toEqual([
                { column_id: 'papers_deduplicated', name: 'Papers (2)', custom_instructions: null },
            ]);
            expect(saved.data).toEqual([
                { papers_deduplicated: exported },
                { papers_deduplicated: { title: 'Second', authors: [{ name: 'B' }] } },
            ]);
            expect(saved.read_only).toBe(false);

            expect(loadPapertable(file).map((record) => record.exported)).toEqual([
                exported,
                { title: 'Second', authors: [{ name: 'B' }] },
            ]);
        });
    });

    describe('document pool', () => {
        it('should parse leading document numbers', () => {
            expect(parseDocumentNumber('12-Drift Study.pdf')).toBe(12);
            expect(parseDocumentNumber('notes.pdf')).toBeNull();
            expect(parseDocumentNumber('12 Drift.pdf')).toBeNull();
        });

        it('should load numbered documents sorted by number', () => {
            for (const name of ['12-Drift Study.pdf', '3-Alpha.PDF', 'notes.pdf', '5-readme.txt']) {
                fs.writeFileSync(path.join(tmpDir, name), '');
            }
            expect(loadDocumentPool(tmpDir)).toEqual([
                { number: 3, file: '3-Alpha.PDF', text: '3-Alpha.PDF' },
                { number: 12, file: '12-Drift Study.pdf', text: '12-Drift Study.pdf' },
            ]);
        });

        it('should honour configured extensions', () => {
            fs.writeFileSync(path.join(tmpDir, '5-readme.txt'), '');
            fs.writeFileSync(path.join(tmpDir, '6-paper.pdf'), '');
            expect(loadDocumentPool(tmpDir, ['.txt']).map((d) => d.file)).toEqual(['5-readme.txt']);
        });

        it('should keep the first file name when numbers clash', () => {
            fs.writeFileSync(path.join(tmpDir, '7-b.pdf'), '');
            fs.writeFileSync(path.join(tmpDir, '7-a.pdf'), '');
            expect(loadDocumentPool(tmpDir).map((d) => d.file)).toEqual(['7-a.pdf']);
        });

        it('should return an empty pool for a missing directory', () => {
            expect(loadDocumentPool(path.join(tmpDir, 'nope'))).toEqual([]);
        });
    });

    describe('metadata pool', () => {
        it('should read numbered rows from a screening sheet', () => {
            const file = path.join(tmpDir, 'included.csv');
            fs.writeFileSync(file, [
                'Paper Number,Title,Year',
                '3,"Multi-Cloud Drift Detection Techniques, Revisited",2021',
                'x,Bad Row,2020',
                ' 12 ,Policy as Code,2022',
                '',
            ].join('\n'));

            expect(loadMetadataPool({ path: file, titleColumn: 'Title', numberColumn: 'Paper Number' })).toEqual([
                { number: 3, title: 'Multi-Cloud Drift Detection Techniques, Revisited' },
                { number: 12, title: 'Policy as Code' },
            ]);
        });

        it('should return an empty pool for a missing sheet', () => {
            expect(loadMetadataPool({ path: path.join(tmpDir, 'none.csv'), titleColumn: 'Title', numberColumn: 'No' }))
                .toEqual([]);
        });
    });
});
