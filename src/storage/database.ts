import Database from 'better-sqlite3';
import type {
    BibRecord,
    DuplicateMatch,
    ResolvedLink,
    RunKind,
    RunRecord,
} from '../types/index.js';
import { fromBibRecord } from '../sources/papertable.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: one row per dedup or link invocation
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  bibmerge_version TEXT NOT NULL,
  kind TEXT NOT NULL,
  config_json TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Records: unique records kept by a dedup run, in first-seen order
CREATE TABLE IF NOT EXISTS records (
  record_id INTEGER PRIMARY KEY,
  run_id INTEGER NOT NULL REFERENCES runs(run_id),
  position INTEGER NOT NULL,
  identifier TEXT,
  title TEXT,
  authors_json TEXT NOT NULL DEFAULT '[]',
  data_json TEXT NOT NULL DEFAULT '{}',
  UNIQUE (run_id, position)
);

-- Duplicates: dropped input records and the unique record they matched
CREATE TABLE IF NOT EXISTS duplicates (
  run_id INTEGER NOT NULL REFERENCES runs(run_id),
  input_index INTEGER NOT NULL,
  matched_position INTEGER NOT NULL,
  reason TEXT NOT NULL,
  PRIMARY KEY (run_id, input_index)
);

-- Reference links: citation numbers resolved by a link run
CREATE TABLE IF NOT EXISTS reference_links (
  run_id INTEGER NOT NULL REFERENCES runs(run_id),
  citation INTEGER NOT NULL,
  document_number INTEGER NOT NULL,
  document_file TEXT NOT NULL,
  strategy TEXT NOT NULL,
  score INTEGER,
  PRIMARY KEY (run_id, citation)
);

CREATE INDEX IF NOT EXISTS idx_records_identifier ON records(identifier);
CREATE INDEX IF NOT EXISTS idx_runs_kind ON runs(kind);
`;

export interface StoredRecord {
    record_id: number;
    run_id: number;
    position: number;
    identifier: string | null;
    title: string | null;
    authors_json: string;
    data_json: string;
}

export interface StoredReferenceLink {
    run_id: number;
    citation: number;
    document_number: number;
    document_file: string;
    strategy: string;
    score: number | null;
}

export interface DatabaseStats {
    runs: number;
    records: number;
    duplicates: number;
    referenceLinks: number;
    latestRuns: Partial<Record<RunKind, RunRecord>>;
}

/**
 * Run log database wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and inserts for each run kind.
 * Stored results are a record of past runs; every run recomputes from its inputs.
 */
export class BibmergeDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true }) as number;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, bibmerge_version, kind, config_json, stats_json)
      VALUES (@created_at, @bibmerge_version, @kind, @config_json, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    getLatestRun(kind: RunKind): RunRecord | undefined {
        return this.db
            .prepare('SELECT * FROM runs WHERE kind = ? ORDER BY run_id DESC LIMIT 1')
            .get(kind) as RunRecord | undefined;
    }

    // ─── Dedup results ────────────────────────────────────────

    /**
     * Store the unique records and duplicate matches of a dedup run in one transaction.
     */
    insertDeduplication(runId: number, unique: readonly BibRecord[], matches: readonly DuplicateMatch[]): void {
        const recordStmt = this.db.prepare(`
      INSERT INTO records (run_id, position, identifier, title, authors_json, data_json)
      VALUES (@run_id, @position, @identifier, @title, @authors_json, @data_json)
    `);
        const duplicateStmt = this.db.prepare(`
      INSERT INTO duplicates (run_id, input_index, matched_position, reason)
      VALUES (@run_id, @input_index, @matched_position, @reason)
    `);

        const insertAll = this.db.transaction(() => {
            unique.forEach((record, position) => {
                recordStmt.run({
                    run_id: runId,
                    position,
                    identifier: record.identifier ?? null,
                    title: record.title ?? null,
                    authors_json: JSON.stringify(record.authorList ?? []),
                    data_json: JSON.stringify(fromBibRecord(record)),
                });
            });
            for (const match of matches) {
                duplicateStmt.run({
                    run_id: runId,
                    input_index: match.inputIndex,
                    matched_position: match.matchedIndex,
                    reason: match.reason,
                });
            }
        });

        insertAll();
    }

    getRecords(runId: number): StoredRecord[] {
        return this.db
            .prepare('SELECT * FROM records WHERE run_id = ? ORDER BY position')
            .all(runId) as StoredRecord[];
    }

    // ─── Reference links ──────────────────────────────────────

    insertReferenceLinks(runId: number, links: ReadonlyMap<number, ResolvedLink>): void {
        const stmt = this.db.prepare(`
      INSERT INTO reference_links (run_id, citation, document_number, document_file, strategy, score)
      VALUES (@run_id, @citation, @document_number, @document_file, @strategy, @score)
    `);

        const insertAll = this.db.transaction(() => {
            for (const [citation, link] of links) {
                stmt.run({
                    run_id: runId,
                    citation,
                    document_number: link.document.number,
                    document_file: link.document.file,
                    strategy: link.strategy,
                    score: link.score ?? null,
                });
            }
        });

        insertAll();
    }

    getReferenceLinks(runId: number): StoredReferenceLink[] {
        return this.db
            .prepare('SELECT * FROM reference_links WHERE run_id = ? ORDER BY citation')
            .all(runId) as StoredReferenceLink[];
    }

    // ─── Stats ────────────────────────────────────────────────

    private count(table: 'runs' | 'records' | 'duplicates' | 'reference_links'): number {
        const row = this.db.prepare(`SELECT COUNT(*) as count FROM ${table}`).get() as { count: number };
        return row.count;
    }

    getStats(): DatabaseStats {
        const latestRuns: Partial<Record<RunKind, RunRecord>> = {};
        const latestDedup = this.getLatestRun('dedup');
        const latestLink = this.getLatestRun('link');
        if (latestDedup) latestRuns.dedup = latestDedup;
        if (latestLink) latestRuns.link = latestLink;

        return {
            runs: this.count('runs'),
            records: this.count('records'),
            duplicates: this.count('duplicates'),
            referenceLinks: this.count('reference_links'),
            latestRuns,
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}
