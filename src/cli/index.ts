import { Command } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { VERSION } from '../utils/version.js';
import { runDeduplication } from '../pipeline/dedup-run.js';
import { runReferenceLinking } from '../pipeline/link-run.js';
import { BibmergeDatabase } from '../storage/database.js';
import type { BibmergeConfig, BibmergeConfigOverrides, LogLevel } from '../types/index.js';

const program = new Command();

program
    .name('bibmerge')
    .description('Merge literature-search exports into one de-duplicated set and link manuscript citations to full texts.')
    .version(VERSION);

function parseNumber(value: string): number {
    const parsed = Number(value);
    if (Number.isNaN(parsed)) {
        throw new Error(`Not a number: ${value}`);
    }
    return parsed;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

/**
 * Flags shared by every command. Unset flags are left out so they do not
 * shadow values from bibmerge.config.json.
 */
function commonFlags(opts: Record<string, unknown>): BibmergeConfigOverrides {
    const flags: BibmergeConfigOverrides = {};
    if (typeof opts['workspace'] === 'string') flags.workspace = opts['workspace'];
    if (typeof opts['db'] === 'string') flags.db = opts['db'];
    if (isLogLevel(opts['logLevel'])) flags.logLevel = opts['logLevel'];
    if (opts['jsonLogs'] === true) flags.jsonLogs = true;
    return flags;
}

async function setup(flags: BibmergeConfigOverrides): Promise<BibmergeConfig> {
    const config = await resolveConfig(flags);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

// ─── DEDUP command ────────────────────────────────────────

program
    .command('dedup')
    .description('Merge papertable exports and remove duplicate records')
    .argument('[inputs...]', 'Papertable files, in ingestion order')
    .option('-w, --workspace <dir>', 'Directory inputs and outputs are resolved against')
    .option('-o, --out <path>', 'Output papertable path')
    .option('--stats <path>', 'Statistics report path')
    .option('--threshold <n>', 'Title similarity threshold', parseNumber)
    .option('--author-overlap <n>', 'Required author overlap ratio', parseNumber)
    .option('--title-only-threshold <n>', 'Title similarity required without author data', parseNumber)
    .option('--db <path>', 'Record the run in this SQLite database')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (inputs: string[], opts: Record<string, unknown>) => {
        const flags = commonFlags(opts);
        if (inputs.length > 0) flags.inputs = inputs;
        if (typeof opts['out'] === 'string') flags.output = opts['out'];
        if (typeof opts['stats'] === 'string') flags.statsFile = opts['stats'];

        const matching: NonNullable<BibmergeConfigOverrides['matching']> = {};
        if (typeof opts['threshold'] === 'number') matching.titleThreshold = opts['threshold'];
        if (typeof opts['authorOverlap'] === 'number') matching.authorOverlap = opts['authorOverlap'];
        if (typeof opts['titleOnlyThreshold'] === 'number') matching.titleOnlyThreshold = opts['titleOnlyThreshold'];
        flags.matching = matching;

        const config = await setup(flags);
        const logger = getLogger();

        try {
            const stats = runDeduplication(config);
            logger.info(
                {
                    before: stats.total_papers_before,
                    unique: stats.unique_papers_after,
                    removed: stats.duplicates_removed,
                    ratePercent: stats.deduplication_rate_percent,
                    bySource: stats.database_totals,
                },
                'Deduplication summary'
            );
        } catch (error) {
            logger.error({ error }, 'Deduplication failed');
            process.exit(1);
        }
    });

// ─── LINK command ─────────────────────────────────────────

program
    .command('link')
    .description('Resolve numbered references of a manuscript to full-text documents')
    .option('-m, --manuscript <path>', 'Manuscript text file')
    .option('-w, --workspace <dir>', 'Directory inputs and outputs are resolved against')
    .option('-d, --documents <dir>', 'Directory of numbered documents')
    .option('--metadata <csv...>', 'Screening sheets, highest priority first (Title / Paper Number columns)')
    .option('--heading <pattern>', 'Pattern of the reference list heading')
    .option('--link-prefix <prefix>', 'Path prefix for document links')
    .option('-o, --out <path>', 'Link map JSON path')
    .option('--linked <path>', 'Also write the manuscript with linked citation markers')
    .option('--min-token-matches <n>', 'Tokens a document name must contain', parseNumber)
    .option('--db <path>', 'Record the run in this SQLite database')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: Record<string, unknown>) => {
        const flags = commonFlags(opts);
        if (typeof opts['manuscript'] === 'string') flags.manuscript = opts['manuscript'];
        if (typeof opts['documents'] === 'string') flags.documentDir = opts['documents'];
        if (typeof opts['heading'] === 'string') flags.referenceHeading = opts['heading'];
        if (typeof opts['linkPrefix'] === 'string') flags.linkPrefix = opts['linkPrefix'];
        if (typeof opts['out'] === 'string') flags.linkMapFile = opts['out'];
        if (typeof opts['linked'] === 'string') flags.linkedManuscript = opts['linked'];
        if (Array.isArray(opts['metadata'])) {
            flags.metadataPools = opts['metadata'].map((path: unknown) => ({
                path: String(path),
                titleColumn: 'Title',
                numberColumn: 'Paper Number',
            }));
        }
        if (typeof opts['minTokenMatches'] === 'number') {
            flags.resolver = { minTokenMatches: opts['minTokenMatches'] };
        }

        const config = await setup(flags);
        const logger = getLogger();

        try {
            const stats = runReferenceLinking(config);
            logger.info(
                { total: stats.total, resolved: stats.resolved, unresolved: stats.unresolved, byStrategy: stats.byStrategy },
                'Linking summary'
            );
        } catch (error) {
            logger.error({ error }, 'Reference linking failed');
            process.exit(1);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show run log statistics')
    .requiredOption('-i, --input <dbPath>', 'Run log database path')
    .action((opts: { input: string }) => {
        try {
            const db = new BibmergeDatabase(opts.input);
            const stats = db.getStats();
            db.close();

            console.log('\n📚 bibmerge Run Log\n');
            console.log(`  Runs:            ${stats.runs}`);
            console.log(`  Unique records:  ${stats.records}`);
            console.log(`  Duplicates:      ${stats.duplicates}`);
            console.log(`  Reference links: ${stats.referenceLinks}`);

            for (const [kind, run] of Object.entries(stats.latestRuns)) {
                if (!run) continue;
                console.log(`\n  Latest ${kind} run (#${run.run_id}, ${run.created_at}):`);
                console.log(`    ${run.stats_json}`);
            }

            console.log('');
        } catch (error) {
            console.error('Inspect failed:', error);
            process.exit(1);
        }
    });

program.parseAsync().catch((error: unknown) => {
    getLogger().error({ error }, 'Command failed');
    process.exit(1);
});
