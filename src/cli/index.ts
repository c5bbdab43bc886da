#!/usr/bin/env node
import { Command } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { PipelineError, describeError } from '../utils/errors.js';
import { runBuild } from '../builder/index-builder.js';
import { IndexDatabase } from '../storage/database.js';
import type { ExtractPaths, IndexConfig, LogLevel } from '../types/index.js';

const VERSION = '1.0.0';

interface BuildFlags {
    config?: string;
    out?: string;
    packageIndex?: string;
    dependencies?: string;
    uploads?: string;
    testers?: string;
    tickets?: string;
    meta?: string;
    ratings?: string;
    batchSize?: string;
    umbrella?: string[];
    vacuum: boolean;
    logLevel?: string;
    jsonLogs?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Turn parsed flags into a partial config, leaving out anything not given
 * so the config file and defaults still apply.
 */
function flagsToConfig(opts: BuildFlags): Partial<IndexConfig> {
    const config: Partial<IndexConfig> = {};
    const extracts: ExtractPaths = {};

    if (opts.packageIndex) extracts.packageIndex = opts.packageIndex;
    if (opts.dependencies) extracts.dependencies = opts.dependencies;
    if (opts.uploads) extracts.uploads = opts.uploads;
    if (opts.testers) extracts.testers = opts.testers;
    if (opts.tickets) extracts.tickets = opts.tickets;
    if (opts.meta) extracts.meta = opts.meta;
    if (opts.ratings) extracts.ratings = opts.ratings;
    if (Object.keys(extracts).length > 0) config.extracts = extracts;

    if (opts.out) config.out = opts.out;
    if (opts.batchSize !== undefined) config.batchSize = Number(opts.batchSize);
    if (opts.umbrella) config.umbrellaPrefixes = opts.umbrella;
    // --no-vacuum is the only way to turn compaction off from the command line
    if (!opts.vacuum) config.vacuum = false;
    if (opts.logLevel !== undefined) {
        if (!isLogLevel(opts.logLevel)) {
            throw new Error(`Invalid log level: ${opts.logLevel}. Valid: ${LOG_LEVELS.join(', ')}`);
        }
        config.logLevel = opts.logLevel;
    }
    if (opts.jsonLogs) config.jsonLogs = true;

    return config;
}

const program = new Command();

program
    .name('pkgindex')
    .description('Build a queryable index of a package ecosystem from raw metadata extracts.')
    .version(VERSION);

// ─── BUILD command ────────────────────────────────────────

program
    .command('build')
    .description('Build the index store from raw extracts')
    .option('-c, --config <path>', 'Config file (default: ./pkgindex.config.json)')
    .option('-o, --out <path>', 'Output database path')
    .option('--package-index <path>', 'Package index extract (authors, distributions, modules)')
    .option('--dependencies <path>', 'Dependency declarations extract')
    .option('--uploads <path>', 'Upload history extract')
    .option('--testers <path>', 'Test report summaries extract')
    .option('--tickets <path>', 'Issue tracker extract')
    .option('--meta <path>', 'Metadata presence and license extract')
    .option('--ratings <path>', 'Community ratings CSV')
    .option('--batch-size <n>', 'Rows per committed batch in backfill passes')
    .option('--umbrella <prefixes...>', 'Name prefixes of umbrella distributions')
    .option('--no-vacuum', 'Skip VACUUM/ANALYZE of the finished store')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: BuildFlags) => {
        let config: IndexConfig;
        try {
            config = await resolveConfig(flagsToConfig(opts), opts.config);
        } catch (error) {
            console.error(`Configuration failed: ${describeError(error)}`);
            process.exit(1);
        }

        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        const logger = getLogger();
        logger.info({ out: config.out, extracts: config.extracts }, 'Starting build');

        try {
            const report = runBuild(config);
            logger.info({ out: config.out, elapsedMs: report.elapsedMs }, 'Build complete!');
        } catch (error) {
            if (error instanceof PipelineError) {
                logger.error(
                    { stage: error.stage, table: error.table, statement: error.statement, error: describeError(error.cause) },
                    'Build failed'
                );
            } else {
                logger.error({ error }, 'Build failed');
            }
            process.exit(1);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show index statistics')
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .action((opts: { input: string }) => {
        try {
            const db = IndexDatabase.open(opts.input);
            const stats = db.getStats();
            db.close();

            console.log('\nPackage Index Statistics\n');
            console.log(`  Authors:       ${stats.tables.author}`);
            console.log(`  Distributions: ${stats.tables.distribution}`);
            console.log(`  Modules:       ${stats.tables.module}`);
            console.log(`  Dependencies:  ${stats.tables.dependency}`);
            console.log(`  Requires:      ${stats.tables.requires}`);
            console.log(`  Tickets:       ${stats.tables.ticket}`);

            console.log('\n  Coverage:');
            for (const [field, count] of Object.entries(stats.coverage)) {
                console.log(`    ${field}: ${count}`);
            }

            console.log('');
        } catch (error) {
            console.error('Inspect failed:', describeError(error));
            process.exit(1);
        }
    });

program.parseAsync().catch((error: unknown) => {
    console.error(describeError(error));
    process.exit(1);
});
