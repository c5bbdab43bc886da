import type { ExtractSet, IndexConfig } from '../types/index.js';
import {
    IndexDatabase,
    INDEX_TABLES,
    TABLE_INDEXES,
    type BatchResult,
    type IndexStats,
} from '../storage/database.js';
import { openExtracts } from '../sources/open-extracts.js';
import { normalizeExtracts, type NormalizeReport } from '../merge/normalizer.js';
import { cleanRequires, type CleanReport } from '../clean/requires-cleaner.js';
import { mergeEntities, type MergeReport } from '../merge/entity-merger.js';
import { buildDependencyTables, type ResolveReport } from '../merge/dependency-resolver.js';
import { buildDependencyGraph } from '../graph/dependency-graph.js';
import { computeMetrics } from '../graph/metrics.js';
import { PipelineError } from '../utils/errors.js';
import { compareText } from '../utils/text.js';
import { getLogger } from '../utils/logger.js';

export interface BuildOptions {
    /** Rows per committed transaction in the backfill passes */
    batchSize: number;
    umbrellaPrefixes: readonly string[];
    /** VACUUM and ANALYZE the finished store */
    vacuum: boolean;
}

export interface MetricsReport {
    weight: BatchResult;
    volatility: BatchResult;
}

export interface BuildReport {
    normalize: NormalizeReport;
    clean: CleanReport;
    merge: MergeReport;
    resolve: ResolveReport;
    metrics: MetricsReport;
    stats: IndexStats;
    elapsedMs: number;
}

/**
 * Run one pipeline stage, tagging any failure with the stage name.
 */
export function runStage<T>(stage: string, fn: () => T): T {
    const started = Date.now();
    getLogger().debug({ stage }, 'Stage started');
    try {
        const result = fn();
        getLogger().info({ stage, elapsed: `${Date.now() - started}ms` }, 'Stage complete');
        return result;
    } catch (error) {
        if (error instanceof PipelineError) throw error;
        throw new PipelineError(stage, error);
    }
}

/**
 * Log the age of every extract that can report one.
 */
function reportExtractAges(extracts: ExtractSet): void {
    for (const source of Object.values(extracts)) {
        if (!source) continue;
        const ageDays = source.age.ageInDays();
        getLogger().info({ source: source.name, age: ageDays === null ? 'unknown' : `${ageDays} day(s)` }, 'Extract age');
    }
}

/**
 * Compute weight and volatility over the final dependency set and write
 * them back. Zero is the column default, so only non-zero values are written.
 */
export function backfillMetrics(db: IndexDatabase, options: Pick<BuildOptions, 'batchSize' | 'umbrellaPrefixes'>): MetricsReport {
    const distributions = db
        .all<{ distribution: string }>('SELECT distribution FROM distribution')
        .map((row) => row.distribution);
    const edges = db.all<{ distribution: string; dependency: string }>(
        'SELECT DISTINCT distribution, dependency FROM dependency'
    );

    const graph = buildDependencyGraph(distributions, edges);
    const metrics = [...computeMetrics(graph, { umbrellaPrefixes: options.umbrellaPrefixes })]
        .sort(([a], [b]) => compareText(a, b));

    const weight = db.batchUpdate(
        'UPDATE distribution SET weight = ? WHERE distribution = ?',
        metrics.filter(([, m]) => m.weight > 0).map(([name, m]) => [m.weight, name]),
        options.batchSize,
        'distribution'
    );
    const volatility = db.batchUpdate(
        'UPDATE distribution SET volatility = ? WHERE distribution = ?',
        metrics.filter(([, m]) => m.volatility > 0).map(([name, m]) => [m.volatility, name]),
        options.batchSize,
        'distribution'
    );

    getLogger().info({ weighted: weight.changed, volatile: volatility.changed }, 'Metrics populated');
    return { weight, volatility };
}

/**
 * Run the full pipeline against an open store:
 *
 * 1. Normalize extracts into staging tables
 * 2. Clean malformed requirement fields
 * 3. Merge entities and backfill ratings/meta
 * 4. Resolve distribution-level dependencies
 * 5. Compute weight and volatility
 * 6. Index, drop staging, compact
 */
export function buildIndex(db: IndexDatabase, extracts: ExtractSet, options: BuildOptions): BuildReport {
    const startTime = Date.now();
    reportExtractAges(extracts);

    const normalize = runStage('normalize', () => normalizeExtracts(db, extracts));
    const clean = runStage('clean', () => cleanRequires(db, options.batchSize));
    const merge = runStage('merge', () => mergeEntities(db, options.batchSize));
    const resolve = runStage('resolve', () => buildDependencyTables(db));
    const metrics = runStage('metrics', () => backfillMetrics(db, options));

    runStage('index', () => {
        for (const table of INDEX_TABLES) {
            db.createIndexes(table, TABLE_INDEXES[table]);
        }
    });

    const stats = runStage('finalize', () => {
        const finalStats = db.getStats();
        getLogger().info({ coverage: finalStats.coverage, distributions: finalStats.tables.distribution }, 'Merge coverage');

        db.dropStagingTables();
        if (options.vacuum) {
            db.compact();
        }
        return finalStats;
    });

    const elapsedMs = Date.now() - startTime;
    getLogger().info(
        { ...stats.tables, degraded: normalize.degraded, elapsed: `${(elapsedMs / 1000).toFixed(1)}s` },
        'Index build complete'
    );

    return { normalize, clean, merge, resolve, metrics, stats, elapsedMs };
}

/**
 * Compose extracts and store from configuration and build the index.
 * The store is closed whether or not the build succeeds.
 */
export function runBuild(config: IndexConfig): BuildReport {
    const extracts = runStage('extracts', () => openExtracts(config.extracts));
    const db = runStage('store', () => IndexDatabase.create(config.out));

    try {
        return buildIndex(db, extracts, {
            batchSize: config.batchSize,
            umbrellaPrefixes: config.umbrellaPrefixes,
            vacuum: config.vacuum,
        });
    } finally {
        db.close();
    }
}
