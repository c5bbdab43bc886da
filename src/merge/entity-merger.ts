import type { BatchResult, IndexDatabase } from '../storage/database.js';
import { getLogger } from '../utils/logger.js';

export interface BackfillReport extends BatchResult {
    /** Source rows that matched no distribution */
    unmatched: number;
}

export interface MergeReport {
    authors: number;
    distributions: number;

    /** Releases dropped because their author is unknown */
    orphanDistributions: number;

    modules: number;
    tickets: number;
    ratings: BackfillReport;
    meta: BackfillReport;
}

/**
 * Build the author, distribution, module and ticket tables from staging.
 *
 * Secondary data (uploads, testers) joins with LEFT JOIN so a release is
 * never dropped for lack of it. Ratings and meta use a different key
 * granularity and are applied afterwards as batched keyed updates.
 */
export function mergeEntities(db: IndexDatabase, batchSize: number): MergeReport {
    // ─── author ───────────────────────────────────────────

    db.createTable('author');
    const authors = db.run(`
INSERT INTO author (author, name)
SELECT author, COALESCE(name, author) FROM t_author
ORDER BY author`);

    // ─── distribution ─────────────────────────────────────

    db.createTable('distribution');
    const distributions = db.run(`
INSERT INTO distribution (
  distribution, version, author, meta, license, release, uploaded,
  pass, fail, unknown, na, rating, ratings, weight, volatility
)
SELECT
  d.dist, d.version, d.author, 0, NULL, d.release,
  COALESCE(ur.uploaded, uv.uploaded),
  t.pass, t.fail, t.unknown, t.na,
  NULL, 0, 0, 0
FROM t_distribution d
JOIN author a ON a.author = d.author
LEFT JOIN t_uploaded ur ON ur.release = d.release
LEFT JOIN t_uploaded_version uv ON uv.dist_version = d.dist_version
LEFT JOIN t_testers t ON t.dist_version = d.dist_version
ORDER BY d.dist`);

    const orphanDistributions = db.count('t_distribution') - distributions;
    if (orphanDistributions > 0) {
        getLogger().warn({ orphanDistributions }, 'Dropped releases with unknown authors');
    }

    const ratings = backfillRatings(db, batchSize);

    db.createIndexes('distribution', ['release']);
    const meta = backfillMeta(db, batchSize);

    // ─── module ───────────────────────────────────────────

    db.createTable('module');
    // A module claimed by several distributions goes to the lexically first one
    const modules = db.run(`
INSERT OR IGNORE INTO module (module, version, distribution)
SELECT m.module, m.version, m.dist
FROM t_module m
JOIN distribution d ON d.distribution = m.dist
ORDER BY m.module, m.dist`);

    // ─── ticket ───────────────────────────────────────────

    db.createTable('ticket');
    const tickets = db.run(`
INSERT INTO ticket (id, distribution, subject, status, severity, created, updated)
SELECT t.id, t.distribution, t.subject, t.status, t.severity, t.created, t.updated
FROM t_ticket t
JOIN distribution d ON d.distribution = t.distribution
ORDER BY t.id`);

    const report: MergeReport = { authors, distributions, orphanDistributions, modules, tickets, ratings, meta };
    getLogger().info(
        { authors, distributions, modules, tickets, ratings: ratings.changed, meta: meta.changed },
        'Entities merged'
    );
    return report;
}

/**
 * Apply community ratings, keyed by distribution name.
 */
export function backfillRatings(db: IndexDatabase, batchSize: number): BackfillReport {
    const rows = db.all<{ distribution: string; rating: number; ratings: number }>(
        'SELECT distribution, rating, ratings FROM t_rating ORDER BY distribution'
    );
    const result = db.batchUpdate(
        'UPDATE distribution SET rating = ?, ratings = ? WHERE distribution = ?',
        rows.map((row) => [row.rating, row.ratings, row.distribution]),
        batchSize,
        'distribution'
    );
    return { ...result, unmatched: result.rows - result.changed };
}

/**
 * Apply the metadata flag and license, keyed by release path.
 */
export function backfillMeta(db: IndexDatabase, batchSize: number): BackfillReport {
    const rows = db.all<{ release: string; meta: number; license: string | null }>(
        'SELECT release, meta, license FROM t_meta ORDER BY release'
    );
    const result = db.batchUpdate(
        'UPDATE distribution SET meta = ?, license = ? WHERE release = ?',
        rows.map((row) => [row.meta, row.license, row.release]),
        batchSize,
        'distribution'
    );
    return { ...result, unmatched: result.rows - result.changed };
}
