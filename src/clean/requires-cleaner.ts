import type { IndexDatabase } from '../storage/database.js';
import { cleanCore, cleanVersion, isMalformedVersion } from './version.js';
import { getLogger } from '../utils/logger.js';

export interface CleanReport {
    /** Distinct malformed version strings rewritten */
    versions: number;

    /** Distinct non-numeric core values rewritten */
    cores: number;

    /** Rows whose missing or empty version was defaulted to 0 */
    defaulted: number;
}

/**
 * Repair malformed versions and core-since values in `t_requires`.
 *
 * Each distinct bad value is rewritten once with a keyed update, so the
 * statement count scales with the number of distinct bad values, not rows.
 */
export function cleanRequires(db: IndexDatabase, batchSize: number): CleanReport {
    const versions = db
        .all<{ version: string }>('SELECT DISTINCT version FROM t_requires WHERE version IS NOT NULL')
        .map((row) => row.version)
        .filter(isMalformedVersion);

    db.batchUpdate(
        'UPDATE t_requires SET version = ? WHERE version = ?',
        versions.map((version) => [cleanVersion(version), version]),
        batchSize,
        't_requires'
    );

    // REAL affinity converts well-formed values on insert; whatever is still text needs cleaning
    const cores = db
        .all<{ core: string }>("SELECT DISTINCT core FROM t_requires WHERE typeof(core) = 'text'")
        .map((row) => row.core);

    db.batchUpdate(
        'UPDATE t_requires SET core = ? WHERE core = ?',
        cores.map((core) => [cleanCore(core), core]),
        batchSize,
        't_requires'
    );

    const defaulted = db.transaction(() =>
        db.run("UPDATE t_requires SET version = '0' WHERE version IS NULL") +
        db.run("UPDATE t_requires SET version = '0', core = 0 WHERE version = ''")
    );

    const report: CleanReport = { versions: versions.length, cores: cores.length, defaulted };
    getLogger().info(report, 'Requirements cleaned');
    return report;
}
