import type { IndexDatabase, StagingTable } from '../storage/database.js';
import {
    isPhase,
    type ExtractSet,
    type ExtractSource,
    type OptionalExtract,
    type RawDistributionRow,
} from '../types/index.js';
import { cleanCore, compareVersions } from '../clean/version.js';
import { MissingExtractError, describeError } from '../utils/errors.js';
import { compareText } from '../utils/text.js';
import { getLogger } from '../utils/logger.js';

/** Ticket statuses that no longer describe an open issue */
const CLOSED_STATUSES = new Set(['resolved', 'rejected']);

export interface NormalizeReport {
    rows: Partial<Record<StagingTable, number>>;

    /** Optional extracts that were absent or unreadable */
    degraded: OptionalExtract[];

    skipped: {
        /** Older releases of a distribution listed more than once */
        superseded: number;
        /** Declarations whose release is not in the package index */
        unknownRelease: number;
        /** Declarations with a phase outside the known set */
        unknownPhase: number;
        /** Upload records missing a name, path or numeric timestamp */
        badUpload: number;
        /** Tickets missing an id, distribution, status or creation date */
        badTicket: number;
        /** Metadata records without a release path */
        badMeta: number;
        /** Tickets for distributions outside the package index */
        orphanTicket: number;
    };
}

/**
 * Key shared by the testers and uploads extracts: "<dist> <version>".
 */
export function releaseIdentity(distribution: string, version: string | null): string {
    return `${distribution} ${version ?? ''}`;
}

/**
 * Convert unix epoch seconds to a UTC YYYY-MM-DD date, or null when invalid.
 */
export function epochToDate(seconds: number): string | null {
    if (!Number.isFinite(seconds)) return null;
    const date = new Date(seconds * 1000);
    return Number.isNaN(date.getTime()) ? null : date.toISOString().slice(0, 10);
}

/**
 * Reduce a timestamp string to its YYYY-MM-DD date, or null when unparsable.
 */
export function toDate(value: unknown): string | null {
    if (typeof value !== 'string') return null;
    const leading = /^(\d{4}-\d{2}-\d{2})/.exec(value.trim());
    if (leading?.[1]) return leading[1];

    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString().slice(0, 10);
}

/**
 * Extract queries are not type-checked: a column declared as text can still
 * hold NULL or a number.
 */
function isText(value: unknown): value is string {
    return typeof value === 'string';
}

function textOrNull(value: unknown): string | null {
    return value === null || value === undefined ? null : String(value);
}

/**
 * Higher core first; missing cores last.
 */
function compareCoreDescending(a: number | string | null, b: number | string | null): number {
    const left = cleanCore(a);
    const right = cleanCore(b);
    if (left === right) return 0;
    if (left === null) return 1;
    if (right === null) return -1;
    return Math.sign(right - left);
}

function readRequired<Row>(source: ExtractSource<Row>): Row[] {
    try {
        return Array.from(source.read());
    } catch (error) {
        throw new MissingExtractError(source.name, describeError(error), { cause: error });
    }
}

/**
 * Keep the highest version of every distribution; first row wins on ties.
 */
export function latestReleases(rows: Iterable<RawDistributionRow>): { latest: RawDistributionRow[]; superseded: number } {
    const byName = new Map<string, RawDistributionRow>();
    let superseded = 0;

    for (const row of rows) {
        const current = byName.get(row.distribution);
        if (current === undefined) {
            byName.set(row.distribution, row);
            continue;
        }
        superseded++;
        if (compareVersions(textOrNull(row.version), textOrNull(current.version)) > 0) {
            byName.set(row.distribution, row);
        }
    }

    return { latest: [...byName.values()], superseded };
}

/**
 * Project every raw extract into its uniformly keyed staging table.
 *
 * Required extracts (package index, dependency declarations) that cannot be
 * read abort the run; optional ones leave their staging table empty.
 */
export function normalizeExtracts(db: IndexDatabase, extracts: ExtractSet): NormalizeReport {
    const report: NormalizeReport = {
        rows: {},
        degraded: [],
        skipped: { superseded: 0, unknownRelease: 0, unknownPhase: 0, badUpload: 0, badTicket: 0, badMeta: 0, orphanTicket: 0 },
    };

    const readOptional = <Row>(key: OptionalExtract, source: ExtractSource<Row> | undefined): Row[] => {
        if (!source) {
            report.degraded.push(key);
            getLogger().warn({ source: key }, 'Optional extract absent, columns will stay NULL');
            return [];
        }
        try {
            return Array.from(source.read());
        } catch (error) {
            report.degraded.push(key);
            getLogger().warn({ source: source.name, error: describeError(error) }, 'Optional extract unreadable, columns will stay NULL');
            return [];
        }
    };

    db.createStagingTables();

    // ─── Package index ────────────────────────────────────

    const authors = readRequired(extracts.authors);
    report.rows.t_author = db.insertRows(
        't_author',
        ['author', 'name'],
        authors.map((row) => ({ author: row.author, name: textOrNull(row.name) })),
        { orIgnore: true }
    );

    const { latest, superseded } = latestReleases(readRequired(extracts.distributions));
    report.skipped.superseded = superseded;

    const distributions = latest.map((row) => {
        const version = textOrNull(row.version);
        return {
            dist: row.distribution,
            version,
            dist_version: releaseIdentity(row.distribution, version),
            author: row.author,
            release: `${row.author}/${row.file}`,
        };
    });
    report.rows.t_distribution = db.insertRows(
        't_distribution',
        ['dist', 'version', 'dist_version', 'author', 'release'],
        distributions
    );

    const modules = readRequired(extracts.modules);
    report.rows.t_module = db.insertRows(
        't_module',
        ['module', 'version', 'dist'],
        modules.map((row) => ({ module: row.module, version: textOrNull(row.version), dist: row.distribution }))
    );

    // ─── Dependency declarations ──────────────────────────

    const releaseOwner = new Map(distributions.map((d) => [d.release, d.dist]));
    const requires: Array<{ distribution: string; module: string; version: string | null; phase: string; core: number | string | null }> = [];

    for (const row of readRequired(extracts.dependencies)) {
        const distribution = releaseOwner.get(row.release);
        if (distribution === undefined) {
            report.skipped.unknownRelease++;
            continue;
        }
        if (!isPhase(row.phase)) {
            report.skipped.unknownPhase++;
            continue;
        }
        requires.push({
            distribution,
            module: row.module,
            version: textOrNull(row.version),
            phase: row.phase,
            core: row.core,
        });
    }

    requires.sort((a, b) =>
        compareText(a.distribution, b.distribution) ||
        compareText(a.phase, b.phase) ||
        compareCoreDescending(a.core, b.core) ||
        compareText(a.module, b.module)
    );
    report.rows.t_requires = db.insertRows('t_requires', ['distribution', 'module', 'version', 'phase', 'core'], requires);

    // ─── Uploads ──────────────────────────────────────────

    const uploads = readOptional('uploads', extracts.uploads).flatMap((row) => {
        const valid = isText(row.distribution) && isText(row.author) && isText(row.filename);
        const uploaded = valid && typeof row.released === 'number' ? epochToDate(row.released) : null;
        if (uploaded === null) {
            report.skipped.badUpload++;
            return [];
        }
        return [{
            dist: row.distribution,
            release: `${row.author}/${row.filename}`,
            dist_version: releaseIdentity(row.distribution, textOrNull(row.version)),
            uploaded,
        }];
    });

    // Shortest distribution name first: prefix-sharing names resolve to the canonical one
    uploads.sort((a, b) =>
        compareText(a.release, b.release) || a.dist.length - b.dist.length || compareText(a.dist, b.dist)
    );
    report.rows.t_uploaded = db.insertRows('t_uploaded', ['release', 'dist_version', 'uploaded'], uploads, { orIgnore: true });
    report.rows.t_uploaded_version = db.insertRows('t_uploaded_version', ['dist_version', 'uploaded'], uploads, { orIgnore: true });

    // ─── Testers ──────────────────────────────────────────

    const testers = readOptional('testers', extracts.testers).map((row) => ({
        dist_version: releaseIdentity(row.distribution, textOrNull(row.version)),
        pass: row.pass,
        fail: row.fail,
        na: row.na,
        unknown: row.unknown,
    }));
    report.rows.t_testers = db.insertRows('t_testers', ['dist_version', 'pass', 'fail', 'na', 'unknown'], testers, { orIgnore: true });

    // ─── Tickets ──────────────────────────────────────────

    const known = new Set(distributions.map((d) => d.dist));
    const tickets = readOptional('tickets', extracts.tickets).flatMap((row) => {
        const created = toDate(row.created);
        if (!Number.isInteger(row.id) || !isText(row.distribution) || !isText(row.status) || created === null) {
            report.skipped.badTicket++;
            return [];
        }
        if (CLOSED_STATUSES.has(row.status.toLowerCase())) return [];
        if (!known.has(row.distribution)) {
            report.skipped.orphanTicket++;
            return [];
        }
        const updated = toDate(row.updated) ?? created;
        return [{
            id: row.id,
            distribution: row.distribution,
            subject: isText(row.subject) ? row.subject : '',
            status: row.status,
            severity: isText(row.severity) && row.severity !== '' ? row.severity : 'normal',
            created,
            updated,
        }];
    });
    tickets.sort((a, b) => a.id - b.id);
    report.rows.t_ticket = db.insertRows(
        't_ticket',
        ['id', 'distribution', 'subject', 'status', 'severity', 'created', 'updated'],
        tickets,
        { orIgnore: true }
    );

    // ─── Backfill inputs ──────────────────────────────────

    report.rows.t_meta = db.insertRows(
        't_meta',
        ['release', 'meta', 'license'],
        readOptional('meta', extracts.meta).flatMap((row) => {
            if (!isText(row.release)) {
                report.skipped.badMeta++;
                return [];
            }
            return [{ release: row.release, meta: row.meta ? 1 : 0, license: textOrNull(row.license) }];
        })
    );

    report.rows.t_rating = db.insertRows(
        't_rating',
        ['distribution', 'rating', 'ratings'],
        readOptional('ratings', extracts.ratings).map((row) => ({
            distribution: row.distribution,
            rating: row.rating,
            ratings: row.reviewCount,
        }))
    );

    getLogger().info({ rows: report.rows, skipped: report.skipped, degraded: report.degraded }, 'Extracts normalized');
    return report;
}
