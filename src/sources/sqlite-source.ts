import Database from 'better-sqlite3';
import type { AgeReporter, ExtractSource } from '../types/index.js';
import { fileAge } from './file-age.js';

/**
 * Queries projecting each SQLite extract onto the raw row shapes.
 */
export const EXTRACT_QUERIES = {
    authors: 'SELECT cpanid AS author, fullname AS name FROM auths',
    distributions: `
SELECT a.cpanid AS author, d.dist_name AS distribution, d.dist_vers AS version, d.dist_file AS file
FROM auths a JOIN dists d ON a.auth_id = d.auth_id`,
    modules: `
SELECT m.mod_name AS module, m.mod_vers AS version, d.dist_name AS distribution
FROM mods m JOIN dists d ON d.dist_id = m.dist_id`,
    dependencies: 'SELECT release, module, version, phase, core FROM meta_dependency',
    uploads: 'SELECT dist AS distribution, version, author, filename, released FROM uploads',
    testers: 'SELECT dist AS distribution, version, pass, fail, na, unknown FROM release',
    meta: 'SELECT release, meta, meta_license AS license FROM meta_distribution',
    tickets: 'SELECT id, distribution, subject, status, severity, created, updated FROM ticket',
} as const;

/**
 * Extract backed by a read-only query against a SQLite file.
 * The file is opened per read and closed once iteration ends.
 */
export class SqliteExtractSource<Row> implements ExtractSource<Row> {
    readonly age: AgeReporter;

    constructor(
        readonly name: string,
        private readonly dbPath: string,
        private readonly query: string
    ) {
        this.age = fileAge(dbPath);
    }

    *read(): Generator<Row> {
        const db = new Database(this.dbPath, { readonly: true, fileMustExist: true });
        try {
            yield* db.prepare<[], Row>(this.query).iterate();
        } finally {
            db.close();
        }
    }
}
