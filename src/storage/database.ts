import Database from 'better-sqlite3';
import { existsSync, mkdirSync, rmSync } from 'node:fs';
import { dirname } from 'node:path';
import { StoreError, describeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Final tables of the index, in creation order.
 */
export type IndexTable = 'author' | 'distribution' | 'module' | 'dependency' | 'requires' | 'ticket';

export const INDEX_TABLES: readonly IndexTable[] = ['author', 'distribution', 'module', 'dependency', 'requires', 'ticket'];

const TABLE_SCHEMAS: Record<IndexTable, string> = {
    author: `
CREATE TABLE author (
  author TEXT NOT NULL PRIMARY KEY,
  name TEXT NOT NULL
)`,
    distribution: `
CREATE TABLE distribution (
  distribution TEXT NOT NULL PRIMARY KEY,
  version TEXT NULL,
  author TEXT NOT NULL REFERENCES author(author),
  meta INTEGER NOT NULL DEFAULT 0,
  license TEXT NULL,
  release TEXT NOT NULL,
  uploaded TEXT NULL,
  pass INTEGER NULL,
  fail INTEGER NULL,
  unknown INTEGER NULL,
  na INTEGER NULL,
  rating REAL NULL,
  ratings INTEGER NOT NULL DEFAULT 0,
  weight INTEGER NOT NULL DEFAULT 0,
  volatility INTEGER NOT NULL DEFAULT 0
)`,
    module: `
CREATE TABLE module (
  module TEXT NOT NULL PRIMARY KEY,
  version TEXT NULL,
  distribution TEXT NOT NULL REFERENCES distribution(distribution)
)`,
    dependency: `
CREATE TABLE dependency (
  distribution TEXT NOT NULL REFERENCES distribution(distribution),
  dependency TEXT NOT NULL REFERENCES distribution(distribution),
  phase TEXT NOT NULL,
  core REAL NULL,
  PRIMARY KEY (distribution, dependency, phase)
)`,
    // module is not a foreign key: requirements on modules outside the index are kept
    requires: `
CREATE TABLE requires (
  distribution TEXT NOT NULL REFERENCES distribution(distribution),
  module TEXT NOT NULL,
  version TEXT NULL,
  phase TEXT NOT NULL,
  PRIMARY KEY (distribution, module, phase)
)`,
    ticket: `
CREATE TABLE ticket (
  id INTEGER NOT NULL PRIMARY KEY,
  distribution TEXT NOT NULL REFERENCES distribution(distribution),
  subject TEXT NOT NULL,
  status TEXT NOT NULL,
  severity TEXT NOT NULL,
  created TEXT NOT NULL,
  updated TEXT NOT NULL
)`,
};

/**
 * Secondary indexes per final table, created after the load.
 */
export const TABLE_INDEXES: Record<IndexTable, readonly string[]> = {
    author: ['name'],
    distribution: ['version', 'author', 'meta', 'license', 'pass', 'fail', 'unknown', 'na', 'uploaded', 'rating', 'ratings', 'weight', 'volatility'],
    module: ['version', 'distribution'],
    dependency: ['distribution', 'dependency', 'phase', 'core'],
    requires: ['distribution', 'module', 'version', 'phase'],
    ticket: ['distribution', 'status', 'severity'],
};

export type StagingTable =
    | 't_author'
    | 't_distribution'
    | 't_module'
    | 't_requires'
    | 't_testers'
    | 't_uploaded'
    | 't_uploaded_version'
    | 't_ticket'
    | 't_meta'
    | 't_rating';

/**
 * Intermediate tables, uniformly keyed by the normalizer.
 * Dropped once the final tables are built.
 */
const STAGING_SCHEMA = `
CREATE TABLE t_author (
  author TEXT NOT NULL PRIMARY KEY,
  name TEXT NULL
);

CREATE TABLE t_distribution (
  dist TEXT NOT NULL PRIMARY KEY,
  version TEXT NULL,
  dist_version TEXT NOT NULL,
  author TEXT NOT NULL,
  release TEXT NOT NULL
);

CREATE TABLE t_module (
  module TEXT NOT NULL,
  version TEXT NULL,
  dist TEXT NOT NULL
);

-- core keeps REAL affinity; malformed text values survive until the cleaner runs
CREATE TABLE t_requires (
  distribution TEXT NOT NULL,
  module TEXT NOT NULL,
  version TEXT NULL,
  phase TEXT NOT NULL,
  core REAL NULL
);

CREATE TABLE t_testers (
  dist_version TEXT NOT NULL PRIMARY KEY,
  pass INTEGER NULL,
  fail INTEGER NULL,
  na INTEGER NULL,
  unknown INTEGER NULL
);

CREATE TABLE t_uploaded (
  release TEXT NOT NULL PRIMARY KEY,
  dist_version TEXT NOT NULL,
  uploaded TEXT NOT NULL
);

CREATE TABLE t_uploaded_version (
  dist_version TEXT NOT NULL PRIMARY KEY,
  uploaded TEXT NOT NULL
);

CREATE TABLE t_ticket (
  id INTEGER NOT NULL PRIMARY KEY,
  distribution TEXT NOT NULL,
  subject TEXT NOT NULL,
  status TEXT NOT NULL,
  severity TEXT NOT NULL,
  created TEXT NOT NULL,
  updated TEXT NOT NULL
);

CREATE TABLE t_meta (
  release TEXT NOT NULL,
  meta INTEGER NOT NULL,
  license TEXT NULL
);

CREATE TABLE t_rating (
  distribution TEXT NOT NULL,
  rating REAL NOT NULL,
  ratings INTEGER NOT NULL
);
`;

export const STAGING_TABLES: readonly StagingTable[] = [
    't_author',
    't_distribution',
    't_module',
    't_requires',
    't_testers',
    't_uploaded',
    't_uploaded_version',
    't_ticket',
    't_meta',
    't_rating',
];

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

/**
 * Table and column names cannot be bound as parameters; only
 * code-defined identifiers are ever spliced into a statement.
 */
function assertIdentifier(name: string): string {
    if (!IDENTIFIER.test(name)) {
        throw new StoreError(`Invalid SQL identifier: ${name}`);
    }
    return name;
}

export interface BatchResult {
    /** Rows submitted */
    rows: number;

    /** Rows the statement actually changed */
    changed: number;

    /** Committed transactions */
    batches: number;
}

export interface IndexStats {
    tables: Record<IndexTable, number>;
    coverage: {
        uploaded: number;
        meta: number;
        rating: number;
        weighted: number;
    };
}

/**
 * Index store wrapper around better-sqlite3.
 * Owns the schema and every statement executed against the output file.
 */
export class IndexDatabase {
    private db: Database.Database;

    constructor(
        private readonly dbPath: string,
        options: { readonly?: boolean } = {}
    ) {
        const readonly = options.readonly ?? false;
        try {
            this.db = new Database(dbPath, readonly ? { readonly: true, fileMustExist: true } : {});
        } catch (error) {
            throw new StoreError(`Cannot open index store ${dbPath}: ${describeError(error)}`, undefined, undefined, { cause: error });
        }

        // Set pragmas; a read-only store keeps its journal mode
        if (!readonly) {
            this.db.pragma('journal_mode = WAL');
            this.db.pragma('foreign_keys = ON');
        }
        this.db.pragma('cache_size = 100000');

        getLogger().debug({ dbPath, readonly }, 'Index store opened');
    }

    /**
     * Open an existing store for reading; a missing file is an error.
     */
    static open(dbPath: string): IndexDatabase {
        return new IndexDatabase(dbPath, { readonly: true });
    }

    /**
     * Create a fresh store, deleting any previous index at the same path.
     */
    static create(dbPath: string): IndexDatabase {
        if (dbPath !== ':memory:') {
            mkdirSync(dirname(dbPath), { recursive: true });
            for (const file of [dbPath, `${dbPath}-wal`, `${dbPath}-shm`]) {
                try {
                    rmSync(file, { force: true });
                } catch (error) {
                    throw new StoreError(`Failed to clear ${file}: ${describeError(error)}`, undefined, undefined, { cause: error });
                }
            }
            if (existsSync(dbPath)) {
                throw new StoreError(`Failed to clear ${dbPath}`);
            }
        }
        return new IndexDatabase(dbPath);
    }

    get path(): string {
        return this.dbPath;
    }

    // ─── Schema ───────────────────────────────────────────────

    createTable(table: IndexTable): void {
        this.exec(TABLE_SCHEMAS[table], table);
    }

    createStagingTables(): void {
        this.exec(STAGING_SCHEMA);
        getLogger().debug({ tables: STAGING_TABLES.length }, 'Staging tables created');
    }

    dropStagingTables(): void {
        for (const table of STAGING_TABLES) {
            this.exec(`DROP TABLE IF EXISTS ${table}`, table);
        }
    }

    /**
     * Create one single-column index per column, named `<table>__<column>`.
     */
    createIndexes(table: string, columns: readonly string[]): void {
        const name = assertIdentifier(table);
        getLogger().info({ table: name, rows: this.count(name) }, 'Indexing table');
        for (const column of columns) {
            const col = assertIdentifier(column);
            this.exec(`CREATE INDEX IF NOT EXISTS ${name}__${col} ON ${name} (${col})`, name);
        }
    }

    tableExists(table: string): boolean {
        const row = this.get<{ found: number }>(
            "SELECT 1 AS found FROM sqlite_master WHERE type = 'table' AND name = ?",
            table
        );
        return row !== undefined;
    }

    // ─── Statements ───────────────────────────────────────────

    /**
     * Execute one or more statements without parameters.
     */
    exec(sql: string, table?: string): void {
        try {
            this.db.exec(sql);
        } catch (error) {
            throw this.storeError(error, sql, table);
        }
    }

    /**
     * Run a single parameterized statement and return the number of changed rows.
     */
    run(sql: string, ...params: unknown[]): number {
        try {
            return this.db.prepare(sql).run(...params).changes;
        } catch (error) {
            throw this.storeError(error, sql);
        }
    }

    all<Row>(sql: string, ...params: unknown[]): Row[] {
        try {
            return this.db.prepare<unknown[], Row>(sql).all(...params);
        } catch (error) {
            throw this.storeError(error, sql);
        }
    }

    get<Row>(sql: string, ...params: unknown[]): Row | undefined {
        try {
            return this.db.prepare<unknown[], Row>(sql).get(...params);
        } catch (error) {
            throw this.storeError(error, sql);
        }
    }

    /**
     * Count rows of a table, optionally restricted by a code-defined condition.
     */
    count(table: string, condition?: string): number {
        const sql = `SELECT COUNT(*) AS count FROM ${assertIdentifier(table)}${condition ? ` WHERE ${condition}` : ''}`;
        return this.get<{ count: number }>(sql)?.count ?? 0;
    }

    // ─── Bulk loading ─────────────────────────────────────────

    /**
     * Insert rows in a single transaction.
     * Returns the number of rows actually inserted.
     */
    insertRows<Row extends object>(
        table: string,
        columns: readonly (keyof Row & string)[],
        rows: Iterable<Row>,
        options: { orIgnore?: boolean } = {}
    ): number {
        const name = assertIdentifier(table);
        const cols = columns.map(assertIdentifier);
        const verb = options.orIgnore ? 'INSERT OR IGNORE' : 'INSERT';
        const sql = `${verb} INTO ${name} (${cols.join(', ')}) VALUES (${cols.map((c) => `@${c}`).join(', ')})`;

        try {
            const stmt = this.db.prepare<[Row]>(sql);
            const insertAll = this.db.transaction((items: Iterable<Row>) => {
                let inserted = 0;
                for (const row of items) {
                    inserted += stmt.run(row).changes;
                }
                return inserted;
            });
            return insertAll(rows);
        } catch (error) {
            throw this.storeError(error, sql, name);
        }
    }

    /**
     * Run a parameterized statement once per row, committing every `batchSize` rows.
     * A failure loses at most the batch in flight; earlier batches stay committed.
     */
    batchUpdate(
        sql: string,
        rows: Iterable<unknown[]>,
        batchSize: number,
        table?: string
    ): BatchResult {
        const result: BatchResult = { rows: 0, changed: 0, batches: 0 };

        try {
            const stmt = this.db.prepare(sql);
            const commit = this.db.transaction((batch: unknown[][]) => {
                let changed = 0;
                for (const params of batch) {
                    changed += stmt.run(...params).changes;
                }
                return changed;
            });

            let batch: unknown[][] = [];
            const flush = (): void => {
                result.changed += commit(batch);
                result.rows += batch.length;
                result.batches++;
                batch = [];
            };

            for (const params of rows) {
                batch.push(params);
                if (batch.length >= batchSize) flush();
            }
            if (batch.length > 0) flush();
        } catch (error) {
            throw this.storeError(error, sql, table);
        }

        return result;
    }

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): IndexStats {
        const rows = (table: IndexTable): number => (this.tableExists(table) ? this.count(table) : 0);
        const tables: Record<IndexTable, number> = {
            author: rows('author'),
            distribution: rows('distribution'),
            module: rows('module'),
            dependency: rows('dependency'),
            requires: rows('requires'),
            ticket: rows('ticket'),
        };

        const hasDistribution = this.tableExists('distribution');
        const coverage = (condition: string): number =>
            hasDistribution ? this.count('distribution', condition) : 0;

        return {
            tables,
            coverage: {
                uploaded: coverage('uploaded IS NOT NULL'),
                meta: coverage('meta = 1'),
                rating: coverage('rating IS NOT NULL'),
                weighted: coverage('weight > 0'),
            },
        };
    }

    // ─── Maintenance ──────────────────────────────────────────

    /**
     * Shrink the file and refresh planner statistics.
     */
    compact(): void {
        this.exec('VACUUM');
        this.exec('ANALYZE main');
    }

    /**
     * Close the database connection.
     */
    close(): void {
        if (this.db.open) {
            this.db.close();
            getLogger().debug({ dbPath: this.dbPath }, 'Index store closed');
        }
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }

    private storeError(error: unknown, sql: string, table?: string): StoreError {
        if (error instanceof StoreError) return error;
        return new StoreError(`Database error: ${describeError(error)}`, sql.trim(), table, { cause: error });
    }
}
