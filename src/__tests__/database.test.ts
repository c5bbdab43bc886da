import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { IndexDatabase, STAGING_TABLES } from '../storage/database.js';
import { StoreError } from '../utils/errors.js';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';

describe('IndexDatabase', () => {
    let db: IndexDatabase;

    beforeEach(() => {
        db = new IndexDatabase(':memory:');
    });

    afterEach(() => {
        db.close();
    });

    describe('schema', () => {
        it('should create and drop every staging table', () => {
            db.createStagingTables();
            for (const table of STAGING_TABLES) {
                expect(db.tableExists(table)).toBe(true);
            }

            db.dropStagingTables();
            for (const table of STAGING_TABLES) {
                expect(db.tableExists(table)).toBe(false);
            }
        });

        it('should name indexes <table>__<column>', () => {
            db.createTable('author');
            db.createIndexes('author', ['name']);

            const row = db.get<{ name: string }>(
                "SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = 'author' AND name NOT LIKE 'sqlite_%'"
            );
            expect(row?.name).toBe('author__name');
        });

        it('should reject identifiers that are not code-defined names', () => {
            expect(() => db.createIndexes('author; DROP TABLE x', ['name'])).toThrow(StoreError);
        });

        it('should enforce the distribution author foreign key', () => {
            db.createTable('author');
            db.createTable('distribution');
            expect(() =>
                db.run("INSERT INTO distribution (distribution, author, release) VALUES ('Foo', 'NOBODY', 'NOBODY/Foo-1.0.tar.gz')")
            ).toThrow(StoreError);
        });
    });

    describe('insertRows', () => {
        it('should return the number of inserted rows', () => {
            db.createStagingTables();
            const inserted = db.insertRows('t_author', ['author', 'name'], [
                { author: 'ALICE', name: 'Alice Example' },
                { author: 'BOB', name: null },
            ]);
            expect(inserted).toBe(2);
            expect(db.count('t_author')).toBe(2);
        });

        it('should keep the first row of a duplicate key with orIgnore', () => {
            db.createStagingTables();
            const inserted = db.insertRows(
                't_author',
                ['author', 'name'],
                [
                    { author: 'ALICE', name: 'First' },
                    { author: 'ALICE', name: 'Second' },
                ],
                { orIgnore: true }
            );
            expect(inserted).toBe(1);
            expect(db.get<{ name: string }>('SELECT name FROM t_author')?.name).toBe('First');
        });

        it('should wrap constraint failures with the statement and table', () => {
            db.createStagingTables();
            const rows = [
                { author: 'ALICE', name: null },
                { author: 'ALICE', name: null },
            ];

            let caught: unknown;
            try {
                db.insertRows('t_author', ['author', 'name'], rows);
            } catch (error) {
                caught = error;
            }

            expect(caught).toBeInstanceOf(StoreError);
            if (caught instanceof StoreError) {
                expect(caught.table).toBe('t_author');
                expect(caught.statement).toBe('INSERT INTO t_author (author, name) VALUES (@author, @name)');
            }
            // The whole insert rolls back
            expect(db.count('t_author')).toBe(0);
        });
    });

    describe('batchUpdate', () => {
        beforeEach(() => {
            db.createTable('author');
            db.insertRows('author', ['author', 'name'], ['A', 'B', 'C', 'D', 'E'].map((author) => ({ author, name: author })));
        });

        it('should commit in batches of the given size', () => {
            const result = db.batchUpdate(
                'UPDATE author SET name = ? WHERE author = ?',
                ['A', 'B', 'C', 'D', 'E'].map((author) => [`${author}-renamed`, author]),
                2,
                'author'
            );
            expect(result).toEqual({ rows: 5, changed: 5, batches: 3 });
            expect(db.get<{ name: string }>("SELECT name FROM author WHERE author = 'E'")?.name).toBe('E-renamed');
        });

        it('should count rows that matched nothing', () => {
            const result = db.batchUpdate(
                'UPDATE author SET name = ? WHERE author = ?',
                [['x', 'A'], ['y', 'MISSING']],
                100
            );
            expect(result).toEqual({ rows: 2, changed: 1, batches: 1 });
        });

        it('should keep batches committed before a failure', () => {
            expect(() =>
                db.batchUpdate(
                    'UPDATE author SET name = ? WHERE author = ?',
                    [['one', 'A'], ['two', 'B'], [null, 'C']],
                    2,
                    'author'
                )
            ).toThrow(StoreError);

            expect(db.get<{ name: string }>("SELECT name FROM author WHERE author = 'B'")?.name).toBe('two');
            expect(db.get<{ name: string }>("SELECT name FROM author WHERE author = 'C'")?.name).toBe('C');
        });
    });

    describe('statements', () => {
        it('should wrap errors in StoreError with the failing statement', () => {
            let caught: unknown;
            try {
                db.run('INSERT INTO missing VALUES (1)');
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(StoreError);
            if (caught instanceof StoreError) {
                expect(caught.statement).toBe('INSERT INTO missing VALUES (1)');
            }
        });

        it('should report zero counts on an empty store', () => {
            expect(db.getStats()).toEqual({
                tables: { author: 0, distribution: 0, module: 0, dependency: 0, requires: 0, ticket: 0 },
                coverage: { uploaded: 0, meta: 0, rating: 0, weighted: 0 },
            });
        });
    });

    describe('create', () => {
        let tmpDir: string;

        beforeEach(() => {
            tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pkgindex-test-'));
        });

        afterEach(() => {
            fs.rmSync(tmpDir, { recursive: true, force: true });
        });

        it('should replace a previous index at the same path', () => {
            const dbPath = path.join(tmpDir, 'nested', 'index.db');
            const first = IndexDatabase.create(dbPath);
            first.createTable('author');
            first.close();

            const second = IndexDatabase.create(dbPath);
            try {
                expect(second.tableExists('author')).toBe(false);
                expect(second.path).toBe(dbPath);
            } finally {
                second.close();
            }
        });

        it('should open an existing index read-only', () => {
            const dbPath = path.join(tmpDir, 'index.db');
            const built = IndexDatabase.create(dbPath);
            built.createTable('author');
            built.run("INSERT INTO author (author, name) VALUES ('ALICE', 'Alice Example')");
            built.close();

            const reader = IndexDatabase.open(dbPath);
            try {
                expect(reader.getStats().tables.author).toBe(1);
                expect(() => reader.run("INSERT INTO author (author, name) VALUES ('BOB', 'Bob')")).toThrow(StoreError);
            } finally {
                reader.close();
            }
        });

        it('should not create a file when opening a missing index', () => {
            const dbPath = path.join(tmpDir, 'missing.db');
            expect(() => IndexDatabase.open(dbPath)).toThrow(StoreError);
            expect(fs.existsSync(dbPath)).toBe(false);
        });
    });
});
