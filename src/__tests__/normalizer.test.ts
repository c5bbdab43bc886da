import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { IndexDatabase } from '../storage/database.js';
import { EXTRACT_QUERIES, SqliteExtractSource } from '../sources/sqlite-source.js';
import type { ExtractSet, RawMetaRow, RawTicketRow, RawUploadRow } from '../types/index.js';
import { latestReleases, normalizeExtracts, releaseIdentity, toDate } from '../merge/normalizer.js';
import { cleanRequires } from '../clean/requires-cleaner.js';
import { MissingExtractError } from '../utils/errors.js';
import { failingSource, makeExtracts, sampleRows } from './helpers.js';

describe('Normalizer', () => {
    let db: IndexDatabase;

    beforeEach(() => {
        db = new IndexDatabase(':memory:');
    });

    afterEach(() => {
        db.close();
    });

    describe('helpers', () => {
        it('should key releases as "<dist> <version>"', () => {
            expect(releaseIdentity('Foo', '1.0')).toBe('Foo 1.0');
            expect(releaseIdentity('Foo', null)).toBe('Foo ');
        });

        it('should reduce timestamps to dates', () => {
            expect(toDate('2021-02-03 10:00:00')).toBe('2021-02-03');
            expect(toDate('not a date')).toBeNull();
            expect(toDate(null)).toBeNull();
        });

        it('should keep the highest decimal version', () => {
            const { latest, superseded } = latestReleases([
                { author: 'ALICE', distribution: 'Foo', version: '0.9', file: 'Foo-0.9.tar.gz' },
                { author: 'ALICE', distribution: 'Foo', version: '0.10', file: 'Foo-0.10.tar.gz' },
            ]);
            expect(superseded).toBe(1);
            expect(latest.map((row) => row.version)).toEqual(['0.9']);
        });

        it('should keep the highest dotted version', () => {
            const { latest } = latestReleases([
                { author: 'ALICE', distribution: 'Foo', version: '1.2.9', file: 'Foo-1.2.9.tar.gz' },
                { author: 'ALICE', distribution: 'Foo', version: '1.2.10', file: 'Foo-1.2.10.tar.gz' },
            ]);
            expect(latest.map((row) => row.file)).toEqual(['Foo-1.2.10.tar.gz']);
        });
    });

    describe('normalizeExtracts', () => {
        it('should stage the package index with release paths', () => {
            const report = normalizeExtracts(db, makeExtracts(sampleRows()));

            expect(report.rows.t_author).toBe(2);
            expect(report.rows.t_distribution).toBe(2);
            expect(report.rows.t_module).toBe(3);
            expect(db.all('SELECT dist, dist_version, release FROM t_distribution ORDER BY dist')).toEqual([
                { dist: 'Bar', dist_version: 'Bar 2.0', release: 'BOB/Bar-2.0.tar.gz' },
                { dist: 'Foo', dist_version: 'Foo 1.0', release: 'ALICE/Foo-1.0.tar.gz' },
            ]);
        });

        it('should skip declarations of unknown releases and phases', () => {
            const rows = sampleRows();
            rows.dependencies = [
                ...(rows.dependencies ?? []),
                { release: 'ALICE/Foo-1.0.tar.gz', module: 'Extra', version: '1', phase: 'recommends', core: null },
                { release: 'NOBODY/Gone-1.tar.gz', module: 'Extra', version: '1', phase: 'runtime', core: null },
            ];

            const report = normalizeExtracts(db, makeExtracts(rows));
            expect(report.rows.t_requires).toBe(2);
            expect(report.skipped.unknownPhase).toBe(1);
            expect(report.skipped.unknownRelease).toBe(1);
        });

        it('should list every absent optional extract as degraded', () => {
            const report = normalizeExtracts(db, makeExtracts(sampleRows()));
            expect(report.degraded).toEqual(['uploads', 'testers', 'tickets', 'meta', 'ratings']);
            expect(db.count('t_uploaded')).toBe(0);
        });

        it('should degrade an unreadable optional extract instead of failing', () => {
            const extracts = { ...makeExtracts(sampleRows()), testers: failingSource<never>('testers') };
            const report = normalizeExtracts(db, extracts);
            expect(report.degraded).toContain('testers');
            expect(report.rows.t_testers).toBe(0);
        });

        it('should fail when a required extract is unreadable', () => {
            const extracts = { ...makeExtracts(sampleRows()), dependencies: failingSource<never>('dependencies') };

            let caught: unknown;
            try {
                normalizeExtracts(db, extracts);
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(MissingExtractError);
            if (caught instanceof MissingExtractError) {
                expect(caught.source).toBe('dependencies');
                expect(caught.message).toBe("Required extract 'dependencies' is unavailable: dependencies is locked");
            }
        });

        it('should resolve shared upload paths to the shortest distribution name', () => {
            const report = normalizeExtracts(db, makeExtracts({
                ...sampleRows(),
                uploads: [
                    { distribution: 'Foo-Bar', version: '1.0', author: 'AUTH', filename: 'Foo-Bar-1.0.tar.gz', released: 0 },
                    { distribution: 'Foo', version: '2.0', author: 'AUTH', filename: 'Foo-Bar-1.0.tar.gz', released: 86400 },
                    { distribution: 'Bad', version: '1', author: 'AUTH', filename: 'Bad-1.tar.gz', released: Number.NaN },
                ],
            }));

            expect(report.skipped.badUpload).toBe(1);
            expect(db.all('SELECT release, dist_version, uploaded FROM t_uploaded')).toEqual([
                { release: 'AUTH/Foo-Bar-1.0.tar.gz', dist_version: 'Foo 2.0', uploaded: '1970-01-02' },
            ]);
            expect(db.count('t_uploaded_version')).toBe(2);
        });

        it('should keep open tickets of known distributions with defaults applied', () => {
            const report = normalizeExtracts(db, makeExtracts({
                ...sampleRows(),
                tickets: [
                    { id: 3, distribution: 'Bar', subject: null, status: 'open', severity: null, created: '2021-01-02T03:04:05Z', updated: 'not a date' },
                    { id: 1, distribution: 'Foo', subject: 'Fixed', status: 'Resolved', severity: 'critical', created: '2021-01-01', updated: '2021-01-05' },
                    { id: 2, distribution: 'Ghost', subject: 'Lost', status: 'new', severity: 'minor', created: '2021-01-01', updated: '2021-01-01' },
                ],
            }));

            expect(report.skipped.orphanTicket).toBe(1);
            expect(db.all('SELECT * FROM t_ticket')).toEqual([
                { id: 3, distribution: 'Bar', subject: '', status: 'open', severity: 'normal', created: '2021-01-02', updated: '2021-01-02' },
            ]);
        });
    });

    describe('optional extracts read from SQLite', () => {
        let tmpDir: string;
        let extractPath: string;

        beforeEach(() => {
            tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pkgindex-test-'));
            extractPath = path.join(tmpDir, 'optional.db');
            const extract = new Database(extractPath);
            extract.exec(`
CREATE TABLE uploads (dist, version, author, filename, released);
INSERT INTO uploads VALUES ('Foo', '1.0', 'ALICE', 'Foo-1.0.tar.gz', 86400);
INSERT INTO uploads VALUES (NULL, '1.0', 'ALICE', 'Lost-1.0.tar.gz', 0);
INSERT INTO uploads VALUES ('Bar', '2.0', 'BOB', 'Bar-2.0.tar.gz', NULL);
CREATE TABLE ticket (id, distribution, subject, status, severity, created, updated);
INSERT INTO ticket VALUES (1, 'Foo', 'Crash', 'open', NULL, '2021-01-01', '2021-01-02');
INSERT INTO ticket VALUES (2, NULL, 'No dist', 'open', 'minor', '2021-01-01', NULL);
INSERT INTO ticket VALUES (3, 'Bar', 'No status', NULL, 'minor', '2021-01-01', NULL);
INSERT INTO ticket VALUES ('abc', 'Bar', 'Bad id', 'open', 'minor', '2021-01-01', NULL);
INSERT INTO ticket VALUES (5, 'Bar', 'No date', 'new', 'minor', NULL, NULL);
CREATE TABLE meta_distribution (release, meta, meta_license);
INSERT INTO meta_distribution VALUES ('ALICE/Foo-1.0.tar.gz', 1, 'perl_5');
INSERT INTO meta_distribution VALUES (NULL, 1, NULL);
`);
            extract.close();
        });

        afterEach(() => {
            fs.rmSync(tmpDir, { recursive: true, force: true });
        });

        function sqliteExtracts(): ExtractSet {
            return {
                ...makeExtracts(sampleRows()),
                uploads: new SqliteExtractSource<RawUploadRow>('uploads', extractPath, EXTRACT_QUERIES.uploads),
                tickets: new SqliteExtractSource<RawTicketRow>('tickets', extractPath, EXTRACT_QUERIES.tickets),
                meta: new SqliteExtractSource<RawMetaRow>('meta', extractPath, EXTRACT_QUERIES.meta),
            };
        }

        it('should skip uploads with a NULL name or timestamp instead of dating them 1970-01-01', () => {
            const report = normalizeExtracts(db, sqliteExtracts());

            expect(report.skipped.badUpload).toBe(2);
            expect(db.all('SELECT release, dist_version, uploaded FROM t_uploaded')).toEqual([
                { release: 'ALICE/Foo-1.0.tar.gz', dist_version: 'Foo 1.0', uploaded: '1970-01-02' },
            ]);
        });

        it('should skip tickets with NULL fields or a non-integer id', () => {
            const report = normalizeExtracts(db, sqliteExtracts());

            expect(report.skipped.badTicket).toBe(4);
            expect(report.skipped.orphanTicket).toBe(0);
            expect(db.all('SELECT * FROM t_ticket')).toEqual([
                { id: 1, distribution: 'Foo', subject: 'Crash', status: 'open', severity: 'normal', created: '2021-01-01', updated: '2021-01-02' },
            ]);
        });

        it('should skip meta rows without a release', () => {
            const report = normalizeExtracts(db, sqliteExtracts());

            expect(report.skipped.badMeta).toBe(1);
            expect(db.all('SELECT release, meta, license FROM t_meta')).toEqual([
                { release: 'ALICE/Foo-1.0.tar.gz', meta: 1, license: 'perl_5' },
            ]);
        });
    });

    describe('cleanRequires', () => {
        it('should rewrite malformed versions and cores', () => {
            const rows = sampleRows();
            rows.dependencies = [
                ...(rows.dependencies ?? []),
                { release: 'ALICE/Foo-1.0.tar.gz', module: 'Qux', version: '', phase: 'build', core: 5.008 },
                { release: 'ALICE/Foo-1.0.tar.gz', module: 'Quux', version: '2', phase: 'build', core: '5.006' },
            ];
            normalizeExtracts(db, makeExtracts(rows));

            const report = cleanRequires(db, 1);
            expect(report).toEqual({ versions: 1, cores: 1, defaulted: 2 });
            expect(db.all('SELECT module, version, core FROM t_requires ORDER BY module')).toEqual([
                { module: 'Bar', version: '1.5', core: null },
                { module: 'Baz', version: '0', core: 5.1 },
                { module: 'Quux', version: '2', core: 5.006 },
                { module: 'Qux', version: '0', core: 0 },
            ]);
        });

        it('should be a no-op on already clean data', () => {
            normalizeExtracts(db, makeExtracts(sampleRows()));
            cleanRequires(db, 10);
            expect(cleanRequires(db, 10)).toEqual({ versions: 0, cores: 0, defaulted: 0 });
        });
    });
});
