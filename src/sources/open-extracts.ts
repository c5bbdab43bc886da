import { existsSync } from 'node:fs';
import type {
    ExtractPaths,
    ExtractSet,
    ExtractSource,
    RawAuthorRow,
    RawDependencyRow,
    RawDistributionRow,
    RawMetaRow,
    RawModuleRow,
    RawTestersRow,
    RawTicketRow,
    RawUploadRow,
} from '../types/index.js';
import { MissingExtractError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { CsvRatingsSource } from './ratings-csv.js';
import { EXTRACT_QUERIES, SqliteExtractSource } from './sqlite-source.js';

function requirePath(name: string, path: string | undefined): string {
    if (!path) {
        throw new MissingExtractError(name, 'no path configured');
    }
    if (!existsSync(path)) {
        throw new MissingExtractError(name, `${path} does not exist`);
    }
    return path;
}

function optionalPath(name: string, path: string | undefined): string | undefined {
    if (!path) {
        getLogger().debug({ source: name }, 'Optional extract not configured');
        return undefined;
    }
    if (!existsSync(path)) {
        getLogger().warn({ source: name, path }, 'Optional extract missing, its columns will stay NULL');
        return undefined;
    }
    return path;
}

function sqliteSource<Row>(name: keyof typeof EXTRACT_QUERIES, path: string): ExtractSource<Row> {
    return new SqliteExtractSource<Row>(name, path, EXTRACT_QUERIES[name]);
}

/**
 * Compose the extract set from configured file paths.
 * Missing required files fail here, before the store is touched.
 */
export function openExtracts(paths: ExtractPaths): ExtractSet {
    const packageIndex = requirePath('packageIndex', paths.packageIndex);
    const dependencies = requirePath('dependencies', paths.dependencies);

    const uploads = optionalPath('uploads', paths.uploads);
    const testers = optionalPath('testers', paths.testers);
    const tickets = optionalPath('tickets', paths.tickets);
    const meta = optionalPath('meta', paths.meta);
    const ratings = optionalPath('ratings', paths.ratings);

    return {
        authors: sqliteSource<RawAuthorRow>('authors', packageIndex),
        distributions: sqliteSource<RawDistributionRow>('distributions', packageIndex),
        modules: sqliteSource<RawModuleRow>('modules', packageIndex),
        dependencies: sqliteSource<RawDependencyRow>('dependencies', dependencies),
        uploads: uploads ? sqliteSource<RawUploadRow>('uploads', uploads) : undefined,
        testers: testers ? sqliteSource<RawTestersRow>('testers', testers) : undefined,
        tickets: tickets ? sqliteSource<RawTicketRow>('tickets', tickets) : undefined,
        meta: meta ? sqliteSource<RawMetaRow>('meta', meta) : undefined,
        ratings: ratings ? new CsvRatingsSource(ratings) : undefined,
    };
}
