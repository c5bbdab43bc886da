import { MemoryExtractSource } from '../sources/memory-source.js';
import { UNKNOWN_AGE } from '../types/index.js';
import type {
    ExtractSet,
    ExtractSource,
    RawAuthorRow,
    RawDependencyRow,
    RawDistributionRow,
    RawMetaRow,
    RawModuleRow,
    RawRatingRow,
    RawTestersRow,
    RawTicketRow,
    RawUploadRow,
} from '../types/index.js';

export interface ExtractRows {
    authors?: RawAuthorRow[];
    distributions?: RawDistributionRow[];
    modules?: RawModuleRow[];
    dependencies?: RawDependencyRow[];
    uploads?: RawUploadRow[];
    testers?: RawTestersRow[];
    ratings?: RawRatingRow[];
    meta?: RawMetaRow[];
    tickets?: RawTicketRow[];
}

function optional<Row>(name: string, rows: Row[] | undefined): ExtractSource<Row> | undefined {
    return rows ? new MemoryExtractSource(name, rows) : undefined;
}

/**
 * In-memory extract set; optional extracts are absent unless rows are given.
 */
export function makeExtracts(rows: ExtractRows): ExtractSet {
    return {
        authors: new MemoryExtractSource('authors', rows.authors ?? []),
        distributions: new MemoryExtractSource('distributions', rows.distributions ?? []),
        modules: new MemoryExtractSource('modules', rows.modules ?? []),
        dependencies: new MemoryExtractSource('dependencies', rows.dependencies ?? []),
        uploads: optional('uploads', rows.uploads),
        testers: optional('testers', rows.testers),
        ratings: optional('ratings', rows.ratings),
        meta: optional('meta', rows.meta),
        tickets: optional('tickets', rows.tickets),
    };
}

/**
 * Extract whose read fails, as a locked or corrupt file would.
 */
export function failingSource<Row>(name: string): ExtractSource<Row> {
    return {
        name,
        age: UNKNOWN_AGE,
        read: () => {
            throw new Error(`${name} is locked`);
        },
    };
}

/**
 * Two authors, two distributions, Foo depending on Bar.
 */
export function sampleRows(): ExtractRows {
    return {
        authors: [
            { author: 'ALICE', name: 'Alice Example' },
            { author: 'BOB', name: null },
        ],
        distributions: [
            { author: 'ALICE', distribution: 'Foo', version: '1.0', file: 'Foo-1.0.tar.gz' },
            { author: 'BOB', distribution: 'Bar', version: '2.0', file: 'Bar-2.0.tar.gz' },
        ],
        modules: [
            { module: 'Foo', version: '1.0', distribution: 'Foo' },
            { module: 'Bar', version: '2.0', distribution: 'Bar' },
            { module: 'Bar.Util', version: null, distribution: 'Bar' },
        ],
        dependencies: [
            { release: 'ALICE/Foo-1.0.tar.gz', module: 'Bar', version: '>= 1.5', phase: 'runtime', core: null },
            { release: 'ALICE/Foo-1.0.tar.gz', module: 'Baz', version: null, phase: 'test', core: 'v5.10' },
        ],
    };
}
