/**
 * Explicit freshness capability of an extract.
 * Sources that cannot tell their age use `UNKNOWN_AGE`.
 */
export interface AgeReporter {
    /** Age of the underlying dataset in days, or null when unknown */
    ageInDays(): number | null;
}

export const UNKNOWN_AGE: AgeReporter = {
    ageInDays: () => null,
};

/**
 * Read-only tabular access to one source dataset.
 */
export interface ExtractSource<Row> {
    /** Human-readable source name used in logs and errors */
    readonly name: string;

    readonly age: AgeReporter;

    /**
     * Iterate over the rows of the dataset.
     * May throw when the dataset cannot be read.
     */
    read(): Iterable<Row>;
}

// ─── Raw rows ─────────────────────────────────────────────

export interface RawAuthorRow {
    author: string;
    name: string | null;
}

export interface RawDistributionRow {
    author: string;
    distribution: string;
    version: string | null;

    /** Archive filename, relative to the author directory */
    file: string;
}

export interface RawModuleRow {
    module: string;
    version: string | null;
    distribution: string;
}

export interface RawDependencyRow {
    /** Owning release path, `author/filename` */
    release: string;
    module: string;
    version: string | null;
    phase: string;
    core: number | string | null;
}

export interface RawUploadRow {
    distribution: string;
    version: string | null;
    author: string;
    filename: string;

    /** Unix epoch seconds */
    released: number;
}

export interface RawTestersRow {
    distribution: string;
    version: string | null;
    pass: number | null;
    fail: number | null;
    na: number | null;
    unknown: number | null;
}

export interface RawRatingRow {
    distribution: string;
    rating: number;
    reviewCount: number;
}

export interface RawMetaRow {
    release: string;
    meta: number;
    license: string | null;
}

export interface RawTicketRow {
    id: number;
    distribution: string;
    subject: string | null;
    status: string;
    severity: string | null;
    created: string;
    updated: string;
}

/**
 * Every extract consumed by the pipeline.
 * The first four are required; the rest degrade to NULL columns when absent.
 */
export interface ExtractSet {
    authors: ExtractSource<RawAuthorRow>;
    distributions: ExtractSource<RawDistributionRow>;
    modules: ExtractSource<RawModuleRow>;
    dependencies: ExtractSource<RawDependencyRow>;

    uploads?: ExtractSource<RawUploadRow>;
    testers?: ExtractSource<RawTestersRow>;
    ratings?: ExtractSource<RawRatingRow>;
    meta?: ExtractSource<RawMetaRow>;
    tickets?: ExtractSource<RawTicketRow>;
}

export type OptionalExtract = 'uploads' | 'testers' | 'ratings' | 'meta' | 'tickets';
