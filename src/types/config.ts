/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * File locations of the raw extracts.
 * Package index and dependency declarations are required.
 */
export interface ExtractPaths {
    /** SQLite file with `auths`, `dists` and `mods` tables */
    packageIndex?: string;

    /** SQLite file with a `meta_dependency` table */
    dependencies?: string;

    /** SQLite file with an `uploads` table */
    uploads?: string;

    /** SQLite file with a `release` table of test summaries */
    testers?: string;

    /** SQLite file with a `ticket` table */
    tickets?: string;

    /** SQLite file with a `meta_distribution` table */
    meta?: string;

    /** CSV file of `distribution,rating,review_count` */
    ratings?: string;
}

/**
 * Full pkgindex configuration merged from CLI flags and config file.
 */
export interface IndexConfig {
    // Output
    out: string;

    // Input
    extracts: ExtractPaths;

    // Loader
    batchSize: number;
    vacuum: boolean;

    // Metrics
    umbrellaPrefixes: string[];

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: IndexConfig = {
    out: './pkgindex.db',
    extracts: {},
    batchSize: 100,
    vacuum: true,
    umbrellaPrefixes: ['Task-', 'Acme-'],
    logLevel: 'info',
    jsonLogs: false,
};
