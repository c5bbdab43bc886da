/**
 * Library entry point.
 */
export * from './types/index.js';
export { IndexDatabase, INDEX_TABLES, TABLE_INDEXES, STAGING_TABLES } from './storage/database.js';
export type { IndexTable, StagingTable, BatchResult, IndexStats } from './storage/database.js';
export { buildIndex, runBuild, backfillMetrics, runStage } from './builder/index-builder.js';
export type { BuildOptions, BuildReport, MetricsReport } from './builder/index-builder.js';
export { normalizeExtracts, latestReleases, releaseIdentity } from './merge/normalizer.js';
export type { NormalizeReport } from './merge/normalizer.js';
export { mergeEntities, backfillRatings, backfillMeta } from './merge/entity-merger.js';
export type { MergeReport, BackfillReport } from './merge/entity-merger.js';
export { resolveDependencies, buildDependencyTables } from './merge/dependency-resolver.js';
export type { ResolveResult, ResolveReport } from './merge/dependency-resolver.js';
export { cleanRequires } from './clean/requires-cleaner.js';
export type { CleanReport } from './clean/requires-cleaner.js';
export { cleanVersion, cleanCore, compareVersions, isMalformedVersion } from './clean/version.js';
export { buildDependencyGraph } from './graph/dependency-graph.js';
export { findStronglyConnectedComponents } from './graph/scc.js';
export { computeMetrics, isUmbrella } from './graph/metrics.js';
export type { DistributionMetrics, MetricsOptions } from './graph/metrics.js';
export { openExtracts } from './sources/open-extracts.js';
export { SqliteExtractSource, EXTRACT_QUERIES } from './sources/sqlite-source.js';
export { CsvRatingsSource, parseRatingsCsv } from './sources/ratings-csv.js';
export { MemoryExtractSource } from './sources/memory-source.js';
export { resolveConfig, mergeConfig } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export { StoreError, MissingExtractError, ConfigError, PipelineError } from './utils/errors.js';
