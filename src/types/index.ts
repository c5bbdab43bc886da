/**
 * Barrel export for all shared types.
 */
export { PHASES, isPhase } from './entities.js';
export type {
    Phase,
    Author,
    Distribution,
    Module,
    RequiresEdge,
    DependencyEdge,
    Requirement,
    Ticket,
} from './entities.js';
export { UNKNOWN_AGE } from './extract.js';
export type {
    AgeReporter,
    ExtractSource,
    ExtractSet,
    OptionalExtract,
    RawAuthorRow,
    RawDistributionRow,
    RawModuleRow,
    RawDependencyRow,
    RawUploadRow,
    RawTestersRow,
    RawRatingRow,
    RawMetaRow,
    RawTicketRow,
} from './extract.js';
export { DEFAULT_CONFIG } from './config.js';
export type { IndexConfig, ExtractPaths, LogLevel } from './config.js';
