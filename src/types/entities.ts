/**
 * Lifecycle stage during which a dependency applies.
 */
export type Phase = 'runtime' | 'build' | 'test' | 'configure' | 'develop';

/** All recognised phases, in declaration order */
export const PHASES: readonly Phase[] = ['runtime', 'build', 'test', 'configure', 'develop'];

export function isPhase(value: string): value is Phase {
    return PHASES.some((phase) => phase === value);
}

/**
 * Author row in the `author` table.
 */
export interface Author {
    /** Upload account id */
    author: string;

    /** Display name */
    name: string;
}

/**
 * Distribution row, one per latest known release.
 */
export interface Distribution {
    distribution: string;
    version: string | null;
    author: string;

    /** 1 when the release shipped package metadata, else 0 */
    meta: number;
    license: string | null;

    /** Release path, `author/filename` */
    release: string;

    /** Upload date as YYYY-MM-DD, null when no upload record matched */
    uploaded: string | null;

    pass: number | null;
    fail: number | null;
    unknown: number | null;
    na: number | null;

    rating: number | null;
    ratings: number;

    /** Number of distributions that transitively depend on this one */
    weight: number;

    /** Number of distributions this one transitively depends on */
    volatility: number;
}

/**
 * Module row: a namespace shipped inside a distribution.
 */
export interface Module {
    module: string;
    version: string | null;
    distribution: string;
}

/**
 * Module-level dependency declaration (staging, pre-collapse).
 */
export interface RequiresEdge {
    distribution: string;
    module: string;
    version: string;
    phase: Phase;

    /** Core-since indicator: the baseline release that bundled the module, or null */
    core: number | null;
}

/**
 * Distribution-level dependency edge.
 */
export interface DependencyEdge {
    distribution: string;
    dependency: string;
    phase: Phase;
    core: number | null;
}

/**
 * Flattened module-level requirement in the final `requires` table.
 */
export interface Requirement {
    distribution: string;
    module: string;
    version: string;
    phase: Phase;
}

/**
 * Open bug-tracker ticket.
 */
export interface Ticket {
    id: number;
    distribution: string;
    subject: string;
    status: string;
    severity: string;
    created: string;
    updated: string;
}
