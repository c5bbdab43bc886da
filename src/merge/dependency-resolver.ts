import type { IndexDatabase } from '../storage/database.js';
import type { DependencyEdge, RequiresEdge } from '../types/index.js';
import { compareText } from '../utils/text.js';
import { getLogger } from '../utils/logger.js';

export interface ResolveResult {
    edges: DependencyEdge[];

    /** Declarations naming a module no indexed distribution provides */
    unresolved: number;
}

export interface ResolveReport {
    dependencies: number;
    requires: number;
    unresolved: number;
    selfEdges: number;
}

/**
 * Null ranks below every number.
 */
function compareCore(a: number | null, b: number | null): number {
    if (a === b) return 0;
    if (a === null) return -1;
    if (b === null) return 1;
    return Math.sign(a - b);
}

/**
 * Collapse module-level declarations into distribution-level edges.
 *
 * Each module is replaced by its owning distribution. Declarations that
 * land on the same (distribution, dependency, phase) keep the highest core
 * value; equal cores prefer the lexically smallest module name.
 * Self-edges are kept.
 */
export function resolveDependencies(
    requires: Iterable<RequiresEdge>,
    owners: ReadonlyMap<string, string>
): ResolveResult {
    const best = new Map<string, { edge: DependencyEdge; module: string }>();
    let unresolved = 0;

    for (const req of requires) {
        const dependency = owners.get(req.module);
        if (dependency === undefined) {
            unresolved++;
            continue;
        }

        const key = `${req.distribution}\u0000${dependency}\u0000${req.phase}`;
        const current = best.get(key);
        const core = compareCore(req.core, current?.edge.core ?? null);

        if (current === undefined || core > 0 || (core === 0 && compareText(req.module, current.module) < 0)) {
            best.set(key, {
                edge: { distribution: req.distribution, dependency, phase: req.phase, core: req.core },
                module: req.module,
            });
        }
    }

    const edges = [...best.values()]
        .map((entry) => entry.edge)
        .sort((a, b) =>
            compareText(a.distribution, b.distribution) ||
            compareText(a.phase, b.phase) ||
            compareText(a.dependency, b.dependency)
        );

    return { edges, unresolved };
}

/**
 * Write the `dependency` and flattened `requires` tables from `t_requires`.
 * Only declarations of merged distributions take part.
 */
export function buildDependencyTables(db: IndexDatabase): ResolveReport {
    db.createTable('dependency');
    db.createTable('requires');

    const requires = db.all<RequiresEdge>(`
SELECT r.distribution, r.module, r.version, r.phase, r.core
FROM t_requires r
JOIN distribution d ON d.distribution = r.distribution`);

    const owners = new Map(
        db.all<{ module: string; distribution: string }>('SELECT module, distribution FROM module')
            .map((row) => [row.module, row.distribution])
    );

    const { edges, unresolved } = resolveDependencies(requires, owners);
    const dependencies = db.insertRows('dependency', ['distribution', 'dependency', 'phase', 'core'], edges);

    // First declaration per (distribution, module, phase) in this order wins
    const flattened = db.run(`
INSERT OR IGNORE INTO requires (distribution, module, version, phase)
SELECT r.distribution, r.module, r.version, r.phase
FROM t_requires r
JOIN distribution d ON d.distribution = r.distribution
ORDER BY r.distribution, r.phase, r.core DESC, r.module, r.version`);

    const selfEdges = edges.filter((edge) => edge.distribution === edge.dependency).length;
    const report: ResolveReport = { dependencies, requires: flattened, unresolved, selfEdges };
    getLogger().info(report, 'Dependencies resolved');
    return report;
}
