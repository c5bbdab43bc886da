import type { DirectedGraph } from 'graphology';
import { findStronglyConnectedComponents } from './scc.js';
import { getLogger } from '../utils/logger.js';

export interface DistributionMetrics {
    /** Distinct non-umbrella distributions that transitively depend on this one */
    weight: number;

    /** Distinct distributions this one transitively depends on */
    volatility: number;
}

export interface MetricsOptions {
    /**
     * Name prefixes of umbrella packages (bundles, demos). They neither
     * count as dependents nor receive a weight. Case-insensitive.
     */
    umbrellaPrefixes?: readonly string[];
}

export function isUmbrella(name: string, prefixes: readonly string[]): boolean {
    const lower = name.toLowerCase();
    return prefixes.some((prefix) => lower.startsWith(prefix.toLowerCase()));
}

/**
 * Memoized reachable-component sets over a DAG of components, visited in
 * an order where every component's inputs come first. A set is released
 * once all components that read it have been processed.
 */
function reachableComponents(
    order: readonly number[],
    inputs: readonly ReadonlySet<number>[],
    readers: readonly ReadonlySet<number>[],
    visit: (component: number, reachable: ReadonlySet<number>) => void
): void {
    const memo = new Map<number, Set<number>>();
    const pendingReaders = readers.map((set) => set.size);

    for (const component of order) {
        const reachable = new Set<number>();
        for (const input of inputs[component] ?? []) {
            reachable.add(input);
            for (const further of memo.get(input) ?? []) {
                reachable.add(further);
            }

            const left = (pendingReaders[input] ?? 1) - 1;
            pendingReaders[input] = left;
            if (left === 0) memo.delete(input);
        }

        visit(component, reachable);
        if ((pendingReaders[component] ?? 0) > 0) {
            memo.set(component, reachable);
        }
    }
}

/**
 * Compute weight (fan-in) and volatility (fan-out) for every node.
 *
 * Cycles are condensed into strongly connected components first; every
 * member of a component reaches the same set of nodes, so one reachable
 * set per component is enough. Each node is counted once per metric no
 * matter how many paths or cycles lead to it, and a node never counts
 * itself. Umbrella packages still carry paths: A → Task-X → B counts A
 * as a dependent of B.
 */
export function computeMetrics(
    graph: DirectedGraph,
    options: MetricsOptions = {}
): Map<string, DistributionMetrics> {
    const prefixes = options.umbrellaPrefixes ?? [];
    const components = findStronglyConnectedComponents(graph);

    const componentOf = new Map<string, number>();
    components.forEach((members, i) => {
        for (const node of members) componentOf.set(node, i);
    });

    const sizes = components.map((members) => members.length);
    const countable = components.map((members) => members.filter((node) => !isUmbrella(node, prefixes)).length);

    const successors = components.map(() => new Set<number>());
    const predecessors = components.map(() => new Set<number>());
    graph.forEachEdge((_edge, _attributes, source, target) => {
        const from = componentOf.get(source);
        const to = componentOf.get(target);
        if (from === undefined || to === undefined || from === to) return;
        successors[from]?.add(to);
        predecessors[to]?.add(from);
    });

    // Tarjan emits sinks first: forward order visits dependencies before dependents
    const sinksFirst = components.map((_, i) => i);
    const sourcesFirst = [...sinksFirst].reverse();

    const fanOut = new Array<number>(components.length).fill(0);
    reachableComponents(sinksFirst, successors, predecessors, (component, reachable) => {
        let total = 0;
        for (const other of reachable) total += sizes[other] ?? 0;
        fanOut[component] = total;
    });

    const fanIn = new Array<number>(components.length).fill(0);
    reachableComponents(sourcesFirst, predecessors, successors, (component, reachable) => {
        let total = 0;
        for (const other of reachable) total += countable[other] ?? 0;
        fanIn[component] = total;
    });

    const metrics = new Map<string, DistributionMetrics>();
    components.forEach((members, i) => {
        const size = sizes[i] ?? 1;
        const peers = countable[i] ?? 0;
        for (const node of members) {
            const umbrella = isUmbrella(node, prefixes);
            metrics.set(node, {
                // Other countable members of the same cycle reach this node too
                weight: umbrella ? 0 : peers - 1 + (fanIn[i] ?? 0),
                // Reachable set including the node itself, minus one
                volatility: size - 1 + (fanOut[i] ?? 0),
            });
        }
    });

    getLogger().debug(
        { nodes: graph.order, edges: graph.size, components: components.length, cyclic: components.filter((c) => c.length > 1).length },
        'Dependency metrics computed'
    );
    return metrics;
}
