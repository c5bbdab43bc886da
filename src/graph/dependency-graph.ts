import { DirectedGraph } from 'graphology';
import { getLogger } from '../utils/logger.js';

/**
 * Build the distribution dependency graph: an edge A → B means A depends on B.
 * Phases collapse into one edge; edges touching unknown distributions are ignored.
 *
 * @param distributions - Every node, inserted in sorted order so traversal is deterministic
 * @param edges - Distribution-level dependency pairs
 */
export function buildDependencyGraph(
    distributions: Iterable<string>,
    edges: Iterable<{ distribution: string; dependency: string }>
): DirectedGraph {
    const graph = new DirectedGraph({ allowSelfLoops: true });

    for (const name of [...distributions].sort()) {
        graph.mergeNode(name);
    }

    let ignored = 0;
    for (const edge of edges) {
        if (!graph.hasNode(edge.distribution) || !graph.hasNode(edge.dependency)) {
            ignored++;
            continue;
        }
        graph.mergeEdge(edge.distribution, edge.dependency);
    }

    if (ignored > 0) {
        getLogger().warn({ ignored }, 'Ignored dependency edges with unknown endpoints');
    }
    getLogger().debug({ nodeCount: graph.order, edgeCount: graph.size }, 'Dependency graph built');
    return graph;
}
