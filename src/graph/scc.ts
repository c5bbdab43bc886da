import type { DirectedGraph } from 'graphology';

interface NodeState {
    index: number;
    lowLink: number;
    onStack: boolean;
}

interface Frame {
    node: string;
    state: NodeState;
    neighbors: string[];
    next: number;
}

/**
 * Strongly connected components (Tarjan), using an explicit work stack so
 * long dependency chains cannot overflow the call stack.
 *
 * Components come out in reverse topological order: every component is
 * emitted after all components reachable from it. Members are sorted.
 */
export function findStronglyConnectedComponents(graph: DirectedGraph): string[][] {
    const states = new Map<string, NodeState>();
    const stack: string[] = [];
    const components: string[][] = [];
    let index = 0;

    const open = (node: string, work: Frame[]): void => {
        const state: NodeState = { index, lowLink: index, onStack: true };
        index += 1;
        states.set(node, state);
        stack.push(node);
        work.push({ node, state, neighbors: graph.outNeighbors(node), next: 0 });
    };

    for (const root of graph.nodes()) {
        if (states.has(root)) continue;

        const work: Frame[] = [];
        open(root, work);

        while (work.length > 0) {
            const frame = work[work.length - 1];
            if (frame === undefined) break;

            const nextId = frame.neighbors[frame.next];
            if (nextId !== undefined) {
                frame.next += 1;
                const nextState = states.get(nextId);
                if (nextState === undefined) {
                    open(nextId, work);
                } else if (nextState.onStack && nextState.index < frame.state.lowLink) {
                    // Back edge into the current path: closes a cycle
                    frame.state.lowLink = nextState.index;
                }
                continue;
            }

            work.pop();
            const parent = work[work.length - 1];
            if (parent !== undefined && frame.state.lowLink < parent.state.lowLink) {
                parent.state.lowLink = frame.state.lowLink;
            }

            if (frame.state.lowLink !== frame.state.index) continue;

            const component: string[] = [];
            for (;;) {
                const popped = stack.pop();
                if (popped === undefined) break;

                const poppedState = states.get(popped);
                if (poppedState) poppedState.onStack = false;
                component.push(popped);
                if (popped === frame.node) break;
            }

            component.sort();
            components.push(component);
        }
    }

    return components;
}
