/**
 * @fileoverview Strongly connected components and cycle detection.
 * Implements Tarjan's algorithm for strongly connected components, and the
 * cycle and strong-connectivity queries derived from it.
 *
 * @module core/graph/algorithms
 */

import type { VertexId } from '../../types/base.js';
import type { Graph } from '../../types/graph.js';
import { buildAdjacencyList } from './builders.js';

// ============================================================
// Internal Types
// ============================================================

/**
 * Internal state for Tarjan's algorithm.
 */
interface TarjanState {
    /** Current index counter */
    index: number;
    /** Stack of node IDs being processed */
    stack: VertexId[];
    /** Set of node IDs currently on stack */
    onStack: Set<VertexId>;
    /** Discovery index for each node */
    indices: Map<VertexId, number>;
    /** Low-link value for each node */
    lowLinks: Map<VertexId, number>;
    /** Collected strongly connected components */
    sccs: VertexId[][];
}

// ============================================================
// Helper Functions
// ============================================================

/**
 * Initializes Tarjan's algorithm state.
 */
function initTarjanState(): TarjanState {
    return {
        index: 0,
        stack: [],
        onStack: new Set(),
        indices: new Map(),
        lowLinks: new Map(),
        sccs: [],
    };
}

/**
 * A vertex whose successors are still being walked.
 */
interface TarjanFrame {
    /** Vertex of this frame */
    nodeId: VertexId;
    /** Position of the next successor to visit */
    successorIndex: number;
}

/**
 * Assigns a discovery index to a vertex and pushes it on the component stack.
 */
function discover(nodeId: VertexId, state: TarjanState): void {
    state.indices.set(nodeId, state.index);
    state.lowLinks.set(nodeId, state.index);
    state.index++;
    state.stack.push(nodeId);
    state.onStack.add(nodeId);
}

/**
 * Pops the component rooted at `nodeId` if its low-link equals its index.
 */
function emitComponent(nodeId: VertexId, state: TarjanState): void {
    const nodeIndex = state.indices.get(nodeId) ?? 0;
    const nodeLowLink = state.lowLinks.get(nodeId) ?? 0;
    if (nodeLowLink !== nodeIndex) {
        return;
    }

    const scc: VertexId[] = [];
    let poppedNode: VertexId | undefined;

    do {
        poppedNode = state.stack.pop();
        if (poppedNode !== undefined) {
            state.onStack.delete(poppedNode);
            scc.push(poppedNode);
        }
    } while (poppedNode !== nodeId && poppedNode !== undefined);

    // Popped in reverse discovery order; the root ends up first
    scc.reverse();
    state.sccs.push(scc);
}

/**
 * Performs the strong connect operation for Tarjan's algorithm from one root.
 * The depth-first walk keeps its own frame stack instead of recursing.
 *
 * @param rootId - Unvisited vertex to start from
 * @param adjacency - Adjacency list representation of the graph
 * @param state - Mutable algorithm state
 */
function strongConnect(
    rootId: VertexId,
    adjacency: Map<VertexId, VertexId[]>,
    state: TarjanState
): void {
    discover(rootId, state);
    const frames: TarjanFrame[] = [{ nodeId: rootId, successorIndex: 0 }];

    let frame = frames[frames.length - 1];
    while (frame !== undefined) {
        const nodeId = frame.nodeId;
        const successors = adjacency.get(nodeId) ?? [];
        const successor = successors[frame.successorIndex];

        if (successor !== undefined) {
            frame.successorIndex++;
            if (!state.indices.has(successor)) {
                discover(successor, state);
                frames.push({ nodeId: successor, successorIndex: 0 });
            } else if (state.onStack.has(successor)) {
                // Successor is on stack and hence in the current SCC
                const successorIndex = state.indices.get(successor) ?? 0;
                const currentLowLink = state.lowLinks.get(nodeId) ?? 0;
                state.lowLinks.set(nodeId, Math.min(currentLowLink, successorIndex));
            }
        } else {
            frames.pop();
            emitComponent(nodeId, state);

            const parent = frames[frames.length - 1];
            if (parent !== undefined) {
                const childLowLink = state.lowLinks.get(nodeId) ?? 0;
                const parentLowLink = state.lowLinks.get(parent.nodeId) ?? 0;
                state.lowLinks.set(parent.nodeId, Math.min(parentLowLink, childLowLink));
            }
        }

        frame = frames[frames.length - 1];
    }
}

// ============================================================
// Public API
// ============================================================

/**
 * Partitions the vertices of a graph into strongly connected components
 * using Tarjan's algorithm.
 *
 * Every vertex appears in exactly one component. Components are returned in
 * reverse topological order of the condensation (a component is emitted
 * after every component it reaches), and each component lists its members in
 * discovery order, so the first member is the component root.
 *
 * @typeParam T - The type of data stored in graph nodes
 * @returns Components as arrays of node IDs
 *
 * @example
 * ```typescript
 * const graph = fromArcs([['a', 'b'], ['b', 'a'], ['b', 'c']]);
 * const sccs = findStronglyConnectedComponents(graph);
 * // sccs = [['c'], ['a', 'b']]
 * ```
 */
export function findStronglyConnectedComponents<T>(graph: Graph<T>): VertexId[][] {
    const adjacency = buildAdjacencyList(graph.edges);
    const state = initTarjanState();

    for (const nodeId of graph.nodes.keys()) {
        if (!state.indices.has(nodeId)) {
            strongConnect(nodeId, adjacency, state);
        }
    }

    return state.sccs;
}

/**
 * Detects all cycles in a graph.
 *
 * A cycle is reported as the members of a cycle-bearing strongly connected
 * component in traversal order: any component with more than one member,
 * and any single vertex carrying a self-loop.
 * For example, a cycle A → B → C → A is returned as ['A', 'B', 'C'].
 *
 * @typeParam T - The type of data stored in graph nodes
 * @returns Array of cycles, where each cycle is an array of node IDs
 */
export function detectCycles<T>(graph: Graph<T>): VertexId[][] {
    const selfLooped = new Set<VertexId>();
    for (const edge of graph.edges) {
        if (edge.from === edge.to) {
            selfLooped.add(edge.from);
        }
    }

    return findStronglyConnectedComponents(graph).filter(
        (scc) => scc.length > 1 || (scc[0] !== undefined && selfLooped.has(scc[0]))
    );
}

/**
 * Checks whether every vertex reaches every other vertex.
 * Graphs with no vertices or a single component are strongly connected.
 */
export function isStronglyConnected<T>(graph: Graph<T>): boolean {
    return findStronglyConnectedComponents(graph).length <= 1;
}
