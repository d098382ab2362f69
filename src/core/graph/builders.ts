/**
 * @fileoverview Construction and derivation of graph values.
 * Graphs are immutable; every helper here returns a new value.
 *
 * @module core/graph/builders
 */

import type { VertexId } from '../../types/base.js';
import type { Graph, GraphEdge, GraphKind, GraphNode } from '../../types/graph.js';

/**
 * Ordered pair shorthand for an arc.
 */
export type ArcTuple = readonly [VertexId, VertexId];

/**
 * Options for {@link fromArcs}.
 */
export interface FromArcsOptions {
    /** Vertices to declare even when no arc touches them */
    readonly vertices?: Iterable<VertexId>;
    /** Category tag of the resulting graph (default: directed) */
    readonly kind?: GraphKind;
}

/**
 * Creates a graph from node IDs and edges.
 * Node IDs are declared in iteration order; duplicates collapse.
 *
 * @typeParam T - The type of data stored in graph nodes
 * @param dataFactory - Produces the payload of each node
 *
 * @example
 * ```typescript
 * const graph = createGraph(['a', 'b'], [{ from: 'a', to: 'b' }], (id) => id.toUpperCase());
 * ```
 */
export function createGraph<T>(
    nodeIds: Iterable<VertexId>,
    edges: readonly GraphEdge[],
    dataFactory: (id: VertexId) => T,
    kind: GraphKind = 'directed'
): Graph<T> {
    const nodes = new Map<VertexId, GraphNode<T>>();
    for (const id of nodeIds) {
        if (!nodes.has(id)) {
            nodes.set(id, { id, data: dataFactory(id) });
        }
    }
    return { kind, nodes, edges: [...edges] };
}

/**
 * Creates a data-less graph from arc tuples.
 * Every arc endpoint is declared as a node, after any explicit `vertices`.
 *
 * @example
 * ```typescript
 * const path = fromArcs([['0', '1'], ['1', '2']]);
 * const lonely = fromArcs([], { vertices: ['x', 'y'] });
 * ```
 */
export function fromArcs(
    arcs: readonly ArcTuple[],
    options: FromArcsOptions = {}
): Graph<null> {
    const ids: VertexId[] = [...(options.vertices ?? [])];
    const edges: GraphEdge[] = [];
    for (const [from, to] of arcs) {
        ids.push(from, to);
        edges.push({ from, to });
    }
    return createGraph(ids, edges, () => null, options.kind ?? 'directed');
}

/**
 * Returns the graph with every edge reversed.
 */
export function reverseGraph<T>(graph: Graph<T>): Graph<T> {
    return {
        kind: graph.kind,
        nodes: graph.nodes,
        edges: graph.edges.map((edge) => ({ ...edge, from: edge.to, to: edge.from })),
    };
}

/**
 * Returns a copy of the graph with extra edges appended.
 * Edges are appended as given; endpoints must already be nodes of the graph.
 *
 * @example
 * ```typescript
 * const result = computeAugmentingArcs(graph);
 * if (result.ok) {
 *   const strong = withEdges(graph, result.value);
 * }
 * ```
 */
export function withEdges<T>(graph: Graph<T>, edges: readonly GraphEdge[]): Graph<T> {
    return {
        kind: graph.kind,
        nodes: graph.nodes,
        edges: [...graph.edges, ...edges],
    };
}

/**
 * Builds an adjacency list from graph edges.
 *
 * @returns Map from node ID to array of successor node IDs
 */
export function buildAdjacencyList(edges: readonly GraphEdge[]): Map<VertexId, VertexId[]> {
    const adjacency = new Map<VertexId, VertexId[]>();

    for (const edge of edges) {
        const successors = adjacency.get(edge.from);
        if (successors) {
            successors.push(edge.to);
        } else {
            adjacency.set(edge.from, [edge.to]);
        }
    }

    return adjacency;
}

/**
 * Key identifying an ordered vertex pair, for duplicate-arc checks.
 */
export function arcKey(from: VertexId, to: VertexId): string {
    return JSON.stringify([from, to]);
}
