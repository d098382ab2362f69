/**
 * @fileoverview Graph types for strong-connectivity augmentation.
 * This module defines the generic graph structure consumed by the core and
 * the derived artifacts each stage produces: the condensation, its
 * structural classification and the augmenting arc set.
 *
 * @module types/graph
 */

import type { VertexId } from './base.js';
import type { Logger } from './config.js';

// ============================================================
// Generic Graph Types
// ============================================================

/**
 * Category of a graph value.
 * Only `'directed'` graphs (ordered pairs, no parallel arcs) are accepted by
 * the augmentation core; the other categories exist so callers holding such
 * graphs are told so instead of receiving a wrong answer.
 */
export type GraphKind =
    | 'directed'
    | 'undirected'
    | 'multi-directed'
    | 'multi-undirected';

/**
 * A node in a graph with associated data.
 *
 * @typeParam T - The type of data stored in the node
 */
export interface GraphNode<T> {
    /** Unique identifier for the node */
    readonly id: VertexId;
    /** Data associated with this node */
    readonly data: T;
}

/**
 * An edge connecting two nodes in a graph.
 */
export interface GraphEdge {
    /** ID of the source node */
    readonly from: VertexId;
    /** ID of the target node */
    readonly to: VertexId;
    /** Optional weight for weighted graphs (ignored by augmentation) */
    readonly weight?: number;
}

/**
 * A generic graph structure with typed nodes and edges.
 *
 * @typeParam T - The type of data stored in nodes
 */
export interface Graph<T> {
    /** Graph category, checked once at the entry point */
    readonly kind: GraphKind;
    /** Map of node IDs to nodes */
    readonly nodes: ReadonlyMap<VertexId, GraphNode<T>>;
    /** List of edges in the graph */
    readonly edges: readonly GraphEdge[];
}

// ============================================================
// Condensation Types
// ============================================================

/**
 * How the representative vertex of a component is chosen.
 * - first-visited: the component root met first by the depth-first decomposition
 * - lowest-id: the smallest member identifier in string order
 */
export type RepresentativeStrategy = 'first-visited' | 'lowest-id';

/**
 * One strongly connected component contracted to a single node.
 */
export interface CondensationNode {
    /** Position of the node in {@link Condensation.nodes} */
    readonly index: number;
    /** Member vertex that stands for the whole component */
    readonly representative: VertexId;
    /** Member vertices in discovery order */
    readonly members: readonly VertexId[];
    /** Number of member vertices */
    readonly size: number;
}

/**
 * An arc between two condensation nodes, by node index.
 */
export interface CondensationArc {
    readonly from: number;
    readonly to: number;
}

/**
 * The acyclic graph of strongly connected components.
 * Nodes are listed in topological order. There is exactly one arc per pair of
 * components joined by at least one crossing arc of the original graph.
 */
export interface Condensation {
    readonly nodes: readonly CondensationNode[];
    readonly arcs: readonly CondensationArc[];
    /** Successor node indices, per node index */
    readonly successors: ReadonlyArray<readonly number[]>;
    /** Predecessor node indices, per node index */
    readonly predecessors: ReadonlyArray<readonly number[]>;
    /** Maps every original vertex to the index of its component */
    readonly componentOf: ReadonlyMap<VertexId, number>;
}

// ============================================================
// Classification Types
// ============================================================

/**
 * Structural role of a condensation node.
 * - source: no incoming arcs, at least one outgoing
 * - sink: no outgoing arcs, at least one incoming
 * - isolated: neither incoming nor outgoing arcs
 * - interior: both incoming and outgoing arcs
 */
export type NodeRole = 'source' | 'sink' | 'isolated' | 'interior';

/**
 * Counts driving the augmentation bound.
 */
export interface RoleCounts {
    /** Non-isolated sources */
    readonly s: number;
    /** Non-isolated sinks */
    readonly t: number;
    /** Isolated nodes */
    readonly q: number;
}

/**
 * Classification of every condensation node.
 * Member lists hold node indices in ascending (topological) order.
 */
export interface Classification {
    readonly roles: readonly NodeRole[];
    readonly sources: readonly number[];
    readonly sinks: readonly number[];
    readonly isolated: readonly number[];
    readonly counts: RoleCounts;
}

// ============================================================
// Augmentation Types
// ============================================================

/**
 * A new arc between representative vertices of two distinct components.
 */
export type AugmentingArc = GraphEdge;

/**
 * Options accepted by the augmentation entry points.
 */
export interface AugmentOptions {
    /**
     * Treat the input as its own condensation: skip decomposition and only
     * check that it is acyclic.
     */
    readonly assumeIsCondensation?: boolean;
    /** Representative choice per component (default: first-visited) */
    readonly representative?: RepresentativeStrategy;
    /** Receives debug output about each stage */
    readonly logger?: Logger;
}

/**
 * Errors reported by decomposition and augmentation.
 * - unsupported-graph-category: the input is not a simple directed graph
 * - has-cycle: the input was asserted to be a condensation but has a cycle
 */
export type AugmentError =
    | { readonly type: 'unsupported-graph-category'; readonly message: string }
    | {
          readonly type: 'has-cycle';
          readonly message: string;
          /** Members of one offending cycle */
          readonly cycle: readonly VertexId[];
      };

/**
 * Augmenting arcs together with the artifacts they were derived from.
 */
export interface Augmentation {
    readonly arcs: readonly AugmentingArc[];
    /** Lower bound on the number of arcs; equals `arcs.length` */
    readonly bound: number;
    readonly condensation: Condensation;
    readonly classification: Classification;
}
