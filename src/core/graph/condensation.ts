/**
 * @fileoverview Component decomposition.
 * Contracts every strongly connected component of a directed graph to a
 * single node and keeps one arc per pair of components joined by a crossing
 * arc. The result is acyclic and lists its nodes in topological order.
 *
 * @module core/graph/condensation
 */

import type { Result, VertexId } from '../../types/base.js';
import type {
    AugmentError,
    AugmentOptions,
    Condensation,
    CondensationArc,
    CondensationNode,
    Graph,
    RepresentativeStrategy,
} from '../../types/graph.js';
import { ok, err } from '../../utils/result.js';
import { silentLogger } from '../../utils/logger.js';
import { detectCycles, findStronglyConnectedComponents } from './algorithms.js';
import { requireSimpleDigraph } from './validate.js';

// ============================================================
// Helper Functions
// ============================================================

/**
 * Picks the representative of a component.
 * `members` is never empty: Tarjan only emits non-empty components.
 */
function pickRepresentative(
    members: readonly VertexId[],
    strategy: RepresentativeStrategy
): VertexId {
    let chosen = members[0] ?? '';
    if (strategy === 'lowest-id') {
        for (const member of members) {
            if (member < chosen) {
                chosen = member;
            }
        }
    }
    return chosen;
}

/**
 * Formats a cycle for error messages: a → b → a.
 */
function formatCycle(cycle: readonly VertexId[]): string {
    const first = cycle[0];
    return first === undefined ? '' : [...cycle, first].join(' → ');
}

// ============================================================
// Public API
// ============================================================

/**
 * Computes the condensation of a simple directed graph.
 *
 * With `assumeIsCondensation`, the graph is taken as already condensed: the
 * decomposition pass only has to confirm that no cycle exists (a self-loop,
 * a 2-cycle or longer), after which every vertex is its own node and
 * `componentOf` is the identity on indices.
 *
 * @returns The condensation, or `unsupported-graph-category` / `has-cycle`
 *
 * @example
 * ```typescript
 * const result = condense(fromArcs([['a', 'b'], ['b', 'a'], ['b', 'c']]));
 * if (result.ok) {
 *   result.value.nodes.map((n) => n.members); // [['a', 'b'], ['c']]
 *   result.value.arcs;                        // [{ from: 0, to: 1 }]
 * }
 * ```
 */
export function condense<T>(
    graph: Graph<T>,
    options: AugmentOptions = {}
): Result<Condensation, AugmentError> {
    const capability = requireSimpleDigraph(graph);
    if (!capability.ok) {
        return capability;
    }

    const logger = options.logger ?? silentLogger;

    if (options.assumeIsCondensation) {
        const cycles = detectCycles(graph);
        const cycle = cycles[0];
        if (cycle !== undefined) {
            return err({
                type: 'has-cycle',
                message: `Graph asserted to be a condensation has a cycle: ${formatCycle(cycle)}`,
                cycle,
            });
        }
    }

    // Tarjan emits sinks first; reverse for topological order
    const components = findStronglyConnectedComponents(graph).reverse();
    const strategy = options.representative ?? 'first-visited';

    const componentOf = new Map<VertexId, number>();
    const nodes: CondensationNode[] = components.map((members, index) => {
        for (const member of members) {
            componentOf.set(member, index);
        }
        return {
            index,
            representative: pickRepresentative(members, strategy),
            members,
            size: members.length,
        };
    });

    const arcs: CondensationArc[] = [];
    const successors: number[][] = nodes.map(() => []);
    const predecessors: number[][] = nodes.map(() => []);
    const linked = nodes.map(() => new Set<number>());

    for (const edge of graph.edges) {
        const from = componentOf.get(edge.from);
        const to = componentOf.get(edge.to);
        if (from === undefined || to === undefined || from === to) {
            continue;
        }
        const seen = linked[from];
        if (seen === undefined || seen.has(to)) {
            continue;
        }
        seen.add(to);
        arcs.push({ from, to });
        successors[from]?.push(to);
        predecessors[to]?.push(from);
    }

    logger.debug(
        `condensed ${graph.nodes.size} vertices and ${graph.edges.length} arcs into ` +
            `${nodes.length} components and ${arcs.length} component arcs`
    );

    return ok({ nodes, arcs, successors, predecessors, componentOf });
}
