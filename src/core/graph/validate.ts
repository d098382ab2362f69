/**
 * @fileoverview Capability check for the augmentation entry points.
 * The core only accepts simple directed graphs; everything else is rejected
 * here, once, before any stage runs.
 *
 * @module core/graph/validate
 */

import type { Result } from '../../types/base.js';
import type { AugmentError, Graph } from '../../types/graph.js';
import { ok, err } from '../../utils/result.js';
import { arcKey } from './builders.js';

/**
 * Confirms that a graph is a simple directed graph.
 *
 * Rejects, with `unsupported-graph-category`:
 * - any kind other than `'directed'`
 * - a repeated ordered pair (a parallel arc)
 * - an edge whose endpoint is not a declared node
 *
 * @example
 * ```typescript
 * const check = requireSimpleDigraph(fromArcs([['a', 'b']], { kind: 'undirected' }));
 * // check.ok === false, check.error.type === 'unsupported-graph-category'
 * ```
 */
export function requireSimpleDigraph<T>(graph: Graph<T>): Result<void, AugmentError> {
    if (graph.kind !== 'directed') {
        return err({
            type: 'unsupported-graph-category',
            message: `Graph category '${graph.kind}' is not supported; a simple directed graph is required`,
        });
    }

    const seen = new Set<string>();
    for (const edge of graph.edges) {
        if (!graph.nodes.has(edge.from) || !graph.nodes.has(edge.to)) {
            const missing = graph.nodes.has(edge.from) ? edge.to : edge.from;
            return err({
                type: 'unsupported-graph-category',
                message: `Arc ${edge.from} → ${edge.to} references undeclared vertex '${missing}'`,
            });
        }

        const key = arcKey(edge.from, edge.to);
        if (seen.has(key)) {
            return err({
                type: 'unsupported-graph-category',
                message: `Parallel arc ${edge.from} → ${edge.to}; multigraphs are not supported`,
            });
        }
        seen.add(key);
    }

    return ok(undefined);
}
