/**
 * @fileoverview Structural classification of a condensation.
 * Tags every component node as source, sink, isolated or interior and
 * derives the counts the augmentation bound is built from.
 *
 * @module core/graph/classify
 */

import type { Classification, Condensation, NodeRole } from '../../types/graph.js';

/**
 * Role of a node from its in- and out-degree in the condensation.
 */
function roleOf(inDegree: number, outDegree: number): NodeRole {
    if (inDegree === 0 && outDegree === 0) {
        return 'isolated';
    }
    if (inDegree === 0) {
        return 'source';
    }
    if (outDegree === 0) {
        return 'sink';
    }
    return 'interior';
}

/**
 * Classifies every node of a condensation.
 *
 * `s` counts non-isolated sources, `t` non-isolated sinks and `q` isolated
 * nodes. A condensation with at most one node is already strongly connected,
 * so it reports `s = t = q = 0` and empty member lists whatever its lone node
 * would nominally be.
 *
 * @example
 * ```typescript
 * // components A → B, C alone
 * const { counts } = classifyCondensation(condensation);
 * // counts = { s: 1, t: 1, q: 1 }
 * ```
 */
export function classifyCondensation(condensation: Condensation): Classification {
    const roles = condensation.nodes.map((node) =>
        roleOf(
            condensation.predecessors[node.index]?.length ?? 0,
            condensation.successors[node.index]?.length ?? 0
        )
    );

    if (condensation.nodes.length <= 1) {
        return {
            roles,
            sources: [],
            sinks: [],
            isolated: [],
            counts: { s: 0, t: 0, q: 0 },
        };
    }

    const sources: number[] = [];
    const sinks: number[] = [];
    const isolated: number[] = [];

    roles.forEach((role, index) => {
        switch (role) {
            case 'source':
                sources.push(index);
                break;
            case 'sink':
                sinks.push(index);
                break;
            case 'isolated':
                isolated.push(index);
                break;
            case 'interior':
                break;
        }
    });

    return {
        roles,
        sources,
        sinks,
        isolated,
        counts: { s: sources.length, t: sinks.length, q: isolated.length },
    };
}

/**
 * Lower bound on the number of arcs needed to make the graph strongly
 * connected, which the constructor in `augment.ts` always meets.
 *
 * - at most one component: 0
 * - only isolated components (`s = t = 0`): `q`
 * - otherwise: `max(s, t) + q`
 *
 * @param nodeCount - Number of condensation nodes
 */
export function augmentationBound(classification: Classification, nodeCount: number): number {
    if (nodeCount <= 1) {
        return 0;
    }
    const { s, t, q } = classification.counts;
    return Math.max(s, t) + q;
}
