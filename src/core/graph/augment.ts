/**
 * @fileoverview Minimum strong-connectivity augmentation (Eswaran–Tarjan).
 * Given a directed graph, computes a smallest set of new arcs whose addition
 * makes every vertex reachable from every other vertex.
 *
 * The construction works on the condensation. Sources and sinks are first
 * paired so that each paired source reaches its sink, every source reaches a
 * paired sink and every sink is reached from a paired source. New arcs then
 * chain the pairs into one cycle, attach the unpaired sources and sinks to
 * it, and splice the isolated components into its closing arc. The arc count
 * is `max(s, t) + q`, which no augmenting set can go below.
 *
 * @module core/graph/augment
 */

import type { Result } from '../../types/base.js';
import type {
    Augmentation,
    AugmentError,
    AugmentOptions,
    AugmentingArc,
    Classification,
    Condensation,
    CondensationNode,
    Graph,
} from '../../types/graph.js';
import { ok, mapResult } from '../../utils/result.js';
import { silentLogger } from '../../utils/logger.js';
import { withEdges } from './builders.js';
import { augmentationBound, classifyCondensation } from './classify.js';
import { condense } from './condensation.js';

// ============================================================
// Internal Types
// ============================================================

/**
 * The condensation seen in one direction.
 * The construction needs at least as many sinks as sources; when the graph
 * has more sources it runs on the reversed condensation instead.
 */
interface Orientation {
    readonly sources: readonly number[];
    readonly sinks: readonly number[];
    readonly successors: ReadonlyArray<readonly number[]>;
    readonly reversed: boolean;
}

/**
 * Internal state for the pairing search.
 */
interface PairingState {
    /** Nodes visited by any search so far */
    marked: Set<number>;
    /** Sink found by the current search */
    found: number | undefined;
}

/**
 * Sources and sinks reordered so that the first `paired` of each form
 * reaching pairs.
 */
interface Pairing {
    readonly sources: readonly number[];
    readonly sinks: readonly number[];
    readonly paired: number;
}

/**
 * A node whose successors the pairing search is still walking.
 */
interface SearchFrame {
    readonly node: number;
    successorIndex: number;
}

type NodeLink = readonly [CondensationNode, CondensationNode];

// ============================================================
// Helper Functions
// ============================================================

function orient(condensation: Condensation, classification: Classification): Orientation {
    if (classification.counts.s <= classification.counts.t) {
        return {
            sources: classification.sources,
            sinks: classification.sinks,
            successors: condensation.successors,
            reversed: false,
        };
    }
    return {
        sources: classification.sinks,
        sinks: classification.sources,
        successors: condensation.predecessors,
        reversed: true,
    };
}

/**
 * Depth-first search for an unmarked sink.
 * Marks stay set across searches, so each node is expanded at most once over
 * the whole pairing pass. Stops expanding as soon as a sink is found.
 */
function search(
    start: number,
    successors: ReadonlyArray<readonly number[]>,
    sinks: ReadonlySet<number>,
    state: PairingState
): void {
    if (state.marked.has(start)) {
        return;
    }
    state.marked.add(start);
    if (sinks.has(start)) {
        state.found = start;
        return;
    }

    const frames: SearchFrame[] = [{ node: start, successorIndex: 0 }];
    let frame = frames[frames.length - 1];
    while (frame !== undefined && state.found === undefined) {
        const successor = successors[frame.node]?.[frame.successorIndex];
        if (successor === undefined) {
            frames.pop();
        } else {
            frame.successorIndex++;
            if (!state.marked.has(successor)) {
                state.marked.add(successor);
                if (sinks.has(successor)) {
                    state.found = successor;
                } else {
                    frames.push({ node: successor, successorIndex: 0 });
                }
            }
        }
        frame = frames[frames.length - 1];
    }
}

/**
 * Pairs sources with sinks they reach.
 * Paired nodes come first in both returned lists, in pairing order; the
 * unpaired ones follow in their original order.
 */
function pairSourcesWithSinks(orientation: Orientation): Pairing {
    const sinkSet = new Set(orientation.sinks);
    const state: PairingState = { marked: new Set(), found: undefined };
    const pairedSources: number[] = [];
    const pairedSinks: number[] = [];

    for (const source of orientation.sources) {
        state.found = undefined;
        search(source, orientation.successors, sinkSet, state);
        if (state.found !== undefined) {
            pairedSources.push(source);
            pairedSinks.push(state.found);
        }
    }

    const sourceSet = new Set(pairedSources);
    const takenSinks = new Set(pairedSinks);
    return {
        sources: [...pairedSources, ...orientation.sources.filter((n) => !sourceSet.has(n))],
        sinks: [...pairedSinks, ...orientation.sinks.filter((n) => !takenSinks.has(n))],
        paired: pairedSources.length,
    };
}

function nodesAt(condensation: Condensation, indices: readonly number[]): CondensationNode[] {
    const nodes: CondensationNode[] = [];
    for (const index of indices) {
        const node = condensation.nodes[index];
        if (node !== undefined) {
            nodes.push(node);
        }
    }
    return nodes;
}

/**
 * Pairs up elements at equal positions, up to the shorter list.
 */
function zip<A, B>(left: readonly A[], right: readonly B[]): Array<readonly [A, B]> {
    const pairs: Array<readonly [A, B]> = [];
    const length = Math.min(left.length, right.length);
    for (let i = 0; i < length; i++) {
        const a = left[i];
        const b = right[i];
        if (a !== undefined && b !== undefined) {
            pairs.push([a, b]);
        }
    }
    return pairs;
}

/**
 * Links each element of a chain to the next one.
 */
function linkConsecutive<N>(chain: readonly N[]): Array<readonly [N, N]> {
    const links: Array<readonly [N, N]> = [];
    let previous: N | undefined;
    for (const item of chain) {
        if (previous !== undefined) {
            links.push([previous, item]);
        }
        previous = item;
    }
    return links;
}

/**
 * Arcs for a condensation whose nodes are all isolated: one cycle through
 * every node.
 */
function linkIsolated(isolated: readonly CondensationNode[]): NodeLink[] {
    return linkConsecutive([...isolated, ...isolated.slice(0, 1)]);
}

/**
 * Arcs for a condensation with at least one non-isolated source, in the
 * orientation where sources do not outnumber sinks.
 *
 * With sources v, sinks w (paired first, p pairs) and isolated nodes x:
 * - w[i] → v[i+1] chains the pairs, for i < p - 1
 * - w[i] → v[i] hooks each unpaired source onto an unpaired sink
 * - w[p-1] → surplus sinks → x[0] → … → x[q-1] → v[0] closes the cycle
 */
function linkSourcesAndSinks(
    sources: readonly CondensationNode[],
    sinks: readonly CondensationNode[],
    paired: number,
    isolated: readonly CondensationNode[]
): NodeLink[] {
    const s = sources.length;

    const chained = zip(sinks.slice(0, paired - 1), sources.slice(1, paired));
    const hooked = zip(sinks.slice(paired, s), sources.slice(paired, s));
    const closing = linkConsecutive([
        ...sinks.slice(paired - 1, paired),
        ...sinks.slice(s),
        ...isolated,
        ...sources.slice(0, 1),
    ]);

    return [...chained, ...hooked, ...closing];
}

// ============================================================
// Public API
// ============================================================

/**
 * Computes a minimum augmenting arc set together with the condensation and
 * classification it was derived from.
 *
 * The input graph is never modified; use {@link applyAugmentation} to obtain
 * the augmented graph.
 *
 * @typeParam T - The type of data stored in graph nodes
 * @returns The augmentation, or `unsupported-graph-category` when the input is
 *   not a simple directed graph, or `has-cycle` when `assumeIsCondensation`
 *   is set and the input has a cycle
 *
 * @example
 * ```typescript
 * const result = augment(fromArcs([['0', '1'], ['1', '2']]));
 * if (result.ok) {
 *   result.value.arcs;  // [{ from: '2', to: '0' }]
 *   result.value.bound; // 1
 * }
 * ```
 */
export function augment<T>(
    graph: Graph<T>,
    options: AugmentOptions = {}
): Result<Augmentation, AugmentError> {
    const condensed = condense(graph, options);
    if (!condensed.ok) {
        return condensed;
    }

    const logger = options.logger ?? silentLogger;
    const condensation = condensed.value;
    const classification = classifyCondensation(condensation);
    const bound = augmentationBound(classification, condensation.nodes.length);
    const { s, t, q } = classification.counts;

    let links: NodeLink[];
    if (condensation.nodes.length <= 1) {
        logger.debug('graph is already strongly connected');
        links = [];
    } else if (s === 0 && t === 0) {
        logger.debug(`linking ${q} isolated components into one cycle`);
        links = linkIsolated(nodesAt(condensation, classification.isolated));
    } else {
        const orientation = orient(condensation, classification);
        const pairing = pairSourcesWithSinks(orientation);
        logger.debug(
            `s=${s} t=${t} q=${q}: ${pairing.paired} source-sink pairs` +
                (orientation.reversed ? ' (reversed)' : '')
        );
        const oriented = linkSourcesAndSinks(
            nodesAt(condensation, pairing.sources),
            nodesAt(condensation, pairing.sinks),
            pairing.paired,
            nodesAt(condensation, classification.isolated)
        );
        links = orientation.reversed
            ? oriented.map(([from, to]) => [to, from] as const)
            : oriented;
    }

    const arcs: AugmentingArc[] = links.map(([from, to]) => ({
        from: from.representative,
        to: to.representative,
    }));

    logger.debug(`augmenting with ${arcs.length} arcs (bound ${bound})`);

    return ok({ arcs, bound, condensation, classification });
}

/**
 * Computes a minimum set of new arcs whose addition makes the graph strongly
 * connected.
 *
 * Every arc joins the representative vertices of two distinct components; no
 * arc is a self-loop or duplicates an existing arc. The empty graph and any
 * strongly connected graph yield an empty set.
 *
 * @typeParam T - The type of data stored in graph nodes
 *
 * @example
 * ```typescript
 * const result = computeAugmentingArcs(fromArcs([], { vertices: ['a', 'b', 'c'] }));
 * // result.value: three arcs forming one cycle through a, b and c
 * ```
 */
export function computeAugmentingArcs<T>(
    graph: Graph<T>,
    options: AugmentOptions = {}
): Result<readonly AugmentingArc[], AugmentError> {
    return mapResult(augment(graph, options), (augmentation) => augmentation.arcs);
}

/**
 * Returns a copy of the graph with the augmenting arcs added.
 */
export function applyAugmentation<T>(graph: Graph<T>, arcs: readonly AugmentingArc[]): Graph<T> {
    return withEdges(graph, arcs);
}
