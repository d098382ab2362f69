/**
 * @fileoverview Unit tests for Tarjan decomposition and cycle queries.
 * @module test/unit/algorithms
 */

import { describe, it, expect } from 'vitest';
import {
    findStronglyConnectedComponents,
    detectCycles,
    isStronglyConnected,
} from '../../src/core/graph/algorithms.js';
import { fromArcs } from '../../src/core/graph/builders.js';
import { cycleGraph, ids, pathGraph } from '../helpers/generators.js';

describe('findStronglyConnectedComponents', () => {
    it('returns no components for an empty graph', () => {
        expect(findStronglyConnectedComponents(fromArcs([]))).toEqual([]);
    });

    it('emits components after the components they reach', () => {
        const graph = fromArcs([['a', 'b'], ['b', 'a'], ['b', 'c']]);
        expect(findStronglyConnectedComponents(graph)).toEqual([['c'], ['a', 'b']]);
    });

    it('lists members in discovery order with the root first', () => {
        const graph = fromArcs([['x', 'y'], ['y', 'z'], ['z', 'x']]);
        expect(findStronglyConnectedComponents(graph)).toEqual([['x', 'y', 'z']]);
    });

    it('puts every vertex in exactly one component', () => {
        const graph = fromArcs(
            [['a', 'b'], ['b', 'c'], ['c', 'a'], ['c', 'd'], ['d', 'e'], ['e', 'd']],
            { vertices: ['f'] }
        );
        const members = findStronglyConnectedComponents(graph).flat().sort();
        expect(members).toEqual(['a', 'b', 'c', 'd', 'e', 'f']);
        expect(findStronglyConnectedComponents(graph)).toHaveLength(3);
    });

    it('decomposes a path of 100000 vertices without recursing per vertex', () => {
        const sccs = findStronglyConnectedComponents(pathGraph(100_000));
        expect(sccs).toHaveLength(100_000);
        expect(sccs[0]).toEqual(['99999']);
        expect(sccs[sccs.length - 1]).toEqual(['0']);
    });

    it('keeps a cycle of 100000 vertices in one component rooted at its first vertex', () => {
        const sccs = findStronglyConnectedComponents(cycleGraph(ids(100_000)));
        expect(sccs).toHaveLength(1);
        expect(sccs[0]?.[0]).toBe('0');
        expect(sccs[0]?.[99_999]).toBe('99999');
    });
});

describe('detectCycles', () => {
    it('finds nothing in a DAG', () => {
        expect(detectCycles(fromArcs([['a', 'b'], ['a', 'c'], ['b', 'c']]))).toEqual([]);
    });

    it('reports a self-loop as a one-vertex cycle', () => {
        expect(detectCycles(fromArcs([['a', 'a']]))).toEqual([['a']]);
    });

    it('reports a 2-cycle', () => {
        expect(detectCycles(fromArcs([['a', 'b'], ['b', 'a']]))).toEqual([['a', 'b']]);
    });

    it('ignores acyclic vertices around a cycle', () => {
        const graph = fromArcs([['d', 'a'], ['a', 'b'], ['b', 'c'], ['c', 'a'], ['c', 'e']]);
        expect(detectCycles(graph)).toEqual([['a', 'b', 'c']]);
    });
});

describe('isStronglyConnected', () => {
    it('holds for the empty and single-vertex graphs', () => {
        expect(isStronglyConnected(fromArcs([]))).toBe(true);
        expect(isStronglyConnected(fromArcs([], { vertices: ['a'] }))).toBe(true);
    });

    it('holds for a cycle and fails for a path', () => {
        expect(isStronglyConnected(fromArcs([['a', 'b'], ['b', 'a']]))).toBe(true);
        expect(isStronglyConnected(fromArcs([['a', 'b']]))).toBe(false);
    });
});
