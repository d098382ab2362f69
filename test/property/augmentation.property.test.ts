/**
 * @fileoverview Property-based tests for minimum augmentation.
 * For any simple digraph, the computed arcs make it strongly connected and
 * their number equals the bound recomputed from plain reachability.
 *
 * @module test/property/augmentation
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { applyAugmentation, augment, computeAugmentingArcs } from '../../src/core/graph/augment.js';
import { reverseGraph } from '../../src/core/graph/builders.js';
import {
    arbitraryDAG,
    arbitraryDigraph,
    gnpRandomGraph,
    isCorrectlyAugmented,
    naiveBound,
    naiveIsStronglyConnected,
    seededRandom,
} from '../helpers/generators.js';

// ============================================================
// Test Configuration
// ============================================================

const PROPERTY_CONFIG: fc.Parameters<unknown> = {
    numRuns: 200,
    verbose: false,
};

// ============================================================
// Property Tests
// ============================================================

describe('Property: minimum strong-connectivity augmentation', () => {
    it('augments any digraph to a strongly connected one with exactly the bound', () => {
        fc.assert(
            fc.property(arbitraryDigraph(8), (graph) => {
                expect(isCorrectlyAugmented(graph)).toBe(true);
            }),
            PROPERTY_CONFIG
        );
    });

    it('augments any DAG, and its reverse, with exactly the bound', () => {
        fc.assert(
            fc.property(arbitraryDAG(10), (graph) => {
                expect(isCorrectlyAugmented(graph)).toBe(true);
                expect(isCorrectlyAugmented(reverseGraph(graph))).toBe(true);
            }),
            PROPERTY_CONFIG
        );
    });

    it('gives the same arcs on a DAG whether or not it is asserted to be a condensation', () => {
        fc.assert(
            fc.property(arbitraryDAG(10), (graph) => {
                const decomposed = computeAugmentingArcs(graph);
                const asserted = computeAugmentingArcs(graph, { assumeIsCondensation: true });
                expect(asserted).toEqual(decomposed);
            }),
            PROPERTY_CONFIG
        );
    });

    it('reports a bound equal to the arc count', () => {
        fc.assert(
            fc.property(arbitraryDigraph(8), (graph) => {
                const result = augment(graph);
                expect(result.ok).toBe(true);
                if (result.ok) {
                    expect(result.value.bound).toBe(result.value.arcs.length);
                    expect(result.value.bound).toBe(naiveBound(graph));
                }
            }),
            PROPERTY_CONFIG
        );
    });

    it('is correct under the lowest-id representative strategy', () => {
        fc.assert(
            fc.property(arbitraryDigraph(8), (graph) => {
                const result = computeAugmentingArcs(graph, { representative: 'lowest-id' });
                expect(result.ok).toBe(true);
                if (result.ok) {
                    expect(result.value).toHaveLength(naiveBound(graph));
                    expect(naiveIsStronglyConnected(applyAugmentation(graph, result.value))).toBe(true);
                }
            }),
            PROPERTY_CONFIG
        );
    });

    it('augments random G(n, p) graphs across sizes and densities', () => {
        const random = seededRandom(20240611);
        for (let n = 1; n < 60; n++) {
            for (let p = 0.019; p < 1; p += 0.2) {
                const graph = gnpRandomGraph(n, p, random);
                expect(isCorrectlyAugmented(graph)).toBe(true);
            }
        }
    });
});
