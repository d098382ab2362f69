/**
 * @fileoverview Barrel file for digraph-augment type definitions.
 * Re-exports all types from Layer 0 type modules.
 *
 * @module types
 */

// Base types (foundational, no dependencies)
export type { VertexId, Result, AsyncResult } from './base.js';

// Config types
export type { LogLevel, Logger, DigraphAugmentConfig } from './config.js';

// Graph types (depends on: base, config)
export type {
    GraphKind,
    GraphNode,
    GraphEdge,
    Graph,
    RepresentativeStrategy,
    CondensationNode,
    CondensationArc,
    Condensation,
    NodeRole,
    RoleCounts,
    Classification,
    AugmentingArc,
    AugmentOptions,
    AugmentError,
    Augmentation,
} from './graph.js';
