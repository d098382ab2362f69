/**
 * @fileoverview Public entry point of digraph-augment.
 *
 * @module digraph-augment
 */

export type * from './types/index.js';

export { computeAugmentingArcs, augment, applyAugmentation } from './core/graph/augment.js';
export { condense } from './core/graph/condensation.js';
export { classifyCondensation, augmentationBound } from './core/graph/classify.js';
export {
    findStronglyConnectedComponents,
    detectCycles,
    isStronglyConnected,
} from './core/graph/algorithms.js';
export { requireSimpleDigraph } from './core/graph/validate.js';
export {
    createGraph,
    fromArcs,
    reverseGraph,
    withEdges,
    type ArcTuple,
    type FromArcsOptions,
} from './core/graph/builders.js';

export { ok, err, mapResult, flatMapResult, createConsoleLogger, silentLogger } from './utils/index.js';
export {
    getDefault,
    loadConfig,
    saveConfig,
    validateConfig,
    mergeConfigs,
    CONFIG_FILE,
    type ConfigError,
    type PartialConfig,
} from './state/config.js';
