/**
 * @fileoverview Barrel file for utility functions.
 * Re-exports all utilities from the utils/ directory.
 * Layer 1 - pure utility functions that import only from types/.
 *
 * @module utils
 */

// Result type helpers for type-safe error handling
export { ok, err, mapResult, flatMapResult } from './result.js';

// Console logging to stderr
export { createConsoleLogger, silentLogger, LOG_PREFIX } from './logger.js';
