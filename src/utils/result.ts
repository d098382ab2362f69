/**
 * @fileoverview Result helpers for type-safe error handling.
 * The graph stages report failures as values; these helpers build and
 * chain them without try/catch at the call sites.
 *
 * @module utils/result
 */

import type { Result } from '../types/base.js';

/**
 * Creates a successful Result containing the given value.
 *
 * @example
 * const result = ok([{ from: 'b', to: 'a' }]);
 * // result: { ok: true, value: [{ from: 'b', to: 'a' }] }
 */
export function ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

/**
 * Creates a failed Result containing the given error.
 *
 * @example
 * const result = err({ type: 'has-cycle', message: 'a → b → a', cycle: ['a', 'b'] });
 */
export function err<E>(error: E): Result<never, E> {
    return { ok: false, error };
}

/**
 * Transforms the success value of a Result.
 * An error passes through unchanged.
 *
 * @example
 * const count = mapResult(computeAugmentingArcs(graph), (arcs) => arcs.length);
 */
export function mapResult<T, U, E>(
    result: Result<T, E>,
    fn: (value: T) => U
): Result<U, E> {
    if (result.ok) {
        return { ok: true, value: fn(result.value) };
    }
    return result;
}

/**
 * Chains a stage that can itself fail onto a previous Result.
 * The first error short-circuits the chain.
 *
 * @example
 * const classified = flatMapResult(condense(graph), (c) => ok(classifyCondensation(c)));
 */
export function flatMapResult<T, U, E>(
    result: Result<T, E>,
    fn: (value: T) => Result<U, E>
): Result<U, E> {
    if (result.ok) {
        return fn(result.value);
    }
    return result;
}
