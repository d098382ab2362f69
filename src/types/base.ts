/**
 * @fileoverview Foundational types for digraph-augment.
 * This module contains the identifier and result types shared by every layer.
 * Zero imports - this is the base layer of the type system.
 *
 * @module types/base
 */

// ============================================================
// Identifier Types
// ============================================================

/**
 * Identifier of a vertex in an input graph.
 * Opaque: the algorithms only compare identifiers for equality and,
 * under the `lowest-id` representative strategy, for string order.
 */
export type VertexId = string;

// ============================================================
// Result Types
// ============================================================

/**
 * Result type for operations that can fail.
 * Provides type-safe error handling without exceptions.
 *
 * @typeParam T - The success value type
 * @typeParam E - The error type (defaults to Error)
 *
 * @example
 * function divide(a: number, b: number): Result<number, string> {
 *   if (b === 0) {
 *     return { ok: false, error: 'Division by zero' };
 *   }
 *   return { ok: true, value: a / b };
 * }
 */
export type Result<T, E = Error> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: E };

/**
 * Async result type for asynchronous operations that can fail.
 * Wraps Result in a Promise for async/await compatibility.
 *
 * @typeParam T - The success value type
 * @typeParam E - The error type (defaults to Error)
 */
export type AsyncResult<T, E = Error> = Promise<Result<T, E>>;
