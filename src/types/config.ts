/**
 * @fileoverview Configuration types for digraph-augment.
 * Defines the shape of .digraph-augment.json and the logger contract.
 * Imports only from other Layer 0 type modules.
 *
 * @module types/config
 */

import type { RepresentativeStrategy } from './graph.js';

// ============================================================
// Logging Types
// ============================================================

/**
 * Minimum severity a logger emits.
 * `silent` suppresses everything.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Sink for diagnostic messages.
 * Implementations must never write to stdout when running under MCP,
 * since stdout carries JSON-RPC.
 */
export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

// ============================================================
// Root Configuration
// ============================================================

/**
 * Root configuration stored in .digraph-augment.json.
 */
export interface DigraphAugmentConfig {
    /** Schema version (always 1) */
    readonly version: 1;
    /** Representative vertex choice per component */
    readonly representative: RepresentativeStrategy;
    /** Minimum level written by the server logger */
    readonly logLevel: LogLevel;
}
