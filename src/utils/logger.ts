/**
 * @fileoverview Leveled console logger.
 * Every line goes to stderr with a bracketed prefix, so the logger is safe to
 * use while stdout carries MCP JSON-RPC traffic.
 *
 * @module utils/logger
 */

import type { Logger, LogLevel } from '../types/config.js';

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

/** Default prefix for lines written by the project's loggers. */
export const LOG_PREFIX = '[digraph-augment]';

/**
 * Creates a logger writing through `console.error`.
 *
 * @param level - Minimum level to emit
 * @param prefix - Tag prepended to each line
 *
 * @example
 * const logger = createConsoleLogger('info');
 * logger.info('Server connected and ready');
 * // stderr: [digraph-augment] Server connected and ready
 */
export function createConsoleLogger(level: LogLevel, prefix: string = LOG_PREFIX): Logger {
    const threshold = LEVEL_ORDER[level];

    const emit = (messageLevel: Exclude<LogLevel, 'silent'>, message: string, details: unknown[]): void => {
        if (LEVEL_ORDER[messageLevel] < threshold) {
            return;
        }
        const tag = messageLevel === 'info' ? prefix : `${prefix} ${messageLevel.toUpperCase()}`;
        console.error(`${tag} ${message}`, ...details);
    };

    return {
        debug: (message, ...details) => emit('debug', message, details),
        info: (message, ...details) => emit('info', message, details),
        warn: (message, ...details) => emit('warn', message, details),
        error: (message, ...details) => emit('error', message, details),
    };
}

/** Logger that drops every message. */
export const silentLogger: Logger = createConsoleLogger('silent');
