/**
 * @fileoverview Unit tests for the console logger.
 * @module test/unit/logger
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createConsoleLogger, silentLogger } from '../../src/utils/logger.js';

describe('createConsoleLogger', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('writes prefixed lines to stderr', () => {
        const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        createConsoleLogger('info').info('ready');
        expect(spy).toHaveBeenCalledWith('[digraph-augment] ready');
    });

    it('tags non-info levels', () => {
        const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const logger = createConsoleLogger('debug', '[test]');
        logger.debug('a', 1);
        logger.warn('b');
        expect(spy.mock.calls).toEqual([['[test] DEBUG a', 1], ['[test] WARN b']]);
    });

    it('drops messages below the threshold', () => {
        const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const logger = createConsoleLogger('warn');
        logger.debug('hidden');
        logger.info('hidden');
        logger.error('shown');
        expect(spy).toHaveBeenCalledTimes(1);
    });

    it('stays quiet when silent', () => {
        const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        silentLogger.error('nothing');
        expect(spy).not.toHaveBeenCalled();
    });
});
