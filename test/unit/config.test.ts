/**
 * @fileoverview Unit tests for configuration loading and validation.
 * @module test/unit/config
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
    CONFIG_FILE,
    getDefault,
    loadConfig,
    mergeConfigs,
    saveConfig,
    validateConfig,
} from '../../src/state/config.js';

describe('validateConfig', () => {
    it('accepts an empty object', () => {
        expect(validateConfig({})).toEqual({ ok: true, value: {} });
    });

    it('accepts every known field', () => {
        const config = { version: 1, representative: 'lowest-id', logLevel: 'debug' };
        expect(validateConfig(config)).toEqual({ ok: true, value: config });
    });

    it('rejects a non-object', () => {
        const result = validateConfig('lowest-id');
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.type).toBe('validation');
        }
    });

    it('names the offending field', () => {
        const result = validateConfig({ representative: 'random' });
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.message.startsWith('representative: ')).toBe(true);
        }
    });

    it('rejects unknown fields and other versions', () => {
        expect(validateConfig({ colour: 'blue' }).ok).toBe(false);
        expect(validateConfig({ version: 2 }).ok).toBe(false);
    });
});

describe('mergeConfigs', () => {
    it('keeps base values for missing fields', () => {
        expect(mergeConfigs(getDefault(), { logLevel: 'debug' })).toEqual({
            version: 1,
            representative: 'first-visited',
            logLevel: 'debug',
        });
    });
});

describe('loadConfig and saveConfig', () => {
    let directory: string;

    beforeEach(async () => {
        directory = await fs.mkdtemp(path.join(os.tmpdir(), 'digraph-augment-'));
    });

    afterEach(async () => {
        await fs.rm(directory, { recursive: true, force: true });
    });

    it('returns defaults when no file exists', async () => {
        expect(await loadConfig(directory)).toEqual({ ok: true, value: getDefault() });
    });

    it('round-trips a saved config', async () => {
        const config = { version: 1, representative: 'lowest-id', logLevel: 'error' } as const;
        expect(await saveConfig(directory, config)).toEqual({ ok: true, value: undefined });
        expect(await loadConfig(directory)).toEqual({ ok: true, value: config });
    });

    it('fills missing fields with defaults', async () => {
        await fs.writeFile(path.join(directory, CONFIG_FILE), '{ "representative": "lowest-id" }');
        expect(await loadConfig(directory)).toEqual({
            ok: true,
            value: { version: 1, representative: 'lowest-id', logLevel: 'warn' },
        });
    });

    it('reports invalid JSON as a parse error', async () => {
        await fs.writeFile(path.join(directory, CONFIG_FILE), '{ not json');
        const result = await loadConfig(directory);
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.type).toBe('parse');
        }
    });

    it('reports schema violations as validation errors', async () => {
        await fs.writeFile(path.join(directory, CONFIG_FILE), '{ "logLevel": "loud" }');
        const result = await loadConfig(directory);
        expect(result.ok).toBe(false);
        if (!result.ok) {
            expect(result.error.type).toBe('validation');
        }
    });
});
