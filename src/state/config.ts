/**
 * @fileoverview Configuration management for digraph-augment.
 * Handles loading, saving, validation, and merging of .digraph-augment.json.
 *
 * @module state/config
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { AsyncResult, Result } from '../types/base.js';
import type { DigraphAugmentConfig } from '../types/config.js';
import { ok, err } from '../utils/result.js';

// ============================================================
// Types
// ============================================================

/**
 * Error types for configuration operations.
 */
export type ConfigError =
    | { readonly type: 'io'; readonly message: string }
    | { readonly type: 'parse'; readonly message: string }
    | { readonly type: 'validation'; readonly message: string };

// ============================================================
// Constants
// ============================================================

export const CONFIG_FILE = '.digraph-augment.json';

const DEFAULT_CONFIG: DigraphAugmentConfig = {
    version: 1,
    representative: 'first-visited',
    logLevel: 'warn',
};

/**
 * Accepted shape of the config file. Every field is optional; missing fields
 * fall back to the defaults.
 */
const configSchema = z
    .object({
        version: z.literal(1).optional(),
        representative: z.enum(['first-visited', 'lowest-id']).optional(),
        logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    })
    .strict();

/** Partial configuration as read from disk. */
export type PartialConfig = z.infer<typeof configSchema>;

// ============================================================
// Default Configuration
// ============================================================

/**
 * Returns the default configuration.
 *
 * @example
 * const config = getDefault();
 * console.log(config.representative); // 'first-visited'
 */
export function getDefault(): DigraphAugmentConfig {
    return { ...DEFAULT_CONFIG };
}

// ============================================================
// Configuration Loading
// ============================================================

/**
 * Loads configuration from a directory.
 * Reads .digraph-augment.json if it exists, otherwise returns defaults.
 *
 * @param directory - Directory holding the config file
 *
 * @example
 * const result = await loadConfig(process.cwd());
 * if (result.ok) {
 *   console.log('Loaded config:', result.value);
 * }
 */
export async function loadConfig(directory: string): AsyncResult<DigraphAugmentConfig, ConfigError> {
    const configPath = path.join(directory, CONFIG_FILE);

    let json: string;
    try {
        json = await fs.readFile(configPath, 'utf-8');
    } catch (e) {
        if (isMissingFile(e)) {
            return ok(getDefault());
        }
        const message = e instanceof Error ? e.message : String(e);
        return err({ type: 'io', message: `Failed to load config: ${message}` });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        return err({ type: 'parse', message: `Invalid JSON in ${CONFIG_FILE}: ${message}` });
    }

    const validationResult = validateConfig(parsed);
    if (!validationResult.ok) {
        return validationResult;
    }

    return ok(mergeConfigs(getDefault(), validationResult.value));
}

function isMissingFile(e: unknown): boolean {
    return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

// ============================================================
// Configuration Saving
// ============================================================

/**
 * Saves configuration to a directory as .digraph-augment.json.
 *
 * @example
 * const result = await saveConfig(process.cwd(), config);
 * if (!result.ok) {
 *   console.error('Failed to save:', result.error.message);
 * }
 */
export async function saveConfig(
    directory: string,
    config: DigraphAugmentConfig
): AsyncResult<void, ConfigError> {
    try {
        const configPath = path.join(directory, CONFIG_FILE);
        await fs.writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
        return ok(undefined);
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        return err({ type: 'io', message: `Failed to save config: ${message}` });
    }
}

// ============================================================
// Configuration Validation
// ============================================================

/**
 * Validates a parsed object against the config schema.
 * The first issue found is reported with its dotted path.
 *
 * @example
 * validateConfig({ representative: 'random' });
 * // { ok: false, error: { type: 'validation', message: "representative: Invalid enum value. ..." } }
 */
export function validateConfig(obj: unknown): Result<PartialConfig, ConfigError> {
    const parsed = configSchema.safeParse(obj);
    if (parsed.success) {
        return ok(parsed.data);
    }

    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return err({
        type: 'validation',
        message: `${where}${issue?.message ?? 'Invalid configuration'}`,
    });
}

// ============================================================
// Configuration Merging
// ============================================================

/**
 * Merges a partial configuration over a base configuration.
 * Override values take precedence; undefined fields keep the base value.
 *
 * @example
 * const merged = mergeConfigs(getDefault(), { logLevel: 'debug' });
 */
export function mergeConfigs(
    base: DigraphAugmentConfig,
    override: PartialConfig
): DigraphAugmentConfig {
    return {
        version: 1,
        representative: override.representative ?? base.representative,
        logLevel: override.logLevel ?? base.logLevel,
    };
}
