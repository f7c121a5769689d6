/**
 * Configuration manager — load, save, validate, and merge configs.
 *
 * Resolution order (later wins): DEFAULT_CONFIG → .docflow/config.json → environment → CLI overrides.
 * The result is validated once and handed to the workflow runner explicitly.
 *
 * Dependency direction: manager.ts → schema.ts, defaults.ts, utils/fs.ts, errors.ts
 * Used by: CLI commands
 */

import { join, resolve } from 'node:path';
import type { ZodIssue } from 'zod';
import { appConfigSchema } from './schema.js';
import { CONFIG_DIR_NAME, CONFIG_FILE_NAME, DEFAULT_CONFIG, ENV_KEYS } from './defaults.js';
import type { AppConfig } from './types.js';
import { fileExists, readJsonFile, writeJsonFile } from '../../utils/fs.js';
import { ConfigError } from '../errors.js';
import { logger } from '../../utils/logger.js';

export type ConfigRecord = Record<string, unknown>;

/**
 * Resolve the config directory path for a given project root.
 */
export function getConfigDir(projectRoot: string): string {
    return join(resolve(projectRoot), CONFIG_DIR_NAME);
}

/**
 * Resolve the full config file path for a given project root.
 */
export function getConfigPath(projectRoot: string): string {
    return join(getConfigDir(projectRoot), CONFIG_FILE_NAME);
}

/**
 * Check whether a config file exists in the given project root.
 */
export function configExists(projectRoot: string): boolean {
    return fileExists(getConfigPath(projectRoot));
}

/**
 * Load and validate the configuration.
 *
 * A missing config file is not an error: defaults plus environment
 * variables are enough to run. Credentials are checked afterwards.
 *
 * @param projectRoot - The root directory of the project (where .docflow/ lives)
 * @param env - Environment to read API keys from
 * @param overrides - Values that win over file and environment (CLI flags)
 * @throws {ConfigError} if the file is invalid JSON, fails validation, or a required key is missing
 */
export function loadConfig(
    projectRoot: string,
    env: NodeJS.ProcessEnv = process.env,
    overrides: ConfigRecord = {},
): AppConfig {
    const configPath = getConfigPath(projectRoot);
    let merged: ConfigRecord = { ...DEFAULT_CONFIG };

    if (fileExists(configPath)) {
        logger.debug(`Loading config from ${configPath}`);
        const raw = readJsonFile(configPath);
        if (!isPlainObject(raw)) {
            throw new ConfigError('Invalid configuration file: expected a JSON object', { configPath });
        }
        merged = mergeConfig(merged, raw);
    } else {
        logger.debug(`No config file at ${configPath}, using defaults`);
    }

    merged = mergeConfig(merged, envOverrides(env));
    merged = mergeConfig(merged, overrides);

    const result = appConfigSchema.safeParse(merged);
    if (!result.success) {
        throw new ConfigError(
            `Invalid configuration file:\n${formatIssues(result.error.issues)}`,
            { configPath, issues: result.error.issues },
        );
    }

    assertCredentials(result.data);
    logger.debug('Config loaded and validated successfully');
    return result.data;
}

/**
 * Fail fast when the chosen provider or the search tool lacks an API key.
 *
 * @throws {ConfigError} naming the environment variable to set
 */
export function assertCredentials(config: AppConfig): void {
    if (config.model.provider === 'gemini' && !config.providers.gemini?.apiKey) {
        throw new ConfigError(
            `Gemini API key is missing. Set ${ENV_KEYS.geminiApiKey} or providers.gemini.apiKey.`,
            { provider: 'gemini' },
        );
    }

    if (config.search.enabled && !config.search.apiKey) {
        throw new ConfigError(
            `Search API key is missing. Set ${ENV_KEYS.searchApiKey}, set search.apiKey, or disable search.`,
            { tool: 'search' },
        );
    }
}

/**
 * Save configuration to disk, validating before write.
 *
 * @throws {ConfigError} if validation fails
 * @throws {OutputError} if the write fails
 */
export function saveConfig(projectRoot: string, config: AppConfig): void {
    const result = appConfigSchema.safeParse(config);

    if (!result.success) {
        throw new ConfigError(
            `Cannot save invalid configuration:\n${formatIssues(result.error.issues)}`,
            { issues: result.error.issues },
        );
    }

    const configPath = getConfigPath(projectRoot);
    writeJsonFile(configPath, result.data);
    logger.debug(`Config saved to ${configPath}`);
}

/**
 * Deep merge two config objects. Source values override target values.
 * Arrays are replaced, not concatenated.
 */
export function mergeConfig(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const result: ConfigRecord = { ...target };

    for (const [key, sourceVal] of Object.entries(source)) {
        const targetVal = result[key];

        if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
            result[key] = mergeConfig(targetVal, sourceVal);
        } else if (sourceVal !== undefined) {
            result[key] = sourceVal;
        }
    }

    return result;
}

/**
 * Get the default configuration with optional partial overrides merged in.
 * @throws {ConfigError} if the overrides produce an invalid config
 */
export function getDefaultConfig(overrides?: ConfigRecord): AppConfig {
    const merged = overrides ? mergeConfig({ ...DEFAULT_CONFIG }, overrides) : { ...DEFAULT_CONFIG };
    const result = appConfigSchema.safeParse(merged);

    if (!result.success) {
        throw new ConfigError(
            `Invalid configuration overrides:\n${formatIssues(result.error.issues)}`,
            { issues: result.error.issues },
        );
    }

    return result.data;
}

// ── Private helpers ──

function envOverrides(env: NodeJS.ProcessEnv): ConfigRecord {
    const overrides: ConfigRecord = {};
    const geminiKey = env[ENV_KEYS.geminiApiKey];
    const searchKey = env[ENV_KEYS.searchApiKey];
    const ollamaUrl = env[ENV_KEYS.ollamaBaseUrl];

    const providers: ConfigRecord = {};
    if (geminiKey) providers.gemini = { apiKey: geminiKey };
    if (ollamaUrl) providers.ollama = { baseUrl: ollamaUrl };
    if (Object.keys(providers).length > 0) overrides.providers = providers;

    if (searchKey) overrides.search = { apiKey: searchKey };

    return overrides;
}

function formatIssues(issues: ZodIssue[]): string {
    return issues.map((i) => `  - ${i.path.join('.')}: ${i.message}`).join('\n');
}

function isPlainObject(value: unknown): value is ConfigRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
