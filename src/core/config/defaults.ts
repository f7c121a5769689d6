/**
 * Default configuration values.
 *
 * The init wizard overrides these based on user choices; API keys
 * normally come from the environment rather than the config file.
 *
 * Dependency direction: defaults.ts → types.ts
 * Used by: manager.ts, init.ts
 */

import type { AppConfig } from './types.js';

/**
 * Full default configuration.
 *
 * Gemini with a low temperature keeps documentation and test scenarios
 * close to the source; search is on so research can look up libraries.
 */
export const DEFAULT_CONFIG: AppConfig = {
    version: 1,

    model: {
        provider: 'gemini',
        model: 'gemini-2.5-flash',
        temperature: 0.3,
        maxTokens: 8192,
        maxToolRounds: 8,
    },

    providers: {
        gemini: {
            baseUrl: 'https://generativelanguage.googleapis.com',
        },
        ollama: {
            baseUrl: 'http://localhost:11434',
        },
    },

    search: {
        enabled: true,
        baseUrl: 'https://api.tavily.com',
        maxResults: 2,
    },

    execution: {
        language: 'python',
        timeoutMs: 30_000,
    },

    output: {
        analysisFile: 'analysis.txt',
        diagramFile: 'workflow_diagram.mmd',
        includeTimestamp: false,
    },

    promptsFile: 'prompts.yaml',
};

/** The directory name where config is stored inside a project. */
export const CONFIG_DIR_NAME = '.docflow';

/** The config file name. */
export const CONFIG_FILE_NAME = 'config.json';

/** Environment variables that override config file values. */
export const ENV_KEYS = {
    geminiApiKey: 'GOOGLE_API_KEY',
    searchApiKey: 'TAVILY_API_KEY',
    ollamaBaseUrl: 'OLLAMA_BASE_URL',
} as const;
