/**
 * `docflow config` — View the resolved configuration.
 *
 * Dependency direction: config.ts → commander, config module
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { configExists, loadConfig, getConfigPath } from '../../core/config/manager.js';
import type { AppConfig } from '../../core/config/types.js';
import { errorMessage } from '../../core/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Copy of the config with API keys masked for display.
 */
export function redactConfig(config: AppConfig): AppConfig {
    const mask = (key: string | undefined): string | undefined => (key ? '********' : key);
    return {
        ...config,
        providers: {
            ...config.providers,
            gemini: config.providers.gemini
                ? { ...config.providers.gemini, apiKey: mask(config.providers.gemini.apiKey) }
                : undefined,
        },
        search: { ...config.search, apiKey: mask(config.search.apiKey) },
    };
}

export const configCommand = new Command('config')
    .description('View the resolved configuration')
    .option('-p, --path', 'Show config file path only')
    .action((options: { path?: boolean }) => {
        const projectRoot = process.cwd();

        if (options.path) {
            console.log(getConfigPath(projectRoot));
            return;
        }

        try {
            const config = loadConfig(projectRoot);

            logger.header('Current Configuration');
            console.log(
                chalk.gray(configExists(projectRoot) ? `File: ${getConfigPath(projectRoot)}` : 'File: (none, using defaults)'),
            );
            console.log();
            console.log(JSON.stringify(redactConfig(config), null, 2));
        } catch (err) {
            logger.error(errorMessage(err));
            process.exit(1);
        }
    });
