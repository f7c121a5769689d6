/**
 * `docflow doctor` — Health check for the configured provider and setup.
 *
 * Dependency direction: doctor.ts → commander, ora, chalk, config module, registry
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { configExists, loadConfig } from '../../core/config/manager.js';
import { createProvider } from '../../providers/registry.js';
import { loadPrompts } from '../../prompts/library.js';
import { errorMessage } from '../../core/errors.js';
import type { AppConfig } from '../../core/config/types.js';
import { logger } from '../../utils/logger.js';

function checkSetup(projectRoot: string): AppConfig | undefined {
    try {
        const config = loadConfig(projectRoot);
        console.log(chalk.green('  ✔ Configuration is valid'));
        loadPrompts(projectRoot, config.promptsFile);
        console.log(chalk.green('  ✔ Prompts are valid'));
        return config;
    } catch (err) {
        console.log(chalk.red(`  ✘ ${errorMessage(err)}`));
        return undefined;
    }
}

export const doctorCommand = new Command('doctor')
    .description('Check project setup and provider health')
    .action(async () => {
        const projectRoot = process.cwd();

        logger.header('docflow — Health Check');

        console.log(
            configExists(projectRoot)
                ? chalk.green('  ✔ Configuration file found')
                : chalk.gray('  - No configuration file, using defaults'),
        );

        const config = checkSetup(projectRoot);
        if (!config) {
            process.exit(1);
        }

        console.log();
        logger.info('Checking provider connection...');

        const { provider: name, model } = config.model;
        const spinner = ora(`Testing ${name}...`).start();
        let healthy = false;
        try {
            healthy = await createProvider(name, config.providers).validateConnection();
        } catch (err) {
            logger.debug(`Provider check failed: ${errorMessage(err)}`);
        }
        spinner.stop();

        console.log(
            healthy
                ? chalk.green(`  ✔ ${name} (${model}) — connected`)
                : chalk.red(`  ✘ ${name} (${model}) — connection failed`),
        );
        console.log(
            config.search.enabled
                ? chalk.green('  ✔ Library search enabled')
                : chalk.gray('  - Library search disabled'),
        );

        console.log();
        if (healthy) {
            logger.success('All checks passed! You\'re ready to go.');
        } else {
            logger.warn('Some checks failed. Review the output above.');
            process.exitCode = 1;
        }
    });
