/**
 * `docflow init` — Interactive setup wizard.
 *
 * Walks the user through choosing a model provider, the search tool, and
 * where results are written. Generates `.docflow/config.json` and a
 * starter `prompts.yaml` in the current project directory.
 *
 * API keys are never asked for: they come from GOOGLE_API_KEY and
 * TAVILY_API_KEY at run time, so the config file is safe to commit.
 *
 * Dependency direction: init.ts → commander, prompts, ora, chalk, config module
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import prompts from 'prompts';
import chalk from 'chalk';
import ora from 'ora';
import { configExists, saveConfig, getDefaultConfig, getConfigPath } from '../../core/config/manager.js';
import { ENV_KEYS } from '../../core/config/defaults.js';
import { sourceLanguageSchema } from '../../core/config/schema.js';
import type { AppConfig } from '../../core/config/types.js';
import { getSupportedProviders } from '../../providers/registry.js';
import { generateDefaultPrompts } from '../../prompts/library.js';
import { logger } from '../../utils/logger.js';

const DEFAULT_MODELS: Record<string, string> = {
    gemini: 'gemini-2.5-flash',
    ollama: 'llama3.2:latest',
};

export const initCommand = new Command('init')
    .description('Initialize docflow in the current project')
    .option('-f, --force', 'Overwrite existing configuration')
    .option('-y, --yes', 'Accept defaults without prompting')
    .action(async (options: { force?: boolean; yes?: boolean }) => {
        const projectRoot = process.cwd();

        logger.header('docflow — Project Setup');

        if (configExists(projectRoot) && !options.force) {
            if (options.yes) {
                logger.warn('Configuration already exists. Use --force to overwrite.');
                return;
            }

            const { overwrite } = await prompts({
                type: 'confirm',
                name: 'overwrite',
                message: 'Configuration already exists. Overwrite?',
                initial: false,
            });

            if (overwrite !== true) {
                logger.info('Setup cancelled.');
                return;
            }
        }

        const config = options.yes ? getDefaultConfig() : await runWizard();

        if (!config) {
            logger.info('Setup cancelled.');
            return;
        }

        const spinner = ora('Saving configuration...').start();
        saveConfig(projectRoot, config);
        const wrotePrompts = generateDefaultPrompts(projectRoot, config.promptsFile);
        spinner.succeed(`Configuration saved to ${getConfigPath(projectRoot)}`);
        if (wrotePrompts) {
            logger.success(`Default prompts written to ${config.promptsFile}`);
        }

        console.log();
        logger.success('Setup complete!');
        console.log(chalk.gray('  Next steps:'));
        if (config.model.provider === 'gemini') {
            console.log(chalk.gray(`  - Export ${ENV_KEYS.geminiApiKey} with your Gemini API key`));
        }
        if (config.search.enabled) {
            console.log(chalk.gray(`  - Export ${ENV_KEYS.searchApiKey} with your Tavily API key`));
        }
        console.log(chalk.gray('  - Run "docflow doctor" to verify the provider'));
        console.log(chalk.gray('  - Run "docflow run <file>" to document and analyze a file'));
        console.log();
    });

/**
 * Run the interactive setup wizard.
 * Returns null when the user aborts a prompt (Ctrl+C).
 */
async function runWizard(): Promise<AppConfig | null> {
    const config = getDefaultConfig();
    let cancelled = false;
    const onCancel = (): boolean => {
        cancelled = true;
        return false;
    };

    logger.info('Model');
    const modelAnswers = await prompts(
        [
            {
                type: 'select',
                name: 'provider',
                message: 'LLM provider:',
                choices: getSupportedProviders().map((p) => ({
                    title: p === 'gemini' ? 'Google Gemini (requires API key)' : 'Ollama (local models, no API key)',
                    value: p,
                })),
                initial: 0,
            },
            {
                type: 'text',
                name: 'model',
                message: 'Model:',
                initial: (prev: string) => DEFAULT_MODELS[prev] ?? config.model.model,
            },
            {
                type: (prev: string, values: { provider?: string }) => (values.provider === 'ollama' ? 'text' : null),
                name: 'ollamaUrl',
                message: 'Ollama base URL:',
                initial: 'http://localhost:11434',
            },
        ],
        { onCancel },
    );
    if (cancelled) return null;

    const provider: unknown = modelAnswers.provider;
    if (provider === 'gemini' || provider === 'ollama') {
        config.model.provider = provider;
    }
    const model: unknown = modelAnswers.model;
    if (typeof model === 'string' && model.trim()) {
        config.model.model = model.trim();
    }
    const ollamaUrl: unknown = modelAnswers.ollamaUrl;
    if (config.model.provider === 'ollama') {
        config.providers.ollama = {
            baseUrl: typeof ollamaUrl === 'string' && ollamaUrl ? ollamaUrl : 'http://localhost:11434',
        };
    }

    logger.info('Workflow');
    const workflowAnswers = await prompts(
        [
            {
                type: 'select',
                name: 'language',
                message: 'Language of the code you will document:',
                choices: sourceLanguageSchema.options.map((lang) => ({ title: lang, value: lang })),
                initial: 0,
            },
            {
                type: 'confirm',
                name: 'search',
                message: 'Search the web for library documentation during research?',
                initial: true,
            },
            {
                type: 'text',
                name: 'analysisFile',
                message: 'Analysis report file:',
                initial: config.output.analysisFile,
            },
        ],
        { onCancel },
    );
    if (cancelled) return null;

    const language = sourceLanguageSchema.safeParse(workflowAnswers.language);
    if (language.success) {
        config.execution.language = language.data;
    }
    const search: unknown = workflowAnswers.search;
    if (typeof search === 'boolean') {
        config.search.enabled = search;
    }
    const analysisFile: unknown = workflowAnswers.analysisFile;
    if (typeof analysisFile === 'string' && analysisFile.trim()) {
        config.output.analysisFile = analysisFile.trim();
    }

    return config;
}
