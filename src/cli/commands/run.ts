/**
 * `docflow run` — Research, document and analyze one source file.
 *
 * Dependency direction: run.ts → commander, config, prompts, agents/factory, workflow/runner
 * Used by: cli/index.ts
 */

import { Command } from 'commander';
import { extname } from 'node:path';
import { loadConfig, type ConfigRecord } from '../../core/config/manager.js';
import type { SourceLanguage } from '../../core/config/types.js';
import { loadPrompts } from '../../prompts/library.js';
import { createStageAgents } from '../../agents/factory.js';
import { WorkflowRunner } from '../../core/workflow/runner.js';
import { FileOutputWriter } from '../../core/workflow/output-writer.js';
import { readTextFile } from '../../utils/fs.js';
import { errorMessage } from '../../core/errors.js';
import { logger, LogLevel } from '../../utils/logger.js';

interface RunCommandOptions {
    language?: string;
    codeOut?: string;
    analysisOut?: string;
    search: boolean;
    timestamp?: boolean;
    verbose?: boolean;
}

const EXTENSION_LANGUAGES: Record<string, SourceLanguage> = {
    '.py': 'python',
    '.js': 'javascript',
    '.mjs': 'javascript',
    '.cjs': 'javascript',
    '.ts': 'javascript',
    '.jsx': 'javascript',
    '.tsx': 'javascript',
};

/**
 * Guess the source language from a file name.
 */
export function inferLanguage(filePath: string): SourceLanguage | undefined {
    return EXTENSION_LANGUAGES[extname(filePath).toLowerCase()];
}

/**
 * Turn command-line flags into config overrides.
 */
export function buildOverrides(filePath: string, options: RunCommandOptions): ConfigRecord {
    const language = options.language ?? inferLanguage(filePath);
    const output: ConfigRecord = {};
    if (options.codeOut) output.codeFile = options.codeOut;
    if (options.analysisOut) output.analysisFile = options.analysisOut;
    if (options.timestamp) output.includeTimestamp = true;

    const overrides: ConfigRecord = { output };
    if (language) overrides.execution = { language };
    if (!options.search) overrides.search = { enabled: false };
    return overrides;
}

export const runCommand = new Command('run')
    .description('Document and analyze a source file')
    .argument('<file>', 'Source file to process')
    .option('-l, --language <language>', 'Source language (python | javascript); inferred from the extension')
    .option('--code-out <path>', 'Where to write the documented code')
    .option('--analysis-out <path>', 'Where to write the analysis report')
    .option('--no-search', 'Do not give the research stage the library search tool')
    .option('--timestamp', 'Stamp the analysis report with the generation time')
    .option('-v, --verbose', 'Show debug output')
    .action(async (file: string, options: RunCommandOptions) => {
        const projectRoot = process.cwd();
        if (options.verbose) logger.setLogLevel(LogLevel.Debug);

        try {
            const sourceCode = readTextFile(file);
            const config = loadConfig(projectRoot, process.env, buildOverrides(file, options));
            const prompts = loadPrompts(projectRoot, config.promptsFile);
            const agents = createStageAgents(config, prompts);
            const writer = new FileOutputWriter(projectRoot, config.output, config.execution.language);

            const runner = new WorkflowRunner({ config, agents, writer }, { spinner: true });
            const result = await runner.run(sourceCode);

            if (result.status !== 'completed') {
                process.exit(1);
            }
        } catch (err) {
            logger.error(errorMessage(err));
            process.exit(1);
        }
    });
