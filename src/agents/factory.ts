/**
 * Agent factory — creates the three stage agents from config.
 *
 * Wires together the provider registry, the model client, the tools and
 * the loaded prompts to produce ready-to-use agents.
 *
 * Dependency direction: factory.ts → agents/roles/*, model-client, providers/registry, tools
 * Used by: CLI run command
 */

import type { AppConfig, PromptSet } from '../core/config/types.js';
import type { ModelClient } from './types.js';
import { ProviderModelClient } from './model-client.js';
import { ResearchAgent } from './roles/researcher.js';
import { DocumenterAgent } from './roles/documenter.js';
import { AnalyzerAgent } from './roles/analyzer.js';
import { createProvider } from '../providers/registry.js';
import { createSearchTool } from '../tools/search.js';
import type { Tool } from '../tools/types.js';
import { InterpreterRunner, type CodeRunner } from '../tools/execute.js';
import { ConfigError } from '../core/errors.js';

/** The agents the workflow runner drives, one per model-backed stage. */
export interface StageAgents {
    research: ResearchAgent;
    document: DocumenterAgent;
    analyze: AnalyzerAgent;
}

export interface StageAgentOverrides {
    /** Model client to use instead of the configured provider. */
    client?: ModelClient;
    /** Code runner to use instead of the configured interpreter. */
    runner?: CodeRunner;
}

/**
 * Create the stage agents using the app config and prompts.
 *
 * @throws {ConfigError} if search is enabled without an API key
 * @throws {ProviderError} if the configured provider cannot be created
 */
export function createStageAgents(
    config: AppConfig,
    prompts: PromptSet,
    overrides: StageAgentOverrides = {},
): StageAgents {
    const client = overrides.client
        ?? new ProviderModelClient(createProvider(config.model.provider, config.providers), config.model);
    const runner = overrides.runner ?? new InterpreterRunner(config.execution);
    const language = config.execution.language;

    let searchTool: Tool | undefined;
    if (config.search.enabled) {
        if (!config.search.apiKey) {
            throw new ConfigError('Search is enabled but no search API key is configured', { tool: 'search' });
        }
        searchTool = createSearchTool({
            apiKey: config.search.apiKey,
            baseUrl: config.search.baseUrl,
            maxResults: config.search.maxResults,
            language,
        });
    }

    return {
        research: new ResearchAgent(client, { prompt: prompts.research_prompt, language }, searchTool),
        document: new DocumenterAgent(client, { prompt: prompts.document_prompt, language }),
        analyze: new AnalyzerAgent(client, { prompt: prompts.analyze_prompt, language }, runner),
    };
}
