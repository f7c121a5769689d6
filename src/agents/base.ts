/**
 * Agent base class — shared behavior for the stage agents.
 *
 * Each stage agent (Research, Document, Analyze) extends this base,
 * implements `run()` with its own input and output, and calls the model
 * through `invokeModel()`.
 *
 * Dependency direction: agents/base.ts → agents/types, core/errors, utils
 * Used by: all agent implementations
 */

import type { AgentStage, ModelClient, ModelRequest } from './types.js';
import { AGENT_STAGE_LABELS } from './types.js';
import type { SourceLanguage } from '../core/config/types.js';
import { AppError, ProviderError, errorMessage } from '../core/errors.js';
import { logger } from '../utils/logger.js';

/** What every stage agent is constructed with. */
export interface AgentOptions {
    /** The stage's prompt template. */
    prompt: string;
    /** Language of the code being processed. */
    language: SourceLanguage;
}

/**
 * Base class for all stage agents.
 *
 * To create a new agent:
 * 1. Extend this class with its input and output types
 * 2. Implement `run(input)`, calling `invokeModel()` for the LLM work
 */
export abstract class BaseAgent<TInput, TOutput> {
    public readonly stage: AgentStage;
    protected readonly client: ModelClient;
    protected readonly prompt: string;
    protected readonly language: SourceLanguage;

    constructor(stage: AgentStage, client: ModelClient, options: AgentOptions) {
        this.stage = stage;
        this.client = client;
        this.prompt = options.prompt;
        this.language = options.language;
    }

    /**
     * Perform this stage's work.
     * @throws {ProviderError} if the model call fails
     */
    abstract run(input: TInput): Promise<TOutput>;

    /**
     * Call the model with this agent's prompt.
     * Errors that are not already typed are wrapped in ProviderError.
     */
    protected async invokeModel(request: Omit<ModelRequest, 'prompt'>): Promise<string> {
        const label = AGENT_STAGE_LABELS[this.stage];
        logger.debug(`${label} calling model${request.tools?.length ? ` with ${request.tools.length} tool(s)` : ''}`);

        try {
            return await this.client.invoke({ ...request, prompt: this.prompt });
        } catch (err) {
            if (err instanceof AppError) throw err;
            throw new ProviderError(`${label} failed: ${errorMessage(err)}`, { stage: this.stage });
        }
    }
}
