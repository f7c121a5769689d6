/**
 * Provider-backed model client with a bounded tool-calling loop.
 *
 * Each round sends the conversation to the provider; when the model asks
 * for tools they are invoked in order and their results appended. The loop
 * ends when the model answers without tool calls. After `maxToolRounds`
 * rounds one last call is made without tools so the model must answer.
 *
 * Dependency direction: model-client.ts → providers/types, tools/types, core/errors
 * Used by: agents/factory.ts
 */

import type { ChatMessage, ChatOptions, ChatResponse, LLMProvider, ToolCall } from '../providers/types.js';
import type { ModelClient, ModelRequest } from './types.js';
import { toDefinition, type Tool } from '../tools/types.js';
import { ToolError } from '../core/errors.js';
import type { ModelConfig } from '../core/config/types.js';
import { logger } from '../utils/logger.js';

export type ModelClientOptions = Pick<ModelConfig, 'model' | 'temperature' | 'maxTokens' | 'maxToolRounds'>;

/** Build the user message for a request. */
export function formatUserMessage(request: Pick<ModelRequest, 'task' | 'code' | 'context'>): string {
    let message = `${request.task}\n\n\`\`\`\n${request.code}\n\`\`\`\n`;

    if (request.context) {
        message += `\n## Context\n\n${request.context}\n`;
    }

    return message;
}

function logRound(round: number, response: ChatResponse): void {
    const { usage } = response;
    logger.debug(
        `Round ${round}: ${response.model} finished (${response.finishReason}), ` +
            `${usage.totalTokens} tokens (${usage.promptTokens} in / ${usage.completionTokens} out)`,
    );
}

export class ProviderModelClient implements ModelClient {
    private readonly provider: LLMProvider;
    private readonly options: ModelClientOptions;

    constructor(provider: LLMProvider, options: ModelClientOptions) {
        this.provider = provider;
        this.options = options;
    }

    async invoke(request: ModelRequest): Promise<string> {
        const tools = request.tools ?? [];
        const messages: ChatMessage[] = [{ role: 'user', content: formatUserMessage(request) }];
        const baseOptions: ChatOptions = {
            model: this.options.model,
            temperature: this.options.temperature,
            maxTokens: this.options.maxTokens,
            systemPrompt: request.prompt,
        };
        const toolOptions: ChatOptions = tools.length > 0
            ? { ...baseOptions, tools: tools.map(toDefinition) }
            : baseOptions;

        for (let round = 0; round < this.options.maxToolRounds; round++) {
            const response = await this.provider.chat(messages, toolOptions);
            logRound(round + 1, response);

            if (tools.length === 0 || response.toolCalls.length === 0) {
                return response.content;
            }

            messages.push({ role: 'assistant', content: response.content, toolCalls: response.toolCalls });
            for (const call of response.toolCalls) {
                const result = await this.runTool(tools, call);
                messages.push({ role: 'tool', content: result, toolName: call.name });
            }
        }

        logger.warn(`Tool round limit (${this.options.maxToolRounds}) reached, asking for a final answer`);
        messages.push({
            role: 'user',
            content: 'Stop calling tools and give your final answer now.',
        });
        const final = await this.provider.chat(messages, baseOptions);
        logRound(this.options.maxToolRounds + 1, final);
        return final.content;
    }

    /**
     * Invoke one requested tool. Unknown tools and malformed arguments are
     * reported back to the model; any other error propagates.
     */
    private async runTool(tools: readonly Tool[], call: ToolCall): Promise<string> {
        const tool = tools.find((t) => t.name === call.name);
        if (!tool) {
            logger.warn(`Model requested unknown tool "${call.name}"`);
            return `Error: unknown tool "${call.name}". Available: ${tools.map((t) => t.name).join(', ')}`;
        }

        logger.debug(`Calling tool ${call.name}`);
        try {
            return await tool.invoke(call.arguments);
        } catch (err) {
            if (err instanceof ToolError) {
                logger.warn(err.message);
                return `Error: ${err.message}`;
            }
            throw err;
        }
    }
}
