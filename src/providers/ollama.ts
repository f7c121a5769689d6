/**
 * Ollama local model provider adapter.
 *
 * Connects to the Ollama HTTP API (default: http://localhost:11434).
 * Tool calling uses the /api/chat `tools` field; tool results are sent
 * back as `tool` role messages.
 *
 * Dependency direction: ollama.ts → providers/types.ts, core/errors.ts, zod
 * Used by: providers/registry.ts
 */

import { z } from 'zod';
import { ProviderError, errorMessage } from '../core/errors.js';
import type { LLMProvider, ChatMessage, ChatOptions, ChatResponse, ToolCall } from './types.js';
import { logger } from '../utils/logger.js';

/** Configuration required to create an Ollama provider. */
export interface OllamaProviderConfig {
  readonly baseUrl?: string;
}

/** Default Ollama settings. */
const DEFAULTS = {
  baseUrl: 'http://localhost:11434',
  model: 'llama3.2:latest',
  timeoutMs: 300_000,
} as const;

interface OllamaMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  tool_calls?: Array<{ function: { name: string; arguments: Record<string, unknown> } }>;
  tool_name?: string;
}

const responseSchema = z.object({
  model: z.string().optional(),
  message: z
    .object({
      content: z.string().default(''),
      tool_calls: z
        .array(
          z.object({
            function: z.object({
              name: z.string(),
              arguments: z.record(z.unknown()).default({}),
            }),
          }),
        )
        .optional(),
    })
    .optional(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

/**
 * Ollama local model provider implementation.
 */
export class OllamaProvider implements LLMProvider {
  public readonly name = 'ollama' as const;
  private readonly baseUrl: string;

  constructor(config?: OllamaProviderConfig) {
    this.baseUrl = config?.baseUrl ?? DEFAULTS.baseUrl;
  }

  async chat(messages: readonly ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
    const model = options?.model ?? DEFAULTS.model;
    const ollamaMessages = this.prepareMessages(messages, options);

    const modelOptions: Record<string, number> = {};
    if (options?.temperature !== undefined) modelOptions.temperature = options.temperature;
    if (options?.maxTokens !== undefined) modelOptions.num_predict = options.maxTokens;

    const body: Record<string, unknown> = {
      model,
      messages: ollamaMessages,
      stream: false,
    };
    if (Object.keys(modelOptions).length > 0) {
      body.options = modelOptions;
    }
    if (options?.tools?.length) {
      body.tools = options.tools.map((tool) => ({
        type: 'function',
        function: {
          name: tool.name,
          description: tool.description,
          parameters: tool.parameters,
        },
      }));
    }

    logger.debug(`Ollama chat request: model=${model}, messages=${ollamaMessages.length}`);

    const parsed = responseSchema.safeParse(await this.request('/api/chat', body));
    if (!parsed.success) {
      throw new ProviderError('Ollama returned an unexpected response shape', {
        provider: 'ollama',
        issues: parsed.error.issues,
      });
    }

    const data = parsed.data;
    const toolCalls: ToolCall[] = (data.message?.tool_calls ?? []).map((call, index) => ({
      id: `${call.function.name}-${index}`,
      name: call.function.name,
      arguments: call.function.arguments,
    }));
    const promptTokens = data.prompt_eval_count ?? 0;
    const completionTokens = data.eval_count ?? 0;

    return {
      content: data.message?.content ?? '',
      toolCalls,
      model: data.model ?? model,
      usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
      finishReason: data.done_reason ?? 'stop',
    };
  }

  /**
   * Validate that Ollama is running and reachable.
   */
  async validateConnection(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch {
      return false;
    }
  }

  // ── Private helpers ──

  private prepareMessages(messages: readonly ChatMessage[], options?: ChatOptions): OllamaMessage[] {
    const result: OllamaMessage[] = [];

    if (options?.systemPrompt) {
      result.push({ role: 'system', content: options.systemPrompt });
    }

    for (const msg of messages) {
      switch (msg.role) {
        case 'assistant':
          result.push({
            role: 'assistant',
            content: msg.content,
            ...(msg.toolCalls?.length
              ? {
                  tool_calls: msg.toolCalls.map((call) => ({
                    function: { name: call.name, arguments: { ...call.arguments } },
                  })),
                }
              : {}),
          });
          break;
        case 'tool':
          result.push({ role: 'tool', content: msg.content, tool_name: msg.toolName });
          break;
        default:
          result.push({ role: msg.role, content: msg.content });
      }
    }

    return result;
  }

  private async request(path: string, body: Record<string, unknown>): Promise<unknown> {
    let response: Response;

    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(DEFAULTS.timeoutMs),
      });
    } catch (err) {
      throw new ProviderError(`Failed to connect to Ollama at ${this.baseUrl}: ${errorMessage(err)}`, {
        provider: 'ollama',
        baseUrl: this.baseUrl,
      });
    }

    if (!response.ok) {
      const errorBody = await response.text();
      throw new ProviderError(`Ollama API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        body: errorBody,
        provider: 'ollama',
      });
    }

    try {
      return await response.json();
    } catch (err) {
      throw new ProviderError(`Ollama returned invalid JSON: ${errorMessage(err)}`, {
        provider: 'ollama',
      });
    }
  }
}
