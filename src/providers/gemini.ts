/**
 * Google Gemini provider adapter.
 *
 * Uses the Gemini REST API directly via fetch() — no SDK dependency.
 * API key is passed as a query parameter (not in headers).
 * Tools are sent as function declarations; function calls come back as
 * `functionCall` parts and results go back as `functionResponse` parts.
 *
 * Dependency direction: gemini.ts → providers/types.ts, core/errors.ts, zod
 * Used by: providers/registry.ts
 */

import { z } from 'zod';
import { ProviderError, errorMessage } from '../core/errors.js';
import type {
  LLMProvider,
  ChatMessage,
  ChatOptions,
  ChatResponse,
  TokenUsage,
  ToolCall,
} from './types.js';
import { logger } from '../utils/logger.js';

/** Configuration required to create a Gemini provider. */
export interface GeminiProviderConfig {
  readonly apiKey: string;
  readonly baseUrl?: string;
}

/** Default Gemini API settings. */
const DEFAULTS = {
  baseUrl: 'https://generativelanguage.googleapis.com',
  model: 'gemini-2.5-flash',
} as const;

type GeminiPart =
  | { text: string }
  | { functionCall: { name: string; args: Record<string, unknown> } }
  | { functionResponse: { name: string; response: { result: string } } };

interface GeminiContent {
  role: 'user' | 'model';
  parts: GeminiPart[];
}

const responseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z
              .array(
                z.object({
                  text: z.string().optional(),
                  functionCall: z
                    .object({ name: z.string(), args: z.record(z.unknown()).optional() })
                    .optional(),
                }),
              )
              .default([]),
          })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .default([]),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
});

type GeminiResponse = z.infer<typeof responseSchema>;

/**
 * Google Gemini provider implementation.
 *
 * System instructions are extracted from messages and sent via a dedicated field.
 * URLs are not logged to avoid key leaks.
 */
export class GeminiProvider implements LLMProvider {
  public readonly name = 'gemini' as const;
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(config: GeminiProviderConfig) {
    if (!config.apiKey) {
      throw new ProviderError('Gemini API key is required', { provider: 'gemini' });
    }
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? DEFAULTS.baseUrl;
  }

  async chat(messages: readonly ChatMessage[], options?: ChatOptions): Promise<ChatResponse> {
    const model = options?.model ?? DEFAULTS.model;
    const { contents, systemInstruction } = this.prepareMessages(messages, options);

    const body: Record<string, unknown> = { contents };

    if (systemInstruction) {
      body.system_instruction = systemInstruction;
    }

    if (options?.tools?.length) {
      body.tools = [
        {
          functionDeclarations: options.tools.map((tool) => ({
            name: tool.name,
            description: tool.description,
            parameters: tool.parameters,
          })),
        },
      ];
    }

    const generationConfig: Record<string, unknown> = {};
    if (options?.maxTokens !== undefined) {
      generationConfig.maxOutputTokens = options.maxTokens;
    }
    if (options?.temperature !== undefined) {
      generationConfig.temperature = options.temperature;
    }
    if (Object.keys(generationConfig).length > 0) {
      body.generationConfig = generationConfig;
    }

    logger.debug(`Gemini chat request: model=${model}, contents=${contents.length}`);

    const raw = await this.request(`/v1beta/models/${model}:generateContent`, body);
    const parsed = responseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderError('Gemini returned an unexpected response shape', {
        provider: 'gemini',
        issues: parsed.error.issues,
      });
    }

    const candidate = parsed.data.candidates[0];
    const parts = candidate?.content?.parts ?? [];
    const text = parts.map((p) => p.text ?? '').join('');
    const toolCalls: ToolCall[] = [];
    for (const part of parts) {
      if (part.functionCall) {
        toolCalls.push({
          id: `${part.functionCall.name}-${toolCalls.length}`,
          name: part.functionCall.name,
          arguments: part.functionCall.args ?? {},
        });
      }
    }

    return {
      content: text,
      toolCalls,
      model,
      usage: this.extractUsage(parsed.data),
      finishReason: candidate?.finishReason ?? 'unknown',
    };
  }

  async validateConnection(): Promise<boolean> {
    try {
      const response = await fetch(this.buildUrl('/v1beta/models'), { method: 'GET' });
      return response.ok;
    } catch {
      return false;
    }
  }

  // -- Private helpers --

  /**
   * Build the URL for an API request, appending the API key as a query parameter.
   * Never log the full URL to avoid leaking the API key.
   */
  private buildUrl(path: string): string {
    return `${this.baseUrl}${path}?key=${encodeURIComponent(this.apiKey)}`;
  }

  private async request(path: string, body: Record<string, unknown>): Promise<unknown> {
    let response: Response;

    try {
      response = await fetch(this.buildUrl(path), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new ProviderError(`Failed to connect to Gemini API: ${errorMessage(err)}`, {
        provider: 'gemini',
        baseUrl: this.baseUrl,
      });
    }

    if (!response.ok) {
      const errorBody = await response.text();
      throw new ProviderError(`Gemini API error: ${response.status} ${response.statusText}`, {
        status: response.status,
        body: errorBody,
        provider: 'gemini',
      });
    }

    try {
      return await response.json();
    } catch (err) {
      throw new ProviderError(`Gemini returned invalid JSON: ${errorMessage(err)}`, {
        provider: 'gemini',
      });
    }
  }

  /**
   * Prepare messages for the Gemini API.
   * Gemini uses `user` and `model` roles (not `assistant`); consecutive tool
   * results are folded into a single user turn of function responses.
   */
  private prepareMessages(
    messages: readonly ChatMessage[],
    options?: ChatOptions,
  ): {
    contents: GeminiContent[];
    systemInstruction?: { parts: Array<{ text: string }> };
  } {
    const contents: GeminiContent[] = [];
    const systemParts: string[] = [];

    if (options?.systemPrompt) {
      systemParts.push(options.systemPrompt);
    }

    for (const msg of messages) {
      switch (msg.role) {
        case 'system':
          systemParts.push(msg.content);
          break;
        case 'user':
          contents.push({ role: 'user', parts: [{ text: msg.content }] });
          break;
        case 'assistant': {
          const parts: GeminiPart[] = msg.content ? [{ text: msg.content }] : [];
          for (const call of msg.toolCalls ?? []) {
            parts.push({ functionCall: { name: call.name, args: { ...call.arguments } } });
          }
          contents.push({ role: 'model', parts });
          break;
        }
        case 'tool': {
          const part: GeminiPart = {
            functionResponse: { name: msg.toolName, response: { result: msg.content } },
          };
          const previous = contents[contents.length - 1];
          if (previous?.role === 'user' && previous.parts.every((p) => 'functionResponse' in p)) {
            previous.parts.push(part);
          } else {
            contents.push({ role: 'user', parts: [part] });
          }
          break;
        }
      }
    }

    const systemInstruction = systemParts.length > 0
      ? { parts: [{ text: systemParts.join('\n\n') }] }
      : undefined;

    return { contents, systemInstruction };
  }

  private extractUsage(response: GeminiResponse): TokenUsage {
    const usage = response.usageMetadata;
    return {
      promptTokens: usage?.promptTokenCount ?? 0,
      completionTokens: usage?.candidatesTokenCount ?? 0,
      totalTokens: usage?.totalTokenCount ?? 0,
    };
  }
}
