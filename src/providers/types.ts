/**
 * LLM Provider interface contract.
 *
 * Every provider adapter MUST implement the LLMProvider interface. Tool
 * calling is part of the contract: a provider receives tool definitions,
 * returns the calls the model asked for, and accepts tool results back as
 * `tool` messages.
 *
 * Dependency direction: providers/types.ts → nothing (leaf module)
 * Used by: provider implementations, registry, model client
 */

/** Supported LLM provider names. Add new providers here. */
export type LLMProviderName = 'gemini' | 'ollama';

/** JSON-schema description of a tool's arguments. */
export interface ToolParameters {
  readonly type: 'object';
  readonly properties: Readonly<
    Record<string, { readonly type: 'string' | 'number' | 'boolean'; readonly description: string }>
  >;
  readonly required: readonly string[];
}

/** A tool the model may call, as advertised to the provider. */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: ToolParameters;
}

/** A tool invocation requested by the model. */
export interface ToolCall {
  /** Provider call id, or a generated one when the provider has none. */
  readonly id: string;
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
}

/** A single message in a chat conversation. */
export type ChatMessage =
  | { readonly role: 'system' | 'user'; readonly content: string }
  | { readonly role: 'assistant'; readonly content: string; readonly toolCalls?: readonly ToolCall[] }
  | { readonly role: 'tool'; readonly content: string; readonly toolName: string };

/** Options for a chat completion request. */
export interface ChatOptions {
  /** Model to use (overrides the provider default). */
  readonly model?: string;
  /** Sampling temperature (0.0 - 2.0). */
  readonly temperature?: number;
  /** Maximum tokens in the response. */
  readonly maxTokens?: number;
  /** System prompt (some providers handle this separately). */
  readonly systemPrompt?: string;
  /** Tools the model may call during this turn. */
  readonly tools?: readonly ToolDefinition[];
}

/** Token usage statistics for a request. */
export interface TokenUsage {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
}

/** Response from a chat completion. */
export interface ChatResponse {
  /** The generated text content (may be empty when tools were called). */
  readonly content: string;
  /** Tool calls the model requested, in the order it listed them. */
  readonly toolCalls: readonly ToolCall[];
  /** The model that was used. */
  readonly model: string;
  /** Token usage statistics. */
  readonly usage: TokenUsage;
  /** Provider-specific finish reason. */
  readonly finishReason: string;
}

/**
 * The contract that every LLM provider adapter MUST implement.
 *
 * Adding a new provider means:
 * 1. Create `src/providers/<name>.ts` implementing this interface
 * 2. Register it in `src/providers/registry.ts`
 * 3. Add the name to LLMProviderName type above
 */
export interface LLMProvider {
  /** The provider's unique identifier. */
  readonly name: LLMProviderName;

  /**
   * Send a chat completion request and get the full response.
   * @throws {ProviderError} on API failure, network error, or invalid response.
   */
  chat(messages: readonly ChatMessage[], options?: ChatOptions): Promise<ChatResponse>;

  /**
   * Validate that the provider connection is working (API key valid, server reachable).
   * Returns true if healthy, false otherwise. Should NOT throw.
   */
  validateConnection(): Promise<boolean>;
}
