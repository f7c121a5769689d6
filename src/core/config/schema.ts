/**
 * Zod schemas defining the complete configuration shape.
 *
 * This is the authoritative definition of what a valid config looks like.
 * All TypeScript types are inferred from these schemas via z.infer<>.
 *
 * Dependency direction: schema.ts → zod
 * Used by: manager.ts, init.ts, types.ts
 */

import { z } from 'zod';

/** Languages the source inspector and code executor understand. */
export const sourceLanguageSchema = z.enum(['python', 'javascript']);

/**
 * Schema for the model used by every stage.
 */
export const modelConfigSchema = z.object({
    /** Which provider serves the model. */
    provider: z.enum(['gemini', 'ollama']).default('gemini'),
    /** The model identifier to use. */
    model: z.string().min(1).default('gemini-2.5-flash'),
    /** Sampling temperature (0.0 = deterministic, higher = more creative). */
    temperature: z.number().min(0).max(2).default(0.3),
    /** Maximum tokens the model can generate in a response. */
    maxTokens: z.number().int().min(1).max(200000).default(8192),
    /** Upper bound on tool-call round trips in one invocation. */
    maxToolRounds: z.number().int().min(1).max(50).default(8),
});

/**
 * Schema for Gemini provider settings.
 * The API key may be absent on disk and supplied through GOOGLE_API_KEY.
 */
export const geminiProviderSchema = z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url().default('https://generativelanguage.googleapis.com'),
});

/**
 * Schema for Ollama provider settings.
 */
export const ollamaProviderSchema = z.object({
    baseUrl: z.string().url().default('http://localhost:11434'),
});

/**
 * Schema for provider configuration (all providers).
 */
export const providerConfigSchema = z.object({
    gemini: geminiProviderSchema.optional(),
    ollama: ollamaProviderSchema.optional(),
});

/**
 * Schema for the library search tool used during research.
 */
export const searchConfigSchema = z.object({
    /** Whether the research stage gets the search tool. */
    enabled: z.boolean().default(true),
    /** Tavily API key; may be supplied through TAVILY_API_KEY instead. */
    apiKey: z.string().optional(),
    baseUrl: z.string().url().default('https://api.tavily.com'),
    maxResults: z.number().int().min(1).max(10).default(2),
});

/**
 * Schema for the code execution tool used during analysis.
 */
export const executionConfigSchema = z.object({
    /** Language of the analyzed source. */
    language: sourceLanguageSchema.default('python'),
    /** Interpreter to run; defaults to python3 or node depending on language. */
    command: z.string().min(1).optional(),
    /** Interpreter arguments; the code is piped on stdin. */
    args: z.array(z.string()).optional(),
    /** Kill the interpreter after this many milliseconds. */
    timeoutMs: z.number().int().min(100).max(600_000).default(30_000),
});

/**
 * Schema for where results are written.
 */
export const outputConfigSchema = z.object({
    /** Documented code output; defaults to code.py or code.js by language. */
    codeFile: z.string().min(1).optional(),
    analysisFile: z.string().min(1).default('analysis.txt'),
    diagramFile: z.string().min(1).default('workflow_diagram.mmd'),
    /** Stamp the analysis report with the generation time (breaks byte-identical reruns). */
    includeTimestamp: z.boolean().default(false),
});

/**
 * The complete application configuration schema.
 * This is the single source of truth for config structure.
 */
export const appConfigSchema = z.object({
    /** Schema version for future migrations. */
    version: z.literal(1).default(1),
    model: modelConfigSchema,
    providers: providerConfigSchema,
    search: searchConfigSchema,
    execution: executionConfigSchema,
    output: outputConfigSchema,
    /** Path of the YAML prompt file, relative to the project root. */
    promptsFile: z.string().min(1).default('prompts.yaml'),
});

/**
 * Schema for the prompt resource. Every key is required and non-empty.
 */
export const promptSetSchema = z.object({
    research_prompt: z.string().trim().min(1, 'research_prompt must not be empty'),
    document_prompt: z.string().trim().min(1, 'document_prompt must not be empty'),
    analyze_prompt: z.string().trim().min(1, 'analyze_prompt must not be empty'),
});
