/**
 * TypeScript types inferred from Zod schemas.
 *
 * NEVER define config types manually — they are always derived
 * from the Zod schemas to guarantee runtime and compile-time agreement.
 *
 * Dependency direction: types.ts → schema.ts
 * Used by: every module that touches config
 */

import { z } from 'zod';
import {
    appConfigSchema,
    executionConfigSchema,
    modelConfigSchema,
    outputConfigSchema,
    promptSetSchema,
    providerConfigSchema,
    searchConfigSchema,
    sourceLanguageSchema,
} from './schema.js';

/** Complete application configuration. */
export type AppConfig = z.infer<typeof appConfigSchema>;

/** Model selection and sampling parameters. */
export type ModelConfig = z.infer<typeof modelConfigSchema>;

/** LLM provider connection settings. */
export type ProviderConfig = z.infer<typeof providerConfigSchema>;

/** Library search tool settings. */
export type SearchConfig = z.infer<typeof searchConfigSchema>;

/** Code execution tool settings. */
export type ExecutionConfig = z.infer<typeof executionConfigSchema>;

/** Output file locations. */
export type OutputConfig = z.infer<typeof outputConfigSchema>;

/** The three prompt templates, keyed as in the prompt file. */
export type PromptSet = z.infer<typeof promptSetSchema>;

/** Source language of the analyzed program. */
export type SourceLanguage = z.infer<typeof sourceLanguageSchema>;
