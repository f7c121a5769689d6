/**
 * Prompt store — loads the three stage prompts from a YAML file.
 *
 * `docflow init` writes the defaults to `prompts.yaml` in the project root.
 * Users can edit that file to customize how each stage instructs the model.
 *
 * Dependency direction: library.ts → yaml, config/schema, utils/fs, core/errors
 * Used by: CLI run/init commands
 */

import { isAbsolute, join } from 'node:path';
import { parse, stringify } from 'yaml';
import { promptSetSchema } from '../core/config/schema.js';
import type { PromptSet } from '../core/config/types.js';
import { ConfigError, errorMessage } from '../core/errors.js';
import { fileExists, readTextFile, writeTextFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/** Names of the prompts, in stage order. */
export const PROMPT_KEYS = ['research_prompt', 'document_prompt', 'analyze_prompt'] as const;

export type PromptKey = (typeof PROMPT_KEYS)[number];

// ── Default Prompts ──

export const DEFAULT_PROMPTS: PromptSet = {
  research_prompt: `You are a Code Research Specialist. Analyze the provided code and:

1. Check if the code already has documentation (docstrings, comments)
2. Identify all imported libraries and understand their purpose
3. Understand what the code does and what kind of tests would be appropriate
4. Research any unfamiliar libraries using the search tool

Be thorough but concise in your analysis.
`,

  document_prompt: `You are a Documentation Generator. Add simple, clear documentation to the code:

1. Add docstrings to functions and classes (keep them concise)
2. Add brief comments for complex logic
3. Add warning comments for potential issues
4. Maintain original code functionality; never change a line of code
5. Use simple, readable formatting

Return ONLY the documented code, no explanations.
`,

  analyze_prompt: `You are a Code Analyzer and Tester. Your tasks:

1. Execute the code to test its functionality
2. Try different test scenarios and inputs
3. Identify any issues, errors, or potential problems
4. Document the input/output behavior

Use the code execution tool to run tests and capture results.
Give every execution a short scenario name.
`,
};

// ── Public API ──

/**
 * Resolve the prompt file path against the project root.
 */
export function getPromptsPath(projectRoot: string, promptsFile: string): string {
  return isAbsolute(promptsFile) ? promptsFile : join(projectRoot, promptsFile);
}

/**
 * Parse and validate a YAML prompt document.
 *
 * @throws {ConfigError} if the YAML is malformed or a prompt key is missing or empty
 */
export function parsePrompts(yamlText: string, source = 'prompts'): PromptSet {
  let raw: unknown;
  try {
    raw = parse(yamlText);
  } catch (err) {
    throw new ConfigError(`Failed to parse ${source}: ${errorMessage(err)}`, { source });
  }

  const result = promptSetSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Invalid prompt file ${source}:\n${issues}`, {
      source,
      issues: result.error.issues,
    });
  }

  return result.data;
}

/**
 * Load the stage prompts once at startup.
 * Falls back to the built-in defaults when the file doesn't exist.
 *
 * @throws {ConfigError} if the file exists but is invalid
 */
export function loadPrompts(projectRoot: string, promptsFile: string): PromptSet {
  const filePath = getPromptsPath(projectRoot, promptsFile);

  if (!fileExists(filePath)) {
    logger.debug(`No prompt file at ${filePath}, using built-in prompts`);
    return { ...DEFAULT_PROMPTS };
  }

  logger.debug(`Loading prompts from ${filePath}`);
  return parsePrompts(readTextFile(filePath), filePath);
}

/**
 * Write the default prompt file into the project.
 * Only creates the file if it doesn't already exist (preserves user edits).
 *
 * @returns whether a file was written
 */
export function generateDefaultPrompts(projectRoot: string, promptsFile: string): boolean {
  const filePath = getPromptsPath(projectRoot, promptsFile);

  if (fileExists(filePath)) {
    logger.debug(`Prompt file already exists: ${filePath}`);
    return false;
  }

  writeTextFile(filePath, stringify(DEFAULT_PROMPTS, { lineWidth: 0 }));
  logger.debug(`Created prompt file: ${filePath}`);
  return true;
}
