/**
 * Library entry point for embedding the documentation workflow.
 *
 * Dependency direction: index.ts → types, config, agents, workflow
 * Used by: package.json main/types
 */

export * from './types/index.js';

export { loadConfig, getDefaultConfig } from './core/config/manager.js';
export { loadPrompts, parsePrompts, DEFAULT_PROMPTS } from './prompts/library.js';
export { createProvider } from './providers/registry.js';
export { createStageAgents } from './agents/factory.js';
export type { StageAgents, StageAgentOverrides } from './agents/factory.js';
export { WorkflowRunner } from './core/workflow/runner.js';
export type { RunnerDependencies, RunnerOptions } from './core/workflow/runner.js';
export { FileOutputWriter, renderAnalysisReport } from './core/workflow/output-writer.js';
export type { OutputWriter, WrittenOutputs } from './core/workflow/output-writer.js';
export { renderMermaid } from './core/workflow/diagram.js';
export { InterpreterRunner } from './tools/execute.js';
export type { CodeRunner, ExecutionOutcome } from './tools/execute.js';
