/**
 * Agent type definitions.
 *
 * Dependency direction: agents/types.ts → tools/types
 * Used by: model client, agent roles, workflow runner
 */

import type { Tool } from '../tools/types.js';

/** The stages that call the model. */
export type AgentStage = 'research' | 'document' | 'analyze';

/** Display-friendly labels for each stage agent. */
export const AGENT_STAGE_LABELS: Record<AgentStage, string> = {
    research: '🔎 Research',
    document: '📝 Document',
    analyze: '🧪 Analyze',
};

/** One request to the model: a prompt template applied to a piece of code. */
export interface ModelRequest {
    /** The stage's prompt template (sent as the system prompt). */
    readonly prompt: string;
    /** The source code under study. */
    readonly code: string;
    /** One-line instruction placed before the code. */
    readonly task: string;
    /** Extra material the stage wants the model to see. */
    readonly context?: string;
    /** Tools the model may call; omit for a single non-agentic call. */
    readonly tools?: readonly Tool[];
}

/**
 * The model capability every stage depends on.
 * Tests supply deterministic implementations.
 */
export interface ModelClient {
    /**
     * Run the request (including any tool calls) and return the model's final text.
     * @throws {ProviderError} on model or search API failure.
     */
    invoke(request: ModelRequest): Promise<string>;
}
