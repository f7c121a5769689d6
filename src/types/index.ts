/**
 * Global shared types re-exported from a single entry point.
 *
 * Dependency direction: types/index.ts → core, providers, agents, workflow (types only)
 * Used by: src/index.ts
 */

// Re-export all error types
export {
    AppError,
    ConfigError,
    ProviderError,
    ToolError,
    WorkflowError,
    OutputError,
} from '../core/errors.js';

// Re-export config types
export type {
    AppConfig,
    ModelConfig,
    ProviderConfig,
    SearchConfig,
    ExecutionConfig,
    OutputConfig,
    PromptSet,
    SourceLanguage,
} from '../core/config/types.js';

// Re-export provider types
export type {
    LLMProvider,
    LLMProviderName,
    ChatMessage,
    ChatOptions,
    ChatResponse,
    ToolCall,
    ToolDefinition,
} from '../providers/types.js';

// Re-export agent types
export type { AgentStage, ModelClient, ModelRequest } from '../agents/types.js';

// Re-export workflow types
export type {
    WorkflowState,
    WorkflowEvent,
    TestResult,
    RunStatus,
    ActiveStage,
} from '../core/workflow/engine.js';
