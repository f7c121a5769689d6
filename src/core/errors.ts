/**
 * Core error hierarchy for docflow.
 *
 * All errors extend AppError and carry a machine-readable code
 * plus optional structured context for debugging.
 *
 * Dependency direction: errors.ts → nothing (leaf module)
 * Used by: every layer in the application
 */

/** Base application error with structured metadata. */
export class AppError extends Error {
    public readonly code: string;
    public readonly context?: Record<string, unknown>;

    constructor(message: string, code: string, context?: Record<string, unknown>) {
        super(message);
        this.name = 'AppError';
        this.code = code;
        this.context = context;

        // Maintains proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }
}

/** Raised when configuration, prompts, or API keys are missing or invalid. */
export class ConfigError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONFIG_ERROR', context);
        this.name = 'ConfigError';
    }
}

/** Raised when a model or search API call fails or cannot be reached. */
export class ProviderError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'PROVIDER_ERROR', context);
        this.name = 'ProviderError';
    }
}

/** Raised when the model requests an unknown tool or passes malformed arguments. */
export class ToolError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'TOOL_ERROR', context);
        this.name = 'ToolError';
    }
}

/** Raised when a workflow state transition is invalid. */
export class WorkflowError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'WORKFLOW_ERROR', context);
        this.name = 'WorkflowError';
    }
}

/** Raised when an output file cannot be written. */
export class OutputError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'OUTPUT_ERROR', context);
        this.name = 'OutputError';
    }
}

/** Render any thrown value as a single message string. */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
