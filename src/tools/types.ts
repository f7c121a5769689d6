/**
 * Tool contract — a capability the model can call by name.
 *
 * Dependency direction: tools/types.ts → providers/types.ts, core/errors
 * Used by: search and execution tools, model client, agents
 */

import type { ToolDefinition } from '../providers/types.js';
import { ToolError } from '../core/errors.js';

/** A tool definition plus the single capability that performs it. */
export interface Tool extends ToolDefinition {
    /**
     * Run the tool with the model-supplied arguments and return text for the model.
     * @throws {ToolError} when the arguments are malformed.
     */
    invoke(args: Readonly<Record<string, unknown>>): Promise<string>;
}

/** Strip the implementation off a tool, leaving what providers advertise. */
export function toDefinition(tool: Tool): ToolDefinition {
    return { name: tool.name, description: tool.description, parameters: tool.parameters };
}

/**
 * Read a required, non-empty string argument.
 * @throws {ToolError} if the argument is missing or not a string
 */
export function requireStringArg(
    args: Readonly<Record<string, unknown>>,
    key: string,
    toolName: string,
): string {
    const value = args[key];
    if (typeof value !== 'string' || value.trim() === '') {
        throw new ToolError(`Tool "${toolName}" requires a non-empty string argument "${key}"`, {
            tool: toolName,
            argument: key,
        });
    }
    return value;
}

/** Read an optional string argument, ignoring values of other types. */
export function optionalStringArg(args: Readonly<Record<string, unknown>>, key: string): string | undefined {
    const value = args[key];
    return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}
