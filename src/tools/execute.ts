/**
 * Code execution tool — runs model-written snippets in a child interpreter.
 *
 * A failing snippet (non-zero exit, timeout, interpreter missing) is an
 * analysis finding: it is reported back to the model and recorded, never thrown.
 *
 * Dependency direction: execute.ts → execa, tools/types, config types
 * Used by: agents/roles/analyzer.ts, agents/factory.ts
 */

import { execa, ExecaError } from 'execa';
import type { Tool } from './types.js';
import { optionalStringArg, requireStringArg } from './types.js';
import type { ExecutionConfig, SourceLanguage } from '../core/config/types.js';
import { logger } from '../utils/logger.js';

export const EXECUTE_TOOL_NAME = 'execute_code';

/** Result of running one snippet. */
export interface ExecutionOutcome {
    readonly succeeded: boolean;
    readonly stdout: string;
    readonly stderr: string;
    readonly exitCode?: number;
    readonly timedOut: boolean;
}

/** One recorded tool call: what was run and what came back. */
export interface ExecutionRecord {
    readonly scenario: string;
    readonly code: string;
    readonly outcome: ExecutionOutcome;
    /** The text returned to the model. */
    readonly report: string;
}

/** Runs a snippet of source code and reports what happened. */
export interface CodeRunner {
    run(code: string): Promise<ExecutionOutcome>;
}

/** Interpreter used when the config names none. Code is fed on stdin. */
const DEFAULT_INTERPRETERS: Record<SourceLanguage, { command: string; args: string[] }> = {
    python: { command: 'python3', args: ['-'] },
    javascript: { command: 'node', args: ['-'] },
};

/**
 * Runs snippets with a local interpreter via execa.
 */
export class InterpreterRunner implements CodeRunner {
    private readonly command: string;
    private readonly args: string[];
    private readonly timeoutMs: number;

    constructor(config: ExecutionConfig) {
        const fallback = DEFAULT_INTERPRETERS[config.language];
        this.command = config.command ?? fallback.command;
        this.args = config.args ?? (config.command ? [] : fallback.args);
        this.timeoutMs = config.timeoutMs;
    }

    async run(code: string): Promise<ExecutionOutcome> {
        logger.debug(`Executing snippet with ${this.command} ${this.args.join(' ')}`);

        const result = await execa(this.command, this.args, {
            input: code,
            reject: false, // Failures are findings, not exceptions
            timeout: this.timeoutMs,
            env: { ...process.env, FORCE_COLOR: '0' },
        });

        const succeeded = !result.failed && result.exitCode === 0;
        let stderr = result.stderr;
        if (!succeeded && stderr.trim() === '') {
            stderr = this.describeFailure(result);
        }

        return {
            succeeded,
            stdout: result.stdout,
            stderr,
            exitCode: result.exitCode,
            timedOut: result.timedOut,
        };
    }

    /** Failure text when the interpreter wrote nothing to stderr, e.g. it could not be spawned. */
    private describeFailure(result: { timedOut: boolean; exitCode?: number }): string {
        if (result.timedOut) {
            return `Timed out after ${this.timeoutMs}ms`;
        }
        if (result instanceof ExecaError) {
            return result.shortMessage;
        }
        return `"${this.command}" exited with code ${result.exitCode ?? 'unknown'}`;
    }
}

/** Text handed back to the model for one execution. */
export function formatExecutionReport(outcome: ExecutionOutcome): string {
    if (outcome.succeeded) {
        return `Execution successful:\n${outcome.stdout}`;
    }
    const details = [outcome.stderr, outcome.stdout].filter((s) => s.trim() !== '').join('\n');
    return `Execution failed:\n${details}`;
}

/**
 * Create the execution tool offered to the analyze stage.
 *
 * @param runner - Where snippets actually run
 * @param onRun - Called once per execution, in call order
 */
export function createExecutionTool(runner: CodeRunner, onRun: (record: ExecutionRecord) => void): Tool {
    let runCount = 0;

    return {
        name: EXECUTE_TOOL_NAME,
        description: 'Execute a complete, self-contained program and return its output',
        parameters: {
            type: 'object',
            properties: {
                code: { type: 'string', description: 'Complete source code to run' },
                scenario: { type: 'string', description: 'Short name of the scenario being tested' },
            },
            required: ['code'],
        },

        async invoke(args) {
            const code = requireStringArg(args, 'code', EXECUTE_TOOL_NAME);
            runCount++;
            const scenario = optionalStringArg(args, 'scenario') ?? `Execution ${runCount}`;

            const outcome = await runner.run(code);
            const report = formatExecutionReport(outcome);
            onRun({ scenario, code, outcome, report });
            return report;
        },
    };
}
