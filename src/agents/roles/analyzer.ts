/**
 * Analyze agent — runs the code through test scenarios via the execution tool.
 *
 * Every tool execution becomes a test result (in call order). Failed
 * executions and problem lines in the model's final answer become issues.
 *
 * Dependency direction: analyzer.ts → agents/base, tools/execute
 * Used by: agents/factory.ts, workflow runner
 */

import { BaseAgent, type AgentOptions } from '../base.js';
import type { ModelClient } from '../types.js';
import { createExecutionTool, type CodeRunner, type ExecutionRecord } from '../../tools/execute.js';
import type { TestResult } from '../../core/workflow/engine.js';

export interface AnalyzeInput {
    code: string;
}

export interface AnalysisResult {
    issuesFound: string[];
    testResults: TestResult[];
}

/** Words that mark a line of the final answer as an issue. */
const ISSUE_KEYWORDS = ['error', 'issue', 'problem', 'fail', 'exception', 'warning'] as const;

/** Shorter lines are headings or fragments, not findings. */
const MIN_ISSUE_LENGTH = 10;

export const SUMMARY_SCENARIO = 'Analysis summary';

/**
 * Lines of a model answer that report a problem, in order.
 */
export function extractIssueLines(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > MIN_ISSUE_LENGTH)
        .filter((line) => {
            const lower = line.toLowerCase();
            return ISSUE_KEYWORDS.some((keyword) => lower.includes(keyword));
        });
}

function firstLine(text: string): string {
    return text.split(/\r?\n/).find((line) => line.trim() !== '')?.trim() ?? 'no output';
}

export class AnalyzerAgent extends BaseAgent<AnalyzeInput, AnalysisResult> {
    private readonly runner: CodeRunner;

    constructor(client: ModelClient, options: AgentOptions, runner: CodeRunner) {
        super('analyze', client, options);
        this.runner = runner;
    }

    async run(input: AnalyzeInput): Promise<AnalysisResult> {
        const executions: ExecutionRecord[] = [];
        const tool = createExecutionTool(this.runner, (record) => executions.push(record));

        const summary = await this.invokeModel({
            task: `Analyze and test this ${this.language} code. Execute it and try different test scenarios; document any issues and the input/output behavior.`,
            code: input.code,
            tools: [tool],
        });

        const testResults: TestResult[] = executions.map((record) => ({
            scenario: record.scenario,
            output: record.report,
            succeeded: record.outcome.succeeded,
        }));

        const issuesFound = executions
            .filter((record) => !record.outcome.succeeded)
            .map((record) => `Scenario "${record.scenario}" failed: ${firstLine(record.outcome.stderr)}`);

        const trimmedSummary = summary.trim();
        if (trimmedSummary) {
            testResults.push({ scenario: SUMMARY_SCENARIO, output: trimmedSummary, succeeded: true });
            issuesFound.push(...extractIssueLines(trimmedSummary));
        }

        return { issuesFound, testResults };
    }
}
