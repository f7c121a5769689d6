/**
 * Workflow runner — drives one source file through the documentation workflow.
 *
 * This is the orchestrator that:
 * 1. Creates a fresh workflow state for the input code
 * 2. Runs the next stage's agent and feeds its output to the engine
 * 3. Stops at the first failure, marking the run failed (no retries)
 * 4. Writes the output files and prints a summary
 *
 * Dependency direction: runner.ts → engine, agents/factory, output-writer, config
 * Used by: cli/commands/run.ts
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import {
    createWorkflowState,
    transition,
    isTerminal,
    getNextStage,
    route,
    type ActiveStage,
    type WorkflowState,
} from './engine.js';
import type { StageAgents } from '../../agents/factory.js';
import type { OutputWriter } from './output-writer.js';
import type { AppConfig } from '../config/types.js';
import { errorMessage } from '../errors.js';
import { logger } from '../../utils/logger.js';

/** Everything the runner needs, supplied once at construction. */
export interface RunnerDependencies {
    config: AppConfig;
    agents: StageAgents;
    writer: OutputWriter;
}

export interface RunnerOptions {
    /** Show an ora spinner while each stage runs. */
    spinner?: boolean;
    /** Print the summary after the run. */
    summary?: boolean;
}

const STAGE_MESSAGES: Record<ActiveStage, string> = {
    research: 'Analyzing code structure and documentation...',
    document: 'Adding documentation and comments...',
    analyze: 'Testing code and identifying issues...',
    final: 'Saving results to files...',
};

export class WorkflowRunner {
    private readonly config: AppConfig;
    private readonly agents: StageAgents;
    private readonly writer: OutputWriter;
    private readonly options: Required<RunnerOptions>;

    constructor(deps: RunnerDependencies, options: RunnerOptions = {}) {
        this.config = deps.config;
        this.agents = deps.agents;
        this.writer = deps.writer;
        this.options = { spinner: options.spinner ?? false, summary: options.summary ?? true };
    }

    /**
     * Run the full workflow for one piece of source code.
     *
     * Never throws for stage failures: the returned state has
     * `status: 'failed'` and `error` set instead.
     */
    async run(sourceCode: string): Promise<WorkflowState> {
        let state = createWorkflowState(sourceCode);

        logger.header('docflow — Documentation Workflow');
        logger.debug(`Language: ${this.config.execution.language}, model: ${this.config.model.model}`);

        while (!isTerminal(state)) {
            const stage = getNextStage(state);
            if (!stage) break;

            logger.stage(stage, STAGE_MESSAGES[stage]);
            const spinner: Ora | undefined = this.options.spinner ? ora(`Running ${stage}...`).start() : undefined;

            try {
                state = await this.runStage(stage, state);
                spinner?.succeed(`${stage} complete`);
            } catch (err) {
                spinner?.fail(`${stage} failed`);
                logger.error(`${stage} failed: ${errorMessage(err)}`);
                state = transition(state, { type: 'ABORT', payload: { reason: errorMessage(err) } });
            }
        }

        if (this.options.summary) {
            printWorkflowSummary(state);
        }

        return state;
    }

    private async runStage(stage: ActiveStage, state: WorkflowState): Promise<WorkflowState> {
        switch (stage) {
            case 'research': {
                const findings = await this.agents.research.run({ sourceCode: state.sourceCode });
                logger.detail(`Libraries found: ${findings.librariesFound.join(', ') || 'none'}`);
                logger.detail(`Documentation present: ${findings.documentationPresent}`);
                logger.detail(
                    route(findings).kind === 'analyze'
                        ? 'Code already documented, proceeding to analysis'
                        : 'Code requires documentation',
                );
                return transition(state, {
                    type: 'RESEARCH_DONE',
                    payload: {
                        librariesFound: findings.librariesFound,
                        documentationPresent: findings.documentationPresent,
                        notes: findings.notes,
                    },
                });
            }

            case 'document': {
                const documentedCode = await this.agents.document.run({
                    sourceCode: state.sourceCode,
                    librariesFound: state.librariesFound,
                    researchNotes: state.researchNotes,
                });
                logger.detail('Documentation completed');
                return transition(state, { type: 'DOCUMENT_DONE', payload: { documentedCode } });
            }

            case 'analyze': {
                const result = await this.agents.analyze.run({
                    code: state.documentedCode ?? state.sourceCode,
                });
                logger.detail(`Issues found: ${result.issuesFound.length}`);
                logger.detail(`Test results captured: ${result.testResults.length}`);
                return transition(state, { type: 'ANALYZE_DONE', payload: result });
            }

            case 'final':
                this.writer.writeResults(state);
                return transition(state, { type: 'OUTPUT_WRITTEN' });
        }
    }
}

// ── Private helpers ──

/** Print a colored summary of the workflow execution. */
function printWorkflowSummary(state: WorkflowState): void {
    logger.header('Workflow Summary');
    console.log(chalk.gray(`Status: ${state.status}`));
    console.log(chalk.gray(`Libraries: ${state.librariesFound.length}`));
    console.log(chalk.gray(`Issues: ${state.issuesFound.length}`));
    console.log(chalk.gray(`Tests: ${state.testResults.length}`));

    if (state.history.length > 0) {
        console.log();
        console.log(chalk.bold('  Stage transitions:'));
        for (const step of state.history) {
            const arrow = state.status === 'failed' && step.event === 'ABORT' ? chalk.red('→') : chalk.green('→');
            console.log(chalk.gray(`    ${step.from} ${arrow} ${chalk.white(step.to)} (${step.event})`));
        }
    }

    console.log();
    if (state.status === 'completed') {
        logger.success('Workflow completed successfully');
    } else {
        logger.error(`Workflow failed: ${state.error ?? 'unknown error'}`);
    }
}
