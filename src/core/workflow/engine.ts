/**
 * Workflow engine — the state machine behind the documentation workflow.
 *
 * Research → [Document] → Analyze → Final, with a single conditional edge
 * after Research decided by `documentationPresent`. Transitions are pure:
 * each returns a new state and records itself in `history`.
 *
 * Dependency direction: engine.ts → core/errors
 * Used by: workflow runner, output writer, diagram
 */

import { WorkflowError } from '../errors.js';

export const WorkflowStage = {
    Research: 'research',
    Document: 'document',
    Analyze: 'analyze',
    Final: 'final',
    Done: 'done',
} as const;

export type WorkflowStage = (typeof WorkflowStage)[keyof typeof WorkflowStage];

/** Stages that still have work to do. */
export type ActiveStage = Exclude<WorkflowStage, 'done'>;

export type RunStatus = 'pending' | 'completed' | 'failed';

/** One scenario the analyzer ran and what it printed. */
export interface TestResult {
    readonly scenario: string;
    readonly output: string;
    readonly succeeded: boolean;
}

/** A recorded state transition. */
export interface TransitionRecord {
    readonly from: WorkflowStage;
    readonly to: WorkflowStage;
    readonly event: WorkflowEvent['type'];
}

/** The single record threaded through every stage of one run. */
export interface WorkflowState {
    readonly sourceCode: string;
    readonly librariesFound: readonly string[];
    readonly documentationPresent: boolean;
    /** Set exactly once: by Document, or copied from `sourceCode` when Document is skipped. */
    readonly documentedCode?: string;
    readonly researchNotes: string;
    readonly issuesFound: readonly string[];
    readonly testResults: readonly TestResult[];
    readonly status: RunStatus;
    /** The next stage to run; `done` once the run has ended. */
    readonly stage: WorkflowStage;
    readonly error?: string;
    readonly history: readonly TransitionRecord[];
}

export type WorkflowEvent =
    | {
          type: 'RESEARCH_DONE';
          payload: { librariesFound: readonly string[]; documentationPresent: boolean; notes: string };
      }
    | { type: 'DOCUMENT_DONE'; payload: { documentedCode: string } }
    | { type: 'ANALYZE_DONE'; payload: { issuesFound: readonly string[]; testResults: readonly TestResult[] } }
    | { type: 'OUTPUT_WRITTEN' }
    | { type: 'ABORT'; payload?: { reason: string } };

/** Where Research hands off to. */
export type Route = { kind: 'document' } | { kind: 'analyze' };

/** An edge of the workflow graph; `condition` marks the conditional ones. */
export interface WorkflowEdge {
    readonly from: ActiveStage | '__start__';
    readonly to: ActiveStage | '__end__';
    readonly condition?: string;
}

export const WORKFLOW_EDGES: readonly WorkflowEdge[] = [
    { from: '__start__', to: 'research' },
    { from: 'research', to: 'document', condition: 'undocumented' },
    { from: 'research', to: 'analyze', condition: 'documented' },
    { from: 'document', to: 'analyze' },
    { from: 'analyze', to: 'final' },
    { from: 'final', to: '__end__' },
];

/**
 * Create a fresh state for one run.
 */
export function createWorkflowState(sourceCode: string): WorkflowState {
    return {
        sourceCode,
        librariesFound: [],
        documentationPresent: false,
        researchNotes: '',
        issuesFound: [],
        testResults: [],
        status: 'pending',
        stage: WorkflowStage.Research,
        history: [],
    };
}

/**
 * Decide where Research hands off to.
 */
export function route(state: Pick<WorkflowState, 'documentationPresent'>): Route {
    return state.documentationPresent ? { kind: 'analyze' } : { kind: 'document' };
}

/**
 * Apply an event to the state.
 *
 * @throws {WorkflowError} if the event is not valid in the current stage
 */
export function transition(state: WorkflowState, event: WorkflowEvent): WorkflowState {
    switch (event.type) {
        case 'RESEARCH_DONE': {
            expectStage(state, event, WorkflowStage.Research);
            const researched = {
                ...state,
                librariesFound: [...event.payload.librariesFound],
                documentationPresent: event.payload.documentationPresent,
                researchNotes: event.payload.notes,
            };
            const next = route(researched);
            if (next.kind === 'analyze') {
                return advance({ ...researched, documentedCode: state.sourceCode }, event, WorkflowStage.Analyze);
            }
            return advance(researched, event, WorkflowStage.Document);
        }

        case 'DOCUMENT_DONE':
            expectStage(state, event, WorkflowStage.Document);
            return advance({ ...state, documentedCode: event.payload.documentedCode }, event, WorkflowStage.Analyze);

        case 'ANALYZE_DONE':
            expectStage(state, event, WorkflowStage.Analyze);
            return advance(
                {
                    ...state,
                    issuesFound: [...event.payload.issuesFound],
                    testResults: [...event.payload.testResults],
                },
                event,
                WorkflowStage.Final,
            );

        case 'OUTPUT_WRITTEN':
            expectStage(state, event, WorkflowStage.Final);
            return advance({ ...state, status: 'completed' }, event, WorkflowStage.Done);

        case 'ABORT':
            if (isTerminal(state)) {
                throw new WorkflowError('Cannot abort a finished run', { status: state.status });
            }
            return advance(
                { ...state, status: 'failed', error: event.payload?.reason ?? 'aborted' },
                event,
                WorkflowStage.Done,
            );
    }
}

/**
 * Whether the run has ended (completed or failed).
 */
export function isTerminal(state: WorkflowState): boolean {
    return state.stage === WorkflowStage.Done;
}

/**
 * The stage to run next, or null once the run has ended.
 */
export function getNextStage(state: WorkflowState): ActiveStage | null {
    return state.stage === WorkflowStage.Done ? null : state.stage;
}

// ── Private helpers ──

function expectStage(state: WorkflowState, event: WorkflowEvent, expected: WorkflowStage): void {
    if (state.stage !== expected) {
        throw new WorkflowError(`Invalid transition: ${event.type} in stage "${state.stage}"`, {
            stage: state.stage,
            event: event.type,
            expected,
        });
    }
}

function advance(state: WorkflowState, event: WorkflowEvent, to: WorkflowStage): WorkflowState {
    return {
        ...state,
        stage: to,
        history: [...state.history, { from: state.stage, to, event: event.type }],
    };
}
