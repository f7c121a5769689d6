/**
 * End-to-end tests for the workflow runner with a scripted model and runner.
 *
 * Uses a temp directory for the output files.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { WorkflowRunner } from '../../../src/core/workflow/runner.js';
import { FileOutputWriter, type OutputWriter } from '../../../src/core/workflow/output-writer.js';
import { createStageAgents } from '../../../src/agents/factory.js';
import { getDefaultConfig } from '../../../src/core/config/manager.js';
import { DEFAULT_PROMPTS } from '../../../src/prompts/library.js';
import { AGENT_STAGE_LABELS, type ModelClient, type ModelRequest } from '../../../src/agents/types.js';
import type { CodeRunner, ExecutionOutcome } from '../../../src/tools/execute.js';
import { OutputError } from '../../../src/core/errors.js';
import { setLogLevel, LogLevel } from '../../../src/utils/logger.js';

const SOURCE = 'import math\ndef f(x): return math.sqrt(x)';
const DOCUMENTED = '"""Square root helper."""\nimport math\n\ndef f(x):  # returns the square root\n    return math.sqrt(x)';

let testDir: string;

beforeEach(() => {
    setLogLevel(LogLevel.Silent);
    testDir = join(tmpdir(), `docflow-runner-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
});

afterEach(() => {
    setLogLevel(LogLevel.Info);
    if (existsSync(testDir)) {
        rmSync(testDir, { recursive: true, force: true });
    }
});

/** Answers each stage the way a well-behaved model would. */
class ScriptedModel implements ModelClient {
    readonly tasks: string[] = [];

    constructor(private readonly failOn?: string) {}

    async invoke(request: ModelRequest): Promise<string> {
        this.tasks.push(request.task);
        if (this.failOn && request.task.startsWith(this.failOn)) {
            throw new Error('model unreachable');
        }

        if (request.task.startsWith('Analyze this')) {
            return 'The code takes the square root of its input.';
        }
        if (request.task === 'Code to document:') {
            return '```python\n' + DOCUMENTED + '\n```';
        }

        const tool = request.tools?.[0];
        if (!tool) throw new Error('execution tool missing');
        await tool.invoke({ code: 'print(f(4))', scenario: 'positive input' });
        await tool.invoke({ code: 'print(f(-1))', scenario: 'negative input' });
        return 'Negative input raises a ValueError exception.';
    }
}

class ScriptedRunner implements CodeRunner {
    async run(code: string): Promise<ExecutionOutcome> {
        return code.includes('-1')
            ? { succeeded: false, stdout: '', stderr: 'ValueError: math domain error', exitCode: 1, timedOut: false }
            : { succeeded: true, stdout: '2.0', stderr: '', exitCode: 0, timedOut: false };
    }
}

function createRunner(model: ModelClient, writer?: OutputWriter): WorkflowRunner {
    const config = getDefaultConfig({ search: { enabled: false } });
    const agents = createStageAgents(config, DEFAULT_PROMPTS, { client: model, runner: new ScriptedRunner() });
    return new WorkflowRunner(
        { config, agents, writer: writer ?? new FileOutputWriter(testDir, config.output, 'python') },
        { summary: false },
    );
}

const EXPECTED_REPORT = [
    '# Code Analysis Results',
    '',
    '## Libraries Used',
    '- math',
    '',
    '## Issues and Recommendations',
    '1. Scenario "negative input" failed: ValueError: math domain error',
    '2. Negative input raises a ValueError exception.',
    '',
    '## Test Results and I/O Behavior',
    '### Test 1: positive input',
    'Execution successful:',
    '2.0',
    '',
    '### Test 2: negative input',
    'Execution failed:',
    'ValueError: math domain error',
    '',
    '### Test 3: Analysis summary',
    'Negative input raises a ValueError exception.',
    '',
    '## Usage Guidelines',
    '1. Review the documented code in code.py',
    '2. Address any issues or recommendations listed above',
    '3. Test the code with various input scenarios',
    '4. Validate functionality before production use',
    '',
].join('\n');

describe('WorkflowRunner', () => {
    it('documents undocumented code and writes both files', async () => {
        const model = new ScriptedModel();
        const state = await createRunner(model).run(SOURCE);

        expect(state.status).toBe('completed');
        expect(state.librariesFound).toContain('math');
        expect(state.documentationPresent).toBe(false);
        expect(state.documentedCode).toBe(DOCUMENTED);
        expect(state.history.map((h) => h.to)).toEqual(['document', 'analyze', 'final', 'done']);
        expect(model.tasks).toHaveLength(3);

        expect(readFileSync(join(testDir, 'code.py'), 'utf-8')).toBe(DOCUMENTED);
        expect(readFileSync(join(testDir, 'analysis.txt'), 'utf-8')).toBe(EXPECTED_REPORT);
    });

    it('skips the document stage for documented code', async () => {
        const documentedSource = '# Square roots\n' + SOURCE;
        const model = new ScriptedModel();
        const state = await createRunner(model).run(documentedSource);

        expect(state.status).toBe('completed');
        expect(state.documentedCode).toBe(documentedSource);
        expect(model.tasks).not.toContain('Code to document:');
        expect(state.history.map((h) => h.to)).toEqual(['analyze', 'final', 'done']);
        expect(readFileSync(join(testDir, 'code.py'), 'utf-8')).toBe(documentedSource);
    });

    it('fails the run without writing files when the model is unreachable', async () => {
        const state = await createRunner(new ScriptedModel('Analyze this')).run(SOURCE);

        expect(state.status).toBe('failed');
        expect(state.error).toBe(`${AGENT_STAGE_LABELS.research} failed: model unreachable`);
        expect(existsSync(join(testDir, 'code.py'))).toBe(false);
        expect(existsSync(join(testDir, 'analysis.txt'))).toBe(false);
    });

    it('stops at a failing document stage', async () => {
        const model = new ScriptedModel('Code to document:');
        const state = await createRunner(model).run(SOURCE);

        expect(state.status).toBe('failed');
        expect(state.history.at(-1)).toEqual({ from: 'document', to: 'done', event: 'ABORT' });
        expect(model.tasks).toHaveLength(2);
    });

    it('fails the run when the output cannot be written', async () => {
        const writer: OutputWriter = {
            writeResults() {
                throw new OutputError('Failed to write file: /read-only/analysis.txt');
            },
        };
        const state = await createRunner(new ScriptedModel(), writer).run(SOURCE);

        expect(state.status).toBe('failed');
        expect(state.error).toBe('Failed to write file: /read-only/analysis.txt');
        expect(state.history.at(-1)).toEqual({ from: 'final', to: 'done', event: 'ABORT' });
    });

    it('writes byte-identical files on a rerun', async () => {
        await createRunner(new ScriptedModel()).run(SOURCE);
        const firstCode = readFileSync(join(testDir, 'code.py'), 'utf-8');
        const firstReport = readFileSync(join(testDir, 'analysis.txt'), 'utf-8');

        await createRunner(new ScriptedModel()).run(SOURCE);

        expect(readFileSync(join(testDir, 'code.py'), 'utf-8')).toBe(firstCode);
        expect(readFileSync(join(testDir, 'analysis.txt'), 'utf-8')).toBe(firstReport);
    });
});
