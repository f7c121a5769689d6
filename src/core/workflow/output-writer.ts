/**
 * Output writer — persists a finished run to the code and analysis files.
 *
 * Both files are overwritten on every run. The code file is written
 * first; if the analysis write then fails the code file stays on disk.
 *
 * Dependency direction: output-writer.ts → engine, utils/fs, config types
 * Used by: workflow runner, CLI run command
 */

import { isAbsolute, join } from 'node:path';
import type { WorkflowState } from './engine.js';
import type { OutputConfig, SourceLanguage } from '../config/types.js';
import { writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

/** Paths actually written by one run. */
export interface WrittenOutputs {
    codeFile: string;
    analysisFile: string;
}

/** Persists the final state of a run. */
export interface OutputWriter {
    /**
     * Write the documented code, then the analysis report.
     * @throws {OutputError} on the first failed write
     */
    writeResults(state: WorkflowState): WrittenOutputs;
}

export interface ReportOptions {
    /** Code file name mentioned in the usage guidelines. */
    codeFile: string;
    /** Include a "Generated on" line when set. */
    generatedAt?: Date;
}

/** Default code output name when the config leaves it unset. */
const DEFAULT_CODE_FILES: Record<SourceLanguage, string> = {
    python: 'code.py',
    javascript: 'code.js',
};

/**
 * Resolve the code output file for a language.
 */
export function resolveCodeFile(output: Pick<OutputConfig, 'codeFile'>, language: SourceLanguage): string {
    return output.codeFile ?? DEFAULT_CODE_FILES[language];
}

/**
 * Render the analysis report. Sections keep the order results were produced in.
 */
export function renderAnalysisReport(state: WorkflowState, options: ReportOptions): string {
    const lines: string[] = ['# Code Analysis Results'];
    if (options.generatedAt) {
        lines.push(`Generated on: ${options.generatedAt.toISOString()}`);
    }

    lines.push('', '## Libraries Used');
    if (state.librariesFound.length > 0) {
        for (const lib of state.librariesFound) lines.push(`- ${lib}`);
    } else {
        lines.push('- No libraries identified');
    }

    lines.push('', '## Issues and Recommendations');
    if (state.issuesFound.length > 0) {
        state.issuesFound.forEach((issue, i) => lines.push(`${i + 1}. ${issue}`));
    } else {
        lines.push('- No critical issues identified');
    }

    lines.push('', '## Test Results and I/O Behavior');
    if (state.testResults.length > 0) {
        state.testResults.forEach((result, i) => {
            lines.push(`### Test ${i + 1}: ${result.scenario}`, result.output.trimEnd(), '');
        });
    } else {
        lines.push('- No test results captured', '');
    }

    lines.push(
        '## Usage Guidelines',
        `1. Review the documented code in ${options.codeFile}`,
        '2. Address any issues or recommendations listed above',
        '3. Test the code with various input scenarios',
        '4. Validate functionality before production use',
    );

    return lines.join('\n') + '\n';
}

/**
 * Writes results under a project root.
 */
export class FileOutputWriter implements OutputWriter {
    private readonly projectRoot: string;
    private readonly codeFile: string;
    private readonly analysisFile: string;
    private readonly includeTimestamp: boolean;
    private readonly now: () => Date;

    constructor(
        projectRoot: string,
        output: OutputConfig,
        language: SourceLanguage,
        now: () => Date = () => new Date(),
    ) {
        this.projectRoot = projectRoot;
        this.codeFile = resolveCodeFile(output, language);
        this.analysisFile = output.analysisFile;
        this.includeTimestamp = output.includeTimestamp;
        this.now = now;
    }

    writeResults(state: WorkflowState): WrittenOutputs {
        const codePath = this.resolve(this.codeFile);
        const analysisPath = this.resolve(this.analysisFile);

        const code = state.documentedCode ?? state.sourceCode;
        writeTextFile(codePath, code);
        logger.detail(`Documented code saved to ${this.codeFile}`);

        const report = renderAnalysisReport(state, {
            codeFile: this.codeFile,
            generatedAt: this.includeTimestamp ? this.now() : undefined,
        });
        writeTextFile(analysisPath, report);
        logger.detail(`Analysis results saved to ${this.analysisFile}`);

        return { codeFile: codePath, analysisFile: analysisPath };
    }

    private resolve(file: string): string {
        return isAbsolute(file) ? file : join(this.projectRoot, file);
    }
}
