/**
 * Research agent — studies the code, optionally searching for libraries.
 *
 * The model's notes are kept for the Document stage; the library list and
 * documentation flag come from the source itself so routing is deterministic.
 *
 * Dependency direction: researcher.ts → agents/base, source-inspector, tools/types
 * Used by: agents/factory.ts, workflow runner
 */

import { BaseAgent, type AgentOptions } from '../base.js';
import type { ModelClient } from '../types.js';
import type { Tool } from '../../tools/types.js';
import { extractLibraries, hasDocumentation } from '../../core/workflow/source-inspector.js';

export interface ResearchInput {
    sourceCode: string;
}

export interface ResearchFindings {
    librariesFound: string[];
    documentationPresent: boolean;
    notes: string;
}

export class ResearchAgent extends BaseAgent<ResearchInput, ResearchFindings> {
    private readonly searchTool?: Tool;

    constructor(client: ModelClient, options: AgentOptions, searchTool?: Tool) {
        super('research', client, options);
        this.searchTool = searchTool;
    }

    async run(input: ResearchInput): Promise<ResearchFindings> {
        const notes = await this.invokeModel({
            task: `Analyze this ${this.language} code:`,
            code: input.sourceCode,
            tools: this.searchTool ? [this.searchTool] : undefined,
        });

        return {
            librariesFound: extractLibraries(input.sourceCode, this.language),
            documentationPresent: hasDocumentation(input.sourceCode, this.language),
            notes: notes.trim(),
        };
    }
}
