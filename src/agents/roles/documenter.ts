/**
 * Document agent — one non-agentic model call that adds documentation.
 *
 * Dependency direction: documenter.ts → agents/base, source-inspector
 * Used by: agents/factory.ts, workflow runner
 */

import { BaseAgent, type AgentOptions } from '../base.js';
import type { ModelClient } from '../types.js';
import { extractCodeBlock, findDroppedLines } from '../../core/workflow/source-inspector.js';
import { logger } from '../../utils/logger.js';

export interface DocumentInput {
    sourceCode: string;
    librariesFound: readonly string[];
    researchNotes: string;
}

const DOCUMENTATION_CHECKLIST = [
    'Please add comprehensive documentation including:',
    '- Detailed docstrings for all functions and classes',
    '- Inline comments explaining complex logic',
    '- Comments for important variables and calculations',
    '- Warning comments for potential issues',
].join('\n');

export class DocumenterAgent extends BaseAgent<DocumentInput, string> {
    constructor(client: ModelClient, options: AgentOptions) {
        super('document', client, options);
    }

    async run(input: DocumentInput): Promise<string> {
        const context = [
            `Libraries used: ${input.librariesFound.length > 0 ? input.librariesFound.join(', ') : 'none'}`,
            input.researchNotes ? `Research notes:\n${input.researchNotes}` : '',
            DOCUMENTATION_CHECKLIST,
        ]
            .filter(Boolean)
            .join('\n\n');

        const response = await this.invokeModel({
            task: 'Code to document:',
            code: input.sourceCode,
            context,
        });

        const documented = extractCodeBlock(response, this.language);

        const dropped = findDroppedLines(input.sourceCode, documented, this.language);
        if (dropped.length > 0) {
            logger.warn(`Documented code no longer contains ${dropped.length} source line(s):`);
            for (const line of dropped) {
                logger.detail(line);
            }
        }

        return documented;
    }
}
