/**
 * Library search tool backed by the Tavily search REST API.
 *
 * Search failures are API errors: they raise ProviderError and fail the run.
 *
 * Dependency direction: search.ts → tools/types, core/errors, zod
 * Used by: agents/factory.ts (research stage)
 */

import { z } from 'zod';
import type { Tool } from './types.js';
import { requireStringArg } from './types.js';
import { ProviderError, errorMessage } from '../core/errors.js';
import type { SourceLanguage } from '../core/config/types.js';
import { logger } from '../utils/logger.js';

export const SEARCH_TOOL_NAME = 'search_library_info';

/** Characters of each result's content passed back to the model. */
const SNIPPET_LENGTH = 200;

export interface SearchToolConfig {
    readonly apiKey: string;
    readonly baseUrl: string;
    readonly maxResults: number;
    readonly language: SourceLanguage;
}

const searchResponseSchema = z.object({
    results: z
        .array(
            z.object({
                url: z.string().optional(),
                content: z.string().optional(),
            }),
        )
        .default([]),
});

/**
 * Format search hits the way the model sees them:
 * one `Source:`/`Content:` block per hit, separated by `---` lines.
 */
export function formatSearchResults(results: ReadonlyArray<{ url?: string; content?: string }>): string {
    if (results.length === 0) {
        return 'No results found.';
    }

    return results
        .map((result) => {
            const content = (result.content ?? 'No content').slice(0, SNIPPET_LENGTH);
            return `Source: ${result.url ?? 'N/A'}\nContent: ${content}...`;
        })
        .join('\n---\n');
}

/** Create the search tool offered to the research stage. */
export function createSearchTool(config: SearchToolConfig): Tool {
    return {
        name: SEARCH_TOOL_NAME,
        description: 'Search for library documentation and usage examples',
        parameters: {
            type: 'object',
            properties: {
                library_name: { type: 'string', description: 'Name of the library to look up' },
            },
            required: ['library_name'],
        },

        async invoke(args) {
            const library = requireStringArg(args, 'library_name', SEARCH_TOOL_NAME);
            const query = `${library} ${config.language} library documentation examples`;
            logger.debug(`Searching: ${query}`);

            let response: Response;
            try {
                response = await fetch(`${config.baseUrl}/search`, {
                    method: 'POST',
                    headers: {
                        'Content-Type': 'application/json',
                        Authorization: `Bearer ${config.apiKey}`,
                    },
                    body: JSON.stringify({ query, max_results: config.maxResults }),
                });
            } catch (err) {
                throw new ProviderError(`Failed to connect to search API: ${errorMessage(err)}`, {
                    tool: SEARCH_TOOL_NAME,
                    baseUrl: config.baseUrl,
                });
            }

            if (!response.ok) {
                const errorBody = await response.text();
                throw new ProviderError(`Search API error: ${response.status} ${response.statusText}`, {
                    tool: SEARCH_TOOL_NAME,
                    status: response.status,
                    body: errorBody,
                });
            }

            let body: unknown;
            try {
                body = await response.json();
            } catch (err) {
                throw new ProviderError(`Search API returned invalid JSON: ${errorMessage(err)}`, {
                    tool: SEARCH_TOOL_NAME,
                });
            }

            const parsed = searchResponseSchema.safeParse(body);
            if (!parsed.success) {
                throw new ProviderError('Search API returned an unexpected response shape', {
                    tool: SEARCH_TOOL_NAME,
                    issues: parsed.error.issues,
                });
            }

            return formatSearchResults(parsed.data.results.slice(0, config.maxResults));
        },
    };
}
