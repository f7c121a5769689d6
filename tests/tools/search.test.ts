/**
 * Tests for the library search tool with a stubbed fetch.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createSearchTool, formatSearchResults, SEARCH_TOOL_NAME } from '../../src/tools/search.js';
import { ProviderError, ToolError } from '../../src/core/errors.js';

const CONFIG = {
    apiKey: 'test-secret',
    baseUrl: 'https://search.test',
    maxResults: 2,
    language: 'python',
} as const;

function stubFetch(response: Response) {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => response);
    vi.stubGlobal('fetch', fetchMock);
    return fetchMock;
}

afterEach(() => {
    vi.unstubAllGlobals();
});

describe('formatSearchResults', () => {
    it('formats one block per hit', () => {
        expect(
            formatSearchResults([
                { url: 'https://docs.test/math', content: 'Mathematical functions' },
                { content: 'No URL here' },
            ]),
        ).toBe(
            'Source: https://docs.test/math\nContent: Mathematical functions...\n---\nSource: N/A\nContent: No URL here...',
        );
    });

    it('truncates content to 200 characters', () => {
        const text = formatSearchResults([{ url: 'u', content: 'x'.repeat(250) }]);
        expect(text).toBe(`Source: u\nContent: ${'x'.repeat(200)}...`);
    });

    it('reports an empty result set', () => {
        expect(formatSearchResults([])).toBe('No results found.');
    });
});

describe('createSearchTool', () => {
    it('advertises the library_name parameter', () => {
        const tool = createSearchTool(CONFIG);
        expect(tool.name).toBe(SEARCH_TOOL_NAME);
        expect(tool.parameters.required).toEqual(['library_name']);
    });

    it('queries the search API and formats the hits', async () => {
        const fetchMock = stubFetch(
            new Response(
                JSON.stringify({
                    results: [
                        { url: 'https://docs.test/a', content: 'first' },
                        { url: 'https://docs.test/b', content: 'second' },
                        { url: 'https://docs.test/c', content: 'third' },
                    ],
                }),
                { status: 200 },
            ),
        );

        const text = await createSearchTool(CONFIG).invoke({ library_name: 'numpy' });

        expect(fetchMock.mock.calls[0]?.[0]).toBe('https://search.test/search');
        const init = fetchMock.mock.calls[0]?.[1];
        expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
        const body: unknown = JSON.parse(String(init?.body));
        expect(body).toEqual({ query: 'numpy python library documentation examples', max_results: 2 });
        expect(text).toBe(
            'Source: https://docs.test/a\nContent: first...\n---\nSource: https://docs.test/b\nContent: second...',
        );
    });

    it('rejects a missing library name', async () => {
        await expect(createSearchTool(CONFIG).invoke({})).rejects.toBeInstanceOf(ToolError);
    });

    it('raises ProviderError on an HTTP error', async () => {
        stubFetch(new Response('bad key', { status: 401, statusText: 'Unauthorized' }));

        await expect(createSearchTool(CONFIG).invoke({ library_name: 'numpy' })).rejects.toThrow(
            'Search API error: 401 Unauthorized',
        );
    });

    it('raises ProviderError when the API is unreachable', async () => {
        vi.stubGlobal(
            'fetch',
            vi.fn(async () => {
                throw new Error('offline');
            }),
        );

        await expect(createSearchTool(CONFIG).invoke({ library_name: 'numpy' })).rejects.toBeInstanceOf(
            ProviderError,
        );
    });

    it('raises ProviderError for an unexpected response shape', async () => {
        stubFetch(new Response(JSON.stringify({ results: 'none' }), { status: 200 }));

        await expect(createSearchTool(CONFIG).invoke({ library_name: 'numpy' })).rejects.toThrow(
            'Search API returned an unexpected response shape',
        );
    });
});
