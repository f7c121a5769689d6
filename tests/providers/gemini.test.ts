/**
 * Tests for the Gemini provider with a stubbed fetch.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { GeminiProvider } from '../../src/providers/gemini.js';
import type { ToolDefinition } from '../../src/providers/types.js';
import { ProviderError } from '../../src/core/errors.js';

const SEARCH_TOOL: ToolDefinition = {
    name: 'search_library_info',
    description: 'Search for library documentation',
    parameters: {
        type: 'object',
        properties: { library_name: { type: 'string', description: 'Library to look up' } },
        required: ['library_name'],
    },
};

function stubFetch(response: Response) {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => response);
    vi.stubGlobal('fetch', fetchMock);
    return fetchMock;
}

function jsonResponse(data: unknown): Response {
    return new Response(JSON.stringify(data), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

function sentBody(fetchMock: ReturnType<typeof stubFetch>): unknown {
    return JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
}

afterEach(() => {
    vi.unstubAllGlobals();
});

describe('GeminiProvider', () => {
    it('requires an API key', () => {
        expect(() => new GeminiProvider({ apiKey: '' })).toThrow(ProviderError);
    });

    it('sends the system instruction, tools and generation config', async () => {
        const fetchMock = stubFetch(jsonResponse({ candidates: [{ content: { parts: [{ text: 'ok' }] } }] }));
        const provider = new GeminiProvider({ apiKey: 'test-secret' });

        await provider.chat(
            [
                { role: 'system', content: 'Be brief.' },
                { role: 'user', content: 'hi' },
            ],
            { model: 'gemini-2.5-flash', temperature: 0.3, maxTokens: 100, tools: [SEARCH_TOOL] },
        );

        expect(fetchMock.mock.calls[0]?.[0]).toBe(
            'https://generativelanguage.googleapis.com/v1beta/models/gemini-2.5-flash:generateContent?key=test-secret',
        );
        expect(sentBody(fetchMock)).toEqual({
            contents: [{ role: 'user', parts: [{ text: 'hi' }] }],
            system_instruction: { parts: [{ text: 'Be brief.' }] },
            tools: [
                {
                    functionDeclarations: [
                        {
                            name: 'search_library_info',
                            description: 'Search for library documentation',
                            parameters: SEARCH_TOOL.parameters,
                        },
                    ],
                },
            ],
            generationConfig: { maxOutputTokens: 100, temperature: 0.3 },
        });
    });

    it('returns text, function calls and usage', async () => {
        stubFetch(
            jsonResponse({
                candidates: [
                    {
                        content: {
                            parts: [
                                { text: 'Looking up. ' },
                                { functionCall: { name: 'search_library_info', args: { library_name: 'math' } } },
                            ],
                        },
                        finishReason: 'STOP',
                    },
                ],
                usageMetadata: { promptTokenCount: 5, candidatesTokenCount: 3, totalTokenCount: 8 },
            }),
        );
        const provider = new GeminiProvider({ apiKey: 'test-secret' });

        const response = await provider.chat([{ role: 'user', content: 'hi' }], { model: 'gemini-2.5-flash' });

        expect(response.content).toBe('Looking up. ');
        expect(response.toolCalls).toEqual([
            { id: 'search_library_info-0', name: 'search_library_info', arguments: { library_name: 'math' } },
        ]);
        expect(response.finishReason).toBe('STOP');
        expect(response.usage).toEqual({ promptTokens: 5, completionTokens: 3, totalTokens: 8 });
    });

    it('folds consecutive tool results into one user turn', async () => {
        const fetchMock = stubFetch(jsonResponse({ candidates: [] }));
        const provider = new GeminiProvider({ apiKey: 'test-secret' });

        await provider.chat([
            { role: 'user', content: 'hi' },
            {
                role: 'assistant',
                content: '',
                toolCalls: [
                    { id: 'a-0', name: 'a', arguments: { x: '1' } },
                    { id: 'b-1', name: 'b', arguments: {} },
                ],
            },
            { role: 'tool', content: 'one', toolName: 'a' },
            { role: 'tool', content: 'two', toolName: 'b' },
        ]);

        expect(sentBody(fetchMock)).toEqual({
            contents: [
                { role: 'user', parts: [{ text: 'hi' }] },
                {
                    role: 'model',
                    parts: [{ functionCall: { name: 'a', args: { x: '1' } } }, { functionCall: { name: 'b', args: {} } }],
                },
                {
                    role: 'user',
                    parts: [
                        { functionResponse: { name: 'a', response: { result: 'one' } } },
                        { functionResponse: { name: 'b', response: { result: 'two' } } },
                    ],
                },
            ],
        });
    });

    it('returns empty content when there are no candidates', async () => {
        stubFetch(jsonResponse({}));
        const provider = new GeminiProvider({ apiKey: 'test-secret' });

        const response = await provider.chat([{ role: 'user', content: 'hi' }]);
        expect(response.content).toBe('');
        expect(response.toolCalls).toEqual([]);
        expect(response.finishReason).toBe('unknown');
    });

    it('throws ProviderError on an HTTP error', async () => {
        stubFetch(new Response('quota exceeded', { status: 429, statusText: 'Too Many Requests' }));
        const provider = new GeminiProvider({ apiKey: 'test-secret' });

        await expect(provider.chat([{ role: 'user', content: 'hi' }])).rejects.toThrow(
            'Gemini API error: 429 Too Many Requests',
        );
    });

    it('throws ProviderError when the API is unreachable', async () => {
        vi.stubGlobal(
            'fetch',
            vi.fn(async () => {
                throw new Error('getaddrinfo ENOTFOUND');
            }),
        );
        const provider = new GeminiProvider({ apiKey: 'test-secret' });

        await expect(provider.chat([{ role: 'user', content: 'hi' }])).rejects.toThrow(
            'Failed to connect to Gemini API: getaddrinfo ENOTFOUND',
        );
    });

    it('throws ProviderError for an unexpected response shape', async () => {
        stubFetch(jsonResponse({ candidates: 'nope' }));
        const provider = new GeminiProvider({ apiKey: 'test-secret' });

        await expect(provider.chat([{ role: 'user', content: 'hi' }])).rejects.toBeInstanceOf(ProviderError);
    });

    it('reports connection health without throwing', async () => {
        stubFetch(new Response('{}', { status: 200 }));
        expect(await new GeminiProvider({ apiKey: 'test-secret' }).validateConnection()).toBe(true);

        stubFetch(new Response('denied', { status: 403 }));
        expect(await new GeminiProvider({ apiKey: 'test-secret' }).validateConnection()).toBe(false);
    });
});
