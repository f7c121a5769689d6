/**
 * Tests for the Ollama provider with a stubbed fetch.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { OllamaProvider } from '../../src/providers/ollama.js';
import { ProviderError } from '../../src/core/errors.js';

function stubFetch(response: Response) {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => response);
    vi.stubGlobal('fetch', fetchMock);
    return fetchMock;
}

function jsonResponse(data: unknown): Response {
    return new Response(JSON.stringify(data), { status: 200 });
}

afterEach(() => {
    vi.unstubAllGlobals();
});

describe('OllamaProvider', () => {
    it('posts a non-streaming chat with options and tools', async () => {
        const fetchMock = stubFetch(jsonResponse({ model: 'llama3.2:latest', message: { content: 'ok' } }));
        const provider = new OllamaProvider({ baseUrl: 'http://localhost:11434' });

        await provider.chat([{ role: 'user', content: 'hi' }], {
            model: 'llama3.2:latest',
            systemPrompt: 'Be brief.',
            temperature: 0.2,
            maxTokens: 64,
            tools: [
                {
                    name: 'execute_code',
                    description: 'Run code',
                    parameters: {
                        type: 'object',
                        properties: { code: { type: 'string', description: 'Code to run' } },
                        required: ['code'],
                    },
                },
            ],
        });

        expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:11434/api/chat');
        const body: unknown = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
        expect(body).toEqual({
            model: 'llama3.2:latest',
            messages: [
                { role: 'system', content: 'Be brief.' },
                { role: 'user', content: 'hi' },
            ],
            stream: false,
            options: { temperature: 0.2, num_predict: 64 },
            tools: [
                {
                    type: 'function',
                    function: {
                        name: 'execute_code',
                        description: 'Run code',
                        parameters: {
                            type: 'object',
                            properties: { code: { type: 'string', description: 'Code to run' } },
                            required: ['code'],
                        },
                    },
                },
            ],
        });
    });

    it('returns tool calls and token usage', async () => {
        stubFetch(
            jsonResponse({
                model: 'llama3.2:latest',
                message: {
                    content: '',
                    tool_calls: [{ function: { name: 'execute_code', arguments: { code: 'print(1)' } } }],
                },
                done_reason: 'stop',
                prompt_eval_count: 10,
                eval_count: 4,
            }),
        );
        const provider = new OllamaProvider();

        const response = await provider.chat([{ role: 'user', content: 'hi' }]);

        expect(response.toolCalls).toEqual([
            { id: 'execute_code-0', name: 'execute_code', arguments: { code: 'print(1)' } },
        ]);
        expect(response.usage).toEqual({ promptTokens: 10, completionTokens: 4, totalTokens: 14 });
        expect(response.finishReason).toBe('stop');
    });

    it('sends tool results back with the tool name', async () => {
        const fetchMock = stubFetch(jsonResponse({ message: { content: 'done' } }));
        const provider = new OllamaProvider();

        await provider.chat([
            {
                role: 'assistant',
                content: '',
                toolCalls: [{ id: 'execute_code-0', name: 'execute_code', arguments: { code: 'print(1)' } }],
            },
            { role: 'tool', content: 'Execution successful:\n1\n', toolName: 'execute_code' },
        ]);

        const body: unknown = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
        expect(body).toMatchObject({
            messages: [
                {
                    role: 'assistant',
                    content: '',
                    tool_calls: [{ function: { name: 'execute_code', arguments: { code: 'print(1)' } } }],
                },
                { role: 'tool', content: 'Execution successful:\n1\n', tool_name: 'execute_code' },
            ],
        });
    });

    it('throws ProviderError on an HTTP error', async () => {
        stubFetch(new Response('model not found', { status: 404, statusText: 'Not Found' }));

        await expect(new OllamaProvider().chat([{ role: 'user', content: 'hi' }])).rejects.toThrow(
            'Ollama API error: 404 Not Found',
        );
    });

    it('throws ProviderError when the server is down', async () => {
        vi.stubGlobal(
            'fetch',
            vi.fn(async () => {
                throw new Error('ECONNREFUSED');
            }),
        );

        await expect(new OllamaProvider().chat([{ role: 'user', content: 'hi' }])).rejects.toThrow(
            'Failed to connect to Ollama at http://localhost:11434: ECONNREFUSED',
        );
    });

    it('throws ProviderError for invalid JSON', async () => {
        stubFetch(new Response('not json', { status: 200 }));

        await expect(new OllamaProvider().chat([{ role: 'user', content: 'hi' }])).rejects.toBeInstanceOf(
            ProviderError,
        );
    });

    it('reports an unreachable server as unhealthy', async () => {
        vi.stubGlobal(
            'fetch',
            vi.fn(async () => {
                throw new Error('ECONNREFUSED');
            }),
        );
        expect(await new OllamaProvider().validateConnection()).toBe(false);
    });
});
