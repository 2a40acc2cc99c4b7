/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { OpenAIProvider } from '../../src/providers/OpenAIProvider.js';
import { OpenRouterProvider } from '../../src/providers/OpenRouterProvider.js';
import type { LLMRequest } from '../../src/types.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubFetch(response: Response | Error) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => {
    if (response instanceof Error) {
      throw response;
    }
    return response;
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function sentBody(fetchMock: ReturnType<typeof stubFetch>): Record<string, unknown> {
  return JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
}

const request: LLMRequest = {
  messages: [
    { role: 'system', content: 'be brief' },
    { role: 'user', content: 'list files' },
    {
      role: 'assistant',
      content: null,
      tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'get_commands', arguments: '{}' } }]
    },
    { role: 'tool', tool_call_id: 'call_1', content: '{"status":"ok","commands_count":0}' }
  ],
  tools: [{ name: 'get_commands', description: 'Return commands', parameters: { type: 'object' } }],
  toolChoice: 'none',
  maxTokens: 256
};

describe('OpenAIProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts a chat-completions request', async () => {
    const fetchMock = stubFetch(jsonResponse({ id: 'r1', choices: [{ message: { content: 'hi' } }] }));
    const provider = new OpenAIProvider({ apiKey: 'test-secret', model: 'gpt-4o-mini' });

    await provider.complete(request);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://api.openai.com/v1/chat/completions');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
    expect(sentBody(fetchMock)).toEqual({
      model: 'gpt-4o-mini',
      messages: [
        { role: 'system', content: 'be brief' },
        { role: 'user', content: 'list files' },
        {
          role: 'assistant',
          content: null,
          tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'get_commands', arguments: '{}' } }]
        },
        { role: 'tool', content: '{"status":"ok","commands_count":0}', tool_call_id: 'call_1' }
      ],
      max_tokens: 256,
      tools: [
        {
          type: 'function',
          function: { name: 'get_commands', description: 'Return commands', parameters: { type: 'object' } }
        }
      ],
      tool_choice: 'none'
    });
  });

  it('strips trailing slashes from a custom base URL', async () => {
    const fetchMock = stubFetch(jsonResponse({ choices: [{ message: { content: '' } }] }));
    const provider = new OpenAIProvider({
      apiKey: 'test-secret',
      model: 'gpt-4o',
      baseUrl: 'http://localhost:8080/v1//'
    });

    await provider.complete({ messages: [{ role: 'user', content: 'hi' }] });

    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:8080/v1/chat/completions');
  });

  it('normalizes tool calls and usage', async () => {
    stubFetch(
      jsonResponse({
        id: 'r2',
        created: 1700000000,
        choices: [
          {
            message: {
              content: null,
              tool_calls: [{ type: 'function', function: { name: 'get_commands', arguments: '{"commands":[]}' } }]
            },
            finish_reason: 'tool_calls'
          }
        ],
        usage: { prompt_tokens: 40, completion_tokens: 12 }
      })
    );
    const provider = new OpenAIProvider({ apiKey: 'test-secret', model: 'gpt-4o-mini' });

    const response = await provider.complete(request);

    expect(response.id).toBe('r2');
    expect(response.created).toBe(1700000000);
    expect(response.content).toBe('');
    expect(response.finishReason).toBe('tool_calls');
    expect(response.toolCalls).toEqual([
      { id: 'call_0', type: 'function', function: { name: 'get_commands', arguments: '{"commands":[]}' } }
    ]);
    expect(response.usage).toEqual({ promptTokens: 40, completionTokens: 12, totalTokens: 52 });
  });

  it('explains rejected credentials', async () => {
    stubFetch(jsonResponse({ error: { message: 'Incorrect API key provided' } }, 401));
    const provider = new OpenAIProvider({ apiKey: 'test-secret', model: 'gpt-4o-mini' });

    await expect(provider.complete(request)).rejects.toThrow(
      'openai rejected the API key (401). Check your credentials.'
    );
  });

  it('surfaces the API error message', async () => {
    stubFetch(jsonResponse({ error: { message: 'model overloaded' } }, 503));
    const provider = new OpenAIProvider({ apiKey: 'test-secret', model: 'gpt-4o-mini' });

    await expect(provider.complete(request)).rejects.toThrow('openai API error: 503 model overloaded');
  });

  it('reports unreachable endpoints', async () => {
    stubFetch(new Error('connect ECONNREFUSED'));
    const provider = new OpenAIProvider({ apiKey: 'test-secret', model: 'gpt-4o-mini' });

    await expect(provider.complete(request)).rejects.toThrow(
      'Failed to reach openai (connect ECONNREFUSED). Check your network connection or base URL.'
    );
  });

  it('rejects responses without choices', async () => {
    stubFetch(jsonResponse({ choices: [] }));
    const provider = new OpenAIProvider({ apiKey: 'test-secret', model: 'gpt-4o-mini' });

    await expect(provider.complete(request)).rejects.toThrow(/^Unexpected openai response/);
  });
});

describe('OpenRouterProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('targets OpenRouter with attribution headers', async () => {
    const fetchMock = stubFetch(jsonResponse({ choices: [{ message: { content: 'ok' } }] }));
    const provider = new OpenRouterProvider({ apiKey: 'test-secret', model: 'openai/gpt-4o-mini' });

    await provider.complete({ messages: [{ role: 'user', content: 'hi' }] });

    const [url, init] = fetchMock.mock.calls[0];
    expect(provider.getName()).toBe('openrouter');
    expect(url).toBe('https://openrouter.ai/api/v1/chat/completions');
    expect(init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-secret',
      'HTTP-Referer': 'https://www.npmjs.com/package/shellmate',
      'X-Title': 'shellmate'
    });
    expect(sentBody(fetchMock).model).toBe('openai/gpt-4o-mini');
  });

  it('words rate limits for OpenRouter', async () => {
    stubFetch(jsonResponse({ error: { message: 'slow down' } }, 429));
    const provider = new OpenRouterProvider({ apiKey: 'test-secret', model: 'openai/gpt-4o-mini' });

    await expect(provider.complete(request)).rejects.toThrow(
      'You hit the rate limit for this OpenRouter model. Please try again later or choose another model with --model.'
    );
  });
});
