import { describe, it, expect, vi } from 'vitest';
import type { LLMRequest } from '@baton/agent-contracts';
import { BackendError } from '@baton/agent-contracts';
import { OpenAICompatibleLLM } from '../openai-compatible-llm.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function makeRequest(overrides: Partial<LLMRequest> = {}): LLMRequest {
  return {
    model: 'test-model',
    systemPrompt: 'You are a browser agent.',
    messages: [{ role: 'user', content: 'Find solar data' }],
    tools: [],
    signal: new AbortController().signal,
    ...overrides,
  };
}

describe('OpenAICompatibleLLM', () => {
  it('posts the conversation and maps the reply', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({
        choices: [{ message: { content: 'Done.' } }],
        usage: { prompt_tokens: 12, completion_tokens: 3 },
      }),
    );
    const llm = new OpenAICompatibleLLM({ apiBase: 'http://localhost:1234/v1/', apiKey: 'test-secret', fetch: fetchMock });

    const response = await llm.complete(makeRequest());

    expect(response).toEqual({
      content: 'Done.',
      toolCalls: [],
      handoff: undefined,
      usage: { promptTokens: 12, completionTokens: 3 },
    });

    const call = fetchMock.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe('http://localhost:1234/v1/chat/completions');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      temperature: 0,
      messages: [
        { role: 'system', content: 'You are a browser agent.' },
        { role: 'user', content: 'Find solar data' },
      ],
    });
  });

  it('serializes tools and tool turns', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ choices: [{ message: { content: '' } }] }));
    const llm = new OpenAICompatibleLLM({ apiBase: 'http://localhost:1234/v1', fetch: fetchMock });

    await llm.complete(
      makeRequest({
        messages: [
          { role: 'user', content: 'Find solar data' },
          { role: 'assistant', content: '', toolCalls: [{ id: 'c1', name: 'web_search', input: { query: 'solar' } }] },
          { role: 'tool', toolCallId: 'c1', name: 'web_search', content: 'No results for "solar".' },
        ],
        tools: [{ name: 'web_search', description: 'Search', inputSchema: { type: 'object', properties: {} } }],
      }),
    );

    const body = JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
    expect(body.tools).toEqual([
      {
        type: 'function',
        function: { name: 'web_search', description: 'Search', parameters: { type: 'object', properties: {} } },
      },
    ]);
    expect(body.messages.slice(2)).toEqual([
      {
        role: 'assistant',
        content: '',
        tool_calls: [{ id: 'c1', type: 'function', function: { name: 'web_search', arguments: '{"query":"solar"}' } }],
      },
      { role: 'tool', tool_call_id: 'c1', content: 'No results for "solar".' },
    ]);
  });

  it('lifts control tool calls into the handoff intent', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({
        choices: [
          {
            message: {
              content: null,
              tool_calls: [
                { id: 'c1', type: 'function', function: { name: 'web_search', arguments: '{"query":"solar"}' } },
                {
                  id: 'c2',
                  type: 'function',
                  function: { name: 'handoff', arguments: '{"to_agent":"write_agent","payload":"notes"}' },
                },
              ],
            },
          },
        ],
      }),
    );
    const llm = new OpenAICompatibleLLM({ apiBase: 'http://localhost:1234/v1', fetch: fetchMock });

    const response = await llm.complete(makeRequest());

    expect(response.content).toBe('');
    expect(response.toolCalls).toEqual([{ id: 'c1', name: 'web_search', input: { query: 'solar' } }]);
    expect(response.handoff).toEqual({ type: 'handoff', target: 'write_agent', payload: 'notes' });
  });

  it('raises BackendError on HTTP failures', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response('overloaded', { status: 503 }));
    const llm = new OpenAICompatibleLLM({ apiBase: 'http://localhost:1234/v1', fetch: fetchMock });

    const error = await llm.complete(makeRequest()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendError);
    expect(error).toMatchObject({ status: 503, message: 'Backend returned 503: overloaded' });
  });

  it('raises BackendError on malformed payloads', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ choices: [] }));
    const llm = new OpenAICompatibleLLM({ apiBase: 'http://localhost:1234/v1', fetch: fetchMock });

    await expect(llm.complete(makeRequest())).rejects.toBeInstanceOf(BackendError);
  });

  it('raises BackendError on network failures', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });
    const llm = new OpenAICompatibleLLM({ apiBase: 'http://localhost:1234/v1', fetch: fetchMock });

    await expect(llm.complete(makeRequest())).rejects.toThrow(
      'Request to http://localhost:1234/v1/chat/completions failed: fetch failed',
    );
  });

  it('rethrows the abort error when the request was cancelled', async () => {
    const controller = new AbortController();
    const fetchMock = vi.fn<typeof fetch>(async () => {
      controller.abort();
      throw Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
    });
    const llm = new OpenAICompatibleLLM({ apiBase: 'http://localhost:1234/v1', fetch: fetchMock });

    const error = await llm.complete(makeRequest({ signal: controller.signal })).catch((e: unknown) => e);

    expect(error).not.toBeInstanceOf(BackendError);
    expect(error).toMatchObject({ name: 'AbortError' });
  });
});
