import { describe, expect, it, vi } from 'vitest';
import { ChatCompletionsEndpoint, type CompletionRequest } from './completion.js';
import { CompletionEndpointError } from './errors.js';
import type { ToolSchema } from './tool_registry.js';
import type { FetchLike } from './transport_streamable_http.js';

const INVOICE_SCHEMA: ToolSchema = {
  type: 'function',
  function: {
    name: 'get_invoice',
    description: 'Get a specific invoice by its id',
    parameters: { type: 'object', properties: { invoice_id: { type: 'string' } }, required: ['invoice_id'] },
  },
};

const REQUEST: CompletionRequest = {
  messages: [{ role: 'user', content: 'Show me invoice 123' }],
  tools: [INVOICE_SCHEMA],
};

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function endpointReturning(response: () => Response, opts: { baseUrl?: string; name?: string } = {}) {
  const fetch = vi.fn<FetchLike>(async () => response());
  return { fetch, endpoint: new ChatCompletionsEndpoint({ apiKey: 'test-secret', fetch, ...opts }) };
}

function sentBody(fetch: ReturnType<typeof endpointReturning>['fetch']): unknown {
  const body = fetch.mock.calls[0][1].body;
  return JSON.parse(typeof body === 'string' ? body : '');
}

describe('ChatCompletionsEndpoint', () => {
  it('posts the conversation and tool schema to Mistral by default', async () => {
    const { fetch, endpoint } = endpointReturning(() => json({ choices: [{ message: { role: 'assistant', content: 'Hi' }, finish_reason: 'stop' }] }));

    const response = await endpoint.complete(REQUEST);

    expect(response).toEqual({ choices: [{ message: { role: 'assistant', content: 'Hi' }, finish_reason: 'stop' }] });
    expect(fetch.mock.calls[0][0]).toBe('https://api.mistral.ai/v1/chat/completions');
    expect(new Headers(fetch.mock.calls[0][1].headers).get('authorization')).toBe('Bearer test-secret');
    expect(sentBody(fetch)).toEqual({
      model: 'mistral-large-latest',
      messages: [{ role: 'user', content: 'Show me invoice 123' }],
      temperature: 0.7,
      max_tokens: 4096,
      tools: [INVOICE_SCHEMA],
      tool_choice: 'auto',
    });
  });

  it('leaves tool fields out when there are no tools', async () => {
    const { fetch, endpoint } = endpointReturning(() => json({ choices: [] }));
    await endpoint.complete({ messages: REQUEST.messages, tools: [] });

    const body = sentBody(fetch);
    expect(body).not.toHaveProperty('tools');
    expect(body).not.toHaveProperty('tool_choice');
  });

  it('normalizes tool calls whose arguments arrive as objects', async () => {
    const { endpoint } = endpointReturning(() =>
      json({
        choices: [
          {
            message: { role: 'assistant', tool_calls: [{ id: 'call_1', function: { name: 'get_invoice', arguments: { invoice_id: '123' } } }] },
            finish_reason: 'tool_calls',
          },
        ],
      }),
    );

    expect(await endpoint.complete(REQUEST)).toEqual({
      choices: [
        {
          message: {
            role: 'assistant',
            content: null,
            tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'get_invoice', arguments: '{"invoice_id":"123"}' } }],
          },
          finish_reason: 'tool_calls',
        },
      ],
    });
  });

  it('joins a custom base URL without doubling the path', async () => {
    const { fetch, endpoint } = endpointReturning(() => json({ choices: [] }), {
      baseUrl: 'http://localhost:8080/v1/chat/completions/',
      name: 'local',
    });
    await endpoint.complete(REQUEST);
    expect(fetch.mock.calls[0][0]).toBe('http://localhost:8080/v1/chat/completions');
  });

  it('raises HTTP failures with the status', async () => {
    const { endpoint } = endpointReturning(() => json({ message: 'Unauthorized' }, 401));
    const failure = await endpoint.complete(REQUEST).catch((e: unknown) => e);

    expect(failure).toBeInstanceOf(CompletionEndpointError);
    expect(failure).toMatchObject({ status: 401, message: 'mistral API error: HTTP 401 {"message":"Unauthorized"}' });
  });

  it('raises connection failures', async () => {
    const fetch = vi.fn<FetchLike>(async () => {
      throw new TypeError('fetch failed');
    });
    const endpoint = new ChatCompletionsEndpoint({ apiKey: 'test-secret', fetch });
    await expect(endpoint.complete(REQUEST)).rejects.toThrow('mistral API connection error: fetch failed');
  });

  it('raises on bodies that are not JSON', async () => {
    const { endpoint } = endpointReturning(() => new Response('<html>gateway</html>', { status: 200 }));
    await expect(endpoint.complete(REQUEST)).rejects.toThrow(/^Invalid JSON response from mistral API: /);
  });

  it('raises on bodies of the wrong shape', async () => {
    const { endpoint } = endpointReturning(() => json({ object: 'error' }));
    await expect(endpoint.complete(REQUEST)).rejects.toThrow(/^Unexpected mistral response shape: /);
  });
});
