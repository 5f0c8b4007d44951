import type { Anthropic } from '@anthropic-ai/sdk';
import { describe, expect, it, vi } from 'vitest';
import {
  AnthropicEndpoint,
  fromAnthropicContent,
  pickLatestModel,
  toAnthropicMessages,
  toAnthropicTools,
  type AnthropicMessagesClient,
} from './completion_anthropic.js';
import type { ToolSchema } from './tool_registry.js';

const INVOICE_SCHEMA: ToolSchema = {
  type: 'function',
  function: {
    name: 'get_invoice',
    description: 'Get a specific invoice by its id',
    parameters: { properties: { invoice_id: { type: 'string' } }, required: ['invoice_id'] },
  },
};

function fakeClient(content: Anthropic.ContentBlock[], ids: string[] = ['claude-3-5-haiku-20241022', 'claude-3-7-sonnet-20250219']) {
  return {
    createMessage: vi.fn<AnthropicMessagesClient['createMessage']>(async () => ({ content })),
    listModelIds: vi.fn<AnthropicMessagesClient['listModelIds']>(async () => ids),
  } satisfies AnthropicMessagesClient;
}

describe('pickLatestModel', () => {
  it('prefers Claude family ids and takes the lexicographically latest', () => {
    expect(pickLatestModel(['claude-3-5-haiku-20241022', 'claude-3-7-sonnet-20250219', 'claude-3-opus-20240229', 'zeta-embed'])).toBe(
      'claude-3-opus-20240229',
    );
  });

  it('falls back to all ids when none names a family', () => {
    expect(pickLatestModel(['model-a', 'model-b'])).toBe('model-b');
  });

  it('rejects an empty list', () => {
    expect(() => pickLatestModel([])).toThrow('No models returned from Anthropic');
  });
});

describe('toAnthropicMessages', () => {
  it('lifts system turns out and groups consecutive tool results', () => {
    const converted = toAnthropicMessages([
      { role: 'system', content: 'Be brief.' },
      { role: 'user', content: 'Show me invoices 1 and 2' },
      {
        role: 'assistant',
        content: '',
        tool_calls: [
          { id: 'a', type: 'function', function: { name: 'get_invoice', arguments: '{"invoice_id":"1"}' } },
          { id: 'b', type: 'function', function: { name: 'get_invoice', arguments: '{"invoice_id":"2"}' } },
        ],
      },
      { role: 'tool', tool_call_id: 'a', name: 'get_invoice', content: '{"id":"1"}' },
      { role: 'tool', tool_call_id: 'b', name: 'get_invoice', content: '{"id":"2"}' },
      { role: 'assistant', content: 'Both are paid.' },
    ]);

    expect(converted).toEqual({
      system: 'Be brief.',
      messages: [
        { role: 'user', content: 'Show me invoices 1 and 2' },
        {
          role: 'assistant',
          content: [
            { type: 'tool_use', id: 'a', name: 'get_invoice', input: { invoice_id: '1' } },
            { type: 'tool_use', id: 'b', name: 'get_invoice', input: { invoice_id: '2' } },
          ],
        },
        {
          role: 'user',
          content: [
            { type: 'tool_result', tool_use_id: 'a', content: '{"id":"1"}' },
            { type: 'tool_result', tool_use_id: 'b', content: '{"id":"2"}' },
          ],
        },
        { role: 'assistant', content: [{ type: 'text', text: 'Both are paid.' }] },
      ],
    });
  });

  it('omits the system field when there is none', () => {
    expect(toAnthropicMessages([{ role: 'user', content: 'Hi' }])).toEqual({ messages: [{ role: 'user', content: 'Hi' }] });
  });
});

describe('toAnthropicTools', () => {
  it('forces an object input schema', () => {
    expect(toAnthropicTools([INVOICE_SCHEMA])).toEqual([
      {
        name: 'get_invoice',
        description: 'Get a specific invoice by its id',
        input_schema: { type: 'object', properties: { invoice_id: { type: 'string' } }, required: ['invoice_id'] },
      },
    ]);
  });
});

describe('fromAnthropicContent', () => {
  it('maps text and tool_use blocks', () => {
    expect(
      fromAnthropicContent([
        { type: 'text', text: 'Let me check.', citations: null },
        { type: 'tool_use', id: 'toolu_1', name: 'get_invoice', input: { invoice_id: '123' } },
      ]),
    ).toEqual({
      role: 'assistant',
      content: 'Let me check.',
      tool_calls: [{ id: 'toolu_1', type: 'function', function: { name: 'get_invoice', arguments: '{"invoice_id":"123"}' } }],
    });
  });

  it('yields null content when there is no text', () => {
    expect(fromAnthropicContent([])).toEqual({ role: 'assistant', content: null });
  });
});

describe('AnthropicEndpoint', () => {
  it('resolves the latest model once and sends system and tools', async () => {
    const client = fakeClient([{ type: 'text', text: 'Hello.', citations: null }]);
    const endpoint = new AnthropicEndpoint({ client });
    const request = {
      messages: [
        { role: 'system' as const, content: 'Be brief.' },
        { role: 'user' as const, content: 'Hi' },
      ],
      tools: [INVOICE_SCHEMA],
    };

    expect(await endpoint.complete(request)).toEqual({ choices: [{ message: { role: 'assistant', content: 'Hello.' } }] });
    await endpoint.complete(request);

    expect(client.listModelIds).toHaveBeenCalledTimes(1);
    expect(client.createMessage.mock.calls[0][0]).toEqual({
      model: 'claude-3-7-sonnet-20250219',
      max_tokens: 1000,
      system: 'Be brief.',
      messages: [{ role: 'user', content: 'Hi' }],
      tools: toAnthropicTools([INVOICE_SCHEMA]),
    });
  });

  it('uses a configured model without listing', async () => {
    const client = fakeClient([]);
    const endpoint = new AnthropicEndpoint({ client, model: 'claude-test', maxTokens: 256 });

    await endpoint.complete({ messages: [{ role: 'user', content: 'Hi' }], tools: [] });

    expect(client.listModelIds).not.toHaveBeenCalled();
    expect(client.createMessage.mock.calls[0][0]).toEqual({ model: 'claude-test', max_tokens: 256, messages: [{ role: 'user', content: 'Hi' }] });
  });

  it('wraps API failures', async () => {
    const client = fakeClient([]);
    client.createMessage.mockRejectedValueOnce(new Error('overloaded'));
    const endpoint = new AnthropicEndpoint({ client, model: 'claude-test' });

    await expect(endpoint.complete({ messages: [{ role: 'user', content: 'Hi' }], tools: [] })).rejects.toMatchObject({
      name: 'CompletionEndpointError',
      message: 'anthropic API error: overloaded',
    });
  });

  it('reports model resolution failures', async () => {
    const empty = new AnthropicEndpoint({ client: fakeClient([], []) });
    await expect(empty.resolveModel()).rejects.toThrow('No models returned from Anthropic');

    const client = fakeClient([]);
    client.listModelIds.mockRejectedValueOnce(new Error('network down'));
    await expect(new AnthropicEndpoint({ client }).resolveModel()).rejects.toThrow(
      'Failed to resolve latest Anthropic model: network down',
    );
  });
});
