import { describe, expect, it, vi } from 'vitest';
import type { StreamItem } from './codec.js';
import { RequestError } from './errors.js';
import { readEventStream, StreamableHttpTransport, type FetchLike } from './transport_streamable_http.js';

const ENDPOINT = 'http://fake.test/mcp';
const RESPONSE = '{"jsonrpc":"2.0","id":"a","result":{"ok":true}}';

async function collect(items: AsyncIterable<StreamItem>): Promise<StreamItem[]> {
  const out: StreamItem[] = [];
  for await (const item of items) out.push(item);
  return out;
}

function stub(response: () => Response) {
  const fetch = vi.fn<FetchLike>(async () => response());
  return { fetch, transport: new StreamableHttpTransport({ endpoint: ENDPOINT, fetch }) };
}

function sentHeaders(fetch: ReturnType<typeof stub>['fetch'], call = 0): Headers {
  return new Headers(fetch.mock.calls[call][1].headers);
}

describe('StreamableHttpTransport.post', () => {
  it('sends content negotiation and session headers', async () => {
    const { fetch, transport } = stub(() => new Response(null, { status: 202 }));
    await transport.post('{}', { sessionId: 'session-abc', protocolVersion: '2025-03-26' });

    const headers = sentHeaders(fetch);
    expect(fetch.mock.calls[0][0]).toBe(ENDPOINT);
    expect(fetch.mock.calls[0][1].method).toBe('POST');
    expect(headers.get('content-type')).toBe('application/json');
    expect(headers.get('accept')).toBe('application/json, text/event-stream');
    expect(headers.get('mcp-session-id')).toBe('session-abc');
    expect(headers.get('mcp-protocol-version')).toBe('2025-03-26');
  });

  it('omits session headers before a session exists', async () => {
    const { fetch, transport } = stub(() => new Response(null, { status: 202 }));
    await transport.post('{}', { protocolVersion: '2025-03-26' });

    const headers = sentHeaders(fetch);
    expect(headers.has('mcp-session-id')).toBe(false);
    expect(headers.has('mcp-protocol-version')).toBe(false);
  });

  it('yields nothing for 202 Accepted', async () => {
    const { transport } = stub(() => new Response(null, { status: 202 }));
    const reply = await transport.post('{}');
    expect(reply.status).toBe(202);
    expect(await collect(reply.items)).toEqual([]);
  });

  it('reads a plain JSON body as one message', async () => {
    const { transport } = stub(
      () => new Response(RESPONSE, { status: 200, headers: { 'content-type': 'application/json', 'mcp-session-id': 'session-xyz' } }),
    );
    const reply = await transport.post('{}');
    expect(reply.sessionId).toBe('session-xyz');
    expect(await collect(reply.items)).toEqual([{ type: 'message', envelope: { kind: 'response', id: 'a', result: { ok: true } } }]);
  });

  it('reads an event-stream body record by record', async () => {
    const body = `: keepalive\n\ndata: {"jsonrpc":"2.0","method":"notifications/message","params":{"level":"info","data":"working"}}\n\ndata: ${RESPONSE}\n\n`;
    const { transport } = stub(() => new Response(body, { status: 200, headers: { 'content-type': 'text/event-stream' } }));
    const reply = await transport.post('{}');
    const items = await collect(reply.items);
    expect(items.map(item => item.type === 'message' && item.envelope.kind)).toEqual(['notification', 'response']);
    expect(reply.sessionId).toBeNull();
  });

  it('raises a transport error carrying the HTTP status', async () => {
    const { transport } = stub(() => new Response('Session not found', { status: 404 }));
    const failure = await transport.post('{}').catch((e: unknown) => e);

    expect(failure).toBeInstanceOf(RequestError);
    expect(failure).toMatchObject({
      kind: 'transport',
      status: 404,
      message: 'POST http://fake.test/mcp failed: HTTP 404 Session not found',
    });
  });

  it('adds configured headers to every request', async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response(null, { status: 202 }));
    const transport = new StreamableHttpTransport({ endpoint: ENDPOINT, fetch, headers: { authorization: 'Bearer test-secret' } });
    await transport.post('{}');
    expect(sentHeaders(fetch).get('authorization')).toBe('Bearer test-secret');
  });
});

describe('StreamableHttpTransport.openEventStream', () => {
  it('returns null when the server answers 405', async () => {
    const { fetch, transport } = stub(() => new Response(null, { status: 405 }));
    expect(await transport.openEventStream({ sessionId: 'session-abc' })).toBeNull();
    expect(fetch.mock.calls[0][1].method).toBe('GET');
    expect(sentHeaders(fetch).get('accept')).toBe('text/event-stream');
  });

  it('raises on other failures', async () => {
    const { transport } = stub(() => new Response('nope', { status: 500 }));
    await expect(transport.openEventStream({ sessionId: 'session-abc' })).rejects.toMatchObject({
      kind: 'transport',
      status: 500,
      message: 'GET http://fake.test/mcp failed: HTTP 500 nope',
    });
  });
});

describe('readEventStream', () => {
  it('cancels the body when the consumer stops early', async () => {
    const cancel = vi.fn();
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode(`data: ${RESPONSE}\n\n`));
      },
      cancel,
    });

    for await (const item of readEventStream(body)) {
      expect(item.type).toBe('message');
      break;
    }
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('stops reading when the signal aborts', async () => {
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode(`data: ${RESPONSE}\n\n`));
      },
    });
    const controller = new AbortController();
    const seen: StreamItem[] = [];
    for await (const item of readEventStream(body, controller.signal)) {
      seen.push(item);
      controller.abort();
    }
    expect(seen).toHaveLength(1);
  });
});
