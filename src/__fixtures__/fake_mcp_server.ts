// In-process stand-in for a Streamable HTTP MCP server. Exposes a fetch
// implementation, so tests never open a socket.
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { isRecord } from '../codec.js';
import type { FetchLike } from '../transport_streamable_http.js';

export type ToolHandler = (args: Record<string, unknown>) => CallToolResult | Promise<CallToolResult>;

export interface FakeTool {
  name: string;
  description?: string;
  inputSchema: { type: 'object'; properties?: Record<string, unknown>; required?: string[] };
  handler: ToolHandler;
}

export interface RecordedRequest {
  verb: 'GET' | 'POST';
  rpcMethod?: string;
  id?: string | number;
  params?: Record<string, unknown>;
  headers: Record<string, string>;
}

export interface FakeServerOptions {
  /** Session id handed out on initialize; null omits the header. */
  sessionId?: string | null;
  protocolVersion?: string;
  tools?: FakeTool[];
  /** Splits tools/list into pages of this size. */
  pageSize?: number;
  /** Answer requests with application/json instead of an event stream. */
  respondJson?: boolean;
  /** Raw event-stream text written before every response record. */
  prelude?: string;
  /** Methods whose response record is replaced by garbage. */
  garble?: string[];
  /** Per-method delay before answering, in ms. Honors the abort signal. */
  delays?: Record<string, number>;
  /** Per-method failure: a network error or an HTTP status. */
  failures?: Record<string, 'network' | number>;
  /** Raw event-stream chunks written to the GET stream. */
  pushEvents?: string[];
  /** What happens to the GET stream after pushEvents. */
  streamEnd?: 'hold' | 'close' | 'drop';
  getStatus?: number;
  /** GET never answers and ignores aborts. */
  hangGet?: boolean;
}

export class NetworkFailure extends TypeError {
  constructor() {
    super('fetch failed');
  }
}

const encoder = new TextEncoder();

function wait(ms: number, signal?: AbortSignal | null): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(new Error('This operation was aborted'));
      },
      { once: true },
    );
  });
}

export function invoiceTool(handler: ToolHandler): FakeTool {
  return {
    name: 'get_invoice',
    description: 'Get a specific invoice by its id',
    inputSchema: {
      type: 'object',
      properties: { invoice_id: { type: 'string', description: 'The invoice id' } },
      required: ['invoice_id'],
    },
    handler,
  };
}

export function textResult(value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: typeof value === 'string' ? value : JSON.stringify(value) }] };
}

export function createFakeMcpServer(opts: FakeServerOptions = {}) {
  const requests: RecordedRequest[] = [];
  const sessionId = opts.sessionId === undefined ? 'session-abc' : opts.sessionId;
  const tools = opts.tools ?? [];

  const respond = (method: string, id: string | number, payload: Record<string, unknown>, extraHeaders: Record<string, string> = {}) => {
    const envelope = JSON.stringify({ jsonrpc: '2.0', id, ...payload });
    if (opts.respondJson) {
      return new Response(envelope, { status: 200, headers: { 'content-type': 'application/json', ...extraHeaders } });
    }
    const record = opts.garble?.includes(method) ? 'data: {garbled\n\n' : `event: message\ndata: ${envelope}\n\n`;
    return new Response(`${opts.prelude ?? ''}${record}`, {
      status: 200,
      headers: { 'content-type': 'text/event-stream', ...extraHeaders },
    });
  };

  const handle = async (method: string, params: Record<string, unknown>): Promise<Record<string, unknown>> => {
    switch (method) {
      case 'initialize':
        return {
          result: {
            protocolVersion: opts.protocolVersion ?? '2025-03-26',
            capabilities: { tools: { listChanged: true } },
            serverInfo: { name: 'fake-billing', version: '1.0.0' },
          },
        };
      case 'tools/list': {
        const size = opts.pageSize ?? (tools.length || 1);
        const start = typeof params.cursor === 'string' ? Number(params.cursor) : 0;
        const page = tools.slice(start, start + size).map(({ handler: _handler, ...tool }) => tool);
        const next = start + size < tools.length ? String(start + size) : undefined;
        return { result: next ? { tools: page, nextCursor: next } : { tools: page } };
      }
      case 'tools/call': {
        const tool = tools.find(t => t.name === params.name);
        if (!tool) return { error: { code: -32602, message: `Unknown tool: ${String(params.name)}` } };
        const args = isRecord(params.arguments) ? params.arguments : {};
        return { result: await tool.handler(args) };
      }
      case 'close':
        return { result: {} };
      default:
        return { error: { code: -32601, message: 'Method not found' } };
    }
  };

  const serveGet = async (signal?: AbortSignal | null): Promise<Response> => {
    if (opts.hangGet) return new Promise<Response>(() => {});
    if (opts.getStatus) return new Response(null, { status: opts.getStatus });
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        for (const chunk of opts.pushEvents ?? []) controller.enqueue(encoder.encode(chunk));
        if (opts.streamEnd === 'close') controller.close();
        else if (opts.streamEnd === 'drop') controller.error(new Error('connection reset'));
        else signal?.addEventListener('abort', () => controller.error(new Error('This operation was aborted')), { once: true });
      },
    });
    return new Response(body, { status: 200, headers: { 'content-type': 'text/event-stream' } });
  };

  const fetchImpl: FetchLike = async (_url, init) => {
    const headers = Object.fromEntries(new Headers(init.headers));
    if (init.method === 'GET') {
      requests.push({ verb: 'GET', headers });
      return serveGet(init.signal);
    }

    const raw: unknown = JSON.parse(typeof init.body === 'string' ? init.body : '{}');
    const message = isRecord(raw) ? raw : {};
    const method = typeof message.method === 'string' ? message.method : '';
    const id = typeof message.id === 'string' || typeof message.id === 'number' ? message.id : undefined;
    const params = isRecord(message.params) ? message.params : {};
    requests.push({ verb: 'POST', rpcMethod: method, id, params, headers });

    const delay = opts.delays?.[method];
    if (delay) await wait(delay, init.signal);

    const failure = opts.failures?.[method];
    if (failure === 'network') throw new NetworkFailure();
    if (typeof failure === 'number') return new Response('boom', { status: failure });

    if (id === undefined) return new Response(null, { status: 202 });

    let payload: Record<string, unknown>;
    try {
      payload = await handle(method, params);
    } catch (err) {
      if (err instanceof NetworkFailure) throw err;
      payload = { error: { code: -32603, message: err instanceof Error ? err.message : String(err) } };
    }
    const extra: Record<string, string> = method === 'initialize' && sessionId ? { 'mcp-session-id': sessionId } : {};
    return respond(method, id, payload, extra);
  };

  return {
    fetch: fetchImpl,
    requests,
    endpoint: 'http://fake.test/mcp',
    posted(method: string): RecordedRequest[] {
      return requests.filter(r => r.verb === 'POST' && r.rpcMethod === method);
    },
    gets(): RecordedRequest[] {
      return requests.filter(r => r.verb === 'GET');
    },
  };
}

export type FakeMcpServer = ReturnType<typeof createFakeMcpServer>;
