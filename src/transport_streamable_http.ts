/*
  Streamable HTTP transport (MCP 2025-03-26 and later):
  - POST {endpoint}  one JSON-RPC message per request. The answer is either
                     202 Accepted (notifications), a JSON body, or a
                     text/event-stream carrying the response record(s).
  - GET  {endpoint}  optional server-push stream for the session; 405 when
                     the server does not offer one.
  The session id travels in the Mcp-Session-Id header, never in the body.
*/
import { decodeEnvelope, EventStreamDecoder, type StreamItem } from './codec.js';
import { DecodeError, RequestError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

export const SESSION_HEADER = 'mcp-session-id';
export const PROTOCOL_VERSION_HEADER = 'mcp-protocol-version';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ExchangeContext {
  sessionId?: string;
  protocolVersion?: string;
  signal?: AbortSignal;
}

export interface PostReply {
  status: number;
  /** Value of the Mcp-Session-Id response header, if the server sent one. */
  sessionId: string | null;
  items: AsyncIterable<StreamItem>;
}

export interface EventStreamConnection {
  status: number;
  items: AsyncIterable<StreamItem>;
}

export interface StreamableHttpTransportOptions {
  endpoint: string;
  fetch?: FetchLike;
  headers?: Record<string, string>;
  logger?: Logger;
}

const EMPTY: AsyncIterable<StreamItem> = {
  async *[Symbol.asyncIterator]() {
    // nothing to read
  },
};

export class StreamableHttpTransport {
  readonly endpoint: string;
  private readonly fetchImpl: FetchLike;
  private readonly extraHeaders: Record<string, string>;
  private readonly logger: Logger;

  constructor(opts: StreamableHttpTransportOptions) {
    this.endpoint = opts.endpoint;
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
    this.extraHeaders = opts.headers ?? {};
    this.logger = opts.logger ?? silentLogger;
  }

  async post(body: string, context: ExchangeContext = {}): Promise<PostReply> {
    const response = await this.fetchImpl(this.endpoint, {
      method: 'POST',
      headers: this.headersFor(context, {
        'content-type': 'application/json',
        accept: 'application/json, text/event-stream',
      }),
      body,
      signal: context.signal,
    });
    await this.ensureOk(response, 'POST');
    this.logger.debug(`POST ${this.endpoint} -> ${response.status} (${response.headers.get('content-type') ?? 'no body'})`);
    return {
      status: response.status,
      sessionId: response.headers.get(SESSION_HEADER),
      items: this.itemsOf(response, context.signal),
    };
  }

  /** Opens the server-push stream. Resolves to null when the server offers none. */
  async openEventStream(context: ExchangeContext = {}): Promise<EventStreamConnection | null> {
    const response = await this.fetchImpl(this.endpoint, {
      method: 'GET',
      headers: this.headersFor(context, {
        accept: 'text/event-stream',
        'cache-control': 'no-cache',
      }),
      signal: context.signal,
    });
    if (response.status === 405) {
      await response.body?.cancel();
      return null;
    }
    await this.ensureOk(response, 'GET');
    if (!response.body) throw new RequestError('transport', 'No response body for event stream', { status: response.status });
    return { status: response.status, items: readEventStream(response.body, context.signal) };
  }

  private headersFor(context: ExchangeContext, base: Record<string, string>): Record<string, string> {
    const headers: Record<string, string> = { ...this.extraHeaders, ...base };
    if (context.sessionId) headers[SESSION_HEADER] = context.sessionId;
    if (context.sessionId && context.protocolVersion) headers[PROTOCOL_VERSION_HEADER] = context.protocolVersion;
    return headers;
  }

  private async ensureOk(response: Response, verb: string): Promise<void> {
    if (response.ok) return;
    const text = (await response.text().catch(() => '')).trim();
    throw new RequestError(
      'transport',
      `${verb} ${this.endpoint} failed: HTTP ${response.status}${text ? ` ${text}` : ''}`,
      { status: response.status },
    );
  }

  private itemsOf(response: Response, signal?: AbortSignal): AsyncIterable<StreamItem> {
    const body = response.body;
    if (response.status === 202 || !body) return EMPTY;
    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('text/event-stream')) return readEventStream(body, signal);
    return readJsonBody(response);
  }
}

async function* readJsonBody(response: Response): AsyncGenerator<StreamItem> {
  const text = (await response.text()).trim();
  if (!text) return;
  const decoded = decodeEnvelope(text);
  if (decoded instanceof DecodeError) yield { type: 'error', error: decoded };
  else yield { type: 'message', envelope: decoded };
}

export async function* readEventStream(body: ReadableStream<Uint8Array>, signal?: AbortSignal): AsyncGenerator<StreamItem> {
  const reader = body.getReader();
  const decoder = new EventStreamDecoder();
  const cancel = () => {
    reader.cancel(signal?.reason).catch(() => {
      // the stream is already errored; read() reports it
    });
  };
  signal?.addEventListener('abort', cancel, { once: true });
  let drained = false;
  try {
    while (true) {
      const { value, done } = await reader.read();
      if (done) break;
      yield* decoder.decode(value);
    }
    drained = true;
    yield* decoder.end();
  } finally {
    signal?.removeEventListener('abort', cancel);
    // consumer stopped early: release the connection instead of leaving it half-read
    if (!drained) await reader.cancel().catch(() => undefined);
    reader.releaseLock();
  }
}
