import { randomUUID } from 'node:crypto';
import { JSONRPCMessageSchema } from '@modelcontextprotocol/sdk/types.js';
import { DecodeError, errorMessage } from './errors.js';

export type RequestId = string | number;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export type Envelope =
  | { kind: 'response'; id: RequestId; result: Record<string, unknown> }
  | { kind: 'error'; id: RequestId; error: JsonRpcErrorObject }
  | { kind: 'notification'; method: string; params?: Record<string, unknown> }
  | { kind: 'request'; id: RequestId; method: string; params?: Record<string, unknown> };

/** One decoded event-stream record. Malformed records surface as `error` items. */
export type StreamItem =
  | { type: 'message'; envelope: Envelope; eventId?: string; event?: string }
  | { type: 'error'; error: DecodeError };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function newCorrelationId(): string {
  return randomUUID();
}

/** Requests carry a correlation id; without one the envelope is a notification. */
export function encode(method: string, params?: Record<string, unknown>, correlationId?: RequestId): string {
  const envelope: Record<string, unknown> = { jsonrpc: '2.0' };
  if (correlationId !== undefined) envelope.id = correlationId;
  envelope.method = method;
  if (params !== undefined) envelope.params = params;
  return JSON.stringify(envelope);
}

function isRequestId(value: unknown): value is RequestId {
  return typeof value === 'string' || typeof value === 'number';
}

function toEnvelope(raw: Record<string, unknown>): Envelope | undefined {
  const { id, method, params, result, error } = raw;
  const paramsRecord = isRecord(params) ? params : undefined;
  if (typeof method === 'string') {
    return isRequestId(id)
      ? { kind: 'request', id, method, params: paramsRecord }
      : { kind: 'notification', method, params: paramsRecord };
  }
  if (!isRequestId(id)) return undefined;
  if (isRecord(result)) return { kind: 'response', id, result };
  if (isRecord(error) && typeof error.code === 'number' && typeof error.message === 'string') {
    return { kind: 'error', id, error: { code: error.code, message: error.message, data: error.data } };
  }
  return undefined;
}

export function decodeEnvelope(text: string): Envelope | DecodeError {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return new DecodeError(`invalid JSON: ${errorMessage(err)}`, text, { cause: err });
  }
  const checked = JSONRPCMessageSchema.safeParse(raw);
  if (!checked.success || !isRecord(raw)) {
    return new DecodeError('not a JSON-RPC 2.0 message', text);
  }
  return toEnvelope(raw) ?? new DecodeError('unrecognised JSON-RPC message shape', text);
}

/**
 * Incremental `text/event-stream` parser. Use one instance per connection;
 * both generators must be drained for the decoder state to advance.
 */
export class EventStreamDecoder {
  private readonly text = new TextDecoder();
  private buffer = '';
  private data: string[] = [];
  private eventId?: string;
  private event?: string;

  *decode(chunk: Uint8Array | string): Generator<StreamItem> {
    this.buffer += typeof chunk === 'string' ? chunk : this.text.decode(chunk, { stream: true });
    let idx: number;
    while ((idx = this.buffer.indexOf('\n')) >= 0) {
      const line = this.buffer.slice(0, idx).replace(/\r$/, '');
      this.buffer = this.buffer.slice(idx + 1);
      const item = this.consumeLine(line);
      if (item) yield item;
    }
  }

  /** Flushes a trailing record the server did not terminate with a blank line. */
  *end(): Generator<StreamItem> {
    const tail = (this.buffer + this.text.decode()).replace(/\r$/, '');
    this.buffer = '';
    if (tail) {
      const item = this.consumeLine(tail);
      if (item) yield item;
    }
    const last = this.dispatch();
    if (last) yield last;
  }

  private consumeLine(line: string): StreamItem | undefined {
    if (line === '') return this.dispatch();
    // comment, servers use these as keepalives
    if (line.startsWith(':')) return undefined;

    const colon = line.indexOf(':');
    const field = colon < 0 ? line : line.slice(0, colon);
    let value = colon < 0 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);

    switch (field) {
      case 'data':
        this.data.push(value);
        break;
      case 'id':
        this.eventId = value;
        break;
      case 'event':
        this.event = value;
        break;
      default:
        break;
    }
    return undefined;
  }

  private dispatch(): StreamItem | undefined {
    const event = this.event;
    this.event = undefined;
    if (this.data.length === 0) return undefined;

    const raw = this.data.join('\n');
    this.data = [];
    const decoded = decodeEnvelope(raw);
    if (decoded instanceof DecodeError) return { type: 'error', error: decoded };
    return { type: 'message', envelope: decoded, eventId: this.eventId, event };
  }
}
