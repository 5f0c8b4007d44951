import {
  CallToolResultSchema,
  InitializeResultSchema,
  LATEST_PROTOCOL_VERSION,
  ListToolsResultSchema,
  type CallToolResult,
  type Implementation,
  type ListToolsResult,
  type ServerCapabilities,
} from '@modelcontextprotocol/sdk/types.js';
import { encode, newCorrelationId, type Envelope } from './codec.js';
import { errorMessage, HandshakeError, RequestError, SessionStateError } from './errors.js';
import { StreamingListener, type NotificationHandler } from './listener.js';
import { silentLogger, type Logger } from './logger.js';
import type { StreamableHttpTransport } from './transport_streamable_http.js';

export interface Session {
  readonly id: string;
  readonly protocolVersion: string;
  readonly capabilities: ServerCapabilities;
  readonly serverInfo: Implementation;
}

export interface ClientInfo {
  name: string;
  version: string;
}

export interface SessionClientOptions {
  clientInfo?: ClientInfo;
  /** Per-request deadline in milliseconds. */
  timeoutMs?: number;
  protocolVersion?: string;
  logger?: Logger;
  /** Receives notifications that arrive on request response streams. */
  onNotification?: NotificationHandler;
}

export interface RequestOptions {
  timeoutMs?: number;
}

/** The slice of the client the tool registry depends on. */
export interface ToolProvider {
  listTools(cursor?: string): Promise<ListToolsResult>;
  callTool(name: string, args: Record<string, unknown>): Promise<CallToolResult>;
}

interface Exchange {
  result: Record<string, unknown>;
  sessionId: string | null;
}

export const DEFAULT_CLIENT_INFO: ClientInfo = { name: 'mcp-chat-agent', version: '0.1.0' };
export const DEFAULT_TIMEOUT_MS = 30_000;
const CLOSE_TIMEOUT_MS = 5_000;

export class SessionClient implements ToolProvider {
  private readonly transport: StreamableHttpTransport;
  private readonly clientInfo: ClientInfo;
  private readonly timeoutMs: number;
  private readonly protocolVersion: string;
  private readonly logger: Logger;
  private readonly onNotification?: NotificationHandler;
  private current?: Session;
  private handshakeFailure?: HandshakeError;
  private handshaking?: Promise<Session>;
  private listener?: StreamingListener;
  private closed = false;
  private readonly inFlight = new Set<string>();

  constructor(transport: StreamableHttpTransport, opts: SessionClientOptions = {}) {
    this.transport = transport;
    this.clientInfo = opts.clientInfo ?? DEFAULT_CLIENT_INFO;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.protocolVersion = opts.protocolVersion ?? LATEST_PROTOCOL_VERSION;
    this.logger = opts.logger ?? silentLogger;
    this.onNotification = opts.onNotification;
  }

  get session(): Session | undefined {
    return this.current;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Number of requests currently waiting on a response. */
  get pendingRequests(): number {
    return this.inFlight.size;
  }

  /** Concurrent callers share one in-flight handshake; the session id is assigned once. */
  async handshake(): Promise<Session> {
    if (this.current) return this.current;
    if (this.handshakeFailure) throw this.handshakeFailure;
    if (this.closed) throw new SessionStateError('Client is closed');

    this.handshaking ??= this.initialize().finally(() => {
      this.handshaking = undefined;
    });
    return this.handshaking;
  }

  private async initialize(): Promise<Session> {
    let session: Session;
    try {
      const { result, sessionId } = await this.exchange(
        'initialize',
        { protocolVersion: this.protocolVersion, capabilities: {}, clientInfo: { ...this.clientInfo } },
        undefined,
        this.timeoutMs,
      );
      if (!sessionId) throw new HandshakeError('Server did not assign a session id (missing Mcp-Session-Id header)');

      const parsed = InitializeResultSchema.safeParse(result);
      if (!parsed.success) throw new HandshakeError(`Invalid initialize result: ${parsed.error.message}`);

      session = Object.freeze({
        id: sessionId,
        protocolVersion: parsed.data.protocolVersion,
        capabilities: parsed.data.capabilities,
        serverInfo: parsed.data.serverInfo,
      });
      await this.post(session, 'notifications/initialized');
    } catch (err) {
      const failure = err instanceof HandshakeError ? err : new HandshakeError(`Handshake failed: ${errorMessage(err)}`, { cause: err });
      this.handshakeFailure = failure;
      throw failure;
    }

    if (this.closed) {
      await this.closeRemote(session);
      throw new SessionStateError('Client was closed during the handshake');
    }
    this.current = session;
    this.logger.info(
      `session initialized: ${session.id} (server ${session.serverInfo.name} ${session.serverInfo.version}, protocol ${session.protocolVersion})`,
    );
    return session;
  }

  async request(method: string, params: Record<string, unknown> = {}, opts: RequestOptions = {}): Promise<Record<string, unknown>> {
    const session = this.requireOpenSession();
    const { result } = await this.exchange(method, params, session, opts.timeoutMs ?? this.timeoutMs);
    return result;
  }

  async notify(method: string, params?: Record<string, unknown>): Promise<void> {
    const session = this.requireOpenSession();
    await this.post(session, method, params);
  }

  async listTools(cursor?: string): Promise<ListToolsResult> {
    const result = await this.request('tools/list', cursor ? { cursor } : {});
    const parsed = ListToolsResultSchema.safeParse(result);
    if (!parsed.success) throw new RequestError('decode', `Invalid tools/list result: ${parsed.error.message}`);
    return parsed.data;
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<CallToolResult> {
    const result = await this.request('tools/call', { name, arguments: args });
    const parsed = CallToolResultSchema.safeParse(result);
    if (!parsed.success) throw new RequestError('decode', `Invalid tools/call result: ${parsed.error.message}`);
    return parsed.data;
  }

  /** Starts the server-push listener for this session. At most one per client. */
  openNotificationStream(handler: NotificationHandler, graceMs?: number): StreamingListener {
    const session = this.requireOpenSession();
    if (this.listener) throw new SessionStateError('Notification stream already open');
    this.listener = new StreamingListener({
      transport: this.transport,
      session,
      handler,
      graceMs,
      logger: this.logger.child('stream'),
    });
    this.listener.start();
    return this.listener;
  }

  /**
   * Refuses new requests, stops the listener and tells the server best-effort.
   * In-flight requests are left to finish or time out on their own.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (this.listener) await this.listener.stop();
    // A handshake still running sends its own close once it sees the flag.
    if (this.handshaking) await this.handshaking.catch(() => undefined);
    const session = this.current;
    if (!session) return;
    if (this.inFlight.size > 0) this.logger.debug(`closing with ${this.inFlight.size} request(s) still in flight`);
    await this.closeRemote(session);
  }

  private async closeRemote(session: Session): Promise<void> {
    try {
      await this.exchange('close', {}, session, CLOSE_TIMEOUT_MS);
      this.logger.info(`session closed: ${session.id}`);
    } catch (err) {
      this.logger.debug(`close request failed (ignored): ${errorMessage(err)}`);
    }
  }

  private requireOpenSession(): Session {
    if (this.closed) throw new SessionStateError('Client is closed');
    if (!this.current) throw new SessionStateError('Handshake has not completed');
    return this.current;
  }

  /** Sends a notification; bounded by the client deadline like any request. */
  private async post(session: Session, method: string, params?: Record<string, unknown>): Promise<void> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const reply = await this.transport.post(encode(method, params), {
        sessionId: session.id,
        protocolVersion: session.protocolVersion,
        signal: controller.signal,
      });
      for await (const item of reply.items) {
        if (item.type === 'message') this.route(item.envelope, undefined);
      }
    } catch (err) {
      if (controller.signal.aborted) {
        throw new RequestError('timeout', `${method} timed out after ${this.timeoutMs}ms`, {}, { cause: err });
      }
      if (err instanceof RequestError) throw err;
      throw new RequestError('transport', `${method} failed: ${errorMessage(err)}`, {}, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }

  private async exchange(method: string, params: Record<string, unknown>, session: Session | undefined, timeoutMs: number): Promise<Exchange> {
    const id = newCorrelationId();
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    this.inFlight.add(id);
    let malformed = 0;
    try {
      const reply = await this.transport.post(encode(method, params, id), {
        sessionId: session?.id,
        protocolVersion: session?.protocolVersion,
        signal: controller.signal,
      });
      for await (const item of reply.items) {
        if (item.type === 'error') {
          malformed++;
          this.logger.warn(`${method}: dropping malformed record: ${item.error.message}`);
          continue;
        }
        const envelope = this.route(item.envelope, id);
        if (!envelope) continue;
        if (envelope.kind === 'error') {
          throw new RequestError('remote', `${method} failed: ${envelope.error.message}`, { code: envelope.error.code });
        }
        return { result: envelope.result, sessionId: reply.sessionId };
      }
      if (timedOut) throw new RequestError('timeout', `${method} timed out after ${timeoutMs}ms`);
      if (malformed > 0) throw new RequestError('decode', `${method}: response stream held only malformed records`);
      throw new RequestError('transport', `${method}: response stream ended without a result`);
    } catch (err) {
      if (timedOut) {
        throw err instanceof RequestError && err.kind === 'timeout'
          ? err
          : new RequestError('timeout', `${method} timed out after ${timeoutMs}ms`, {}, { cause: err });
      }
      if (err instanceof RequestError) throw err;
      throw new RequestError('transport', `${method} failed: ${errorMessage(err)}`, {}, { cause: err });
    } finally {
      clearTimeout(timer);
      this.inFlight.delete(id);
    }
  }

  /** Hands non-response traffic to the notification handler; returns the response matching `id`. */
  private route(envelope: Envelope, id: string | undefined): Extract<Envelope, { kind: 'response' | 'error' }> | undefined {
    switch (envelope.kind) {
      case 'notification':
        this.deliver(envelope);
        return undefined;
      case 'request':
        this.logger.debug(`ignoring server request ${envelope.method} (${String(envelope.id)})`);
        return undefined;
      default:
        if (id !== undefined && envelope.id === id) return envelope;
        this.logger.warn(`discarding response with unmatched id ${String(envelope.id)}`);
        return undefined;
    }
  }

  private deliver(envelope: Envelope): void {
    if (!this.onNotification) return;
    try {
      this.onNotification(envelope);
    } catch (err) {
      this.logger.error(`notification handler failed: ${errorMessage(err)}`);
    }
  }
}
