import type { Envelope } from './codec.js';
import { errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { Session } from './session.js';
import type { StreamableHttpTransport } from './transport_streamable_http.js';

export type NotificationHandler = (envelope: Envelope) => void;

export type ListenerState = 'idle' | 'running' | 'stopped';
export type StopOutcome = 'stopped' | 'terminated';

export interface StreamingListenerOptions {
  transport: StreamableHttpTransport;
  session: Session;
  handler: NotificationHandler;
  /** How long stop() waits for the task before abandoning it. */
  graceMs?: number;
  logger?: Logger;
}

export const DEFAULT_GRACE_MS = 2_000;

/**
 * Background reader for the session's server-push channel. The channel is
 * supplementary: a lost connection ends the task and nothing else.
 */
export class StreamingListener {
  readonly session: Session;
  private readonly transport: StreamableHttpTransport;
  private readonly handler: NotificationHandler;
  private readonly graceMs: number;
  private readonly logger: Logger;
  private readonly controller = new AbortController();
  private task?: Promise<void>;
  private current: ListenerState = 'idle';

  constructor(opts: StreamingListenerOptions) {
    this.transport = opts.transport;
    this.session = opts.session;
    this.handler = opts.handler;
    this.graceMs = opts.graceMs ?? DEFAULT_GRACE_MS;
    this.logger = opts.logger ?? silentLogger;
  }

  get state(): ListenerState {
    return this.current;
  }

  start(): void {
    if (this.current !== 'idle') return;
    this.current = 'running';
    this.task = this.run(this.controller.signal).finally(() => {
      this.current = 'stopped';
    });
  }

  async stop(graceMs = this.graceMs): Promise<StopOutcome> {
    this.controller.abort();
    if (!this.task) {
      this.current = 'stopped';
      return 'stopped';
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<StopOutcome>(resolve => {
      timer = setTimeout(() => resolve('terminated'), graceMs);
    });
    const outcome = await Promise.race([this.task.then((): StopOutcome => 'stopped'), deadline]);
    clearTimeout(timer);

    if (outcome === 'terminated') {
      this.logger.warn(`listener ignored cancellation for ${graceMs}ms; abandoning it`);
      this.current = 'stopped';
    }
    return outcome;
  }

  private async run(signal: AbortSignal): Promise<void> {
    try {
      this.logger.info(`connecting to event stream for session ${this.session.id}`);
      const connection = await this.transport.openEventStream({
        sessionId: this.session.id,
        protocolVersion: this.session.protocolVersion,
        signal,
      });
      if (!connection) {
        this.logger.info('server offers no event stream (405); listener exiting');
        return;
      }
      this.logger.info('event stream connected');

      for await (const item of connection.items) {
        if (signal.aborted) break;
        if (item.type === 'error') {
          this.logger.debug(`ignoring non-JSON record: ${item.error.raw}`);
          continue;
        }
        this.dispatch(item.envelope);
      }
      if (!signal.aborted) this.logger.warn('event stream closed by server');
    } catch (err) {
      if (signal.aborted) this.logger.debug('event stream cancelled');
      else this.logger.warn(`event stream lost: ${errorMessage(err)}`);
    }
  }

  private dispatch(envelope: Envelope): void {
    if (envelope.kind === 'response' || envelope.kind === 'error') {
      this.logger.warn(`discarding unmatched response ${String(envelope.id)} on event stream`);
      return;
    }
    try {
      this.handler(envelope);
    } catch (err) {
      this.logger.error(`notification handler failed: ${errorMessage(err)}`);
    }
  }
}
