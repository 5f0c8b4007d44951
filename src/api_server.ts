// OpenAI-compatible HTTP front end for the agent:
//   GET  /health               liveness
//   GET  /v1/models            advertised model ids
//   POST /v1/chat/completions  one agent turn; `stream: true` answers as SSE chunks
import http from 'node:http';
import { randomUUID } from 'node:crypto';
import { buffer } from 'node:stream/consumers';
import { z } from 'zod';
import type { Agent, ChatOutcome } from './agent.js';
import { errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { DEFAULT_CLIENT_INFO } from './session.js';

export type ChatAgent = Pick<Agent, 'ask'>;
export type ApiHandler = (request: Request) => Promise<Response>;

export interface ApiHandlerOptions {
  agent: ChatAgent;
  /** Ids listed by /v1/models. */
  models: readonly string[];
  /** When set, callers must send `Authorization: Bearer <apiKey>`. */
  apiKey?: string;
  logger?: Logger;
  clock?: () => Date;
}

const ContentPartSchema = z.object({ type: z.string(), text: z.string().optional() }).passthrough();

const ChatRequestSchema = z.object({
  model: z.string().min(1),
  messages: z.array(
    z.object({
      role: z.string(),
      content: z.union([z.string(), z.array(ContentPartSchema)]).nullish(),
    }),
  ),
  stream: z.boolean().nullish(),
});

type ChatRequest = z.infer<typeof ChatRequestSchema>;

const CORS_HEADERS: Record<string, string> = {
  'access-control-allow-origin': '*',
  'access-control-allow-methods': 'GET, POST, OPTIONS',
  'access-control-allow-headers': 'Content-Type, Authorization',
};

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { ...CORS_HEADERS, 'content-type': 'application/json' } });
}

function apiError(status: number, type: string, message: string): Response {
  return json({ error: { message, type } }, status);
}

/** Text of the last user message; multi-part content keeps its text parts, space-joined. */
export function lastUserMessage(messages: ChatRequest['messages']): string | undefined {
  const last = messages.filter(m => m.role === 'user').at(-1);
  if (!last?.content) return undefined;
  if (typeof last.content === 'string') return last.content;
  return last.content
    .flatMap(part => (part.type === 'text' && part.text !== undefined ? [part.text] : []))
    .join(' ');
}

function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

export function createApiHandler(opts: ApiHandlerOptions): ApiHandler {
  const logger = opts.logger ?? silentLogger;
  const clock = opts.clock ?? (() => new Date());
  const seconds = () => Math.floor(clock().getTime() / 1000);
  const startedAt = seconds();

  // One conversation behind the server, so turns run one at a time.
  let tail: Promise<unknown> = Promise.resolve();
  const serial = (message: string): Promise<ChatOutcome> => {
    const run = tail.then(() => opts.agent.ask(message));
    tail = run.catch(() => undefined);
    return run;
  };

  const authorized = (request: Request): boolean => {
    const header = request.headers.get('authorization');
    if (opts.apiKey !== undefined) return header === `Bearer ${opts.apiKey}`;
    return header === null || header.startsWith('Bearer ');
  };

  async function completions(request: Request): Promise<Response> {
    if (!authorized(request)) return apiError(401, 'authentication_error', 'Invalid or missing bearer token');

    let raw: unknown;
    try {
      raw = await request.json();
    } catch (err) {
      return apiError(400, 'invalid_request_error', `Request body is not valid JSON: ${errorMessage(err)}`);
    }
    const parsed = ChatRequestSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
      return apiError(400, 'invalid_request_error', `Invalid chat completion request: ${detail}`);
    }
    const message = lastUserMessage(parsed.data.messages);
    if (!message) return apiError(400, 'invalid_request_error', 'Request holds no user message');

    const id = `chatcmpl-${randomUUID()}`;
    const model = parsed.data.model;
    logger.info(`chat completion ${id} (${parsed.data.stream ? 'stream' : 'json'}): ${message}`);

    if (parsed.data.stream) return streamed(id, model, message);

    let outcome: ChatOutcome;
    try {
      outcome = await serial(message);
    } catch (err) {
      logger.error(`chat completion ${id} failed: ${errorMessage(err)}`);
      return apiError(500, 'server_error', errorMessage(err));
    }
    return json({
      id,
      object: 'chat.completion',
      created: seconds(),
      model,
      choices: [{ index: 0, message: { role: 'assistant', content: outcome.content }, finish_reason: 'stop' }],
      usage: {
        prompt_tokens: estimateTokens(message),
        completion_tokens: estimateTokens(outcome.content),
        total_tokens: estimateTokens(message + outcome.content),
      },
    });
  }

  function streamed(id: string, model: string, message: string): Response {
    const encoder = new TextEncoder();
    const created = seconds();
    const chunk = (delta: { role?: 'assistant'; content?: string }, finishReason: string | null) => ({
      id,
      object: 'chat.completion.chunk',
      created,
      model,
      choices: [{ index: 0, delta, finish_reason: finishReason }],
    });

    const body = new ReadableStream<Uint8Array>({
      async start(controller) {
        const send = (data: string) => controller.enqueue(encoder.encode(`data: ${data}\n\n`));
        try {
          const outcome = await serial(message);
          send(JSON.stringify(chunk({ role: 'assistant', content: outcome.content }, null)));
          send(JSON.stringify(chunk({}, 'stop')));
        } catch (err) {
          logger.error(`chat completion ${id} failed: ${errorMessage(err)}`);
          send(JSON.stringify({ error: { message: errorMessage(err), type: 'server_error' } }));
        }
        send('[DONE]');
        controller.close();
      },
    });
    return new Response(body, {
      headers: { ...CORS_HEADERS, 'content-type': 'text/event-stream', 'cache-control': 'no-cache' },
    });
  }

  return async request => {
    const { pathname } = new URL(request.url);
    if (request.method === 'OPTIONS') return new Response(null, { status: 204, headers: CORS_HEADERS });

    switch (pathname) {
      case '/health':
        if (request.method !== 'GET') break;
        return json({ status: 'healthy', service: DEFAULT_CLIENT_INFO.name, version: DEFAULT_CLIENT_INFO.version });
      case '/v1/models':
        if (request.method !== 'GET') break;
        return json({
          object: 'list',
          data: opts.models.map(model => ({ id: model, object: 'model', created: startedAt, owned_by: DEFAULT_CLIENT_INFO.name })),
        });
      case '/v1/chat/completions':
        if (request.method !== 'POST') break;
        return completions(request);
      default:
        return apiError(404, 'not_found', `Not found: ${request.method} ${pathname}`);
    }
    return apiError(405, 'method_not_allowed', `Method not allowed: ${request.method} ${pathname}`);
  };
}

const HOP_BY_HOP = new Set(['connection', 'content-length', 'host', 'keep-alive', 'transfer-encoding']);

async function toRequest(req: http.IncomingMessage, origin: string): Promise<Request> {
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (HOP_BY_HOP.has(key)) continue;
    if (typeof value === 'string') headers.set(key, value);
    else if (value) for (const item of value) headers.append(key, item);
  }
  const method = req.method ?? 'GET';
  const body = method === 'GET' || method === 'HEAD' ? undefined : (await buffer(req)).toString('utf8');
  return new Request(new URL(req.url ?? '/', origin), { method, headers, body });
}

async function writeResponse(response: Response, res: http.ServerResponse): Promise<void> {
  response.headers.forEach((value, key) => res.setHeader(key, value));
  res.writeHead(response.status);
  const reader = response.body?.getReader();
  if (reader) {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      res.write(value);
    }
  }
  res.end();
}

export interface ApiServerOptions {
  port: number;
  host: string;
  logger?: Logger;
}

/** Serves `handler` over node:http; resolves once the server is listening. */
export async function startApiServer(handler: ApiHandler, opts: ApiServerOptions): Promise<http.Server> {
  const logger = opts.logger ?? silentLogger;
  const origin = `http://${opts.host}:${opts.port}`;

  const server = http.createServer(async (req, res) => {
    try {
      await writeResponse(await handler(await toRequest(req, origin)), res);
    } catch (err) {
      logger.error(`${req.method ?? 'GET'} ${req.url ?? '/'} failed: ${errorMessage(err)}`);
      if (!res.headersSent) res.writeHead(500, { 'content-type': 'application/json' });
      res.end(JSON.stringify({ error: { message: 'Internal server error', type: 'server_error' } }));
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(opts.port, opts.host, () => {
      server.off('error', reject);
      resolve();
    });
  });
  logger.info(`API server listening on ${origin} (GET /health, GET /v1/models, POST /v1/chat/completions)`);
  return server;
}
