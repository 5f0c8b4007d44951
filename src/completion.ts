// Chat-completions wire types (snake_case, OpenAI/Mistral shape) and the
// endpoint seam the agent drives.
import { z } from 'zod';
import { CompletionEndpointError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { ToolSchema } from './tool_registry.js';
import type { FetchLike } from './transport_streamable_http.js';

export interface ToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

export interface AssistantMessage {
  role: 'assistant';
  content: string | null;
  tool_calls?: readonly ToolCall[];
}

export type ConversationTurn =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | AssistantMessage
  | { role: 'tool'; tool_call_id: string; name: string; content: string };

export interface CompletionRequest {
  messages: readonly ConversationTurn[];
  tools: readonly ToolSchema[];
}

export interface CompletionChoice {
  message: AssistantMessage;
  finish_reason?: string | null;
}

export interface CompletionResponse {
  choices: CompletionChoice[];
}

export interface CompletionEndpoint {
  readonly name: string;
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse>;
}

const WireToolCallSchema = z.object({
  id: z.string(),
  type: z.string().optional(),
  function: z.object({
    name: z.string(),
    arguments: z.union([z.string(), z.record(z.unknown())]).optional(),
  }),
});

const WireResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        role: z.string().optional(),
        content: z.string().nullish(),
        tool_calls: z.array(WireToolCallSchema).nullish(),
      }),
      finish_reason: z.string().nullish(),
    }),
  ),
});

type WireResponse = z.infer<typeof WireResponseSchema>;

export function normalizeResponse(wire: WireResponse): CompletionResponse {
  return {
    choices: wire.choices.map(choice => {
      const message: AssistantMessage = { role: 'assistant', content: choice.message.content ?? null };
      const calls = choice.message.tool_calls ?? [];
      if (calls.length > 0) {
        message.tool_calls = calls.map((call): ToolCall => ({
          id: call.id,
          type: 'function',
          function: {
            name: call.function.name,
            arguments:
              typeof call.function.arguments === 'string' ? call.function.arguments : JSON.stringify(call.function.arguments ?? {}),
          },
        }));
      }
      return { message, finish_reason: choice.finish_reason ?? null };
    }),
  };
}

export const MISTRAL_API_URL = 'https://api.mistral.ai/v1';
export const MISTRAL_DEFAULT_MODEL = 'mistral-large-latest';

export interface ChatCompletionsEndpointOptions {
  apiKey: string;
  /** Base URL; `/chat/completions` is appended. Defaults to Mistral. */
  baseUrl?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  name?: string;
  fetch?: FetchLike;
  logger?: Logger;
}

function normalizeBaseUrl(raw: string): string {
  return raw.replace(/\/+$/, '').replace(/\/chat\/completions$/, '');
}

/** Any OpenAI-compatible `/chat/completions` API; Mistral by default. */
export class ChatCompletionsEndpoint implements CompletionEndpoint {
  readonly name: string;
  readonly model: string;
  private readonly url: string;
  private readonly apiKey: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(opts: ChatCompletionsEndpointOptions) {
    this.name = opts.name ?? 'mistral';
    this.model = opts.model ?? MISTRAL_DEFAULT_MODEL;
    this.url = `${normalizeBaseUrl(opts.baseUrl ?? MISTRAL_API_URL)}/chat/completions`;
    this.apiKey = opts.apiKey;
    this.temperature = opts.temperature ?? 0.7;
    this.maxTokens = opts.maxTokens ?? 4096;
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init));
    this.logger = opts.logger ?? silentLogger;
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    const body: Record<string, unknown> = {
      model: this.model,
      messages: request.messages,
      temperature: this.temperature,
      max_tokens: this.maxTokens,
    };
    if (request.tools.length > 0) {
      body.tools = request.tools;
      body.tool_choice = 'auto';
    }
    this.logger.debug(`${this.name} request: ${request.messages.length} messages, ${request.tools.length} tools`);

    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (err) {
      throw new CompletionEndpointError(`${this.name} API connection error: ${errorMessage(err)}`, undefined, { cause: err });
    }

    const text = await response.text();
    if (!response.ok) {
      throw new CompletionEndpointError(`${this.name} API error: HTTP ${response.status} ${text}`.trim(), response.status);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new CompletionEndpointError(`Invalid JSON response from ${this.name} API: ${errorMessage(err)}`, response.status, { cause: err });
    }
    const parsed = WireResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new CompletionEndpointError(`Unexpected ${this.name} response shape: ${parsed.error.message}`, response.status);
    }
    return normalizeResponse(parsed.data);
  }
}
