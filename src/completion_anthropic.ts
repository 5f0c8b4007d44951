import { Anthropic } from '@anthropic-ai/sdk';
import type { AssistantMessage, CompletionEndpoint, CompletionRequest, CompletionResponse, ConversationTurn, ToolCall } from './completion.js';
import { isRecord } from './codec.js';
import { CompletionEndpointError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { ToolSchema } from './tool_registry.js';

/** The two Anthropic API calls the adapter makes. */
export interface AnthropicMessagesClient {
  createMessage(body: Anthropic.MessageCreateParamsNonStreaming, signal?: AbortSignal): Promise<{ content: Anthropic.ContentBlock[] }>;
  listModelIds(): Promise<string[]>;
}

export function sdkMessagesClient(apiKey: string): AnthropicMessagesClient {
  const client = new Anthropic({ apiKey });
  return {
    createMessage: (body, signal) => client.messages.create(body, { signal }),
    listModelIds: async () => {
      const ids: string[] = [];
      for await (const model of client.models.list()) ids.push(model.id);
      return ids;
    },
  };
}

// Heuristic: lexicographically latest id naming a Claude family; else the latest of all.
export function pickLatestModel(ids: readonly string[]): string {
  if (!ids.length) throw new Error('No models returned from Anthropic');
  const prioritized = ids.filter(id => /(sonnet|opus|haiku)/i.test(id));
  const candidates = prioritized.length ? prioritized : ids;
  return [...candidates].sort()[candidates.length - 1];
}

function parseInput(raw: string): Record<string, unknown> {
  try {
    const value: unknown = JSON.parse(raw || '{}');
    return isRecord(value) ? value : {};
  } catch {
    return {};
  }
}

export interface AnthropicConversation {
  system?: string;
  messages: Anthropic.MessageParam[];
}

export function toAnthropicMessages(turns: readonly ConversationTurn[]): AnthropicConversation {
  const system: string[] = [];
  const messages: Anthropic.MessageParam[] = [];
  // tool results must travel together in one user message
  let results: Anthropic.ToolResultBlockParam[] | undefined;

  for (const turn of turns) {
    switch (turn.role) {
      case 'system':
        system.push(turn.content);
        break;
      case 'user':
        results = undefined;
        messages.push({ role: 'user', content: turn.content });
        break;
      case 'assistant': {
        results = undefined;
        const blocks: Anthropic.ContentBlockParam[] = [];
        if (turn.content) blocks.push({ type: 'text', text: turn.content });
        for (const call of turn.tool_calls ?? []) {
          blocks.push({ type: 'tool_use', id: call.id, name: call.function.name, input: parseInput(call.function.arguments) });
        }
        if (blocks.length) messages.push({ role: 'assistant', content: blocks });
        break;
      }
      case 'tool': {
        const block: Anthropic.ToolResultBlockParam = { type: 'tool_result', tool_use_id: turn.tool_call_id, content: turn.content };
        if (results) {
          results.push(block);
        } else {
          results = [block];
          messages.push({ role: 'user', content: results });
        }
        break;
      }
    }
  }
  return system.length ? { system: system.join('\n\n'), messages } : { messages };
}

export function toAnthropicTools(tools: readonly ToolSchema[]): Anthropic.Tool[] {
  return tools.map((tool): Anthropic.Tool => ({
    name: tool.function.name,
    description: tool.function.description,
    input_schema: { ...tool.function.parameters, type: 'object' },
  }));
}

export function fromAnthropicContent(content: readonly Anthropic.ContentBlock[]): AssistantMessage {
  const text: string[] = [];
  const calls: ToolCall[] = [];
  for (const block of content) {
    if (block.type === 'text') text.push(block.text);
    else if (block.type === 'tool_use') {
      calls.push({ id: block.id, type: 'function', function: { name: block.name, arguments: JSON.stringify(block.input ?? {}) } });
    }
  }
  const message: AssistantMessage = { role: 'assistant', content: text.length ? text.join('') : null };
  if (calls.length) message.tool_calls = calls;
  return message;
}

export interface AnthropicEndpointOptions {
  client: AnthropicMessagesClient;
  /** Resolved from the models list on first use when omitted. */
  model?: string;
  maxTokens?: number;
  logger?: Logger;
}

export class AnthropicEndpoint implements CompletionEndpoint {
  readonly name = 'anthropic';
  private readonly client: AnthropicMessagesClient;
  private readonly maxTokens: number;
  private readonly logger: Logger;
  private model?: string;

  constructor(opts: AnthropicEndpointOptions) {
    this.client = opts.client;
    this.model = opts.model;
    this.maxTokens = opts.maxTokens ?? 1000;
    this.logger = opts.logger ?? silentLogger;
  }

  async resolveModel(): Promise<string> {
    if (this.model) return this.model;
    let ids: string[];
    try {
      ids = await this.client.listModelIds();
    } catch (err) {
      throw new CompletionEndpointError(`Failed to resolve latest Anthropic model: ${errorMessage(err)}`, undefined, { cause: err });
    }
    if (!ids.length) throw new CompletionEndpointError('No models returned from Anthropic');
    const model = pickLatestModel(ids);
    this.logger.info(`selected latest model: ${model}`);
    this.model = model;
    return model;
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<CompletionResponse> {
    const model = await this.resolveModel();
    const { system, messages } = toAnthropicMessages(request.messages);
    const body: Anthropic.MessageCreateParamsNonStreaming = { model, max_tokens: this.maxTokens, messages };
    if (system) body.system = system;
    if (request.tools.length) body.tools = toAnthropicTools(request.tools);

    try {
      const reply = await this.client.createMessage(body, signal);
      return { choices: [{ message: fromAnthropicContent(reply.content) }] };
    } catch (err) {
      const status = err instanceof Anthropic.APIError && typeof err.status === 'number' ? err.status : undefined;
      throw new CompletionEndpointError(`anthropic API error: ${errorMessage(err)}`, status, { cause: err });
    }
  }
}
