import type { AssistantMessage, CompletionEndpoint, CompletionResponse, ConversationTurn, ToolCall } from './completion.js';
import { isRecord } from './codec.js';
import { CompletionEndpointError, errorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import type { ToolCallRequest, ToolCallResult, ToolRegistry } from './tool_registry.js';

export const DEFAULT_MAX_TOOL_ITERATIONS = 2;
export const NO_RESPONSE = 'No response received';
export const NO_FURTHER_RESPONSE = 'No further response: the tool-call limit was reached before a final answer.';

export type ChatStatus = 'answered' | 'exhausted' | 'empty';

export interface ChatOutcome {
  content: string;
  status: ChatStatus;
  /** Tool dispatch rounds performed for this message. */
  iterations: number;
  toolResults: ToolCallResult[];
}

export interface AgentOptions {
  endpoint: CompletionEndpoint;
  registry: ToolRegistry;
  maxToolIterations?: number;
  /** Sent ahead of the history on every call; never stored in it. */
  systemPrompt?: string;
  logger?: Logger;
  onToolResult?: (result: ToolCallResult) => void;
}

type ParsedArguments = { ok: true; value: Record<string, unknown> } | { ok: false; error: string };

export function parseToolArguments(raw: string): ParsedArguments {
  if (!raw.trim()) return { ok: true, value: {} };
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: `arguments are not valid JSON (${errorMessage(err)})` };
  }
  return isRecord(value) ? { ok: true, value } : { ok: false, error: 'arguments must be a JSON object' };
}

export function toolTurnContent(result: ToolCallResult): string {
  if (!result.ok) return JSON.stringify({ error: result.error });
  return typeof result.payload === 'string' ? result.payload : JSON.stringify(result.payload ?? null);
}

/**
 * Drives one user message to a final reply: completion, tool dispatch,
 * completion again, at most `maxToolIterations` dispatch rounds.
 */
export class Agent {
  private readonly endpoint: CompletionEndpoint;
  private readonly registry: ToolRegistry;
  private readonly maxToolIterations: number;
  private readonly systemPrompt?: string;
  private readonly logger: Logger;
  private readonly onToolResult?: (result: ToolCallResult) => void;
  private readonly turns: ConversationTurn[] = [];

  constructor(opts: AgentOptions) {
    if (opts.maxToolIterations !== undefined && opts.maxToolIterations < 1) {
      throw new RangeError('maxToolIterations must be at least 1');
    }
    this.endpoint = opts.endpoint;
    this.registry = opts.registry;
    this.maxToolIterations = opts.maxToolIterations ?? DEFAULT_MAX_TOOL_ITERATIONS;
    this.systemPrompt = opts.systemPrompt;
    this.logger = opts.logger ?? silentLogger;
    this.onToolResult = opts.onToolResult;
  }

  get history(): readonly ConversationTurn[] {
    return [...this.turns];
  }

  async chat(message: string): Promise<string> {
    return (await this.ask(message)).content;
  }

  async ask(message: string): Promise<ChatOutcome> {
    if (this.registry.stale) await this.refreshTools();

    this.append({ role: 'user', content: message });
    const toolResults: ToolCallResult[] = [];
    let iterations = 0;

    while (iterations < this.maxToolIterations) {
      const response = await this.complete();
      const reply = response.choices[0]?.message;
      if (!reply) return { content: NO_RESPONSE, status: 'empty', iterations, toolResults };

      const calls = reply.tool_calls ?? [];
      if (calls.length === 0) {
        this.append({ role: 'assistant', content: reply.content ?? '' });
        return { content: reply.content ?? '', status: 'answered', iterations, toolResults };
      }

      const turn = this.append(assistantTurn(reply, calls));
      const results = await Promise.all(calls.map(call => this.dispatch(call, turn)));
      this.appendResults(calls, results);
      toolResults.push(...results);
      iterations++;
    }

    this.logger.warn(`tool-call limit (${this.maxToolIterations}) reached without a final answer`);
    return { content: NO_FURTHER_RESPONSE, status: 'exhausted', iterations, toolResults };
  }

  /** A failed refresh keeps the cached tools; the registry stays stale so the next message retries. */
  private async refreshTools(): Promise<void> {
    try {
      await this.registry.discover();
    } catch (err) {
      this.logger.warn(`tool refresh failed; using ${this.registry.tools.length} cached tool(s): ${errorMessage(err)}`);
    }
  }

  private append(turn: ConversationTurn): number {
    this.turns.push(Object.freeze(turn));
    return this.turns.length - 1;
  }

  private async complete(): Promise<CompletionResponse> {
    const messages: ConversationTurn[] = this.systemPrompt
      ? [{ role: 'system', content: this.systemPrompt }, ...this.turns]
      : [...this.turns];
    try {
      return await this.endpoint.complete({ messages, tools: this.registry.completionTools() });
    } catch (err) {
      if (err instanceof CompletionEndpointError) throw err;
      throw new CompletionEndpointError(`${this.endpoint.name} completion failed: ${errorMessage(err)}`, undefined, { cause: err });
    }
  }

  private async dispatch(call: ToolCall, turn: number): Promise<ToolCallResult> {
    const name = call.function.name;
    const args = parseToolArguments(call.function.arguments);
    const result: ToolCallResult = args.ok
      ? await this.registry.dispatch({ id: call.id, name, arguments: args.value, turn } satisfies ToolCallRequest)
      : { callId: call.id, name, ok: false, error: `Invalid arguments for tool '${name}': ${args.error}` };
    try {
      this.onToolResult?.(result);
    } catch (err) {
      this.logger.error(`onToolResult hook failed: ${errorMessage(err)}`);
    }
    return result;
  }

  /** Appends one tool turn per request, in request order. */
  private appendResults(calls: readonly ToolCall[], results: readonly ToolCallResult[]): void {
    const outstanding = new Map<string, ToolCallResult>();
    const pending = new Set(calls.map(call => call.id));
    for (const result of results) {
      if (!pending.has(result.callId) || outstanding.has(result.callId)) {
        this.logger.warn(`discarding tool result with unmatched id ${result.callId}`);
        continue;
      }
      outstanding.set(result.callId, result);
    }
    for (const call of calls) {
      const result = outstanding.get(call.id);
      if (!result) continue;
      outstanding.delete(call.id);
      this.append({ role: 'tool', tool_call_id: call.id, name: result.name, content: toolTurnContent(result) });
    }
  }
}

function assistantTurn(reply: AssistantMessage, calls: readonly ToolCall[]): AssistantMessage {
  const frozen = calls.map(call => Object.freeze({ ...call, function: Object.freeze({ ...call.function }) }));
  return { role: 'assistant', content: reply.content ?? '', tool_calls: Object.freeze(frozen) };
}
