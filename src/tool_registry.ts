import type { ListToolsResult } from '@modelcontextprotocol/sdk/types.js';
import { Ajv, type ValidateFunction } from 'ajv';
import { errorMessage, RequestError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { toolPayload, toolResultText } from './print.js';
import type { ToolProvider } from './session.js';

export interface ToolDescriptor {
  readonly name: string;
  readonly description?: string;
  readonly inputSchema: Readonly<Record<string, unknown>>;
}

/** Function-call schema as completion endpoints expect it. */
export interface ToolSchema {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface ToolCallRequest {
  /** Correlation id assigned by the model. */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  /** Index of the assistant turn that asked for the call. */
  turn?: number;
}

export type ToolCallResult =
  | { callId: string; name: string; ok: true; payload: unknown }
  | { callId: string; name: string; ok: false; error: string };

export interface ToolRegistryOptions {
  logger?: Logger;
  /** Extra attempts for a tools/list page that timed out. */
  listRetries?: number;
}

export const NO_DESCRIPTION = 'No description available';

export class ToolRegistry {
  private readonly provider: ToolProvider;
  private readonly logger: Logger;
  private readonly listRetries: number;
  private readonly ajv = new Ajv({ allErrors: true, strict: false });
  private readonly validators = new Map<string, ValidateFunction | null>();
  private descriptors: readonly ToolDescriptor[] = [];
  private discovered = false;
  private isStale = false;

  constructor(provider: ToolProvider, opts: ToolRegistryOptions = {}) {
    this.provider = provider;
    this.logger = opts.logger ?? silentLogger;
    this.listRetries = opts.listRetries ?? 1;
  }

  get tools(): readonly ToolDescriptor[] {
    return this.descriptors;
  }

  /** True before the first discovery and after invalidate(). */
  get stale(): boolean {
    return !this.discovered || this.isStale;
  }

  invalidate(): void {
    this.isStale = true;
  }

  async discover(): Promise<readonly ToolDescriptor[]> {
    const found: ToolDescriptor[] = [];
    let cursor: string | undefined;
    do {
      const page = await this.listPage(cursor);
      for (const tool of page.tools) {
        found.push(
          Object.freeze({
            name: tool.name,
            description: tool.description,
            inputSchema: Object.freeze({ ...tool.inputSchema }),
          }),
        );
      }
      cursor = page.nextCursor;
    } while (cursor);

    this.descriptors = Object.freeze(found);
    this.validators.clear();
    this.ajv.removeSchema();
    this.discovered = true;
    this.isStale = false;
    this.logger.info(`loaded ${found.length} tools: ${found.map(t => t.name).join(', ')}`);
    return this.descriptors;
  }

  completionTools(): ToolSchema[] {
    return this.descriptors.map((tool): ToolSchema => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description ?? NO_DESCRIPTION,
        parameters: { ...tool.inputSchema },
      },
    }));
  }

  /** Never rejects: every failure comes back as an error-shaped result. */
  async dispatch(request: ToolCallRequest): Promise<ToolCallResult> {
    const fail = (error: string): ToolCallResult => ({ callId: request.id, name: request.name, ok: false, error });

    const tool = this.descriptors.find(t => t.name === request.name);
    if (!tool) {
      this.logger.warn(`model requested unknown tool '${request.name}'`);
      return fail(`Tool '${request.name}' not found`);
    }

    const validate = this.validatorFor(tool);
    if (validate && !validate(request.arguments)) {
      const detail = this.ajv.errorsText(validate.errors, { dataVar: 'arguments' });
      return fail(`Invalid arguments for tool '${tool.name}': ${detail}`);
    }

    this.logger.info(`calling tool ${tool.name} with ${JSON.stringify(request.arguments)}`);
    try {
      const result = await this.provider.callTool(tool.name, request.arguments);
      if (result.isError) {
        const message = toolResultText(result) || `Tool '${tool.name}' reported an error`;
        this.logger.warn(`tool ${tool.name} returned an error: ${message}`);
        return fail(message);
      }
      this.logger.info(`tool ${tool.name} completed`);
      return { callId: request.id, name: tool.name, ok: true, payload: toolPayload(result) };
    } catch (err) {
      this.logger.error(`error calling tool ${tool.name}: ${errorMessage(err)}`);
      return fail(errorMessage(err));
    }
  }

  private async listPage(cursor: string | undefined): Promise<ListToolsResult> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.provider.listTools(cursor);
      } catch (err) {
        const retryable = err instanceof RequestError && err.kind === 'timeout' && attempt < this.listRetries;
        if (!retryable) throw err;
        this.logger.warn(`tools/list timed out; retrying (${attempt + 1}/${this.listRetries})`);
      }
    }
  }

  private validatorFor(tool: ToolDescriptor): ValidateFunction | null {
    const cached = this.validators.get(tool.name);
    if (cached !== undefined) return cached;
    let validate: ValidateFunction | null = null;
    try {
      validate = this.ajv.compile({ ...tool.inputSchema });
    } catch (err) {
      this.logger.warn(`cannot compile input schema of ${tool.name}; arguments go unvalidated: ${errorMessage(err)}`);
    }
    this.validators.set(tool.name, validate);
    return validate;
  }
}
