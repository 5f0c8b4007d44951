import { z } from 'zod';
import { DEFAULT_MAX_TOOL_ITERATIONS } from './agent.js';
import { MISTRAL_API_URL } from './completion.js';
import { ConfigError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';
import { DEFAULT_TIMEOUT_MS } from './session.js';
import { resolveEndpoint } from './url.js';

export const PROVIDERS = ['mistral', 'anthropic'] as const;
export type Provider = (typeof PROVIDERS)[number];

/** Raw CLI flags as commander hands them over; every field optional. */
export interface CliOptions {
  url?: string;
  mountPath?: string;
  provider?: string;
  model?: string;
  maxIterations?: string;
  timeout?: string;
  maxTokens?: string;
  systemPrompt?: string;
  listen?: boolean;
  ask?: string;
  serve?: string;
  host?: string;
  verbose?: boolean;
  logLevel?: string;
}

/** OpenAI-compatible HTTP front end, run instead of the terminal prompt. */
export interface ServeConfig {
  port: number;
  host: string;
  apiKey?: string;
}

export interface AppConfig {
  endpoint: string;
  provider: Provider;
  apiKey: string;
  completionUrl?: string;
  model?: string;
  maxTokens: number;
  maxToolIterations: number;
  requestTimeoutMs: number;
  systemPrompt: string;
  listen: boolean;
  logLevel: LogLevel;
  ask?: string;
  serve?: ServeConfig;
}

export const DEFAULT_SERVER_URL = 'http://localhost:3001';
export const DEFAULT_MOUNT_PATH = '/mcp';
export const DEFAULT_API_HOST = '127.0.0.1';
export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful billing assistant. You can call tools exposed by an MCP server to look up invoices, customers and other billing data. ' +
  'Use the tools when the user asks about that data and answer clearly from what they return.';

const API_KEY_VARS: Record<Provider, string> = {
  mistral: 'MISTRAL_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

const ConfigSchema = z.object({
  provider: z.enum(PROVIDERS),
  completionUrl: z.string().url().optional(),
  model: z.string().min(1).optional(),
  maxTokens: z.coerce.number().int().positive(),
  maxToolIterations: z.coerce.number().int().min(1),
  requestTimeoutMs: z.coerce.number().int().positive(),
  systemPrompt: z.string(),
  logLevel: z.enum(LOG_LEVELS),
  servePort: z.coerce.number().int().min(0).max(65535).optional(),
});

function pick(...values: Array<string | undefined>): string | undefined {
  return values.find(v => v !== undefined && v.trim() !== '');
}

export function resolveConfig(opts: CliOptions, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const provider = pick(opts.provider, env.AGENT_PROVIDER) ?? 'mistral';
  const isAnthropic = provider === 'anthropic';

  const checked = ConfigSchema.safeParse({
    provider,
    completionUrl: isAnthropic ? undefined : pick(env.MISTRAL_API_URL) ?? MISTRAL_API_URL,
    model: pick(opts.model, isAnthropic ? env.ANTHROPIC_MODEL : env.MISTRAL_MODEL),
    maxTokens: pick(opts.maxTokens, isAnthropic ? env.ANTHROPIC_MAX_TOKENS : env.MISTRAL_MAX_TOKENS) ?? (isAnthropic ? '1000' : '4096'),
    maxToolIterations: pick(opts.maxIterations, env.AGENT_MAX_TOOL_ITERATIONS) ?? String(DEFAULT_MAX_TOOL_ITERATIONS),
    requestTimeoutMs: pick(opts.timeout, env.MCP_REQUEST_TIMEOUT_MS) ?? String(DEFAULT_TIMEOUT_MS),
    systemPrompt: pick(opts.systemPrompt, env.AGENT_SYSTEM_PROMPT) ?? DEFAULT_SYSTEM_PROMPT,
    logLevel: opts.verbose ? 'debug' : pick(opts.logLevel, env.LOG_LEVEL) ?? 'warn',
    servePort: pick(opts.serve, env.AGENT_API_PORT),
  });
  if (!checked.success) {
    const detail = checked.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  const { servePort, ...parsed } = checked.data;

  const keyVar = API_KEY_VARS[parsed.provider];
  const apiKey = env[keyVar]?.trim();
  if (!apiKey) throw new ConfigError(`${keyVar} environment variable is required for provider '${parsed.provider}'`);

  const endpoint = resolveEndpoint(
    pick(opts.url, env.MCP_SERVER_URL) ?? DEFAULT_SERVER_URL,
    pick(opts.mountPath, env.MCP_MOUNT_PATH) ?? DEFAULT_MOUNT_PATH,
  );

  return {
    ...parsed,
    endpoint,
    apiKey,
    listen: opts.listen ?? true,
    ask: pick(opts.ask),
    serve:
      servePort === undefined
        ? undefined
        : { port: servePort, host: pick(opts.host, env.AGENT_API_HOST) ?? DEFAULT_API_HOST, apiKey: pick(env.AGENT_API_KEY)?.trim() },
  };
}
