#!/usr/bin/env node
import { Command, Option } from 'commander';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { config as loadEnv } from 'dotenv';
import { Agent } from './agent.js';
import { createApiHandler, startApiServer } from './api_server.js';
import type { Envelope } from './codec.js';
import { ChatCompletionsEndpoint, MISTRAL_DEFAULT_MODEL, type CompletionEndpoint } from './completion.js';
import { AnthropicEndpoint, sdkMessagesClient } from './completion_anthropic.js';
import { PROVIDERS, resolveConfig, type AppConfig, type CliOptions } from './config.js';
import { AgentError, errorMessage } from './errors.js';
import { createLogger, LOG_LEVELS, type Logger } from './logger.js';
import { formatToolActivity } from './print.js';
import { SessionClient } from './session.js';
import { ToolRegistry } from './tool_registry.js';
import { StreamableHttpTransport } from './transport_streamable_http.js';

loadEnv();

function buildEndpoint(config: AppConfig, logger: Logger): CompletionEndpoint {
  if (config.provider === 'anthropic') {
    return new AnthropicEndpoint({
      client: sdkMessagesClient(config.apiKey),
      model: config.model,
      maxTokens: config.maxTokens,
      logger,
    });
  }
  return new ChatCompletionsEndpoint({
    apiKey: config.apiKey,
    baseUrl: config.completionUrl,
    model: config.model,
    maxTokens: config.maxTokens,
    logger,
  });
}

function logNotification(envelope: Envelope, logger: Logger): void {
  if (envelope.kind !== 'notification') return;
  const params = envelope.params ?? {};
  if (envelope.method === 'notifications/message') {
    logger.info(`server log (${String(params.level ?? 'info')}): ${JSON.stringify(params.data ?? null)}`);
  } else {
    logger.info(`notification ${envelope.method} ${JSON.stringify(params)}`);
  }
}

async function answer(agent: Agent, question: string): Promise<void> {
  try {
    const reply = await agent.chat(question);
    console.log('\n' + reply);
  } catch (e) {
    if (!(e instanceof AgentError)) throw e;
    console.error(`Error: ${e.message}`);
  }
}

async function interactive(agent: Agent): Promise<void> {
  const rl = readline.createInterface({ input, output });
  const stop = new AbortController();
  rl.on('SIGINT', () => stop.abort());
  rl.on('close', () => stop.abort());

  console.log('Ask about invoices, customers or other billing data. Type exit to quit.');
  try {
    while (true) {
      let q: string;
      try {
        q = (await rl.question('\nQuery (type exit to quit): ', { signal: stop.signal })).trim();
      } catch (e) {
        if (stop.signal.aborted) break;
        throw e;
      }
      if (q.toLowerCase() === 'exit') break;
      if (!q) continue;
      await answer(agent, q);
    }
  } finally {
    rl.close();
  }
  console.log('Goodbye! Closing session...');
}

async function serve(agent: Agent, config: AppConfig, logger: Logger): Promise<void> {
  if (!config.serve) return;
  const backing = config.model ?? (config.provider === 'mistral' ? MISTRAL_DEFAULT_MODEL : undefined);
  const models = backing ? ['mcp-chat-agent', backing] : ['mcp-chat-agent'];
  const handler = createApiHandler({ agent, models, apiKey: config.serve.apiKey, logger });
  const server = await startApiServer(handler, { port: config.serve.port, host: config.serve.host, logger });
  console.log(`Serving on http://${config.serve.host}:${config.serve.port} (Ctrl+C to stop)`);

  await new Promise<void>(resolve => {
    process.once('SIGINT', resolve);
    process.once('SIGTERM', resolve);
  });
  await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
}

async function run(opts: CliOptions): Promise<void> {
  const config = resolveConfig(opts);
  const logger = createLogger({ level: config.logLevel, tag: 'client' });

  console.log('Connecting to MCP server at:', config.endpoint);
  const transport = new StreamableHttpTransport({ endpoint: config.endpoint, logger: logger.child('transport') });

  let toolsChanged = () => {};
  const onNotification = (envelope: Envelope) => {
    logNotification(envelope, logger);
    if (envelope.kind === 'notification' && envelope.method === 'notifications/tools/list_changed') toolsChanged();
  };
  const client = new SessionClient(transport, {
    timeoutMs: config.requestTimeoutMs,
    logger: logger.child('session'),
    onNotification,
  });
  const registry = new ToolRegistry(client, { logger: logger.child('tools') });
  toolsChanged = () => registry.invalidate();

  await client.handshake();
  try {
    if (config.listen) client.openNotificationStream(onNotification);

    const tools = await registry.discover();
    console.log('Tools:', tools.map(t => t.name).join(', ') || '(none)');

    const agent = new Agent({
      endpoint: buildEndpoint(config, logger.child('model')),
      registry,
      maxToolIterations: config.maxToolIterations,
      systemPrompt: config.systemPrompt,
      logger: logger.child('agent'),
      onToolResult: config.logLevel === 'debug' ? result => console.log(formatToolActivity(result)) : undefined,
    });

    if (config.serve) await serve(agent, config, logger.child('api'));
    else if (config.ask) await answer(agent, config.ask);
    else await interactive(agent);
  } finally {
    await client.close();
  }
}

const program = new Command();
program
  .name('mcp-chat-agent')
  .description('Chat with a language model that calls tools on a remote MCP server')
  .option('--url <url>', 'MCP server base URL (env MCP_SERVER_URL, default http://localhost:3001)')
  .option('--mount-path <path>', 'MCP mount path (env MCP_MOUNT_PATH, default /mcp)')
  .addOption(new Option('--provider <name>', 'completion provider (env AGENT_PROVIDER)').choices([...PROVIDERS]))
  .option('--model <id>', 'model id (env MISTRAL_MODEL / ANTHROPIC_MODEL)')
  .option('--max-iterations <n>', 'tool-call rounds per message (env AGENT_MAX_TOOL_ITERATIONS, default 2)')
  .option('--timeout <ms>', 'MCP request timeout in ms (env MCP_REQUEST_TIMEOUT_MS, default 30000)')
  .option('--max-tokens <n>', 'max tokens per completion (env MISTRAL_MAX_TOKENS / ANTHROPIC_MAX_TOKENS)')
  .option('--system-prompt <text>', 'system prompt (env AGENT_SYSTEM_PROMPT)')
  .option('--no-listen', 'do not open the server notification stream')
  .option('--ask <question>', 'ask one question and exit')
  .option('--serve <port>', 'serve an OpenAI-compatible API instead of the prompt (env AGENT_API_PORT)')
  .option('--host <host>', 'API bind address (env AGENT_API_HOST, default 127.0.0.1)')
  .addOption(new Option('--log-level <level>', 'log level (env LOG_LEVEL, default warn)').choices([...LOG_LEVELS]))
  .option('--verbose', 'verbose logging and tool previews', false)
  .action(async () => {
    try {
      await run(program.opts<CliOptions>());
    } catch (e) {
      console.error('Fatal:', errorMessage(e));
      process.exit(1);
    }
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error('Fatal:', errorMessage(e));
  process.exit(1);
});
