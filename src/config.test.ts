import { describe, expect, it } from 'vitest';
import { DEFAULT_SYSTEM_PROMPT, resolveConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('resolveConfig', () => {
  it('fills defaults for the mistral provider', () => {
    expect(resolveConfig({}, { MISTRAL_API_KEY: 'test-secret' })).toEqual({
      endpoint: 'http://localhost:3001/mcp',
      provider: 'mistral',
      apiKey: 'test-secret',
      completionUrl: 'https://api.mistral.ai/v1',
      model: undefined,
      maxTokens: 4096,
      maxToolIterations: 2,
      requestTimeoutMs: 30000,
      systemPrompt: DEFAULT_SYSTEM_PROMPT,
      listen: true,
      logLevel: 'warn',
      ask: undefined,
      serve: undefined,
    });
  });

  it('names the missing API key variable', () => {
    expect(() => resolveConfig({}, {})).toThrow(new ConfigError("MISTRAL_API_KEY environment variable is required for provider 'mistral'"));
    expect(() => resolveConfig({ provider: 'anthropic' }, { MISTRAL_API_KEY: 'test-secret' })).toThrow(
      "ANTHROPIC_API_KEY environment variable is required for provider 'anthropic'",
    );
  });

  it('lets flags override the environment', () => {
    const config = resolveConfig(
      { url: 'http://billing.internal:8080', maxIterations: '3', timeout: '5000', model: 'mistral-small-latest' },
      {
        MISTRAL_API_KEY: 'test-secret',
        MCP_SERVER_URL: 'http://ignored:1',
        AGENT_MAX_TOOL_ITERATIONS: '5',
        MCP_REQUEST_TIMEOUT_MS: '1000',
        MISTRAL_MODEL: 'mistral-large-latest',
      },
    );

    expect(config).toMatchObject({
      endpoint: 'http://billing.internal:8080/mcp',
      maxToolIterations: 3,
      requestTimeoutMs: 5000,
      model: 'mistral-small-latest',
    });
  });

  it('reads anthropic settings from the environment', () => {
    const config = resolveConfig(
      {},
      { AGENT_PROVIDER: 'anthropic', ANTHROPIC_API_KEY: 'test-secret', ANTHROPIC_MAX_TOKENS: '2048', MISTRAL_API_URL: 'http://unused' },
    );

    expect(config).toMatchObject({ provider: 'anthropic', apiKey: 'test-secret', maxTokens: 2048, completionUrl: undefined });
  });

  it('treats blank values as unset', () => {
    const config = resolveConfig({ mountPath: '  ' }, { MISTRAL_API_KEY: 'test-secret', MCP_MOUNT_PATH: '', LOG_LEVEL: ' ' });
    expect(config.endpoint).toBe('http://localhost:3001/mcp');
    expect(config.logLevel).toBe('warn');
  });

  it('switches to debug logging in verbose mode', () => {
    expect(resolveConfig({ verbose: true, logLevel: 'error' }, { MISTRAL_API_KEY: 'test-secret' }).logLevel).toBe('debug');
  });

  it('keeps the listen flag and one-shot question', () => {
    const config = resolveConfig({ listen: false, ask: 'Show me invoice 123' }, { MISTRAL_API_KEY: 'test-secret' });
    expect(config.listen).toBe(false);
    expect(config.ask).toBe('Show me invoice 123');
  });

  it('configures the HTTP front end from flags or the environment', () => {
    expect(resolveConfig({ serve: '8080' }, { MISTRAL_API_KEY: 'test-secret' }).serve).toEqual({
      port: 8080,
      host: '127.0.0.1',
      apiKey: undefined,
    });
    expect(
      resolveConfig({}, { MISTRAL_API_KEY: 'test-secret', AGENT_API_PORT: '3000', AGENT_API_HOST: '0.0.0.0', AGENT_API_KEY: 'test-secret' }).serve,
    ).toEqual({ port: 3000, host: '0.0.0.0', apiKey: 'test-secret' });
    expect(() => resolveConfig({ serve: '70000' }, { MISTRAL_API_KEY: 'test-secret' })).toThrow(/^Invalid configuration: servePort: /);
  });

  it('rejects invalid values', () => {
    expect(() => resolveConfig({ maxIterations: '0' }, { MISTRAL_API_KEY: 'test-secret' })).toThrow(/^Invalid configuration: maxToolIterations: /);
    expect(() => resolveConfig({ provider: 'openai' }, { MISTRAL_API_KEY: 'test-secret' })).toThrow(/^Invalid configuration: provider: /);
    expect(() => resolveConfig({ timeout: 'soon' }, { MISTRAL_API_KEY: 'test-secret' })).toThrow(ConfigError);
  });

  it('rejects unusable server URLs', () => {
    expect(() => resolveConfig({ url: 'ftp://billing' }, { MISTRAL_API_KEY: 'test-secret' })).toThrow(
      'MCP server URL must use http or https: ftp://billing',
    );
  });
});
