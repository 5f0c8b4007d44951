import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ToolCallResult } from './tool_registry.js';

export function toolResultText(result: Pick<CallToolResult, 'content'>): string {
  const parts: string[] = [];
  for (const block of result.content) {
    if (block.type === 'text') parts.push(block.text);
  }
  return parts.join('\n');
}

/**
 * The value handed back to the model: structured content when the tool
 * declares it, a lone text block (parsed when it holds JSON), or the raw
 * content blocks.
 */
export function toolPayload(result: CallToolResult): unknown {
  if (result.structuredContent !== undefined) return result.structuredContent;
  const [only, ...rest] = result.content;
  if (only && rest.length === 0 && only.type === 'text') {
    try {
      return JSON.parse(only.text);
    } catch {
      return only.text;
    }
  }
  return result.content;
}

export function previewLine(value: unknown, max = 50): string {
  const text = typeof value === 'string' ? value : JSON.stringify(value) ?? '';
  const singleLine = text.replace(/\s+/g, ' ').trim();
  return singleLine.length > max ? `${singleLine.slice(0, max)}...` : singleLine;
}

export function formatToolActivity(result: ToolCallResult): string {
  return result.ok
    ? `[Tool ${result.name} result: ${previewLine(result.payload)}]`
    : `[Tool ${result.name} failed: ${previewLine(result.error)}]`;
}
