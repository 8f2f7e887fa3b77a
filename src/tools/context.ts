import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

import type { AppConfig } from '../config/types.js';
import type { BrowseOptions } from '../services/fetcher.js';
import type { SearxngClient } from '../services/searxng.js';

/**
 * Everything a tool handler needs, built once per process and shared by
 * every server instance.
 */
export interface ToolContext {
  readonly config: AppConfig;
  readonly searxng: SearxngClient;
  /** Transport and resolver overrides for browse; the real ones otherwise. */
  readonly browse?: Pick<BrowseOptions, 'transport' | 'resolver'>;
}

/** The part of the SDK's per-request extra the handlers read. */
export interface ToolCallExtra {
  readonly signal?: AbortSignal;
}

export type ToolHandler<Input> = (
  input: Input,
  extra: ToolCallExtra
) => Promise<CallToolResult>;

export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}
