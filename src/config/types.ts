export const TOOL_NAMES = [
  'search',
  'browse',
  'engines',
  'health',
  'ping',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const LOG_LEVELS = [
  'error',
  'warn',
  'info',
  'http',
  'verbose',
  'debug',
  'silly',
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** SearXNG `safesearch` levels: none, moderate, strict. */
export type SafeSearchLevel = 0 | 1 | 2;

export interface SearxngConfig {
  readonly baseUrl: string;
  readonly defaultCategories: readonly string[];
  readonly defaultEngines: readonly string[];
  readonly language: string;
  readonly safeSearch: SafeSearchLevel;
  readonly userAgent: string;
  readonly numResults: number;
  readonly timeoutMs: number;
}

/**
 * Immutable browse policy, shared by reference across concurrent calls.
 *
 * When `allowedHosts` is set it is non-empty, lower-cased, and is the whole
 * allow set: IP classification is skipped for its members.
 */
export interface FetchPolicy {
  readonly followRedirects: boolean;
  readonly maxRedirects: number;
  readonly maxBytes: number;
  readonly timeoutMs: number;
  readonly userAgent: string;
  readonly allowedHosts?: ReadonlySet<string>;
  readonly allowPrivate: boolean;
}

export interface StreamableHttpConfig {
  readonly statefulMode: boolean;
  readonly sessionTtlMs: number;
  readonly maxSessions: number;
  /** Reconnect delay sent to SSE clients in the `retry` field; unset leaves it to the client. */
  readonly sseRetryMs?: number;
}

export interface AppConfig {
  readonly server: {
    readonly name: string;
    readonly version: string;
  };
  readonly tools: readonly ToolName[];
  readonly searxng: SearxngConfig;
  readonly browse: FetchPolicy;
  readonly streamableHttp: StreamableHttpConfig;
  readonly logging: {
    readonly level: LogLevel;
  };
}
