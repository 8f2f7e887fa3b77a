import { readFileSync } from 'node:fs';

import { z } from 'zod';

import { ConfigError } from '../errors/app-error.js';

import {
  parseBoolean,
  parseCsv,
  parseInteger,
  parseLogLevel,
  parseSafeSearch,
  parseString,
  safeSearchFromNumber,
} from './env-parsers.js';
import { type FileConfig, loadConfigFile } from './file-config.js';
import {
  type AppConfig,
  type FetchPolicy,
  type SearxngConfig,
  type StreamableHttpConfig,
  TOOL_NAMES,
  type ToolName,
} from './types.js';

export * from './types.js';

const packageJsonSchema = z.object({ version: z.string() });

function readPackageVersion(): string {
  const raw = readFileSync(new URL('../../package.json', import.meta.url), {
    encoding: 'utf8',
  });
  const parsed: unknown = JSON.parse(raw);
  return packageJsonSchema.parse(parsed).version;
}

export const SERVER_NAME = 'searxng-mcp';
export const serverVersion = readPackageVersion();

const DEFAULT_USER_AGENT = `${SERVER_NAME}/${serverVersion}`;
const DEFAULT_TOOLS: readonly ToolName[] = ['search', 'browse'];
const REQUIRED_TOOLS: readonly ToolName[] = ['search', 'browse'];

export const DEFAULT_SEARXNG_CONFIG: SearxngConfig = {
  baseUrl: 'http://localhost:8080',
  defaultCategories: [],
  defaultEngines: [],
  language: 'en',
  safeSearch: 0,
  userAgent: DEFAULT_USER_AGENT,
  numResults: 5,
  timeoutMs: 20_000,
};

export const DEFAULT_FETCH_POLICY: FetchPolicy = {
  followRedirects: false,
  maxRedirects: 10,
  maxBytes: 2_000_000,
  timeoutMs: 20_000,
  userAgent: DEFAULT_USER_AGENT,
  allowPrivate: false,
};

const DEFAULT_STREAMABLE_HTTP_CONFIG: StreamableHttpConfig = {
  statefulMode: true,
  sessionTtlMs: 30 * 60 * 1000,
  maxSessions: 200,
};

type Env = Readonly<Record<string, string | undefined>>;

export interface LoadConfigOptions {
  /** YAML file to layer over the defaults; `SEARXNG_MCP_CONFIG` otherwise. */
  readonly configPath?: string;
  /** Comma-separated tool list from the command line; beats every layer. */
  readonly tools?: string;
  readonly env?: Env;
}

function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some((name) => name === value);
}

export function resolveEnabledTools(
  requested: readonly string[],
  source: string
): ToolName[] {
  const enabled: ToolName[] = [];
  const unknown: string[] = [];

  for (const raw of requested) {
    const name = raw.trim().toLowerCase();
    if (!name) continue;
    if (!isToolName(name)) {
      unknown.push(raw.trim());
      continue;
    }
    if (!enabled.includes(name)) enabled.push(name);
  }

  if (unknown.length > 0) {
    throw new ConfigError(
      `Unknown tools: ${unknown.join(',')} (valid: ${TOOL_NAMES.join(',')})`,
      source
    );
  }

  const missing = REQUIRED_TOOLS.filter((name) => !enabled.includes(name));
  if (missing.length > 0) {
    throw new ConfigError(
      `Tools must include ${REQUIRED_TOOLS.join(',')} (got: ${enabled.join(',')})`,
      source
    );
  }

  return enabled;
}

function normalizeAllowedHosts(
  hosts: readonly string[] | undefined
): ReadonlySet<string> | undefined {
  if (!hosts) return undefined;
  const normalized = hosts
    .map((host) => host.trim().toLowerCase())
    .filter((host) => host.length > 0);
  return normalized.length > 0 ? new Set(normalized) : undefined;
}

function buildSearxngConfig(
  file: FileConfig['searxng'],
  env: Env
): SearxngConfig {
  const base = DEFAULT_SEARXNG_CONFIG;
  const fromFile: SearxngConfig = {
    baseUrl: file?.base_url ?? base.baseUrl,
    defaultCategories: file?.default_categories ?? base.defaultCategories,
    defaultEngines: file?.default_engines ?? base.defaultEngines,
    language: file?.language ?? base.language,
    safeSearch:
      file?.safe_search === undefined
        ? base.safeSearch
        : safeSearchFromNumber(file.safe_search),
    userAgent: file?.user_agent ?? base.userAgent,
    numResults: file?.num_results ?? base.numResults,
    timeoutMs:
      file?.timeout_secs === undefined
        ? base.timeoutMs
        : file.timeout_secs * 1000,
  };

  const timeoutSecs = parseInteger(
    env.SEARXNG_TIMEOUT_SECS,
    fromFile.timeoutMs / 1000,
    1
  );

  return Object.freeze({
    baseUrl: parseString(env.SEARXNG_BASE_URL, fromFile.baseUrl),
    defaultCategories: Object.freeze(
      env.SEARXNG_DEFAULT_CATEGORIES === undefined
        ? [...fromFile.defaultCategories]
        : parseCsv(env.SEARXNG_DEFAULT_CATEGORIES)
    ),
    defaultEngines: Object.freeze(
      env.SEARXNG_DEFAULT_ENGINES === undefined
        ? [...fromFile.defaultEngines]
        : parseCsv(env.SEARXNG_DEFAULT_ENGINES)
    ),
    language: parseString(env.SEARXNG_DEFAULT_LANGUAGE, fromFile.language),
    safeSearch:
      env.SEARXNG_SAFE_SEARCH === undefined
        ? fromFile.safeSearch
        : parseSafeSearch(env.SEARXNG_SAFE_SEARCH),
    userAgent: parseString(env.SEARXNG_USER_AGENT, fromFile.userAgent),
    numResults: parseInteger(env.SEARXNG_NUM_RESULTS, fromFile.numResults),
    timeoutMs: timeoutSecs * 1000,
  });
}

function buildFetchPolicy(file: FileConfig['browse'], env: Env): FetchPolicy {
  const base = DEFAULT_FETCH_POLICY;
  const fileTimeoutSecs =
    file?.timeout_secs ?? Math.round(base.timeoutMs / 1000);

  const allowedHosts =
    env.BROWSE_ALLOWED_HOSTS === undefined
      ? normalizeAllowedHosts(file?.allowed_hosts)
      : normalizeAllowedHosts(parseCsv(env.BROWSE_ALLOWED_HOSTS, true));

  const policy: FetchPolicy = {
    followRedirects: parseBoolean(
      env.BROWSE_FOLLOW_REDIRECTS,
      file?.follow_redirects ?? base.followRedirects
    ),
    maxRedirects: parseInteger(
      env.BROWSE_MAX_REDIRECTS,
      file?.max_redirects ?? base.maxRedirects
    ),
    maxBytes: parseInteger(
      env.BROWSE_MAX_BYTES,
      file?.max_bytes ?? base.maxBytes,
      1
    ),
    timeoutMs:
      parseInteger(env.BROWSE_TIMEOUT_SECS, fileTimeoutSecs, 1) * 1000,
    userAgent: parseString(
      env.BROWSE_USER_AGENT,
      file?.user_agent ?? base.userAgent
    ),
    allowPrivate: parseBoolean(
      env.BROWSE_ALLOW_PRIVATE,
      file?.allow_private ?? base.allowPrivate
    ),
    ...(allowedHosts ? { allowedHosts } : {}),
  };

  return Object.freeze(policy);
}

function buildStreamableHttpConfig(
  file: FileConfig['streamable_http'],
  env: Env
): StreamableHttpConfig {
  const base = DEFAULT_STREAMABLE_HTTP_CONFIG;
  const sseRetrySecs = parseInteger(
    env.STREAMABLE_HTTP_SSE_RETRY,
    file?.sse_retry_secs ?? 0,
    1
  );
  return Object.freeze({
    statefulMode: parseBoolean(
      env.STREAMABLE_HTTP_STATEFUL,
      file?.stateful_mode ?? base.statefulMode
    ),
    sessionTtlMs:
      file?.session_ttl_secs === undefined
        ? base.sessionTtlMs
        : file.session_ttl_secs * 1000,
    maxSessions: file?.max_sessions ?? base.maxSessions,
    ...(sseRetrySecs > 0 ? { sseRetryMs: sseRetrySecs * 1000 } : {}),
  });
}

function resolveToolList(
  options: LoadConfigOptions,
  file: FileConfig,
  env: Env
): ToolName[] {
  if (options.tools !== undefined) {
    return resolveEnabledTools(parseCsv(options.tools), '--tools');
  }
  const fromEnv = env.SEARXNG_MCP_TOOLS;
  if (fromEnv !== undefined && fromEnv.trim() !== '') {
    return resolveEnabledTools(parseCsv(fromEnv), 'SEARXNG_MCP_TOOLS');
  }
  if (file.tools) {
    return resolveEnabledTools(file.tools, 'config file');
  }
  return [...DEFAULT_TOOLS];
}

/**
 * Merges the configuration layers once at startup.
 *
 * Precedence, lowest first: defaults, YAML file, environment. The result is
 * frozen and passed explicitly to everything that needs it.
 */
export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.SEARXNG_MCP_CONFIG;
  const file: FileConfig =
    configPath && configPath.trim() !== ''
      ? await loadConfigFile(configPath)
      : {};

  return Object.freeze({
    server: Object.freeze({ name: SERVER_NAME, version: serverVersion }),
    tools: Object.freeze(resolveToolList(options, file, env)),
    searxng: buildSearxngConfig(file.searxng, env),
    browse: buildFetchPolicy(file.browse, env),
    streamableHttp: buildStreamableHttpConfig(file.streamable_http, env),
    logging: Object.freeze({
      level: parseLogLevel(env.LOG_LEVEL, file.logging?.level ?? 'warn'),
    }),
  });
}
