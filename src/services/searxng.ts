import axios, { type AxiosInstance, isAxiosError } from 'axios';
import { z } from 'zod';

import type { SafeSearchLevel, SearxngConfig } from '../config/types.js';
import { UpstreamError } from '../errors/app-error.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { sanitizeText, truncateText } from '../utils/sanitizer.js';

import { attachLoggingInterceptors } from './fetcher/interceptors.js';

const ERROR_BODY_MAX_CHARS = 500;

export const ENGINE_FILTERS = ['enabled', 'disabled', 'all'] as const;
export type EngineFilter = (typeof ENGINE_FILTERS)[number];

const searchResultSchema = z.object({
  title: z.string(),
  url: z.string(),
  content: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  score: z
    .number()
    .nullish()
    .transform((value) => value ?? 0),
  engines: z
    .array(z.string())
    .nullish()
    .transform((value) => value ?? []),
  category: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
});

const searchResponseSchema = z.object({
  results: z.array(searchResultSchema).default([]),
  suggestions: z.array(z.string()).default([]),
});

const configResponseSchema = z.object({
  engines: z.array(z.unknown()),
});

const namedEngineSchema = z
  .object({ name: z.string(), enabled: z.unknown() })
  .passthrough();

export type SearchResult = z.infer<typeof searchResultSchema>;
export type SearchResponse = z.infer<typeof searchResponseSchema>;
export type EngineInfo = z.infer<typeof namedEngineSchema>;

export interface SearchParams {
  readonly query: string;
  readonly categories?: string;
  readonly engines?: string;
  readonly language?: string;
  readonly pageno?: number;
  readonly timeRange?: string;
  readonly safeSearch?: SafeSearchLevel;
  readonly numResults?: number;
}

export function createSearxngHttpClient(config: SearxngConfig): AxiosInstance {
  const client = axios.create({
    timeout: config.timeoutMs,
    responseType: 'text',
    validateStatus: () => true,
    headers: {
      'User-Agent': config.userAgent,
      Accept: 'application/json',
    },
  });
  return attachLoggingInterceptors(client);
}

function joinOrUndefined(values: readonly string[]): string | undefined {
  return values.length > 0 ? values.join(',') : undefined;
}

function bodyExcerpt(data: unknown): string {
  const text = typeof data === 'string' ? data : '';
  return truncateText(sanitizeText(text), ERROR_BODY_MAX_CHARS);
}

function parseJsonBody(data: unknown, endpoint: string): unknown {
  if (typeof data !== 'string') return data;
  try {
    return JSON.parse(data);
  } catch (error) {
    throw new UpstreamError(
      `searxng ${endpoint} returned invalid JSON: ${getErrorMessage(error)}`,
      endpoint,
      undefined,
      { cause: error }
    );
  }
}

function includeEngine(engine: EngineInfo, filter: EngineFilter): boolean {
  const enabled = engine.enabled === true;
  switch (filter) {
    case 'all':
      return true;
    case 'enabled':
      return enabled;
    case 'disabled':
      return !enabled;
  }
}

/**
 * Thin client for a SearXNG instance's JSON API.
 */
export class SearxngClient {
  private readonly baseUrl: string;

  constructor(
    private readonly config: SearxngConfig,
    private readonly http: AxiosInstance = createSearxngHttpClient(config)
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  async search(
    params: SearchParams,
    signal?: AbortSignal
  ): Promise<SearchResponse> {
    const query: Record<string, string | number> = {
      q: params.query,
      format: 'json',
      language: params.language ?? this.config.language,
      safesearch: params.safeSearch ?? this.config.safeSearch,
    };

    const categories =
      params.categories ?? joinOrUndefined(this.config.defaultCategories);
    const engines =
      params.engines ?? joinOrUndefined(this.config.defaultEngines);
    if (categories !== undefined) query['categories'] = categories;
    if (engines !== undefined) query['engines'] = engines;
    if (params.pageno !== undefined) query['pageno'] = params.pageno;
    if (params.timeRange !== undefined) query['time_range'] = params.timeRange;

    const data = await this.getJson('/search', query, signal);
    const parsed = searchResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError(
        `unexpected /search response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
        '/search'
      );
    }

    const results = [...parsed.data.results].sort((a, b) => b.score - a.score);
    const limit = params.numResults ?? this.config.numResults;

    return {
      results: limit > 0 ? results.slice(0, limit) : results,
      suggestions: parsed.data.suggestions,
    };
  }

  async getEngines(
    filter: EngineFilter,
    signal?: AbortSignal
  ): Promise<Record<string, EngineInfo>> {
    const data = await this.getJson('/config', undefined, signal);
    const parsed = configResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamError(
        'unexpected /config response: missing engines array',
        '/config'
      );
    }

    const engines: Record<string, EngineInfo> = {};
    for (const entry of parsed.data.engines) {
      const engine = namedEngineSchema.safeParse(entry);
      if (!engine.success) continue;
      if (includeEngine(engine.data, filter)) {
        engines[engine.data.name] = engine.data;
      }
    }
    return engines;
  }

  async testConnection(signal?: AbortSignal): Promise<void> {
    await this.request('/config', undefined, signal);
  }

  private async getJson(
    endpoint: string,
    params: Record<string, string | number> | undefined,
    signal: AbortSignal | undefined
  ): Promise<unknown> {
    const data = await this.request(endpoint, params, signal);
    return parseJsonBody(data, endpoint);
  }

  private async request(
    endpoint: string,
    params: Record<string, string | number> | undefined,
    signal: AbortSignal | undefined
  ): Promise<unknown> {
    let response;
    try {
      response = await this.http.get<unknown>(`${this.baseUrl}${endpoint}`, {
        params,
        signal,
      });
    } catch (error) {
      const code = isAxiosError(error) && error.code ? ` (${error.code})` : '';
      throw new UpstreamError(
        `searxng ${endpoint} request failed${code}: ${getErrorMessage(error)}`,
        endpoint,
        undefined,
        { cause: error }
      );
    }

    if (response.status < 200 || response.status >= 300) {
      const excerpt = bodyExcerpt(response.data);
      throw new UpstreamError(
        excerpt
          ? `searxng ${endpoint} failed: HTTP ${response.status}: ${excerpt}`
          : `searxng ${endpoint} failed: HTTP ${response.status}`,
        endpoint,
        response.status
      );
    }

    return response.data;
  }
}
