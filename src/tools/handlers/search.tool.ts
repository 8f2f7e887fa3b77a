import { performance } from 'node:perf_hooks';

import type { SafeSearchLevel } from '../../config/types.js';
import { ValidationError } from '../../errors/app-error.js';
import { logError, logInfo } from '../../services/logger.js';
import type { SearchParams } from '../../services/searxng.js';
import { truncateForLog } from '../../utils/sanitizer.js';
import { handleToolError } from '../../utils/tool-error-handler.js';

import { SAFE_SEARCH_LEVELS, type SearchInput } from '../schemas.js';
import { type ToolContext, type ToolHandler, textResult } from '../context.js';

export const SEARCH_TOOL_NAME = 'search';
export const SEARCH_TOOL_DESCRIPTION =
  'Searches the web through the configured SearXNG instance. Returns JSON with results (title, url, content, score, engines, category) sorted by score, plus suggestions.';

const QUERY_LOG_MAX = 120;

function toSafeSearchLevel(
  level: SearchInput['safe_search']
): SafeSearchLevel | undefined {
  if (level === undefined) return undefined;
  const index = SAFE_SEARCH_LEVELS.indexOf(level);
  return index === 0 || index === 1 || index === 2 ? index : undefined;
}

function toSearchParams(input: SearchInput): SearchParams {
  return {
    query: input.query,
    categories: input.categories,
    engines: input.engines,
    language: input.language,
    pageno: input.pageno,
    timeRange: input.time_range,
    safeSearch: toSafeSearchLevel(input.safe_search),
    numResults: input.num_results,
  };
}

export function createSearchToolHandler(
  context: ToolContext
): ToolHandler<SearchInput> {
  return async (input, extra) => {
    try {
      if (!input.query.trim()) {
        throw new ValidationError('query must be non-empty', {
          field: 'query',
        });
      }

      logInfo('mcp.search request', {
        query: truncateForLog(input.query, QUERY_LOG_MAX),
        queryLength: input.query.length,
        engines: input.engines ?? '',
        categories: input.categories ?? '',
      });
      const startedAt = performance.now();

      const response = await context.searxng.search(
        toSearchParams(input),
        extra.signal
      );

      logInfo('mcp.search response', {
        elapsedMs: Math.round(performance.now() - startedAt),
        results: response.results.length,
        suggestions: response.suggestions.length,
      });

      return textResult(JSON.stringify(response));
    } catch (error) {
      logError(
        'search tool error',
        error instanceof Error ? error : undefined
      );
      return handleToolError(error, 'search failed');
    }
  };
}
