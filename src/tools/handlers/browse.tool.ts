import { performance } from 'node:perf_hooks';

import { ValidationError } from '../../errors/app-error.js';
import { browse } from '../../services/fetcher.js';
import { logError, logInfo } from '../../services/logger.js';
import { truncateForLog } from '../../utils/sanitizer.js';
import { handleToolError } from '../../utils/tool-error-handler.js';

import type { BrowseInput } from '../schemas.js';
import { type ToolContext, type ToolHandler, textResult } from '../context.js';

export const BROWSE_TOOL_NAME = 'browse';
export const BROWSE_TOOL_DESCRIPTION =
  'Fetches an http(s) URL and returns the page as Markdown. Private, loopback and link-local targets are refused unless the server is configured to allow them.';

const URL_LOG_MAX = 200;

export function createBrowseToolHandler(
  context: ToolContext
): ToolHandler<BrowseInput> {
  return async (input, extra) => {
    try {
      if (!input.url.trim()) {
        throw new ValidationError('url must be non-empty', { field: 'url' });
      }

      logInfo('mcp.browse request', {
        url: truncateForLog(input.url, URL_LOG_MAX),
      });
      const startedAt = performance.now();

      const markdown = await browse(input.url, context.config.browse, {
        ...context.browse,
        signal: extra.signal,
      });

      logInfo('mcp.browse response', {
        elapsedMs: Math.round(performance.now() - startedAt),
        markdownLength: markdown.length,
      });

      return textResult(markdown);
    } catch (error) {
      logError(
        'browse tool error',
        error instanceof Error ? error : undefined
      );
      return handleToolError(error, 'browse failed');
    }
  };
}
