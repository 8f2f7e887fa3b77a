import { performance } from 'node:perf_hooks';

import { logError, logInfo } from '../../services/logger.js';
import { handleToolError } from '../../utils/tool-error-handler.js';

import type { EnginesInput } from '../schemas.js';
import { type ToolContext, type ToolHandler, textResult } from '../context.js';

export const ENGINES_TOOL_NAME = 'engines';
export const ENGINES_TOOL_DESCRIPTION =
  'Lists the engines configured on the SearXNG instance as a JSON object keyed by engine name.';

export function createEnginesToolHandler(
  context: ToolContext
): ToolHandler<EnginesInput> {
  return async (input, extra) => {
    const filter = input.filter ?? 'enabled';
    try {
      logInfo('mcp.engines request', { filter });
      const startedAt = performance.now();

      const engines = await context.searxng.getEngines(filter, extra.signal);

      logInfo('mcp.engines response', {
        elapsedMs: Math.round(performance.now() - startedAt),
        engines: Object.keys(engines).length,
      });

      return textResult(JSON.stringify(engines));
    } catch (error) {
      logError(
        'engines tool error',
        error instanceof Error ? error : undefined
      );
      return handleToolError(error, 'get_engines failed');
    }
  };
}
