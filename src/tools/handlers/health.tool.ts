import { performance } from 'node:perf_hooks';

import { logError, logInfo } from '../../services/logger.js';
import { handleToolError } from '../../utils/tool-error-handler.js';

import type { HealthInput } from '../schemas.js';
import { type ToolContext, type ToolHandler, textResult } from '../context.js';

export const HEALTH_TOOL_NAME = 'health';
export const HEALTH_TOOL_DESCRIPTION =
  'Checks connectivity to the configured SearXNG instance and reports the server version.';

export function createHealthToolHandler(
  context: ToolContext
): ToolHandler<HealthInput> {
  return async (input, extra) => {
    const includeEngines = input.include_engines ?? false;
    try {
      const startedAt = performance.now();
      await context.searxng.testConnection(extra.signal);

      let enginesEnabled: number | null = null;
      if (includeEngines) {
        const engines = await context.searxng.getEngines(
          'enabled',
          extra.signal
        );
        enginesEnabled = Object.keys(engines).length;
      }

      logInfo('mcp.health response', {
        elapsedMs: Math.round(performance.now() - startedAt),
        includeEngines,
        enginesEnabled,
      });

      return textResult(
        JSON.stringify({
          ok: true,
          version: context.config.server.version,
          engines_enabled: enginesEnabled,
        })
      );
    } catch (error) {
      logError(
        'health tool error',
        error instanceof Error ? error : undefined
      );
      return handleToolError(error, 'health failed');
    }
  };
}
