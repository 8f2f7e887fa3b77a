import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import type { ToolName } from '../config/types.js';

import type { ToolContext } from './context.js';
import {
  BROWSE_TOOL_DESCRIPTION,
  BROWSE_TOOL_NAME,
  createBrowseToolHandler,
} from './handlers/browse.tool.js';
import {
  createEnginesToolHandler,
  ENGINES_TOOL_DESCRIPTION,
  ENGINES_TOOL_NAME,
} from './handlers/engines.tool.js';
import {
  createHealthToolHandler,
  HEALTH_TOOL_DESCRIPTION,
  HEALTH_TOOL_NAME,
} from './handlers/health.tool.js';
import {
  PING_TOOL_DESCRIPTION,
  PING_TOOL_NAME,
  pingToolHandler,
} from './handlers/ping.tool.js';
import {
  createSearchToolHandler,
  SEARCH_TOOL_DESCRIPTION,
  SEARCH_TOOL_NAME,
} from './handlers/search.tool.js';
import {
  browseInputSchema,
  enginesInputSchema,
  healthInputSchema,
  pingInputSchema,
  searchInputSchema,
} from './schemas.js';

export type { ToolContext } from './context.js';

/**
 * Registers the enabled subset of tools. A tool that is not enabled is never
 * registered, so it is absent from `tools/list`.
 */
export function registerTools(
  server: McpServer,
  context: ToolContext,
  enabled: readonly ToolName[] = context.config.tools
): void {
  const isEnabled = (name: ToolName): boolean => enabled.includes(name);

  if (isEnabled(SEARCH_TOOL_NAME)) {
    server.registerTool(
      SEARCH_TOOL_NAME,
      {
        title: 'Web Search',
        description: SEARCH_TOOL_DESCRIPTION,
        inputSchema: searchInputSchema,
      },
      createSearchToolHandler(context)
    );
  }

  if (isEnabled(BROWSE_TOOL_NAME)) {
    server.registerTool(
      BROWSE_TOOL_NAME,
      {
        title: 'Browse URL',
        description: BROWSE_TOOL_DESCRIPTION,
        inputSchema: browseInputSchema,
      },
      createBrowseToolHandler(context)
    );
  }

  if (isEnabled(ENGINES_TOOL_NAME)) {
    server.registerTool(
      ENGINES_TOOL_NAME,
      {
        title: 'SearXNG Engines',
        description: ENGINES_TOOL_DESCRIPTION,
        inputSchema: enginesInputSchema,
      },
      createEnginesToolHandler(context)
    );
  }

  if (isEnabled(HEALTH_TOOL_NAME)) {
    server.registerTool(
      HEALTH_TOOL_NAME,
      {
        title: 'Health',
        description: HEALTH_TOOL_DESCRIPTION,
        inputSchema: healthInputSchema,
      },
      createHealthToolHandler(context)
    );
  }

  if (isEnabled(PING_TOOL_NAME)) {
    server.registerTool(
      PING_TOOL_NAME,
      {
        title: 'Ping',
        description: PING_TOOL_DESCRIPTION,
        inputSchema: pingInputSchema,
      },
      pingToolHandler
    );
  }
}
