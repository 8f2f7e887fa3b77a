import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import process from 'node:process';

import type { AppConfig } from './config/types.js';
import { logError, logInfo } from './services/logger.js';
import { SearxngClient } from './services/searxng.js';
import { registerTools, type ToolContext } from './tools/index.js';
import { toError } from './utils/error-utils.js';

const SERVER_INSTRUCTIONS =
  'SearXNG MCP server. Use "search" to query the web through SearXNG and "browse" to read a page as Markdown.';

export function createToolContext(config: AppConfig): ToolContext {
  return { config, searxng: new SearxngClient(config.searxng) };
}

function attachServerErrorHandler(server: McpServer): void {
  server.server.onerror = (error) => {
    logError('[MCP Error]', error);
  };
}

/**
 * Builds one MCP server with the enabled tools registered. The HTTP
 * transport calls this once per session; the stdio transport once.
 */
export function createMcpServer(context: ToolContext): McpServer {
  const server = new McpServer(
    {
      name: context.config.server.name,
      version: context.config.server.version,
    },
    {
      capabilities: { tools: {} },
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  registerTools(server, context);
  attachServerErrorHandler(server);
  return server;
}

function createShutdownHandler(server: McpServer): (signal: string) => void {
  let shuttingDown = false;

  return (signal: string): void => {
    if (shuttingDown) {
      logInfo('Shutdown already in progress; ignoring signal', { signal });
      return;
    }
    shuttingDown = true;
    logInfo(`${signal} received, shutting down`);

    void server
      .close()
      .catch((err: unknown) => {
        logError('Error during shutdown', toError(err));
        process.exitCode = 1;
      })
      .finally(() => {
        process.exitCode ??= 0;
      });
  };
}

function registerSignalHandlers(handler: (signal: string) => void): void {
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      handler(signal);
    });
  }
}

export async function startStdioServer(context: ToolContext): Promise<void> {
  const server = createMcpServer(context);
  const transport = new StdioServerTransport();

  registerSignalHandlers(createShutdownHandler(server));
  try {
    await server.connect(transport);
  } catch (error: unknown) {
    throw new Error(`Failed to start stdio server: ${toError(error).message}`, {
      cause: error,
    });
  }
  logInfo('searxng-mcp running on stdio', {
    tools: context.config.tools.join(','),
  });
}
