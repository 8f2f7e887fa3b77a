import { randomUUID } from 'node:crypto';

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import type { Express, NextFunction, Request, Response } from 'express';
import { z } from 'zod';

import type { StreamableHttpConfig } from '../config/types.js';
import { createMcpServer } from '../server.js';
import { logDebug, logError, logInfo } from '../services/logger.js';
import type { ToolContext } from '../tools/index.js';
import { toError } from '../utils/error-utils.js';

import {
  closeSession,
  getSessionId,
  type SessionEntry,
  type SessionStore,
} from './sessions.js';

export interface McpRouteOptions {
  readonly context: ToolContext;
  readonly sessionStore: SessionStore;
  readonly streamableHttp: StreamableHttpConfig;
}

const jsonRpcMessageSchema = z
  .object({
    jsonrpc: z.literal('2.0').optional(),
    method: z.string().optional(),
    id: z.union([z.string(), z.number(), z.null()]).optional(),
  })
  .passthrough();

const mcpRequestBodySchema = z.union([
  jsonRpcMessageSchema,
  z.array(jsonRpcMessageSchema).nonempty(),
]);

type McpRequestBody = z.infer<typeof mcpRequestBodySchema>;

function sendJsonRpcError(
  res: Response,
  code: number,
  message: string,
  status: number
): void {
  res.status(status).json({
    jsonrpc: '2.0',
    error: { code, message },
    id: null,
  });
}

function respondServerBusy(res: Response): void {
  sendJsonRpcError(res, -32000, 'Server busy: maximum sessions reached', 503);
}

function respondBadRequest(res: Response): void {
  sendJsonRpcError(
    res,
    -32000,
    'Bad Request: Missing session ID or not an initialize request',
    400
  );
}

function respondInvalidRequestBody(res: Response): void {
  sendJsonRpcError(res, -32600, 'Invalid Request: Malformed request body', 400);
}

function respondMethodNotAllowed(res: Response): void {
  sendJsonRpcError(res, -32000, 'Method not allowed in stateless mode', 405);
}

function respondInternalError(res: Response, error: unknown): void {
  logError('MCP request handling failed', toError(error));
  if (!res.headersSent) {
    sendJsonRpcError(res, -32603, 'Internal error', 500);
  }
}

function describeBody(body: McpRequestBody): Record<string, unknown> {
  if (Array.isArray(body)) return { batch: body.length };
  return { method: body.method, id: body.id };
}

/**
 * Session bookkeeping for stateful mode. Slots are reserved while an
 * initialize request is in flight so concurrent initializations cannot
 * overshoot `maxSessions`.
 */
class SessionSlots {
  private inFlight = 0;

  constructor(
    private readonly store: SessionStore,
    private readonly maxSessions: number
  ) {}

  private atCapacity(): boolean {
    return this.store.size() + this.inFlight >= this.maxSessions;
  }

  evictExpired(): number {
    const evicted = this.store.evictExpired();
    for (const session of evicted) {
      void closeSession(session, 'expired');
    }
    return evicted.length;
  }

  /** Makes room by evicting the least recently seen session if needed. */
  reserve(): boolean {
    if (this.atCapacity()) {
      const oldest = this.store.evictOldest();
      if (oldest) {
        logInfo('Evicting least recently used session', {
          maxSessions: this.maxSessions,
        });
        void closeSession(oldest, 'evicted');
      }
    }
    if (this.atCapacity()) return false;
    this.inFlight += 1;
    return true;
  }

  release(): void {
    if (this.inFlight > 0) this.inFlight -= 1;
  }
}

function sseOptions(config: StreamableHttpConfig): {
  retryInterval?: number;
} {
  return config.sseRetryMs === undefined
    ? {}
    : { retryInterval: config.sseRetryMs };
}

function createSessionTransport(
  store: SessionStore,
  slots: SessionSlots,
  server: McpServer,
  config: StreamableHttpConfig
): StreamableHTTPServerTransport {
  let slotHeld = true;
  const releaseSlot = (): void => {
    if (!slotHeld) return;
    slotHeld = false;
    slots.release();
  };

  const transport: StreamableHTTPServerTransport =
    new StreamableHTTPServerTransport({
      ...sseOptions(config),
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (id) => {
        releaseSlot();
        const now = Date.now();
        const entry: SessionEntry = {
          transport,
          server,
          createdAt: now,
          lastSeen: now,
        };
        store.set(id, entry);
        logInfo('Session initialized', { sessionId: id });
      },
      onsessionclosed: (id) => {
        store.remove(id);
        logInfo('Session closed', { sessionId: id });
      },
    });

  transport.onclose = () => {
    releaseSlot();
    if (transport.sessionId) {
      store.remove(transport.sessionId);
    }
  };

  return transport;
}

async function handleStatefulPost(
  req: Request,
  res: Response,
  body: McpRequestBody,
  options: McpRouteOptions,
  slots: SessionSlots
): Promise<void> {
  const sessionId = getSessionId(req);

  if (sessionId) {
    const session = options.sessionStore.get(sessionId);
    if (!session) {
      sendJsonRpcError(res, -32001, 'Session not found', 404);
      return;
    }
    options.sessionStore.touch(sessionId);
    await session.transport.handleRequest(req, res, body);
    return;
  }

  if (!isInitializeRequest(body)) {
    respondBadRequest(res);
    return;
  }

  slots.evictExpired();
  if (!slots.reserve()) {
    respondServerBusy(res);
    return;
  }

  const server = createMcpServer(options.context);
  const transport = createSessionTransport(
    options.sessionStore,
    slots,
    server,
    options.streamableHttp
  );
  try {
    await server.connect(transport);
  } catch (error) {
    slots.release();
    throw error;
  }

  await transport.handleRequest(req, res, body);
}

async function handleStatelessPost(
  req: Request,
  res: Response,
  body: McpRequestBody,
  options: McpRouteOptions
): Promise<void> {
  const server = createMcpServer(options.context);
  const transport = new StreamableHTTPServerTransport({
    ...sseOptions(options.streamableHttp),
    sessionIdGenerator: undefined,
  });

  res.on('close', () => {
    void closeSession({ server }, 'stateless');
  });

  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

async function handleSessionRequest(
  req: Request,
  res: Response,
  options: McpRouteOptions
): Promise<void> {
  if (!options.streamableHttp.statefulMode) {
    respondMethodNotAllowed(res);
    return;
  }

  const sessionId = getSessionId(req);
  if (!sessionId) {
    sendJsonRpcError(res, -32000, 'Missing mcp-session-id header', 400);
    return;
  }

  const session = options.sessionStore.get(sessionId);
  if (!session) {
    sendJsonRpcError(res, -32001, 'Session not found', 404);
    return;
  }

  options.sessionStore.touch(sessionId);
  await session.transport.handleRequest(req, res);
}

export function registerMcpRoutes(app: Express, options: McpRouteOptions): void {
  const slots = new SessionSlots(
    options.sessionStore,
    options.streamableHttp.maxSessions
  );

  const asyncHandler =
    (fn: (req: Request, res: Response) => Promise<void>) =>
    (req: Request, res: Response, next: NextFunction) => {
      fn(req, res).catch((error: unknown) => {
        if (res.headersSent) {
          next(error);
          return;
        }
        respondInternalError(res, error);
      });
    };

  app.post(
    '/mcp',
    asyncHandler(async (req, res) => {
      const parsed = mcpRequestBodySchema.safeParse(req.body);
      if (!parsed.success) {
        respondInvalidRequestBody(res);
        return;
      }

      logDebug('[MCP POST]', {
        ...describeBody(parsed.data),
        sessionId: getSessionId(req) ?? 'none',
        sessionCount: options.sessionStore.size(),
      });

      if (options.streamableHttp.statefulMode) {
        await handleStatefulPost(req, res, parsed.data, options, slots);
      } else {
        await handleStatelessPost(req, res, parsed.data, options);
      }
    })
  );
  app.get(
    '/mcp',
    asyncHandler((req, res) => handleSessionRequest(req, res, options))
  );
  app.delete(
    '/mcp',
    asyncHandler((req, res) => handleSessionRequest(req, res, options))
  );
}
