import express, { type Express } from 'express';

import type { ToolContext } from '../tools/index.js';

import { errorHandler } from './error-handler.js';
import { registerMcpRoutes } from './mcp-routes.js';
import { createSessionStore, type SessionStore } from './sessions.js';

const JSON_BODY_LIMIT = '1mb';

export interface HttpApp {
  readonly app: Express;
  readonly sessionStore: SessionStore;
}

/**
 * Express app serving the streamable HTTP transport on `/mcp` and a liveness
 * check on `/healthz`.
 */
export function createHttpApp(context: ToolContext): HttpApp {
  const { streamableHttp, server } = context.config;
  const sessionStore = createSessionStore(streamableHttp.sessionTtlMs);

  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', version: server.version });
  });

  registerMcpRoutes(app, { context, sessionStore, streamableHttp });

  app.use(errorHandler);

  return { app, sessionStore };
}
