import type { Server } from 'node:http';

import { logInfo } from '../services/logger.js';
import type { ToolContext } from '../tools/index.js';

import { createHttpApp } from './app.js';
import {
  createShutdownHandler,
  registerSignalHandlers,
} from './server-shutdown.js';
import { closeSession, type SessionStore } from './sessions.js';

const SESSION_SWEEP_INTERVAL_MS = 60_000;

export interface BindAddress {
  readonly host: string;
  readonly port: number;
}

function startSessionCleanup(store: SessionStore): () => void {
  const timer = setInterval(() => {
    const evicted = store.evictExpired();
    for (const session of evicted) {
      void closeSession(session, 'expired');
    }
    if (evicted.length > 0) {
      logInfo('Expired sessions evicted', { count: evicted.length });
    }
  }, SESSION_SWEEP_INTERVAL_MS);
  timer.unref();
  return () => {
    clearInterval(timer);
  };
}

function listen(
  app: ReturnType<typeof createHttpApp>['app'],
  bind: BindAddress
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(bind.port, bind.host);
    server.once('listening', () => {
      resolve(server);
    });
    server.once('error', reject);
  });
}

export async function startHttpServer(
  context: ToolContext,
  bind: BindAddress
): Promise<Server> {
  const { app, sessionStore } = createHttpApp(context);
  const httpServer = await listen(app, bind);
  const stopSessionCleanup = context.config.streamableHttp.statefulMode
    ? startSessionCleanup(sessionStore)
    : () => undefined;

  registerSignalHandlers(
    createShutdownHandler({ httpServer, sessionStore, stopSessionCleanup })
  );

  logInfo('searxng-mcp listening', {
    url: `http://${bind.host.includes(':') ? `[${bind.host}]` : bind.host}:${bind.port}/mcp`,
    stateful: context.config.streamableHttp.statefulMode,
    tools: context.config.tools.join(','),
  });

  return httpServer;
}
