import type { Server } from 'node:http';

import { logError, logInfo } from '../services/logger.js';

import { closeSession, type SessionStore } from './sessions.js';

const FORCED_SHUTDOWN_MS = 10_000;

export interface ShutdownTargets {
  readonly httpServer: Server;
  readonly sessionStore: SessionStore;
  readonly stopSessionCleanup: () => void;
}

export function createShutdownHandler(
  targets: ShutdownTargets
): (signal: string) => Promise<void> {
  let shuttingDown = false;

  return async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logInfo(`${signal} received, shutting down gracefully...`);

    targets.stopSessionCleanup();

    const sessions = targets.sessionStore.clear();
    await Promise.allSettled(
      sessions.map((session) => closeSession(session, 'open'))
    );

    targets.httpServer.close(() => {
      logInfo('HTTP server closed');
      process.exit(0);
    });

    setTimeout(() => {
      logError('Forced shutdown after timeout');
      process.exit(1);
    }, FORCED_SHUTDOWN_MS).unref();
  };
}

export function registerSignalHandlers(
  shutdown: (signal: string) => Promise<void>
): void {
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}
