import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { Request } from 'express';

import { logWarn } from '../services/logger.js';
import { getErrorMessage } from '../utils/error-utils.js';

export interface SessionEntry {
  readonly transport: StreamableHTTPServerTransport;
  readonly server: McpServer;
  readonly createdAt: number;
  lastSeen: number;
}

export interface SessionStore {
  get(sessionId: string): SessionEntry | undefined;
  touch(sessionId: string): void;
  set(sessionId: string, entry: SessionEntry): void;
  remove(sessionId: string): SessionEntry | undefined;
  size(): number;
  /** Empties the store and returns what it held. */
  clear(): SessionEntry[];
  evictExpired(): SessionEntry[];
  /** Removes the least recently seen session. */
  evictOldest(): SessionEntry | undefined;
}

export function getSessionId(req: Request): string | undefined {
  const header = req.headers['mcp-session-id'];
  return Array.isArray(header) ? header[0] : header;
}

class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, SessionEntry>();

  constructor(
    private readonly sessionTtlMs: number,
    private readonly now: () => number
  ) {}

  get(sessionId: string): SessionEntry | undefined {
    return this.sessions.get(sessionId);
  }

  touch(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (session) session.lastSeen = this.now();
  }

  set(sessionId: string, entry: SessionEntry): void {
    this.sessions.set(sessionId, entry);
  }

  remove(sessionId: string): SessionEntry | undefined {
    const session = this.sessions.get(sessionId);
    this.sessions.delete(sessionId);
    return session;
  }

  size(): number {
    return this.sessions.size;
  }

  clear(): SessionEntry[] {
    const entries = [...this.sessions.values()];
    this.sessions.clear();
    return entries;
  }

  evictExpired(): SessionEntry[] {
    const cutoff = this.now() - this.sessionTtlMs;
    const expired = [...this.sessions].filter(
      ([, session]) => session.lastSeen < cutoff
    );
    for (const [id] of expired) this.sessions.delete(id);
    return expired.map(([, session]) => session);
  }

  evictOldest(): SessionEntry | undefined {
    let oldest: [string, SessionEntry] | undefined;
    for (const candidate of this.sessions) {
      if (!oldest || candidate[1].lastSeen < oldest[1].lastSeen) {
        oldest = candidate;
      }
    }
    return oldest ? this.remove(oldest[0]) : undefined;
  }
}

/**
 * In-memory session registry. A session idle for longer than `sessionTtlMs`
 * is expired; `now` is injectable so expiry can be tested without timers.
 */
export function createSessionStore(
  sessionTtlMs: number,
  now: () => number = Date.now
): SessionStore {
  return new InMemorySessionStore(sessionTtlMs, now);
}

/**
 * Closes the session's server, which also closes its transport. Failures are
 * logged, not thrown.
 */
export async function closeSession(
  session: Pick<SessionEntry, 'server'>,
  reason: string
): Promise<void> {
  try {
    await session.server.close();
  } catch (error) {
    logWarn(`Failed to close ${reason} session`, {
      error: getErrorMessage(error),
    });
  }
}
