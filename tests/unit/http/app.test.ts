import type { Server } from 'node:http';

import { afterEach, describe, expect, test } from 'vitest';

import { createHttpApp } from '../../../src/http/app.js';
import { closeSession, type SessionStore } from '../../../src/http/sessions.js';
import type { AppConfig } from '../../../src/config/types.js';
import { makeConfig, makeToolContext } from '../../helpers/context.js';

interface Running {
  readonly baseUrl: string;
  readonly server: Server;
  readonly sessionStore: SessionStore;
}

const running: Running[] = [];

async function start(config: AppConfig = makeConfig()): Promise<Running> {
  const { context } = makeToolContext({ config });
  const { app, sessionStore } = createHttpApp(context);
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => {
      resolve(listening);
    });
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  const { port } = address;
  const entry = { baseUrl: `http://127.0.0.1:${port}`, server, sessionStore };
  running.push(entry);
  return entry;
}

afterEach(async () => {
  for (const { server, sessionStore } of running.splice(0)) {
    await Promise.all(
      sessionStore.clear().map((session) => closeSession(session, 'test'))
    );
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });
  }
});

const MCP_HEADERS = {
  'content-type': 'application/json',
  accept: 'application/json, text/event-stream',
};

const INITIALIZE = {
  jsonrpc: '2.0',
  id: 1,
  method: 'initialize',
  params: {
    protocolVersion: '2025-03-26',
    capabilities: {},
    clientInfo: { name: 'test-client', version: '1.0.0' },
  },
};

async function postMcp(
  baseUrl: string,
  body: unknown,
  headers: Record<string, string> = {}
): Promise<Response> {
  return fetch(`${baseUrl}/mcp`, {
    method: 'POST',
    headers: { ...MCP_HEADERS, ...headers },
    body: JSON.stringify(body),
  });
}

describe('http app', () => {
  test('GET /healthz reports the version', async () => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}/healthz`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      status: 'ok',
      version: makeConfig().server.version,
    });
  });

  test('rejects malformed JSON bodies', async () => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}/mcp`, {
      method: 'POST',
      headers: MCP_HEADERS,
      body: '{not json',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      error: { code: 'BAD_REQUEST', statusCode: 400 },
    });
  });

  test('rejects bodies that are not JSON-RPC messages', async () => {
    const { baseUrl } = await start();

    const response = await postMcp(baseUrl, 'hello');

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      jsonrpc: '2.0',
      error: { code: -32600, message: 'Invalid Request: Malformed request body' },
      id: null,
    });
  });

  test('requires initialize before a session exists', async () => {
    const { baseUrl } = await start();

    const response = await postMcp(baseUrl, {
      jsonrpc: '2.0',
      id: 2,
      method: 'tools/list',
    });

    expect(response.status).toBe(400);
  });

  test('rejects unknown sessions', async () => {
    const { baseUrl } = await start();

    const response = await postMcp(
      baseUrl,
      { jsonrpc: '2.0', id: 2, method: 'tools/list' },
      { 'mcp-session-id': 'does-not-exist' }
    );

    expect(response.status).toBe(404);
    expect(await response.json()).toMatchObject({ error: { code: -32001 } });
  });

  test('initialize opens a session', async () => {
    const { baseUrl, sessionStore } = await start();

    const response = await postMcp(baseUrl, INITIALIZE);
    await response.text();

    expect(response.status).toBe(200);
    const sessionId = response.headers.get('mcp-session-id');
    expect(sessionId).toEqual(expect.any(String));
    expect(sessionStore.get(sessionId ?? '')).toBeDefined();
  });

  test('GET without a session header is a bad request', async () => {
    const { baseUrl } = await start();

    const response = await fetch(`${baseUrl}/mcp`, { headers: MCP_HEADERS });

    expect(response.status).toBe(400);
  });

  test('stateless mode refuses GET and DELETE', async () => {
    const config = makeConfig({
      streamableHttp: { statefulMode: false, sessionTtlMs: 60_000, maxSessions: 2 },
    });
    const { baseUrl } = await start(config);

    const get = await fetch(`${baseUrl}/mcp`, { headers: MCP_HEADERS });
    const del = await fetch(`${baseUrl}/mcp`, {
      method: 'DELETE',
      headers: MCP_HEADERS,
    });

    expect(get.status).toBe(405);
    expect(del.status).toBe(405);
  });

  test('stateless mode answers initialize without a session id', async () => {
    const config = makeConfig({
      streamableHttp: { statefulMode: false, sessionTtlMs: 60_000, maxSessions: 2 },
    });
    const { baseUrl, sessionStore } = await start(config);

    const response = await postMcp(baseUrl, INITIALIZE);
    await response.text();

    expect(response.status).toBe(200);
    expect(response.headers.get('mcp-session-id')).toBeNull();
    expect(sessionStore.size()).toBe(0);
  });
});
