import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { afterEach, describe, expect, test } from 'vitest';

import { createMcpServer } from '../../../src/server.js';
import {
  type AxiosStub,
  jsonReply,
  type StubReply,
} from '../../helpers/axios-stub.js';
import { makeConfig, makeToolContext } from '../../helpers/context.js';
import {
  FakeResolver,
  FakeTransport,
  html,
  PUBLIC_IP,
} from '../../helpers/fakes.js';

const SEARCH_BODY = {
  results: [
    { title: 'B', url: 'https://b.example/', content: 'second', score: 1 },
    { title: 'A', url: 'https://a.example/', content: 'first', score: 3 },
  ],
  suggestions: [],
};

const CONFIG_BODY = {
  engines: [
    { name: 'duckduckgo', enabled: true },
    { name: 'bing', enabled: false },
  ],
};

function searxngRoutes(path: string): StubReply {
  if (path === '/search') return jsonReply(SEARCH_BODY);
  if (path === '/config') return jsonReply(CONFIG_BODY);
  return { status: 404 };
}

interface Connected {
  readonly client: Client;
  readonly server: McpServer;
}

const open: Connected[] = [];

async function connect(
  options: Parameters<typeof makeToolContext>[0]
): Promise<{ client: Client; searxngStub: AxiosStub }> {
  const { context, searxngStub } = makeToolContext(options);
  const server = createMcpServer(context);
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  const [clientTransport, serverTransport] =
    InMemoryTransport.createLinkedPair();
  await Promise.all([
    server.connect(serverTransport),
    client.connect(clientTransport),
  ]);
  open.push({ client, server });
  return { client, searxngStub };
}

async function call(
  client: Client,
  name: string,
  args: Record<string, unknown>
): Promise<{ text: string; isError: boolean; structured: unknown }> {
  const raw = await client.callTool({ name, arguments: args });
  const result = CallToolResultSchema.parse(raw);
  const [first] = result.content;
  if (first?.type !== 'text') throw new Error('expected text content');
  return {
    text: first.text,
    isError: result.isError === true,
    structured: result.structuredContent,
  };
}

afterEach(async () => {
  for (const { client, server } of open.splice(0)) {
    await client.close();
    await server.close();
  }
});

describe('tool registration', () => {
  test('lists every enabled tool', async () => {
    const { client } = await connect({});

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      'search',
      'browse',
      'engines',
      'health',
      'ping',
    ]);
  });

  test('tools outside the enabled set are not registered', async () => {
    const { client } = await connect({
      config: makeConfig({ tools: ['search', 'browse'] }),
    });

    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual(['search', 'browse']);
  });

  test('advertises the search input schema', async () => {
    const { client } = await connect({});

    const { tools } = await client.listTools();
    const search = tools.find((tool) => tool.name === 'search');

    expect(search?.inputSchema.required).toEqual(['query']);
    expect(Object.keys(search?.inputSchema.properties ?? {})).toEqual([
      'query',
      'categories',
      'engines',
      'language',
      'pageno',
      'time_range',
      'safe_search',
      'num_results',
    ]);
  });
});

describe('ping', () => {
  test('replies pong or echoes the message', async () => {
    const { client } = await connect({});

    await expect(call(client, 'ping', {})).resolves.toMatchObject({
      text: 'pong',
      isError: false,
    });
    await expect(call(client, 'ping', { message: 'hello' })).resolves.toMatchObject({
      text: 'hello',
    });
  });
});

describe('search', () => {
  test('returns results sorted by score as JSON', async () => {
    const { client, searxngStub } = await connect({ searxng: searxngRoutes });

    const result = await call(client, 'search', {
      query: 'test query',
      safe_search: 'strict',
      num_results: 1,
    });

    expect(result.isError).toBe(false);
    expect(JSON.parse(result.text)).toEqual({
      results: [
        {
          title: 'A',
          url: 'https://a.example/',
          content: 'first',
          score: 3,
          engines: [],
          category: '',
        },
      ],
      suggestions: [],
    });
    expect(searxngStub.calls[0]?.params).toMatchObject({
      q: 'test query',
      safesearch: 2,
    });
  });

  test('rejects a blank query', async () => {
    const { client } = await connect({ searxng: searxngRoutes });

    const result = await call(client, 'search', { query: '   ' });

    expect(result.isError).toBe(true);
    expect(result.structured).toEqual({
      error: 'query must be non-empty',
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      details: { field: 'query' },
    });
  });

  test('reports upstream failures as tool errors', async () => {
    const { client } = await connect({
      searxng: () => ({ status: 502, data: 'bad gateway' }),
    });

    const result = await call(client, 'search', { query: 'q' });

    expect(result.isError).toBe(true);
    expect(JSON.parse(result.text)).toEqual({
      error: 'searxng /search failed: HTTP 502: bad gateway',
      code: 'UPSTREAM_ERROR',
      statusCode: 502,
      details: { endpoint: '/search', httpStatus: 502 },
    });
  });
});

describe('browse', () => {
  test('returns the page as Markdown', async () => {
    const transport = new FakeTransport({
      'http://a.example/': html('<h1>Title</h1><script>x()</script><p>Body text</p>'),
    });
    const { client } = await connect({
      transport,
      resolver: new FakeResolver({ 'a.example': [PUBLIC_IP] }),
    });

    const result = await call(client, 'browse', { url: 'http://a.example/' });

    expect(result).toEqual({
      text: '# Title\n\nBody text',
      isError: false,
      structured: undefined,
    });
    expect(transport.requests).toEqual(['http://a.example/']);
  });

  test('refuses private targets without contacting them', async () => {
    const transport = new FakeTransport({});
    const { client } = await connect({ transport, resolver: new FakeResolver() });

    const result = await call(client, 'browse', { url: 'http://127.0.0.1/' });

    expect(result.isError).toBe(true);
    expect(result.structured).toEqual({
      error:
        '127.0.0.1: refusing to browse private/loopback IP (set BROWSE_ALLOW_PRIVATE=true or BROWSE_ALLOWED_HOSTS to override)',
      code: 'POLICY_DENIED',
      statusCode: 403,
      details: { host: '127.0.0.1', reason: 'private_ip' },
    });
    expect(transport.requests).toEqual([]);
  });

  test('rejects a blank url', async () => {
    const { client } = await connect({});

    const result = await call(client, 'browse', { url: '' });

    expect(result.isError).toBe(true);
    expect(result.structured).toMatchObject({
      error: 'url must be non-empty',
      code: 'VALIDATION_ERROR',
    });
  });
});

describe('engines', () => {
  test('defaults to enabled engines', async () => {
    const { client } = await connect({ searxng: searxngRoutes });

    const result = await call(client, 'engines', {});

    expect(JSON.parse(result.text)).toEqual({
      duckduckgo: { name: 'duckduckgo', enabled: true },
    });
  });

  test('filters disabled engines', async () => {
    const { client } = await connect({ searxng: searxngRoutes });

    const result = await call(client, 'engines', { filter: 'disabled' });

    expect(Object.keys(JSON.parse(result.text))).toEqual(['bing']);
  });
});

describe('health', () => {
  test('reports the version without engines by default', async () => {
    const { client } = await connect({ searxng: searxngRoutes });

    const result = await call(client, 'health', {});

    expect(JSON.parse(result.text)).toEqual({
      ok: true,
      version: makeConfig().server.version,
      engines_enabled: null,
    });
  });

  test('counts enabled engines on request', async () => {
    const { client } = await connect({ searxng: searxngRoutes });

    const result = await call(client, 'health', { include_engines: true });

    expect(JSON.parse(result.text)).toMatchObject({ engines_enabled: 1 });
  });

  test('fails when SearXNG is unreachable', async () => {
    const { client } = await connect({ searxng: () => ({ status: 500 }) });

    const result = await call(client, 'health', {});

    expect(result.isError).toBe(true);
    expect(result.structured).toMatchObject({
      error: 'searxng /config failed: HTTP 500',
      code: 'UPSTREAM_ERROR',
    });
  });
});
