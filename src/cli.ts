import { parseArgs } from 'node:util';

import type { LogLevel } from './config/types.js';
import type { BindAddress } from './http/index.js';
import { getErrorMessage } from './utils/error-utils.js';

export const TRANSPORTS = ['stdio', 'streamable-http'] as const;
export type TransportMode = (typeof TRANSPORTS)[number];

export const DEFAULT_BIND = '127.0.0.1:3344';

export interface CliValues {
  readonly transport: TransportMode;
  readonly bind: BindAddress;
  readonly tools?: string;
  readonly config?: string;
  readonly verbosity: number;
  readonly help: boolean;
  readonly version: boolean;
}

interface CliParseSuccess {
  readonly ok: true;
  readonly values: CliValues;
}

interface CliParseFailure {
  readonly ok: false;
  readonly message: string;
}

export type CliParseResult = CliParseSuccess | CliParseFailure;

const usageLines = [
  'SearXNG MCP server',
  '',
  'Usage:',
  '  searxng-mcp [--transport|-t stdio|streamable-http] [--bind|-b host:port]',
  '              [--tools a,b] [--config|-c path] [-v|-vv] [--help|-h] [--version|-V]',
  '',
  'Options:',
  '  --transport, -t  stdio (default) or streamable-http.',
  `  --bind, -b       Listen address for streamable-http (default: ${DEFAULT_BIND}).`,
  '  --tools          Comma-separated tool allowlist (default: search,browse).',
  '                   Also read from SEARXNG_MCP_TOOLS.',
  '  --config, -c     YAML config file. Also read from SEARXNG_MCP_CONFIG.',
  '  --verbose, -v    Increase verbosity (-v: info, -vv: debug).',
  '  --help, -h       Show this help message.',
  '  --version, -V    Show server version.',
  '',
] as const;

const optionSchema = {
  transport: { type: 'string', short: 't', default: 'stdio' },
  bind: { type: 'string', short: 'b', default: DEFAULT_BIND },
  tools: { type: 'string' },
  config: { type: 'string', short: 'c' },
  verbose: { type: 'boolean', short: 'v', multiple: true },
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'V', default: false },
} as const;

function isTransportMode(value: string): value is TransportMode {
  return TRANSPORTS.some((mode) => mode === value);
}

/**
 * Parses `host:port`, with IPv6 hosts in brackets (`[::1]:3344`).
 */
export function parseBindAddress(value: string): BindAddress | undefined {
  const match = /^(?:\[([^\]]+)\]|([^:[\]]+)):(\d{1,5})$/.exec(value.trim());
  if (!match) return undefined;
  const host = match[1] ?? match[2];
  const port = Number.parseInt(match[3] ?? '', 10);
  if (!host || !Number.isInteger(port) || port > 65_535) return undefined;
  return { host, port };
}

/** 0 keeps the configured level, 1 is info, 2 or more is debug. */
export function verbosityToLogLevel(verbosity: number): LogLevel | undefined {
  if (verbosity <= 0) return undefined;
  return verbosity === 1 ? 'info' : 'debug';
}

export function renderCliUsage(): string {
  return `${usageLines.join('\n')}\n`;
}

export function parseCliArgs(args: readonly string[]): CliParseResult {
  try {
    const { values } = parseArgs({
      args: [...args],
      options: optionSchema,
      strict: true,
      allowPositionals: false,
    });

    const transport = values.transport ?? 'stdio';
    if (!isTransportMode(transport)) {
      return {
        ok: false,
        message: `Invalid --transport "${transport}" (expected ${TRANSPORTS.join(' or ')})`,
      };
    }

    const bindValue = values.bind ?? DEFAULT_BIND;
    const bind = parseBindAddress(bindValue);
    if (!bind) {
      return {
        ok: false,
        message: `Invalid --bind "${bindValue}" (expected host:port)`,
      };
    }

    return {
      ok: true,
      values: {
        transport,
        bind,
        ...(values.tools !== undefined ? { tools: values.tools } : {}),
        ...(values.config !== undefined ? { config: values.config } : {}),
        verbosity: values.verbose?.length ?? 0,
        help: values.help === true,
        version: values.version === true,
      },
    };
  } catch (error: unknown) {
    return {
      ok: false,
      message: getErrorMessage(error),
    };
  }
}
