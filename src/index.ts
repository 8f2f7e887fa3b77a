#!/usr/bin/env node
import { parseCliArgs, renderCliUsage, verbosityToLogLevel } from './cli.js';
import { loadConfig, serverVersion } from './config/index.js';
import { startHttpServer } from './http/index.js';
import { createToolContext, startStdioServer } from './server.js';
import { logError, setLogLevel } from './services/logger.js';
import { getErrorMessage, toError } from './utils/error-utils.js';

process.on('uncaughtException', (error) => {
  logError('Uncaught exception', error);
  process.stderr.write(`Uncaught exception: ${error.message}\n`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  const error = toError(reason);
  logError('Unhandled rejection', error);
  process.stderr.write(`Unhandled rejection: ${error.message}\n`);
});

function fail(message: string): never {
  process.stderr.write(`searxng-mcp: ${message}\n`);
  process.exit(1);
}

const parsed = parseCliArgs(process.argv.slice(2));
if (!parsed.ok) {
  process.stderr.write(renderCliUsage());
  fail(parsed.message);
}

const cli = parsed.values;
if (cli.help) {
  process.stdout.write(renderCliUsage());
  process.exit(0);
}
if (cli.version) {
  process.stdout.write(`${serverVersion}\n`);
  process.exit(0);
}

try {
  const config = await loadConfig({
    ...(cli.config !== undefined ? { configPath: cli.config } : {}),
    ...(cli.tools !== undefined ? { tools: cli.tools } : {}),
  });
  setLogLevel(verbosityToLogLevel(cli.verbosity) ?? config.logging.level);

  const context = createToolContext(config);
  if (cli.transport === 'stdio') {
    await startStdioServer(context);
  } else {
    await startHttpServer(context, cli.bind);
  }
} catch (error: unknown) {
  logError('Startup failed', toError(error));
  fail(getErrorMessage(error));
}
