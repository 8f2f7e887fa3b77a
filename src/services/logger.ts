import winston from 'winston';

import type { LogLevel } from '../config/types.js';

const ALL_LEVELS = Object.keys(winston.config.npm.levels);

// stdout carries the stdio MCP stream, so every level goes to stderr.
const consoleTransport = new winston.transports.Console({
  stderrLevels: ALL_LEVELS,
  format:
    process.env.NODE_ENV === 'production'
      ? winston.format.json()
      : winston.format.combine(
          winston.format.colorize(),
          winston.format.simple()
        ),
});

const logger = winston.createLogger({
  level: 'warn',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  defaultMeta: { service: 'searxng-mcp' },
  transports: [consoleTransport],
});

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export function getLogLevel(): string {
  return logger.level;
}

export function logInfo(message: string, meta?: Record<string, unknown>): void {
  logger.info(message, meta);
}

export function logWarn(message: string, meta?: Record<string, unknown>): void {
  logger.warn(message, meta);
}

export function logDebug(
  message: string,
  meta?: Record<string, unknown>
): void {
  logger.debug(message, meta);
}

export function logError(
  message: string,
  error?: Error | Record<string, unknown>
): void {
  const errorMeta =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : error;
  logger.error(message, errorMeta);
}
