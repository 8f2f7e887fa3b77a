import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';

import {
  AppError,
  BadRedirectError,
  HttpStatusError,
  PolicyDeniedError,
  TimeoutError,
  TooManyRedirectsError,
  UpstreamError,
  ValidationError,
} from '../errors/index.js';

export type ToolErrorResponse = CallToolResult & {
  isError: true;
};

export interface ToolErrorExtra {
  readonly code?: string;
  readonly statusCode?: number;
  readonly details?: Record<string, unknown>;
}

const isDevelopment = process.env.NODE_ENV === 'development';

export function createToolErrorResponse(
  message: string,
  extra?: ToolErrorExtra
): ToolErrorResponse {
  const errorContent: Record<string, unknown> = {
    error: message,
    ...(extra?.code ? { code: extra.code } : {}),
    ...(extra?.statusCode !== undefined
      ? { statusCode: extra.statusCode }
      : {}),
    ...(extra?.details ? { details: extra.details } : {}),
  };

  return {
    content: [{ type: 'text', text: JSON.stringify(errorContent) }],
    structuredContent: errorContent,
    isError: true,
  };
}

function resolveErrorDetails(
  error: AppError
): Record<string, unknown> | undefined {
  if (error instanceof ValidationError) return error.details;
  if (error instanceof PolicyDeniedError) {
    return { host: error.host, reason: error.reason };
  }
  if (error instanceof TimeoutError) {
    return { url: error.url, timeoutMs: error.timeoutMs };
  }
  if (error instanceof TooManyRedirectsError) {
    return { maxRedirects: error.maxRedirects };
  }
  if (error instanceof BadRedirectError || error instanceof HttpStatusError) {
    return { url: error.url, httpStatus: error.httpStatus };
  }
  if (error instanceof UpstreamError) {
    return {
      endpoint: error.endpoint,
      ...(error.httpStatus !== undefined
        ? { httpStatus: error.httpStatus }
        : {}),
    };
  }
  if ('url' in error && typeof error.url === 'string') {
    return { url: error.url };
  }
  return undefined;
}

function withStack(message: string, error: Error): string {
  return isDevelopment ? `${message}\n${error.stack ?? ''}` : message;
}

/**
 * Maps any failure inside a tool handler to an `isError` result. Operational
 * errors keep their own message; anything else is prefixed with
 * `fallbackMessage`.
 */
export function handleToolError(
  error: unknown,
  fallbackMessage = 'Operation failed'
): ToolErrorResponse {
  if (error instanceof AppError) {
    const details = resolveErrorDetails(error);
    return createToolErrorResponse(withStack(error.message, error), {
      code: error.code,
      statusCode: error.statusCode,
      ...(details ? { details } : {}),
    });
  }

  if (error instanceof Error) {
    const code = error.name === 'AbortError' ? 'ABORTED' : 'UNKNOWN_ERROR';
    return createToolErrorResponse(
      withStack(`${fallbackMessage}: ${error.message}`, error),
      { code }
    );
  }

  return createToolErrorResponse(`${fallbackMessage}: Unknown error`, {
    code: 'UNKNOWN_ERROR',
  });
}
