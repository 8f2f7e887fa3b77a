import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';

import type {
  AxiosError,
  AxiosInstance,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from 'axios';

import { logDebug, logWarn } from '../logger.js';

const SLOW_REQUEST_MS = 5000;

interface RequestTiming {
  readonly requestId: string;
  readonly startedAt: number;
}

// Keyed by the config object axios threads through request and response.
const timings = new WeakMap<InternalAxiosRequestConfig, RequestTiming>();

function takeTiming(
  config: InternalAxiosRequestConfig | undefined
): { requestId?: string; duration: number } {
  if (!config) return { duration: 0 };
  const timing = timings.get(config);
  timings.delete(config);
  if (!timing) return { duration: 0 };
  return {
    requestId: timing.requestId,
    duration: Math.round(performance.now() - timing.startedAt),
  };
}

export function handleRequest(
  config: InternalAxiosRequestConfig
): InternalAxiosRequestConfig {
  const requestId = randomUUID().substring(0, 8);
  timings.set(config, { requestId, startedAt: performance.now() });

  logDebug('HTTP Request', {
    requestId,
    method: config.method?.toUpperCase(),
    url: config.url,
  });

  return config;
}

export function handleResponse(response: AxiosResponse): AxiosResponse {
  const { requestId, duration } = takeTiming(response.config);
  const url = response.config.url ?? 'unknown';

  logDebug('HTTP Response', {
    requestId,
    status: response.status,
    url,
    duration: `${duration}ms`,
  });

  if (duration > SLOW_REQUEST_MS) {
    logWarn('Slow HTTP request detected', {
      requestId,
      url,
      duration: `${duration}ms`,
    });
  }

  return response;
}

export function handleResponseError(error: AxiosError): Promise<never> {
  const { requestId, duration } = takeTiming(error.config);
  logDebug('HTTP Request Failed', {
    requestId,
    url: error.config?.url ?? 'unknown',
    code: error.code,
    duration: `${duration}ms`,
  });
  return Promise.reject(error);
}

export function attachLoggingInterceptors(client: AxiosInstance): AxiosInstance {
  client.interceptors.request.use(handleRequest);
  client.interceptors.response.use(handleResponse, handleResponseError);
  return client;
}
