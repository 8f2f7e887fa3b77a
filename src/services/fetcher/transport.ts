import { Readable } from 'node:stream';

import axios, { type AxiosInstance, isAxiosError } from 'axios';

import { TransportError } from '../../errors/app-error.js';
import { getErrorMessage } from '../../utils/error-utils.js';

import { attachLoggingInterceptors } from './interceptors.js';

/**
 * One response of a redirect walk, with the body still unread.
 */
export interface HopResponse {
  readonly status: number;
  readonly location?: string;
  readonly contentType?: string;
  readonly body: AsyncIterable<Uint8Array | string>;
  /** Stops the transfer and releases the connection. Idempotent. */
  discard(): void;
}

export interface HopRequestOptions {
  readonly userAgent: string;
  readonly signal: AbortSignal;
}

/**
 * Issues exactly one GET. Implementations must never follow redirects
 * themselves; the walker inspects and re-validates every hop.
 */
export interface HopTransport {
  get(url: URL, options: HopRequestOptions): Promise<HopResponse>;
}

const ACCEPT_HEADER =
  'text/html,application/xhtml+xml,application/xml;q=0.9,text/*;q=0.8';

export function createBrowseHttpClient(): AxiosInstance {
  const client = axios.create({
    maxRedirects: 0,
    responseType: 'stream',
    decompress: true,
    // Connect to the validated host, never to an ambient HTTP(S)_PROXY.
    proxy: false,
    validateStatus: () => true,
    headers: {
      Accept: ACCEPT_HEADER,
      'Accept-Encoding': 'gzip, deflate, br',
    },
  });
  return attachLoggingInterceptors(client);
}

function headerToString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === 'string' ? first : undefined;
  }
  return undefined;
}

function toTransportError(error: unknown, url: string): TransportError {
  if (isAxiosError(error)) {
    const code = error.code ? ` (${error.code})` : '';
    return new TransportError(
      `Request failed${code}: ${error.message}`,
      url,
      'TRANSPORT_ERROR',
      502,
      { cause: error }
    );
  }
  return new TransportError(
    `Request failed: ${getErrorMessage(error)}`,
    url,
    'TRANSPORT_ERROR',
    502,
    { cause: error }
  );
}

export class AxiosHopTransport implements HopTransport {
  constructor(
    private readonly client: AxiosInstance = createBrowseHttpClient()
  ) {}

  async get(url: URL, options: HopRequestOptions): Promise<HopResponse> {
    let response;
    try {
      response = await this.client.get<unknown>(url.href, {
        signal: options.signal,
        headers: { 'User-Agent': options.userAgent },
      });
    } catch (error) {
      throw toTransportError(error, url.href);
    }

    const body: unknown = response.data;
    if (!(body instanceof Readable)) {
      throw new TransportError(
        'Response body is not a stream',
        url.href,
        'TRANSPORT_ERROR'
      );
    }

    return {
      status: response.status,
      location: headerToString(response.headers['location']),
      contentType: headerToString(response.headers['content-type']),
      body,
      discard: () => {
        if (!body.destroyed) body.destroy();
      },
    };
  }
}
