import {
  AppError,
  BodyTooLargeError,
  InvalidEncodingError,
  TransportError,
} from '../../errors/app-error.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { sanitizeText, truncateText } from '../../utils/sanitizer.js';

import { logDebug } from '../logger.js';

type Chunk = Uint8Array | string;

const SNIPPET_MAX_BYTES = 1024;
const SNIPPET_MAX_CHARS = 300;

interface BodyReadState {
  parts: Buffer[];
  total: number;
}

function toBuffer(chunk: Chunk): Buffer {
  if (typeof chunk === 'string') return Buffer.from(chunk);
  return Buffer.isBuffer(chunk)
    ? chunk
    : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
}

function appendChunk(
  state: BodyReadState,
  chunk: Chunk,
  maxBytes: number,
  url: string
): BodyReadState {
  const buffer = toBuffer(chunk);
  // Fail before buffering: the chunk that would cross the limit is dropped.
  if (state.total + buffer.length > maxBytes) {
    throw new BodyTooLargeError(url, maxBytes);
  }
  state.parts.push(buffer);
  state.total += buffer.length;
  return state;
}

/**
 * Folds a lazily produced chunk sequence into one buffer, stopping the moment
 * the running total would exceed `maxBytes`. Leaving the `for await` early
 * calls the iterator's `return()`, which destroys a Node stream.
 */
export async function readBounded(
  chunks: AsyncIterable<Chunk>,
  maxBytes: number,
  url: string
): Promise<Buffer> {
  let state: BodyReadState = { parts: [], total: 0 };

  try {
    for await (const chunk of chunks) {
      state = appendChunk(state, chunk, maxBytes, url);
    }
  } catch (error) {
    if (error instanceof AppError) throw error;
    throw new TransportError(
      `Failed to read response body: ${getErrorMessage(error)}`,
      url,
      'TRANSPORT_ERROR',
      502,
      { cause: error }
    );
  }

  return Buffer.concat(state.parts, state.total);
}

export function decodeUtf8(bytes: Uint8Array, url: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    throw new InvalidEncodingError(url);
  }
}

/**
 * Best-effort excerpt of an error body for messages. Reads at most 1 KiB and
 * never fails.
 */
export async function readSnippet(
  chunks: AsyncIterable<Chunk>
): Promise<string> {
  const parts: Buffer[] = [];
  let total = 0;
  try {
    for await (const chunk of chunks) {
      const buffer = toBuffer(chunk);
      parts.push(buffer);
      total += buffer.length;
      if (total >= SNIPPET_MAX_BYTES) break;
    }
  } catch (error) {
    logDebug('Error body read ended early', {
      error: getErrorMessage(error),
    });
  }

  const bytes = Buffer.concat(parts, total).subarray(0, SNIPPET_MAX_BYTES);
  const text = new TextDecoder('utf-8').decode(bytes);
  return truncateText(sanitizeText(text), SNIPPET_MAX_CHARS);
}
