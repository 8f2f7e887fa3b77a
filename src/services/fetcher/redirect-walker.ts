import type { FetchPolicy } from '../../config/types.js';
import {
  AppError,
  BadRedirectError,
  HttpStatusError,
  PolicyDeniedError,
  TimeoutError,
  TooManyRedirectsError,
  TransportError,
  UnsupportedContentTypeError,
  UnsupportedSchemeError,
  UrlValidationError,
} from '../../errors/app-error.js';
import { raceWithSignal } from '../../utils/abort-utils.js';
import { getErrorMessage } from '../../utils/error-utils.js';
import { stripStylesAndScripts } from '../../utils/sanitizer.js';
import { htmlToMarkdown } from '../../transformers/markdown.transformer.js';

import { logDebug } from '../logger.js';

import { decodeUtf8, readBounded, readSnippet } from './body-reader.js';
import type { NameResolver } from './dns-resolver.js';
import { evaluateHost } from './host-policy.js';
import type { HopResponse, HopTransport } from './transport.js';

export interface WalkerDeps {
  readonly transport: HopTransport;
  readonly resolver: NameResolver;
  /** HTML to Markdown; runs after styles and scripts are stripped. */
  readonly convert?: (html: string) => string;
}

type WalkState =
  | { readonly kind: 'validating'; readonly url: URL; readonly hop: number }
  | { readonly kind: 'requesting'; readonly url: URL; readonly hop: number }
  | {
      readonly kind: 'redirecting';
      readonly url: URL;
      readonly hop: number;
      readonly response: HopResponse;
    }
  | { readonly kind: 'done'; readonly markdown: string }
  | { readonly kind: 'failed'; readonly error: AppError };

type TerminalState = Extract<WalkState, { kind: 'done' | 'failed' }>;
type ActiveState = Exclude<WalkState, TerminalState>;

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:']);

const ACCEPTED_CONTENT_TYPES = [
  'text/',
  'application/xhtml+xml',
  'application/xml',
] as const;

function isTerminal(state: WalkState): state is TerminalState {
  return state.kind === 'done' || state.kind === 'failed';
}

function isRedirectStatus(status: number): boolean {
  return status >= 300 && status < 400;
}

function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

function isAcceptedContentType(contentType: string | undefined): boolean {
  if (contentType === undefined) return true;
  const lower = contentType.trim().toLowerCase();
  return ACCEPTED_CONTENT_TYPES.some((prefix) => lower.startsWith(prefix));
}

function parseTarget(raw: string): URL {
  const input = raw.trim();
  if (!URL.canParse(input)) {
    throw new UrlValidationError('Invalid URL format', raw);
  }
  const url = new URL(input);
  if (!SUPPORTED_PROTOCOLS.has(url.protocol)) {
    throw new UnsupportedSchemeError(url.protocol.replace(/:$/, ''));
  }
  if (!url.hostname) {
    throw new UrlValidationError('URL has no host', raw);
  }
  return url;
}

class RedirectWalk {
  private readonly deadline: AbortSignal;
  private readonly signal: AbortSignal;
  private readonly convert: (html: string) => string;

  constructor(
    private readonly policy: FetchPolicy,
    private readonly deps: WalkerDeps,
    callerSignal: AbortSignal | undefined
  ) {
    this.deadline = AbortSignal.timeout(policy.timeoutMs);
    this.signal = callerSignal
      ? AbortSignal.any([this.deadline, callerSignal])
      : this.deadline;
    this.convert = deps.convert ?? htmlToMarkdown;
  }

  async run(start: URL): Promise<string> {
    let state: WalkState = { kind: 'validating', url: start, hop: 0 };

    while (!isTerminal(state)) {
      const current: ActiveState = state;
      try {
        state = await this.step(current);
      } catch (error) {
        state = { kind: 'failed', error: this.toFailure(error, current.url) };
      }
    }

    if (state.kind === 'failed') throw state.error;
    return state.markdown;
  }

  private async step(state: ActiveState): Promise<WalkState> {
    switch (state.kind) {
      case 'validating':
        return this.validate(state.url, state.hop);
      case 'requesting':
        return this.request(state.url, state.hop);
      case 'redirecting':
        return this.redirect(state.url, state.hop, state.response);
    }
  }

  private async validate(url: URL, hop: number): Promise<WalkState> {
    if (hop > this.policy.maxRedirects) {
      throw new AppError(
        `Redirect walk passed its hop bound (${hop})`,
        500,
        'INTERNAL_ERROR',
        false
      );
    }

    const decision = await raceWithSignal(
      evaluateHost(url.hostname, this.policy, this.deps.resolver),
      this.signal,
      () => this.abortReason(url)
    );
    if (decision.kind === 'deny') {
      return {
        kind: 'failed',
        error: new PolicyDeniedError(url.hostname, decision.reason),
      };
    }
    return { kind: 'requesting', url, hop };
  }

  private async request(url: URL, hop: number): Promise<WalkState> {
    this.throwIfAborted(url);
    logDebug('Browse hop', { hop, url: url.href });

    const response = await this.deps.transport.get(url, {
      userAgent: this.policy.userAgent,
      signal: this.signal,
    });

    if (isRedirectStatus(response.status)) {
      return { kind: 'redirecting', url, hop, response };
    }

    try {
      return { kind: 'done', markdown: await this.finish(url, response) };
    } finally {
      response.discard();
    }
  }

  private redirect(url: URL, hop: number, response: HopResponse): WalkState {
    response.discard();

    if (!this.policy.followRedirects) {
      throw new BadRedirectError(
        `Received HTTP ${response.status} but redirects are disabled`,
        url.href,
        response.status
      );
    }

    const location = response.location?.trim();
    if (!location || !URL.canParse(location, url.href)) {
      throw new BadRedirectError(
        `HTTP ${response.status} without a usable Location header`,
        url.href,
        response.status
      );
    }

    const next = new URL(location, url);
    if (hop === this.policy.maxRedirects) {
      throw new TooManyRedirectsError(this.policy.maxRedirects);
    }
    if (!SUPPORTED_PROTOCOLS.has(next.protocol)) {
      throw new UnsupportedSchemeError(next.protocol.replace(/:$/, ''));
    }

    logDebug('Following redirect', {
      status: response.status,
      from: url.href,
      to: next.href,
    });
    return { kind: 'validating', url: next, hop: hop + 1 };
  }

  private async finish(url: URL, response: HopResponse): Promise<string> {
    if (!isSuccessStatus(response.status)) {
      const snippet = await raceWithSignal(
        readSnippet(response.body),
        this.signal,
        () => this.abortReason(url)
      );
      throw new HttpStatusError(url.href, response.status, snippet);
    }

    if (!isAcceptedContentType(response.contentType)) {
      throw new UnsupportedContentTypeError(response.contentType ?? '');
    }

    const bytes = await raceWithSignal(
      readBounded(response.body, this.policy.maxBytes, url.href),
      this.signal,
      () => this.abortReason(url)
    );
    const html = decodeUtf8(bytes, url.href);
    return this.convert(stripStylesAndScripts(html));
  }

  private throwIfAborted(url: URL): void {
    if (this.signal.aborted) throw this.abortReason(url);
  }

  private abortReason(url: URL): TransportError {
    if (this.deadline.aborted) {
      return new TimeoutError(url.href, this.policy.timeoutMs);
    }
    return new TransportError('Request was canceled', url.href, 'CANCELED', 499);
  }

  private toFailure(error: unknown, url: URL): AppError {
    // Any failure after the signal fired is reported as the abort itself.
    if (this.signal.aborted) return this.abortReason(url);
    if (error instanceof AppError) return error;
    return new TransportError(
      `Request failed: ${getErrorMessage(error)}`,
      url.href,
      'TRANSPORT_ERROR',
      502,
      { cause: error }
    );
  }
}

/**
 * Fetches `rawUrl` and renders it as Markdown, re-validating the host of
 * every redirect hop against `policy` before contacting it. One deadline of
 * `policy.timeoutMs` covers DNS, every hop and the body read.
 */
export async function fetchAsMarkdown(
  rawUrl: string,
  policy: FetchPolicy,
  deps: WalkerDeps,
  signal?: AbortSignal
): Promise<string> {
  const start = parseTarget(rawUrl);
  return new RedirectWalk(policy, deps, signal).run(start);
}
