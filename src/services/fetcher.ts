import type { FetchPolicy } from '../config/types.js';

import { type NameResolver, systemResolver } from './fetcher/dns-resolver.js';
import { fetchAsMarkdown } from './fetcher/redirect-walker.js';
import { AxiosHopTransport, type HopTransport } from './fetcher/transport.js';

export type { NameResolver } from './fetcher/dns-resolver.js';
export type { HopResponse, HopTransport } from './fetcher/transport.js';

export interface BrowseOptions {
  readonly signal?: AbortSignal;
  readonly transport?: HopTransport;
  readonly resolver?: NameResolver;
}

let defaultTransport: HopTransport | null = null;

function getDefaultTransport(): HopTransport {
  defaultTransport ??= new AxiosHopTransport();
  return defaultTransport;
}

/**
 * Fetches a user-supplied URL under `policy` and returns it as Markdown.
 */
export async function browse(
  url: string,
  policy: FetchPolicy,
  options: BrowseOptions = {}
): Promise<string> {
  return fetchAsMarkdown(
    url,
    policy,
    {
      transport: options.transport ?? getDefaultTransport(),
      resolver: options.resolver ?? systemResolver,
    },
    options.signal
  );
}
