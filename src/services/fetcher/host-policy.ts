import type { FetchPolicy } from '../../config/types.js';
import type { DenyReason } from '../../errors/app-error.js';
import { getErrorMessage } from '../../utils/error-utils.js';

import { logDebug } from '../logger.js';

import { type NameResolver, normalizeDnsName } from './dns-resolver.js';
import { classifyIp, isIpLiteral } from './ip-classifier.js';

export type HostDecision =
  | { readonly kind: 'allow' }
  | { readonly kind: 'deny'; readonly reason: DenyReason };

type HostPolicy = Pick<FetchPolicy, 'allowedHosts' | 'allowPrivate'>;

const ALLOW: HostDecision = { kind: 'allow' };

function deny(reason: DenyReason): HostDecision {
  return { kind: 'deny', reason };
}

/** Lower-cases, strips IPv6 brackets and a single trailing dot. */
export function normalizeHost(host: string): string {
  const lower = host.toLowerCase();
  const unbracketed =
    lower.startsWith('[') && lower.endsWith(']') ? lower.slice(1, -1) : lower;
  return normalizeDnsName(unbracketed);
}

export function isLocalhostName(host: string): boolean {
  return host === 'localhost' || host.endsWith('.localhost');
}

/**
 * Everything that can be decided without DNS. `undefined` means the host is
 * a name that must be resolved before a decision is possible.
 */
export function evaluateHostStatically(
  host: string,
  policy: HostPolicy
): HostDecision | undefined {
  const normalized = normalizeHost(host);

  if (policy.allowedHosts) {
    return policy.allowedHosts.has(normalized)
      ? ALLOW
      : deny('not_in_allowlist');
  }

  if (policy.allowPrivate) return ALLOW;

  if (isLocalhostName(normalized)) return deny('local_host');

  if (isIpLiteral(normalized)) {
    return classifyIp(normalized) === 'private' ? deny('private_ip') : ALLOW;
  }

  return undefined;
}

async function evaluateResolvedHost(
  host: string,
  resolver: NameResolver
): Promise<HostDecision> {
  let addresses: readonly string[];
  try {
    addresses = await resolver.resolve(host);
  } catch (error) {
    logDebug('Host resolution failed', {
      host,
      error: getErrorMessage(error),
    });
    return deny('resolution_failed');
  }

  if (addresses.length === 0) return deny('resolution_failed');

  // One private answer taints the name: the transport picks the address.
  if (addresses.some((address) => classifyIp(address) === 'private')) {
    return deny('resolves_to_private_ip');
  }

  return ALLOW;
}

/**
 * Decides whether `host` may be contacted. Rules apply in order and the
 * first match wins: allowlist, allow-private, localhost names, IP literals,
 * then DNS. Never cached; every redirect hop calls this again.
 */
export async function evaluateHost(
  host: string,
  policy: HostPolicy,
  resolver: NameResolver
): Promise<HostDecision> {
  const decision = evaluateHostStatically(host, policy);
  if (decision) return decision;
  return evaluateResolvedHost(normalizeHost(host), resolver);
}
