import { lookup } from 'node:dns/promises';

/**
 * Resolves a hostname to every address the system resolver returns.
 */
export interface NameResolver {
  resolve(hostname: string): Promise<readonly string[]>;
}

export function normalizeDnsName(value: string): string {
  return value.trim().toLowerCase().replace(/\.$/, '');
}

export const systemResolver: NameResolver = {
  async resolve(hostname: string): Promise<readonly string[]> {
    const addresses = await lookup(hostname, { all: true, verbatim: true });
    return addresses.map((entry) => entry.address);
  },
};
