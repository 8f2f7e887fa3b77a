import { BlockList, isIP } from 'node:net';

export type IpClass = 'public' | 'private';

type IpFamily = 'ipv4' | 'ipv6';

type PrivateSubnet = Readonly<{
  subnet: string;
  prefix: number;
  family: IpFamily;
}>;

const PRIVATE_SUBNETS: readonly PrivateSubnet[] = [
  { subnet: '0.0.0.0', prefix: 8, family: 'ipv4' },
  { subnet: '10.0.0.0', prefix: 8, family: 'ipv4' },
  { subnet: '100.64.0.0', prefix: 10, family: 'ipv4' },
  { subnet: '127.0.0.0', prefix: 8, family: 'ipv4' },
  { subnet: '169.254.0.0', prefix: 16, family: 'ipv4' },
  { subnet: '172.16.0.0', prefix: 12, family: 'ipv4' },
  { subnet: '192.168.0.0', prefix: 16, family: 'ipv4' },
  { subnet: 'fc00::', prefix: 7, family: 'ipv6' },
  { subnet: 'fe80::', prefix: 10, family: 'ipv6' },
];

const PRIVATE_ADDRESSES: readonly string[] = ['::', '::1'];

const IPV6_MAPPED_PREFIX = '::ffff:';

function createPrivateBlockList(): BlockList {
  const list = new BlockList();
  for (const entry of PRIVATE_SUBNETS) {
    list.addSubnet(entry.subnet, entry.prefix, entry.family);
  }
  for (const address of PRIVATE_ADDRESSES) {
    list.addAddress(address, 'ipv6');
  }
  return list;
}

const PRIVATE_BLOCK_LIST = createPrivateBlockList();

function stripBrackets(host: string): string {
  return host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host;
}

function stripIpv6ZoneId(ip: string): string {
  const zoneIndex = ip.indexOf('%');
  if (zoneIndex <= 0) return ip;
  return ip.slice(0, zoneIndex);
}

function extractMappedIpv4(ip: string): string | null {
  if (!ip.startsWith(IPV6_MAPPED_PREFIX)) return null;
  const mapped = ip.slice(IPV6_MAPPED_PREFIX.length);
  return isIP(mapped) === 4 ? mapped : null;
}

function normalizeIp(input: string): { ip: string; family: IpFamily } | null {
  const lowered = stripBrackets(input.trim().toLowerCase());
  const address = stripIpv6ZoneId(lowered);
  if (!address) return null;

  switch (isIP(address)) {
    case 4:
      return { ip: address, family: 'ipv4' };
    case 6: {
      // hex-form mapped addresses are matched against the IPv4 rules by BlockList
      const mapped = extractMappedIpv4(address);
      return mapped
        ? { ip: mapped, family: 'ipv4' }
        : { ip: address, family: 'ipv6' };
    }
    default:
      return null;
  }
}

/**
 * Classifies an IP literal. Total: anything that is not a recognizable
 * private, loopback, link-local, unspecified or CGNAT address is public.
 */
export function classifyIp(ip: string): IpClass {
  const normalized = normalizeIp(ip);
  if (!normalized) return 'public';
  return PRIVATE_BLOCK_LIST.check(normalized.ip, normalized.family)
    ? 'private'
    : 'public';
}

export function isIpLiteral(host: string): boolean {
  return normalizeIp(host) !== null;
}
