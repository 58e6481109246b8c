import { BlockList, isIP } from 'net';

const NON_PUBLIC_IPV4: ReadonlyArray<readonly [string, number]> = [
  ['0.0.0.0', 8],
  ['10.0.0.0', 8],
  ['100.64.0.0', 10],
  ['127.0.0.0', 8],
  ['169.254.0.0', 16],
  ['172.16.0.0', 12],
  ['192.0.0.0', 24],
  ['192.0.2.0', 24],
  ['192.168.0.0', 16],
  ['198.18.0.0', 15],
  ['198.51.100.0', 24],
  ['203.0.113.0', 24],
  ['224.0.0.0', 4],
  ['240.0.0.0', 4],
];

const NON_PUBLIC_IPV6: ReadonlyArray<readonly [string, number]> = [
  ['::', 128],
  ['::1', 128],
  ['100::', 64],
  ['2001:db8::', 32],
  ['fc00::', 7],
  ['fe80::', 10],
  ['ff00::', 8],
];

const nonPublicRanges = new BlockList();
for (const [network, prefix] of NON_PUBLIC_IPV4) {
  nonPublicRanges.addSubnet(network, prefix, 'ipv4');
}
for (const [network, prefix] of NON_PUBLIC_IPV6) {
  nonPublicRanges.addSubnet(network, prefix, 'ipv6');
}

function ipv4ToInt(address: string): number | undefined {
  const octets = address.split('.').map(Number);
  if (
    octets.length !== 4 ||
    octets.some((octet) => !Number.isInteger(octet) || octet < 0 || octet > 255)
  ) {
    return undefined;
  }
  return octets.reduce((value, octet) => ((value << 8) | octet) >>> 0, 0);
}

function intToIpv4(value: number): string {
  return [24, 16, 8, 0].map((shift) => (value >>> shift) & 0xff).join('.');
}

function parseGroups(text: string): Array<number> {
  return text === '' ? [] : text.split(':').map((group) => parseInt(group, 16));
}

function expandIpv6(address: string): Array<number> | undefined {
  let text = address.toLowerCase();
  const zone = text.indexOf('%');
  if (zone !== -1) text = text.slice(0, zone);

  const tail: Array<number> = [];
  const lastColon = text.lastIndexOf(':');
  const lastPart = text.slice(lastColon + 1);
  if (lastPart.includes('.')) {
    const embedded = ipv4ToInt(lastPart);
    if (embedded === undefined) return undefined;
    tail.push(embedded >>> 16, embedded & 0xffff);
    const head = text.slice(0, lastColon);
    text = head.endsWith(':') ? `${head}:` : head;
  }

  let groups: Array<number>;
  const gap = text.indexOf('::');
  if (gap === -1) {
    groups = [...parseGroups(text), ...tail];
  } else {
    const left = parseGroups(text.slice(0, gap));
    const right = [...parseGroups(text.slice(gap + 2)), ...tail];
    const missing = 8 - left.length - right.length;
    if (missing < 0) return undefined;
    groups = [...left, ...new Array<number>(missing).fill(0), ...right];
  }

  if (
    groups.length !== 8 ||
    groups.some((group) => !Number.isInteger(group) || group < 0 || group > 0xffff)
  ) {
    return undefined;
  }
  return groups;
}

function compressIpv6(groups: ReadonlyArray<number>): string {
  let bestStart = -1;
  let bestLength = 0;
  for (let start = 0; start < groups.length; start++) {
    let length = 0;
    while (start + length < groups.length && groups[start + length] === 0) {
      length++;
    }
    if (length > bestLength) {
      bestStart = start;
      bestLength = length;
    }
  }

  const hex = groups.map((group) => group.toString(16));
  if (bestLength < 2) return hex.join(':');
  const left = hex.slice(0, bestStart).join(':');
  const right = hex.slice(bestStart + bestLength).join(':');
  return `${left}::${right}`;
}

function unwrapMappedIpv4(groups: ReadonlyArray<number>): string | undefined {
  const [a, b, c, d, e, f, high, low] = groups;
  if (
    a === 0 &&
    b === 0 &&
    c === 0 &&
    d === 0 &&
    e === 0 &&
    f === 0xffff &&
    high !== undefined &&
    low !== undefined
  ) {
    return intToIpv4(((high << 16) | low) >>> 0);
  }
  return undefined;
}

/**
 * Returns the canonical text form of an address, or `undefined` when the
 * input is not an IP address. IPv6 is lower-cased and compressed; IPv4-mapped
 * IPv6 addresses come back as plain IPv4. Brackets and zone ids are dropped.
 */
export function canonicalizeIp(address: string): string | undefined {
  let candidate = address.trim();
  if (candidate.startsWith('[')) {
    const end = candidate.indexOf(']');
    if (end === -1) return undefined;
    candidate = candidate.slice(1, end);
  }

  switch (isIP(candidate)) {
    case 4: {
      const value = ipv4ToInt(candidate);
      return value === undefined ? undefined : intToIpv4(value);
    }
    case 6: {
      const groups = expandIpv6(candidate);
      if (!groups) return undefined;
      return unwrapMappedIpv4(groups) ?? compressIpv6(groups);
    }
    default:
      return undefined;
  }
}

/** Expects a canonical address (see {@link canonicalizeIp}). */
export function isPublicIp(address: string): boolean {
  const family = isIP(address);
  if (family === 0) return false;
  return !nonPublicRanges.check(address, family === 4 ? 'ipv4' : 'ipv6');
}

/**
 * Zeroes the host bits of a canonical address so that every client in the
 * same subnet maps to one value.
 */
export function maskIp(
  address: string,
  ipv4PrefixBits: number,
  ipv6PrefixBits: number,
): string {
  if (isIP(address) === 4) {
    if (ipv4PrefixBits >= 32) return address;
    const value = ipv4ToInt(address);
    if (value === undefined) return address;
    const mask = ipv4PrefixBits <= 0 ? 0 : (~0 << (32 - ipv4PrefixBits)) >>> 0;
    return intToIpv4((value & mask) >>> 0);
  }

  if (ipv6PrefixBits >= 128) return address;
  const groups = expandIpv6(address);
  if (!groups) return address;
  const masked = groups.map((group, index) => {
    const bits = Math.min(16, Math.max(0, ipv6PrefixBits - index * 16));
    return bits === 0 ? 0 : group & ((0xffff << (16 - bits)) & 0xffff);
  });
  return compressIpv6(masked);
}
