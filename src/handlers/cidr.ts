/**
 * IPv4 CIDR arithmetic for VPC and subnet validation.
 */

export interface Ipv4Block {
  /** Network address as an unsigned 32-bit integer. */
  network: number;
  prefixLength: number;
}

const OCTET = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)$/;

export function parseIpv4(address: string): number | undefined {
  const parts = address.split('.');
  if (parts.length !== 4 || !parts.every((part) => OCTET.test(part))) return undefined;
  return parts.reduce((acc, part) => acc * 256 + Number(part), 0);
}

export function formatIpv4(value: number): string {
  return [24, 16, 8, 0].map((shift) => Math.floor(value / 2 ** shift) % 256).join('.');
}

/** Parse `a.b.c.d/n`. Host bits must be zero. */
export function parseCidr(cidr: string): Ipv4Block | undefined {
  const [address, prefix, ...rest] = cidr.split('/');
  if (rest.length > 0 || prefix === undefined || !/^\d{1,2}$/.test(prefix)) return undefined;
  const prefixLength = Number(prefix);
  if (prefixLength > 32) return undefined;
  const network = parseIpv4(address);
  if (network === undefined) return undefined;
  if (network % blockSize(prefixLength) !== 0) return undefined;
  return { network, prefixLength };
}

export function blockSize(prefixLength: number): number {
  return 2 ** (32 - prefixLength);
}

export function contains(outer: Ipv4Block, inner: Ipv4Block): boolean {
  return (
    inner.prefixLength >= outer.prefixLength &&
    inner.network >= outer.network &&
    inner.network + blockSize(inner.prefixLength) <= outer.network + blockSize(outer.prefixLength)
  );
}

export function overlaps(a: Ipv4Block, b: Ipv4Block): boolean {
  return a.network < b.network + blockSize(b.prefixLength) && b.network < a.network + blockSize(a.prefixLength);
}

/** The provider reserves the first four and the last address of every subnet. */
export function usableAddressCount(block: Ipv4Block): number {
  return Math.max(blockSize(block.prefixLength) - 5, 0);
}

/** The n-th assignable host address (0-based) in a subnet, after the four reserved ones. */
export function hostAddress(block: Ipv4Block, index: number): string | undefined {
  if (index < 0 || index >= usableAddressCount(block)) return undefined;
  return formatIpv4(block.network + 4 + index);
}
