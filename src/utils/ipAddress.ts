import ipaddr from 'ipaddr.js';

export type IpAddress = ReturnType<typeof ipaddr.parse>;

/**
 * Parses a dotted-quad IPv4 or an IPv6 literal. Returns null for anything
 * else, including the shorthand IPv4 forms (`10.1`, `0x0a.0.0.1`) that
 * `ipaddr.parse` would otherwise accept.
 */
export const parseAddress = (value: string): IpAddress | null => {
  if (ipaddr.IPv4.isValidFourPartDecimal(value) || ipaddr.IPv6.isValid(value)) {
    return ipaddr.parse(value);
  }
  return null;
};

/** Canonical text form, so `::1` and `0:0:0:0:0:0:0:1` compare equal. */
export const canonicalAddress = (value: string): string => {
  const address = parseAddress(value);
  return address ? address.toString() : value;
};

/**
 * Orders two addresses of the same family. Addresses of different families
 * have no order and yield null.
 */
export const compareAddresses = (a: IpAddress, b: IpAddress): number | null => {
  if (a.kind() !== b.kind()) {
    return null;
  }
  const left = a.toByteArray();
  const right = b.toByteArray();
  for (let i = 0; i < left.length; i++) {
    if (left[i] !== right[i]) {
      return left[i] < right[i] ? -1 : 1;
    }
  }
  return 0;
};

export interface AddressRange {
  from: IpAddress | null;
  to: IpAddress | null;
}

// Inclusive on both ends; a missing bound is open
export const isInRange = (address: IpAddress, range: AddressRange): boolean => {
  if (range.from) {
    const order = compareAddresses(address, range.from);
    if (order === null || order < 0) {
      return false;
    }
  }
  if (range.to) {
    const order = compareAddresses(address, range.to);
    if (order === null || order > 0) {
      return false;
    }
  }
  return true;
};
