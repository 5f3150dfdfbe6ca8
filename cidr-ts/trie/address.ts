/**
 * IPv4 address arithmetic
 *
 * Addresses are unsigned 32-bit integers carried in a JS number. Bitwise
 * operators work on signed 32-bit values, so every result that can reach
 * the top bit is brought back into range with `>>> 0`.
 */

/** Number of bits in an IPv4 address. */
export const ADDRESS_BITS = 32;

/** Largest IPv4 address (255.255.255.255). */
export const ADDRESS_MAX = 0xffffffff;

/** Largest octet value in a dotted quad. */
export const OCTET_MAX = 255;

/**
 * Check that a value is a whole number in the IPv4 address range
 */
export function isAddress(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= ADDRESS_MAX;
}

/**
 * Check that a value is a valid prefix width (0 through 32)
 */
export function isPrefixWidth(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= ADDRESS_BITS;
}

/**
 * Netmask with the high `width` bits set.
 *
 * Width 0 is answered directly: shifting by the full word width is
 * `<< 0` in JavaScript, which would yield an all-ones mask.
 */
export function prefixMask(width: number): number {
  if (width === 0) {
    return 0;
  }
  return (ADDRESS_MAX << (ADDRESS_BITS - width)) >>> 0;
}

/**
 * Clear the host bits of an address for the given prefix width
 */
export function normalizePrefix(address: number, width: number): number {
  return (address & prefixMask(width)) >>> 0;
}

/**
 * Append one octet to a partially built address
 * @param address - Octets accumulated so far
 * @param octet - Next octet (0-255)
 */
export function appendOctet(address: number, octet: number): number {
  return ((address << 8) | octet) >>> 0;
}

/** Count set bits in a 32-bit value. */
export function popcount(value: number): number {
  let v = value >>> 0;
  let count = 0;
  while (v !== 0) {
    v &= v - 1;
    count += 1;
  }
  return count;
}

/**
 * Size-minus-one of the largest block aligned at `start`.
 *
 * `(start - 1) & ~start` keeps exactly the trailing zero bits of `start`;
 * for `start = 0` every bit is kept, which is the whole address space.
 */
export function alignedBlockMask(start: number): number {
  return ((start - 1) & ~start) >>> 0;
}

/** Number of addresses covered by a prefix. */
export function prefixSize(width: number): number {
  return 2 ** (ADDRESS_BITS - width);
}
