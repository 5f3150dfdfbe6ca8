import type { CidrPrefix } from "../trie/Node";

/** Render an address as a dotted quad, most significant octet first. */
export const formatAddress = (address: number): string => {
  const a = (address >>> 24) & 0xff;
  const b = (address >>> 16) & 0xff;
  const c = (address >>> 8) & 0xff;
  const d = address & 0xff;
  return `${a}.${b}.${c}.${d}`;
};

/** Render a prefix as `a.b.c.d/w`. */
export const formatPrefix = (prefix: CidrPrefix): string =>
  `${formatAddress(prefix.address)}/${prefix.width}`;

/** Render a cover as the exact stdout text: one LF-terminated line each. */
export const renderPrefixes = (prefixes: ReadonlyArray<CidrPrefix>): string =>
  prefixes.map((prefix) => `${formatPrefix(prefix)}\n`).join("");
