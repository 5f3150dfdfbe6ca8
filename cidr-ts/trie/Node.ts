/** Subtree with no member addresses. */
export interface EmptyNode {
  readonly _tag: "empty";
}

/** Subtree in which every address is a member. */
export interface FullNode {
  readonly _tag: "full";
}

/**
 * Mixed subtree. `children[0]` covers the half whose discriminating bit is
 * 0, `children[1]` the half where it is 1. Never has two Full children.
 */
export interface InnerNode {
  readonly _tag: "inner";
  readonly children: [PrefixNode, PrefixNode];
}

/** Membership trie node union. */
export type PrefixNode = EmptyNode | FullNode | InnerNode;

/** Shared Empty sentinel. */
export const Empty: EmptyNode = Object.freeze({ _tag: "empty" });

/** Shared Full sentinel. */
export const Full: FullNode = Object.freeze({ _tag: "full" });

/** Allocate an inner node with two Empty children. */
export const makeInner = (): InnerNode => ({
  _tag: "inner",
  children: [Empty, Empty],
});

/** CIDR block: base address plus prefix width. */
export interface CidrPrefix {
  readonly address: number;
  readonly width: number;
}
