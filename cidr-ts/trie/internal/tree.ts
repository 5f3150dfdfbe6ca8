import * as Data from "effect/Data";
import {
  ADDRESS_BITS,
  alignedBlockMask,
  popcount,
} from "../address";
import {
  Empty,
  Full,
  makeInner,
  type CidrPrefix,
  type InnerNode,
  type PrefixNode,
} from "../Node";

/** Raised when the tree holds an inner node below the last address bit. */
export class TrieInvariantError extends Data.TaggedError("TrieInvariantError")<{
  readonly message: string;
  readonly depth: number;
}> {}

/** Mutable tree root plus live inner-node count. */
export interface PrefixTree {
  root: PrefixNode;
  innerNodes: number;
}

export const makeTree = (): PrefixTree => ({ root: Empty, innerNodes: 0 });

const bitAt = (address: number, depth: number): 0 | 1 =>
  ((address >>> (ADDRESS_BITS - 1 - depth)) & 1) === 0 ? 0 : 1;

const allocateInner = (tree: PrefixTree): InnerNode => {
  tree.innerNodes += 1;
  return makeInner();
};

const releaseSubtree = (tree: PrefixTree, node: PrefixNode): void => {
  if (node._tag !== "inner") {
    return;
  }
  releaseSubtree(tree, node.children[0]);
  releaseSubtree(tree, node.children[1]);
  tree.innerNodes -= 1;
};

const addToNode = (
  tree: PrefixTree,
  node: PrefixNode,
  address: number,
  depth: number,
  targetDepth: number,
): PrefixNode => {
  if (node._tag === "full") {
    return node;
  }
  if (depth >= targetDepth) {
    releaseSubtree(tree, node);
    return Full;
  }

  const inner = node._tag === "inner" ? node : allocateInner(tree);
  const side = bitAt(address, depth);
  inner.children[side] = addToNode(
    tree,
    inner.children[side],
    address,
    depth + 1,
    targetDepth,
  );

  if (inner.children[0] === Full && inner.children[1] === Full) {
    tree.innerNodes -= 1;
    return Full;
  }
  return inner;
};

/**
 * Mark every address of the block `address/width`. `address` must already
 * have its host bits cleared.
 */
export const insertBlock = (
  tree: PrefixTree,
  address: number,
  width: number,
): void => {
  tree.root = addToNode(tree, tree.root, address, 0, width);
};

/**
 * Mark `[start, end]` by repeatedly stripping the largest aligned block
 * at `start` that stays within `end`. Returns the number of blocks used.
 */
export const insertSpan = (
  tree: PrefixTree,
  start: number,
  end: number,
): number => {
  let cursor = start;
  let blocks = 0;
  for (;;) {
    let mask = alignedBlockMask(cursor);
    while (cursor + mask > end) {
      mask >>>= 1;
    }
    insertBlock(tree, cursor, ADDRESS_BITS - popcount(mask));
    blocks += 1;

    // Plain number arithmetic: past 255.255.255.255 this is 2^32, not 0.
    const next = cursor + mask + 1;
    if (next > end) {
      return blocks;
    }
    cursor = next;
  }
};

const walk = (
  node: PrefixNode,
  value: number,
  bit: number,
  visit: (prefix: CidrPrefix) => void,
): void => {
  switch (node._tag) {
    case "empty":
      return;
    case "full":
      visit({ address: value, width: ADDRESS_BITS - 1 - bit });
      return;
    case "inner":
      if (bit < 0) {
        throw new TrieInvariantError({
          message: "Inner node found below the last address bit",
          depth: ADDRESS_BITS,
        });
      }
      walk(node.children[0], value, bit - 1, visit);
      walk(node.children[1], (value | (1 << bit)) >>> 0, bit - 1, visit);
      return;
  }
};

/** Visit every maximal Full subtree in ascending address order. */
export const visitFullPrefixes = (
  tree: PrefixTree,
  visit: (prefix: CidrPrefix) => void,
): void => walk(tree.root, 0, ADDRESS_BITS - 1, visit);

/** Membership test for a single address. */
export const treeContains = (tree: PrefixTree, address: number): boolean => {
  let node = tree.root;
  let depth = 0;
  while (node._tag === "inner") {
    if (depth >= ADDRESS_BITS) {
      throw new TrieInvariantError({
        message: "Inner node found below the last address bit",
        depth,
      });
    }
    node = node.children[bitAt(address, depth)];
    depth += 1;
  }
  return node._tag === "full";
};

/** Drop every node and return how many inner nodes were released. */
export const releaseTree = (tree: PrefixTree): number => {
  const released = tree.innerNodes;
  releaseSubtree(tree, tree.root);
  tree.root = Empty;
  tree.innerNodes = 0;
  return released;
};
