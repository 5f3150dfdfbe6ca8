import * as Context from "effect/Context";
import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import { isAddress, isPrefixWidth, normalizePrefix } from "./address";
import type { CidrPrefix } from "./Node";
import {
  insertBlock,
  insertSpan,
  makeTree,
  releaseTree,
  treeContains,
  visitFullPrefixes,
} from "./internal/tree";

export { TrieInvariantError } from "./internal/tree";

/** Error raised when a value is not an unsigned 32-bit address. */
export class InvalidAddressError extends Data.TaggedError(
  "InvalidAddressError",
)<{
  readonly value: number;
}> {}

/** Error raised when a prefix width or base address is malformed. */
export class InvalidPrefixError extends Data.TaggedError("InvalidPrefixError")<{
  readonly address: number;
  readonly width: number;
  readonly reason: "WidthOutOfRange" | "HostBitsSet";
}> {}

/** Error raised when a range's lower bound exceeds its upper bound. */
export class ReversedRangeError extends Data.TaggedError("ReversedRangeError")<{
  readonly start: number;
  readonly end: number;
}> {}

/** Trie bookkeeping exposed for logging. */
export interface PrefixTrieStats {
  readonly innerNodes: number;
}

/** Membership trie service interface. */
export interface PrefixTrieService {
  readonly insertPrefix: (
    address: number,
    width: number,
  ) => Effect.Effect<void, InvalidAddressError | InvalidPrefixError>;
  readonly insertRange: (
    start: number,
    end: number,
  ) => Effect.Effect<void, InvalidAddressError | ReversedRangeError>;
  readonly insertAddress: (
    address: number,
  ) => Effect.Effect<void, InvalidAddressError>;
  readonly forEachFullPrefix: (
    visit: (prefix: CidrPrefix) => void,
  ) => Effect.Effect<void>;
  readonly prefixes: () => Effect.Effect<ReadonlyArray<CidrPrefix>>;
  readonly contains: (
    address: number,
  ) => Effect.Effect<boolean, InvalidAddressError>;
  readonly stats: () => Effect.Effect<PrefixTrieStats>;
}

/** Context tag for the membership trie. */
export class PrefixTrie extends Context.Tag("PrefixTrie")<
  PrefixTrie,
  PrefixTrieService
>() {}

const validateAddress = (
  value: number,
): Effect.Effect<number, InvalidAddressError> =>
  isAddress(value)
    ? Effect.succeed(value)
    : Effect.fail(new InvalidAddressError({ value }));

const validatePrefix = (
  address: number,
  width: number,
): Effect.Effect<void, InvalidAddressError | InvalidPrefixError> =>
  Effect.gen(function* () {
    yield* validateAddress(address);
    if (!isPrefixWidth(width)) {
      return yield* Effect.fail(
        new InvalidPrefixError({ address, width, reason: "WidthOutOfRange" }),
      );
    }
    if (normalizePrefix(address, width) !== address) {
      return yield* Effect.fail(
        new InvalidPrefixError({ address, width, reason: "HostBitsSet" }),
      );
    }
  });

// Traversal and lookup throw TrieInvariantError on a corrupt tree; running
// them in Effect.sync turns that into a defect.
const makePrefixTrie = Effect.gen(function* () {
  const tree = yield* Effect.acquireRelease(
    Effect.sync(() => makeTree()),
    (owned) =>
      Effect.sync(() => releaseTree(owned)).pipe(
        Effect.flatMap((innerNodes) =>
          Effect.logDebug("prefix trie released").pipe(
            Effect.annotateLogs({ innerNodes }),
          ),
        ),
      ),
  );

  const insertPrefix = (address: number, width: number) =>
    Effect.gen(function* () {
      yield* validatePrefix(address, width);
      insertBlock(tree, address, width);
    });

  // A valid address is always a valid /32.
  const insertAddress = (address: number) =>
    insertPrefix(address, 32).pipe(
      Effect.catchTag("InvalidPrefixError", (error) => Effect.die(error)),
    );

  const insertRange = (start: number, end: number) =>
    Effect.gen(function* () {
      yield* validateAddress(start);
      yield* validateAddress(end);
      if (start > end) {
        return yield* Effect.fail(new ReversedRangeError({ start, end }));
      }
      const blocks = insertSpan(tree, start, end);
      yield* Effect.logDebug("range inserted").pipe(
        Effect.annotateLogs({ start, end, blocks }),
      );
    });

  const forEachFullPrefix = (visit: (prefix: CidrPrefix) => void) =>
    Effect.sync(() => visitFullPrefixes(tree, visit));

  const prefixes = () =>
    Effect.sync(() => {
      const collected: Array<CidrPrefix> = [];
      visitFullPrefixes(tree, (prefix) => {
        collected.push(prefix);
      });
      return collected;
    });

  const contains = (address: number) =>
    validateAddress(address).pipe(
      Effect.flatMap((valid) => Effect.sync(() => treeContains(tree, valid))),
    );

  const stats = () =>
    Effect.sync(
      () => ({ innerNodes: tree.innerNodes }) satisfies PrefixTrieStats,
    );

  return {
    insertPrefix,
    insertRange,
    insertAddress,
    forEachFullPrefix,
    prefixes,
    contains,
    stats,
  } satisfies PrefixTrieService;
});

/** Scoped trie layer; the tree is released when the scope closes. */
export const PrefixTrieLive: Layer.Layer<PrefixTrie> = Layer.scoped(
  PrefixTrie,
  makePrefixTrie,
);

/** Scoped trie for tests, optionally pre-filled with normalized prefixes. */
export const PrefixTrieTest = (
  seed: ReadonlyArray<CidrPrefix> = [],
): Layer.Layer<PrefixTrie> =>
  Layer.scoped(
    PrefixTrie,
    makePrefixTrie.pipe(
      Effect.tap((trie) =>
        Effect.forEach(
          seed,
          (prefix) =>
            trie.insertPrefix(prefix.address, prefix.width).pipe(Effect.orDie),
          { discard: true },
        ),
      ),
    ),
  );

/** Mark every address of a normalized prefix. */
export const insertPrefix = (address: number, width: number) =>
  Effect.gen(function* () {
    const trie = yield* PrefixTrie;
    yield* trie.insertPrefix(address, width);
  });

/** Mark every address in an inclusive range. */
export const insertRange = (start: number, end: number) =>
  Effect.gen(function* () {
    const trie = yield* PrefixTrie;
    yield* trie.insertRange(start, end);
  });

/** Mark a single address. */
export const insertAddress = (address: number) =>
  Effect.gen(function* () {
    const trie = yield* PrefixTrie;
    yield* trie.insertAddress(address);
  });

/** Visit every maximal Full subtree in ascending address order. */
export const forEachFullPrefix = (visit: (prefix: CidrPrefix) => void) =>
  Effect.gen(function* () {
    const trie = yield* PrefixTrie;
    yield* trie.forEachFullPrefix(visit);
  });

/** Collect the minimal prefix cover in ascending address order. */
export const prefixes = () =>
  Effect.gen(function* () {
    const trie = yield* PrefixTrie;
    return yield* trie.prefixes();
  });

/** Check whether an address is a member. */
export const contains = (address: number) =>
  Effect.gen(function* () {
    const trie = yield* PrefixTrie;
    return yield* trie.contains(address);
  });
