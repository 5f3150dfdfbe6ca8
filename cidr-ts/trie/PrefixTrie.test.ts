import { assert, describe, it } from "@effect/vitest";
import * as Effect from "effect/Effect";
import { normalizePrefix, prefixSize } from "./address";
import { makeInner, type CidrPrefix, type InnerNode } from "./Node";
import {
  InvalidAddressError,
  InvalidPrefixError,
  PrefixTrie,
  PrefixTrieTest,
  ReversedRangeError,
  TrieInvariantError,
  contains,
  forEachFullPrefix,
  insertAddress,
  insertPrefix,
  insertRange,
  prefixes,
} from "./PrefixTrie";
import { makeTree, visitFullPrefixes } from "./internal/tree";

const TEN = 0x0a000000;

const stats = () =>
  Effect.gen(function* () {
    const trie = yield* PrefixTrie;
    return yield* trie.stats();
  });

describe("PrefixTrie", () => {
  it.effect("stores a single prefix as one Full subtree", () =>
    Effect.gen(function* () {
      yield* insertPrefix(TEN, 8);
      assert.deepStrictEqual(yield* prefixes(), [{ address: TEN, width: 8 }]);
    }).pipe(Effect.provide(PrefixTrieTest())),
  );

  it.effect("collapses four adjacent addresses into a /30", () =>
    Effect.gen(function* () {
      for (let offset = 0; offset < 4; offset += 1) {
        yield* insertAddress(TEN + offset);
      }
      assert.deepStrictEqual(yield* prefixes(), [{ address: TEN, width: 30 }]);
      const { innerNodes } = yield* stats();
      assert.strictEqual(innerNodes, 30);
    }).pipe(Effect.provide(PrefixTrieTest())),
  );

  it.effect("collapses buddy prefixes", () =>
    Effect.gen(function* () {
      yield* insertPrefix(TEN, 31);
      yield* insertPrefix(TEN + 2, 31);
      assert.deepStrictEqual(yield* prefixes(), [{ address: TEN, width: 30 }]);
    }).pipe(Effect.provide(PrefixTrieTest())),
  );

  it.effect("decomposes a range into aligned blocks", () =>
    Effect.gen(function* () {
      yield* insertRange(TEN, TEN + 5);
      assert.deepStrictEqual(yield* prefixes(), [
        { address: TEN, width: 30 },
        { address: TEN + 4, width: 31 },
      ]);
    }).pipe(Effect.provide(PrefixTrieTest())),
  );

  it.effect("width 0 fills the whole space with a single root", () =>
    Effect.gen(function* () {
      yield* insertAddress(TEN + 1);
      yield* insertPrefix(0, 0);
      assert.deepStrictEqual(yield* prefixes(), [{ address: 0, width: 0 }]);
      const { innerNodes } = yield* stats();
      assert.strictEqual(innerNodes, 0);
    }).pipe(Effect.provide(PrefixTrieTest())),
  );

  it.effect("the full address range is 0.0.0.0/0", () =>
    Effect.gen(function* () {
      yield* insertRange(0, 0xffffffff);
      assert.deepStrictEqual(yield* prefixes(), [{ address: 0, width: 0 }]);
    }).pipe(Effect.provide(PrefixTrieTest())),
  );

  it.effect("a range ending at the top address terminates", () =>
    Effect.gen(function* () {
      yield* insertRange(0xffffffff, 0xffffffff);
      assert.deepStrictEqual(yield* prefixes(), [
        { address: 0xffffffff, width: 32 },
      ]);
    }).pipe(Effect.provide(PrefixTrieTest())),
  );

  it.effect("the worst-case range needs 62 blocks", () =>
    Effect.gen(function* () {
      yield* insertRange(1, 0xfffffffe);
      const cover = yield* prefixes();
      assert.strictEqual(cover.length, 62);
      assert.deepStrictEqual(cover[0], { address: 1, width: 32 });
      assert.deepStrictEqual(cover[30], { address: 0x40000000, width: 2 });
      assert.deepStrictEqual(cover[31], { address: 0x80000000, width: 2 });
      assert.deepStrictEqual(cover[61], { address: 0xfffffffe, width: 32 });
    }).pipe(Effect.provide(PrefixTrieTest())),
  );

  it.effect("a wider prefix releases the addresses it subsumes", () =>
    Effect.gen(function* () {
      yield* insertAddress(TEN + 1);
      yield* insertAddress(TEN + 7);
      yield* insertRange(TEN + 0x100, TEN + 0x1ff);
      yield* insertPrefix(TEN, 8);
      assert.deepStrictEqual(yield* prefixes(), [{ address: TEN, width: 8 }]);
      const { innerNodes } = yield* stats();
      assert.strictEqual(innerNodes, 8);
    }).pipe(Effect.provide(PrefixTrieTest())),
  );

  it.effect("inserting inside a Full subtree changes nothing", () =>
    Effect.gen(function* () {
      yield* insertPrefix(TEN, 8);
      yield* insertAddress(TEN + 12345);
      yield* insertRange(TEN + 5, TEN + 500);
      assert.deepStrictEqual(yield* prefixes(), [{ address: TEN, width: 8 }]);
    }).pipe(Effect.provide(PrefixTrieTest())),
  );

  it.effect("visits prefixes in ascending address order", () =>
    Effect.gen(function* () {
      yield* insertPrefix(0xc0a80000, 16);
      yield* insertAddress(0x7f000001);
      yield* insertPrefix(TEN, 8);
      const visited: Array<CidrPrefix> = [];
      yield* forEachFullPrefix((prefix) => {
        visited.push(prefix);
      });
      assert.deepStrictEqual(visited, [
        { address: TEN, width: 8 },
        { address: 0x7f000001, width: 32 },
        { address: 0xc0a80000, width: 16 },
      ]);
    }).pipe(Effect.provide(PrefixTrieTest())),
  );

  it.effect("starts from the seeded prefixes", () =>
    Effect.gen(function* () {
      yield* insertPrefix(TEN + 0x100, 24);
      assert.deepStrictEqual(yield* prefixes(), [{ address: TEN, width: 23 }]);
      assert.isTrue(yield* contains(TEN + 0x42));
      const { innerNodes } = yield* stats();
      assert.strictEqual(innerNodes, 23);
    }).pipe(Effect.provide(PrefixTrieTest([{ address: TEN, width: 24 }]))),
  );

  it.effect("answers membership queries", () =>
    Effect.gen(function* () {
      yield* insertPrefix(TEN, 8);
      yield* insertAddress(0xc0a80101);
      assert.isTrue(yield* contains(0x0a123456));
      assert.isTrue(yield* contains(0xc0a80101));
      assert.isFalse(yield* contains(0xc0a80102));
      assert.isFalse(yield* contains(0x0b000000));
    }).pipe(Effect.provide(PrefixTrieTest())),
  );

  it.effect("rejects a reversed range without changing the trie", () =>
    Effect.gen(function* () {
      const error = yield* Effect.flip(insertRange(TEN + 5, TEN + 1));
      assert.instanceOf(error, ReversedRangeError);
      assert.deepStrictEqual(yield* prefixes(), []);
    }).pipe(Effect.provide(PrefixTrieTest())),
  );

  it.effect("rejects malformed prefixes", () =>
    Effect.gen(function* () {
      const hostBits = yield* Effect.flip(insertPrefix(0x0a010203, 16));
      assert.instanceOf(hostBits, InvalidPrefixError);
      if (hostBits._tag === "InvalidPrefixError") {
        assert.strictEqual(hostBits.reason, "HostBitsSet");
      }

      const tooWide = yield* Effect.flip(insertPrefix(TEN, 33));
      assert.instanceOf(tooWide, InvalidPrefixError);
      if (tooWide._tag === "InvalidPrefixError") {
        assert.strictEqual(tooWide.reason, "WidthOutOfRange");
      }

      const badAddress = yield* Effect.flip(insertAddress(-1));
      assert.instanceOf(badAddress, InvalidAddressError);
      assert.deepStrictEqual(yield* prefixes(), []);
    }).pipe(Effect.provide(PrefixTrieTest())),
  );

  it.effect("inserting a prefix, its range or its addresses is equivalent", () =>
    Effect.gen(function* () {
      const asPrefix = yield* Effect.gen(function* () {
        yield* insertPrefix(0xac100010, 28);
        return yield* prefixes();
      }).pipe(Effect.provide(PrefixTrieTest()));

      const asRange = yield* Effect.gen(function* () {
        yield* insertRange(0xac100010, 0xac10001f);
        return yield* prefixes();
      }).pipe(Effect.provide(PrefixTrieTest()));

      const asAddresses = yield* Effect.gen(function* () {
        for (let offset = 15; offset >= 0; offset -= 1) {
          yield* insertAddress(0xac100010 + offset);
        }
        return yield* prefixes();
      }).pipe(Effect.provide(PrefixTrieTest()));

      assert.deepStrictEqual(asPrefix, [{ address: 0xac100010, width: 28 }]);
      assert.deepStrictEqual(asRange, asPrefix);
      assert.deepStrictEqual(asAddresses, asPrefix);
    }),
  );

  it("treats an inner node below the last bit as a broken invariant", () => {
    const tree = makeTree();
    const root = makeInner();
    let node: InnerNode = root;
    for (let depth = 0; depth < 32; depth += 1) {
      const child = makeInner();
      node.children[0] = child;
      node = child;
    }
    tree.root = root;
    assert.throws(() => visitFullPrefixes(tree, () => {}), TrieInvariantError);
  });
});

// Small deterministic LCG so the property runs are reproducible.
const makeRandom = (seed: number) => {
  let state = seed >>> 0;
  return (): number => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state;
  };
};

const WINDOW = 1024;

describe("PrefixTrie cover properties", () => {
  for (const seed of [1, 7, 42, 1234]) {
    it.effect(`cover is exact and minimal (seed ${seed})`, () =>
      Effect.gen(function* () {
        const random = makeRandom(seed);
        const members = new Array<boolean>(WINDOW).fill(false);
        const mark = (start: number, end: number) => {
          for (let offset = start - TEN; offset <= end - TEN; offset += 1) {
            members[offset] = true;
          }
        };

        for (let op = 0; op < 40; op += 1) {
          const start = TEN + (random() % WINDOW);
          switch (random() % 3) {
            case 0:
              yield* insertAddress(start);
              mark(start, start);
              break;
            case 1: {
              const end = Math.min(start + (random() % 64), TEN + WINDOW - 1);
              yield* insertRange(start, end);
              mark(start, end);
              break;
            }
            default: {
              const width = 22 + (random() % 11);
              const base = normalizePrefix(start, width);
              yield* insertPrefix(base, width);
              mark(base, base + prefixSize(width) - 1);
              break;
            }
          }
        }

        const cover = yield* prefixes();
        const covered = new Array<number>(WINDOW).fill(0);
        const keys = new Set(cover.map((p) => `${p.address}/${p.width}`));
        let previousEnd = -1;

        for (const prefix of cover) {
          const size = prefixSize(prefix.width);
          assert.isAtLeast(prefix.address, TEN);
          assert.isAtMost(prefix.address + size, TEN + WINDOW);
          assert.isAbove(prefix.address, previousEnd);
          previousEnd = prefix.address + size - 1;

          for (let offset = 0; offset < size; offset += 1) {
            const index = prefix.address - TEN + offset;
            covered[index] = (covered[index] ?? 0) + 1;
          }

          const buddy = (prefix.address ^ size) >>> 0;
          assert.isFalse(
            keys.has(`${buddy}/${prefix.width}`),
            `buddy of ${prefix.address}/${prefix.width} is also present`,
          );
        }

        for (let offset = 0; offset < WINDOW; offset += 1) {
          assert.strictEqual(
            covered[offset],
            members[offset] ? 1 : 0,
            `address offset ${offset}`,
          );
        }
      }).pipe(Effect.provide(PrefixTrieTest())),
    );
  }
});
