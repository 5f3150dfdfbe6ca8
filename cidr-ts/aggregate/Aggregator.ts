import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as Stream from "effect/Stream";
import type { InputDiagnostic } from "../input/Diagnostic";
import {
  finishInput,
  initialInputState,
  scanChunk,
  type InputEvent,
} from "../input/InputMachine";
import type { CidrPrefix } from "../trie/Node";
import {
  PrefixTrie,
  PrefixTrieLive,
  type PrefixTrieService,
} from "../trie/PrefixTrie";

/** Minimal cover plus every diagnostic raised while reading. */
export interface AggregateResult {
  readonly prefixes: ReadonlyArray<CidrPrefix>;
  readonly diagnostics: ReadonlyArray<InputDiagnostic>;
}

/** Streaming aggregation service: bytes in, minimal prefixes out. */
export interface AggregatorService {
  /** Feed a chunk; returns the diagnostics it produced. */
  readonly ingest: (
    chunk: Uint8Array,
  ) => Effect.Effect<ReadonlyArray<InputDiagnostic>>;
  /** Apply end of input and read the minimal cover. */
  readonly finish: () => Effect.Effect<AggregateResult>;
}

/** Context tag for the aggregator. */
export class Aggregator extends Context.Tag("Aggregator")<
  Aggregator,
  AggregatorService
>() {}

// Units reaching the trie come from the machine, so their addresses and
// widths are always in range; only a reversed range is a user error here.
const applyEvent = (
  trie: PrefixTrieService,
  event: InputEvent,
): Effect.Effect<InputDiagnostic | undefined> => {
  switch (event._tag) {
    case "Diagnostic":
      return Effect.succeed(event.diagnostic);
    case "Address":
      return trie
        .insertAddress(event.address)
        .pipe(Effect.orDie, Effect.as(undefined));
    case "Prefix":
      return trie
        .insertPrefix(event.address, event.width)
        .pipe(Effect.orDie, Effect.as(undefined));
    case "Range":
      return trie.insertRange(event.start, event.end).pipe(
        Effect.as(undefined),
        Effect.catchTag("ReversedRangeError", (error) =>
          Effect.succeed({
            _tag: "ReversedRange",
            start: error.start,
            end: error.end,
            line: event.line,
          } satisfies InputDiagnostic),
        ),
        Effect.orDie,
      );
  }
};

const makeAggregator = Effect.gen(function* () {
  const trie = yield* PrefixTrie;
  let state = initialInputState;
  let units = 0;

  const apply = (events: ReadonlyArray<InputEvent>) =>
    Effect.gen(function* () {
      const diagnostics: Array<InputDiagnostic> = [];
      for (const event of events) {
        if (event._tag !== "Diagnostic") {
          units += 1;
        }
        const diagnostic = yield* applyEvent(trie, event);
        if (diagnostic !== undefined) {
          diagnostics.push(diagnostic);
        }
      }
      return diagnostics;
    });

  const ingest = (chunk: Uint8Array) =>
    Effect.gen(function* () {
      const step = scanChunk(state, chunk);
      state = step.state;
      return yield* apply(step.events);
    });

  const finish = () =>
    Effect.gen(function* () {
      const step = finishInput(state);
      state = step.state;
      const diagnostics = yield* apply(step.events);
      const prefixes = yield* trie.prefixes();
      const { innerNodes } = yield* trie.stats();
      yield* Effect.logDebug("input aggregated").pipe(
        Effect.annotateLogs({
          units,
          lines: state.line,
          prefixes: prefixes.length,
          innerNodes,
        }),
      );
      return { prefixes, diagnostics } satisfies AggregateResult;
    });

  return { ingest, finish } satisfies AggregatorService;
});

/** Aggregator layer over an existing trie. */
export const AggregatorLive: Layer.Layer<Aggregator, never, PrefixTrie> =
  Layer.effect(Aggregator, makeAggregator);

/** Aggregator with its own scoped in-memory trie. */
export const AggregatorMemoryLive: Layer.Layer<Aggregator> =
  AggregatorLive.pipe(Layer.provide(PrefixTrieLive));

/** Options for {@link aggregateStream}. */
export interface AggregateStreamOptions<E, R> {
  /** Called for each diagnostic as soon as it is produced. */
  readonly onDiagnostic?: (
    diagnostic: InputDiagnostic,
  ) => Effect.Effect<void, E, R>;
}

/** Run a whole byte stream through the aggregator. */
export const aggregateStream = <E, R, E2 = never, R2 = never>(
  chunks: Stream.Stream<Uint8Array, E, R>,
  options: AggregateStreamOptions<E2, R2> = {},
) =>
  Effect.gen(function* () {
    const aggregator = yield* Aggregator;
    const diagnostics: Array<InputDiagnostic> = [];
    const record = (found: ReadonlyArray<InputDiagnostic>) =>
      Effect.forEach(
        found,
        (diagnostic) => {
          diagnostics.push(diagnostic);
          return options.onDiagnostic
            ? options.onDiagnostic(diagnostic)
            : Effect.void;
        },
        { discard: true },
      );

    yield* Stream.runForEach(chunks, (chunk) =>
      aggregator.ingest(chunk).pipe(Effect.flatMap(record)),
    );
    const result = yield* aggregator.finish();
    yield* record(result.diagnostics);

    return {
      prefixes: result.prefixes,
      diagnostics,
    } satisfies AggregateResult;
  });

/** Aggregate an in-memory text input. */
export const aggregateText = (text: string) =>
  aggregateStream(Stream.make(new TextEncoder().encode(text)));
