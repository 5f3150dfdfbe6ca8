import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Stream from "effect/Stream";
import { aggregateStream } from "../aggregate/Aggregator";
import { formatDiagnostic } from "../input/Diagnostic";
import { AggregatorOutput } from "../output/AggregatorOutput";
import { renderPrefixes } from "../output/PrefixFormat";
import { getAggregatorConfig } from "./AggregatorConfig";

/** Error raised when standard input cannot be read. */
export class InputReadError extends Data.TaggedError("InputReadError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Process exit codes. */
export const ExitCode = {
  Ok: 0,
  /** Input could not be read or output could not be written. */
  IoFailure: 74,
  /** Internal invariant violated. */
  Internal: 70,
} as const;

/** Byte chunks from a readable stream (stdin by default). */
export const readableStream = (
  readable: NodeJS.ReadableStream = process.stdin,
): Stream.Stream<Uint8Array, InputReadError> => {
  const encoder = new TextEncoder();
  return Stream.fromAsyncIterable(
    readable,
    (cause) =>
      new InputReadError({
        message: "Failed to read standard input",
        cause,
      }),
  ).pipe(
    Stream.map((chunk) =>
      typeof chunk === "string" ? encoder.encode(chunk) : chunk,
    ),
  );
};

/**
 * Read the whole input, report diagnostics on stderr as they are found,
 * then print the minimal cover on stdout. Malformed input never changes
 * the exit code.
 */
export const runCidrAggregate = <E, R>(input: Stream.Stream<Uint8Array, E, R>) =>
  Effect.gen(function* () {
    const { programName } = yield* getAggregatorConfig();
    const output = yield* AggregatorOutput;

    const result = yield* aggregateStream(input, {
      onDiagnostic: (diagnostic) =>
        output.stderr(`${formatDiagnostic(programName, diagnostic)}\n`),
    });
    yield* output.stdout(renderPrefixes(result.prefixes));

    yield* Effect.logDebug("aggregation complete").pipe(
      Effect.annotateLogs({
        prefixes: result.prefixes.length,
        diagnostics: result.diagnostics.length,
      }),
    );
    return ExitCode.Ok;
  });
