import * as Context from "effect/Context";
import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";

/** Error raised when stdout or stderr rejects a write. */
export class OutputWriteError extends Data.TaggedError("OutputWriteError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Sink for the two output streams. Text is written verbatim. */
export interface AggregatorOutputService {
  readonly stdout: (text: string) => Effect.Effect<void, OutputWriteError>;
  readonly stderr: (text: string) => Effect.Effect<void, OutputWriteError>;
}

/** Context tag for process output. */
export class AggregatorOutput extends Context.Tag("AggregatorOutput")<
  AggregatorOutput,
  AggregatorOutputService
>() {}

const writeTo = (
  stream: NodeJS.WritableStream,
  name: "stdout" | "stderr",
  text: string,
): Effect.Effect<void, OutputWriteError> =>
  text.length === 0
    ? Effect.void
    : Effect.async<void, OutputWriteError>((resume) => {
        stream.write(text, (error) => {
          resume(
            error
              ? Effect.fail(
                  new OutputWriteError({
                    message: `Failed to write to ${name}`,
                    cause: error,
                  }),
                )
              : Effect.void,
          );
        });
      });

/** Process stdout/stderr. */
export const AggregatorOutputLive: Layer.Layer<AggregatorOutput> =
  Layer.succeed(AggregatorOutput, {
    stdout: (text) => writeTo(process.stdout, "stdout", text),
    stderr: (text) => writeTo(process.stderr, "stderr", text),
  } satisfies AggregatorOutputService);

/** In-memory output capture for tests. */
export interface CapturedOutput {
  readonly service: AggregatorOutputService;
  readonly stdout: () => string;
  readonly stderr: () => string;
}

/** Build an output sink that records everything written to it. */
export const makeCapturedOutput = (): CapturedOutput => {
  const out: Array<string> = [];
  const err: Array<string> = [];
  return {
    service: {
      stdout: (text) =>
        Effect.sync(() => {
          out.push(text);
        }),
      stderr: (text) =>
        Effect.sync(() => {
          err.push(text);
        }),
    },
    stdout: () => out.join(""),
    stderr: () => err.join(""),
  };
};
