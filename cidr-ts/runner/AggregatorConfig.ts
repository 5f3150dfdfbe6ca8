import * as Path from "node:path";
import * as Context from "effect/Context";
import * as Data from "effect/Data";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as Schema from "effect/Schema";

/** Schema for the aggregator's resolved configuration. */
export const AggregatorConfigSchema = Schema.Struct({
  programName: Schema.NonEmptyTrimmedString,
});

/** Raw configuration input shape before schema decoding. */
export type AggregatorConfigInput = Schema.Schema.Encoded<
  typeof AggregatorConfigSchema
>;

/** Decoded configuration shape used by services. */
export type AggregatorConfigData = Schema.Schema.Type<
  typeof AggregatorConfigSchema
>;

/** Default configuration values. */
export const AggregatorConfigDefaults: AggregatorConfigInput = {
  programName: "cidr-aggregate",
};

/** Error raised when configuration cannot be decoded. */
export class InvalidAggregatorConfigError extends Data.TaggedError(
  "InvalidAggregatorConfigError",
)<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/**
 * Inputs used to resolve the effective configuration. The program takes no
 * arguments and reads no environment; `argv` is accepted only so stray
 * arguments can be noted in the debug log.
 */
export interface AggregatorConfigResolveInput {
  /** Path the program was started from; its base name becomes `programName`. */
  readonly invokedAs?: string;
  readonly argv?: ReadonlyArray<string>;
  readonly configDefaults?: Partial<AggregatorConfigInput>;
}

/** Base name of the invoked script without its extension, if any. */
export const programNameFrom = (invokedAs: string): string | undefined => {
  const name = Path.basename(invokedAs, Path.extname(invokedAs));
  return name.length > 0 ? name : undefined;
};

/** Service contract exposing resolved configuration. */
export interface AggregatorConfigService {
  readonly config: AggregatorConfigData;
}

/** Context tag for configuration resolution. */
export class AggregatorConfig extends Context.Tag("AggregatorConfig")<
  AggregatorConfig,
  AggregatorConfigService
>() {}

const decodeAggregatorConfig = (input: AggregatorConfigInput) =>
  Schema.decode(AggregatorConfigSchema)(input).pipe(
    Effect.mapError(
      (cause) =>
        new InvalidAggregatorConfigError({
          message: "Invalid aggregator config",
          cause,
        }),
    ),
  );

const makeAggregatorConfig = ({
  invokedAs,
  argv = [],
  configDefaults = {},
}: AggregatorConfigResolveInput) =>
  Effect.gen(function* () {
    if (argv.length > 0) {
      yield* Effect.logDebug("ignoring command-line arguments").pipe(
        Effect.annotateLogs({ count: argv.length }),
      );
    }
    const invokedName =
      invokedAs === undefined ? undefined : programNameFrom(invokedAs);
    const config = yield* decodeAggregatorConfig({
      ...AggregatorConfigDefaults,
      ...(invokedName === undefined ? {} : { programName: invokedName }),
      ...configDefaults,
    } satisfies AggregatorConfigInput);
    return { config } satisfies AggregatorConfigService;
  });

/** Live configuration layer. */
export const AggregatorConfigLive = (
  input: AggregatorConfigResolveInput = {},
): Layer.Layer<AggregatorConfig, InvalidAggregatorConfigError> =>
  Layer.effect(AggregatorConfig, makeAggregatorConfig(input));

/** Read the resolved configuration. */
export const getAggregatorConfig = () =>
  Effect.gen(function* () {
    const service = yield* AggregatorConfig;
    return service.config;
  });
