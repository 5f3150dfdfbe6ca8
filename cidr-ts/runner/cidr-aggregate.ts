#!/usr/bin/env -S npx tsx
import * as Console from "effect/Console";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import { AggregatorMemoryLive } from "../aggregate/Aggregator";
import { AggregatorOutputLive } from "../output/AggregatorOutput";
import { AggregatorConfigLive } from "./AggregatorConfig";
import {
  ExitCode,
  readableStream,
  runCidrAggregate,
} from "./CidrAggregateMain";

const MainLayer = Layer.mergeAll(
  AggregatorMemoryLive,
  AggregatorOutputLive,
  AggregatorConfigLive({
    invokedAs: process.argv[1],
    argv: process.argv.slice(2),
  }),
);

const program = runCidrAggregate(readableStream(process.stdin)).pipe(
  Effect.provide(MainLayer),
  Effect.catchAll((error) =>
    Console.error(`${error._tag}: ${error.message}`).pipe(
      Effect.as(ExitCode.IoFailure),
    ),
  ),
);

Effect.runPromise(program).then(
  (code) => {
    process.exitCode = code;
  },
  (defect: unknown) => {
    console.error(defect);
    process.exitCode = ExitCode.Internal;
  },
);
