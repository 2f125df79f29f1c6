import { Context, Effect, Either, Layer } from "effect";
import { expectedIntervalCount, marketRange, validateConfiguration } from "../configuration/index.js";
import type { ConfigurationError } from "../errors/configuration.error.js";
import type { ComputationInvariantError } from "../errors/computation-invariant.error.js";
import { DataUnavailableError } from "../errors/data-unavailable.error.js";
import { RunLogger } from "../event-logger/index.js";
import type { IRunLogger } from "../event-logger/types.js";
import { TimeSeriesSource } from "../time-series/types.js";
import { ScenarioCache, scenarioCacheKey } from "./cache.js";
import { compare } from "./comparator.js";
import type { ScenarioComparison, ScenarioRequest } from "./types.js";

export type ScenarioError = ConfigurationError | DataUnavailableError | ComputationInvariantError;

export type BatchOutcome = {
  readonly label: string;
  readonly result: Either.Either<ScenarioComparison, ScenarioError>;
};

export class ScenarioRunner extends Context.Tag("ScenarioRunner")<
  ScenarioRunner,
  {
    readonly compare: (request: ScenarioRequest) => Effect.Effect<ScenarioComparison, ScenarioError>;
    // Independent scenarios; one failure does not stop the others. Results keep input order.
    readonly runBatch: (
      requests: readonly ScenarioRequest[],
      options?: { readonly concurrency?: number }
    ) => Effect.Effect<readonly BatchOutcome[]>;
  }
>() {}

export const ScenarioRunnerLayer = (
  runLogger: IRunLogger = new RunLogger(),
): Layer.Layer<ScenarioRunner, never, ScenarioCache | TimeSeriesSource> =>
  Layer.effect(
    ScenarioRunner,
    Effect.gen(function* () {
      const cache = yield* ScenarioCache;
      const source = yield* TimeSeriesSource;

      const compareRequest = (request: ScenarioRequest) =>
        Effect.gen(function* () {
          const config = yield* validateConfiguration(request.config);
          const series = request.series ?? (yield* source.load(config.market));

          const solar = series.solar;
          if (solar === undefined) {
            return yield* Effect.fail(new DataUnavailableError({
              series: "solar",
              timestamp: new Date(marketRange(config.market).startMs),
              reason: "no solar series supplied for the hybrid scenario",
            }));
          }

          yield* runLogger.onRunStarted(request.label, expectedIntervalCount(config.market));

          const { comparison, cached } = yield* cache.getOrRun(
            scenarioCacheKey(config, series),
            compare(config, series.prices, solar),
          );

          yield* runLogger.onRunCompleted(request.label, comparison, cached);

          return comparison;
        }).pipe(
          Effect.tapError((error) => runLogger.onRunFailed(request.label, error)),
          Effect.annotateLogs("scenario", request.label),
        );

      const runBatch = (
        requests: readonly ScenarioRequest[],
        options?: { readonly concurrency?: number }
      ) =>
        Effect.forEach(
          requests,
          (request) =>
            compareRequest(request).pipe(
              Effect.either,
              Effect.map((result): BatchOutcome => ({ label: request.label, result }))
            ),
          { concurrency: options?.concurrency ?? 1 }
        );

      return ScenarioRunner.of({
        compare: compareRequest,
        runBatch,
      });
    })
  );
