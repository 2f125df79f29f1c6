import { Effect } from "effect";
import type { Configuration } from "../configuration/index.js";
import type { ComputationInvariantError } from "../errors/computation-invariant.error.js";
import type { DataUnavailableError } from "../errors/data-unavailable.error.js";
import { diffMetrics, evaluate } from "../finance/evaluator.js";
import { simulate } from "../simulation/engine.js";
import type { PricePoint, SolarPoint } from "../time-series/types.js";
import type { ScenarioComparison, ScenarioResult } from "./types.js";

type RunError = DataUnavailableError | ComputationInvariantError;

export const runScenario = (
  config: Configuration,
  prices: readonly PricePoint[],
  solar?: readonly SolarPoint[],
): Effect.Effect<ScenarioResult, RunError> =>
  Effect.gen(function* () {
    const flows = yield* simulate(config, prices, solar);
    const { metrics, intervals } = yield* evaluate(flows, prices, config.tariff, config.market);

    return { metrics, flows, intervals };
  });

/**
 * Runs the battery-only and hybrid scenarios over the same window. The two runs share
 * nothing mutable and execute concurrently.
 */
export const compare = (
  config: Configuration,
  prices: readonly PricePoint[],
  solar: readonly SolarPoint[],
): Effect.Effect<ScenarioComparison, RunError> =>
  Effect.all(
    {
      batteryOnly: runScenario(config, prices).pipe(Effect.withSpan("scenario.batteryOnly")),
      hybrid: runScenario(config, prices, solar).pipe(Effect.withSpan("scenario.hybrid")),
    },
    { concurrency: 2 }
  ).pipe(
    Effect.map(({ batteryOnly, hybrid }) => ({
      batteryOnly,
      hybrid,
      delta: diffMetrics(hybrid.metrics, batteryOnly.metrics),
    })),
    Effect.withSpan("scenario.compare", {
      attributes: { region: config.market.region, startDate: config.market.startDate, endDate: config.market.endDate },
    })
  );
