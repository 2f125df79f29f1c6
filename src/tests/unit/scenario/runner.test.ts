import { describe, it, vitest, beforeEach, expect } from "@effect/vitest";
import type { MockedObject } from "@effect/vitest";
import { Effect, Either, Layer } from "effect";
import type { IRunLogger } from "../../../event-logger/types.js";
import { ScenarioRunner, ScenarioRunnerLayer } from "../../../scenario/runner.js";
import { ScenarioCacheLayer } from "../../../scenario/cache.js";
import { InMemoryTimeSeriesSourceLayer } from "../../../time-series/in-memory.source.js";
import type { SeriesBundle } from "../../../time-series/types.js";
import { baseConfigInput, hourlyPrices, hourlySolar } from "../../fixtures.js";

const DAY_START = "2024-01-01T00:00:00Z";

const bundle: SeriesBundle = {
  prices: hourlyPrices(DAY_START, 24, () => 50),
  solar: hourlySolar(DAY_START, 24, (hour) => (hour >= 8 && hour < 16 ? 1 : 0)),
};

const invalidConfig = {
  ...baseConfigInput,
  battery: { ...baseConfigInput.battery, powerMw: -1 },
};

describe("ScenarioRunner", () => {
  const runLoggerMock: MockedObject<IRunLogger> = {
    onRunStarted: vitest.fn(),
    onRunCompleted: vitest.fn(),
    onRunFailed: vitest.fn(),
  };

  const runnerLayer = ScenarioRunnerLayer(runLoggerMock).pipe(
    Layer.provide(Layer.mergeAll(ScenarioCacheLayer(), InMemoryTimeSeriesSourceLayer(bundle)))
  );

  beforeEach(() => {
    vitest.clearAllMocks();
    runLoggerMock.onRunStarted.mockReturnValue(Effect.void);
    runLoggerMock.onRunCompleted.mockReturnValue(Effect.void);
    runLoggerMock.onRunFailed.mockReturnValue(Effect.void);
  });

  it.effect("should load series from the source when the request carries none", () =>
    Effect.gen(function* () {
      const runner = yield* ScenarioRunner;

      const comparison = yield* runner.compare({ label: "site-a", config: baseConfigInput });

      expect(comparison.hybrid.metrics.totalPvProductionMwh).toBe(8);
      expect(comparison.batteryOnly.metrics.totalPvProductionMwh).toBe(0);
      expect(runLoggerMock.onRunStarted).toHaveBeenCalledWith("site-a", 24);
      expect(runLoggerMock.onRunCompleted).toHaveBeenCalledWith("site-a", comparison, false);
    }).pipe(Effect.provide(runnerLayer))
  );

  it.effect("should serve a repeated comparison from the cache", () =>
    Effect.gen(function* () {
      const runner = yield* ScenarioRunner;

      const first = yield* runner.compare({ label: "first", config: baseConfigInput });
      const second = yield* runner.compare({ label: "second", config: baseConfigInput, series: bundle });

      expect(second).toBe(first);
      expect(runLoggerMock.onRunCompleted).toHaveBeenNthCalledWith(1, "first", first, false);
      expect(runLoggerMock.onRunCompleted).toHaveBeenNthCalledWith(2, "second", first, true);
    }).pipe(Effect.provide(runnerLayer))
  );

  it.effect("should miss the cache when the configuration differs", () =>
    Effect.gen(function* () {
      const runner = yield* ScenarioRunner;
      const larger = { ...baseConfigInput, battery: { ...baseConfigInput.battery, energyMwh: 4 } };

      const first = yield* runner.compare({ label: "small", config: baseConfigInput });
      const second = yield* runner.compare({ label: "large", config: larger });

      expect(second).not.toBe(first);
      expect(runLoggerMock.onRunCompleted).toHaveBeenNthCalledWith(2, "large", second, false);
    }).pipe(Effect.provide(runnerLayer))
  );

  it.effect("should fail with ConfigurationError before running anything", () =>
    Effect.gen(function* () {
      const runner = yield* ScenarioRunner;

      const error = yield* Effect.flip(runner.compare({ label: "broken", config: invalidConfig }));

      expect(error._tag).toBe("ConfigurationError");
      expect(runLoggerMock.onRunStarted).not.toHaveBeenCalled();
      expect(runLoggerMock.onRunFailed).toHaveBeenCalledWith("broken", error);
    }).pipe(Effect.provide(runnerLayer))
  );

  it.effect("should fail with DataUnavailableError when no solar series is available", () =>
    Effect.gen(function* () {
      const runner = yield* ScenarioRunner;

      const error = yield* Effect.flip(runner.compare({
        label: "no-solar",
        config: baseConfigInput,
        series: { prices: bundle.prices },
      }));

      expect(error._tag).toBe("DataUnavailable");
      expect(error.message).toBe(
        "solar series: no solar series supplied for the hybrid scenario at 2024-01-01T00:00:00.000Z"
      );
    }).pipe(Effect.provide(runnerLayer))
  );

  it.effect("should keep running a batch past failures and preserve input order", () =>
    Effect.gen(function* () {
      const runner = yield* ScenarioRunner;

      const outcomes = yield* runner.runBatch(
        [
          { label: "one", config: baseConfigInput },
          { label: "two", config: invalidConfig },
          { label: "three", config: { ...baseConfigInput, battery: { ...baseConfigInput.battery, powerMw: 2 } } },
        ],
        { concurrency: 2 }
      );

      expect(outcomes.map(({ label }) => label)).toEqual(["one", "two", "three"]);
      expect(outcomes.map(({ result }) => Either.isRight(result))).toEqual([true, false, true]);
      expect(runLoggerMock.onRunFailed).toHaveBeenCalledTimes(1);
    }).pipe(Effect.provide(runnerLayer))
  );
});
