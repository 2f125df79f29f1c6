import { createHash } from "node:crypto";
import { Context, Effect, HashMap, Layer, Option, Ref } from "effect";
import type { Configuration } from "../configuration/index.js";
import type { SeriesBundle } from "../time-series/types.js";
import type { ScenarioComparison } from "./types.js";

/**
 * Content address of a comparison: the validated configuration plus the full series
 * contents, so two runs share an entry only when every input is identical.
 */
export const scenarioCacheKey = (config: Configuration, series: SeriesBundle): string =>
  createHash("sha256")
    .update(JSON.stringify({ config, prices: series.prices, solar: series.solar ?? null }))
    .digest("hex");

export type CacheLookup = {
  readonly comparison: ScenarioComparison;
  readonly cached: boolean;
};

export class ScenarioCache extends Context.Tag("ScenarioCache")<
  ScenarioCache,
  {
    readonly getOrRun: <E>(
      key: string,
      run: Effect.Effect<ScenarioComparison, E>
    ) => Effect.Effect<CacheLookup, E>;
    readonly size: () => Effect.Effect<number>;
  }
>() {}

export const DEFAULT_CACHE_ENTRIES = 64;

type CacheState = {
  readonly entries: HashMap.HashMap<string, ScenarioComparison>;
  readonly insertionOrder: ReadonlyArray<string>; // oldest first
};

/**
 * Holds at most `maxEntries` comparisons; once full, the oldest entry is evicted.
 * `maxEntries` of 0 disables caching.
 */
export const ScenarioCacheLayer = (maxEntries: number = DEFAULT_CACHE_ENTRIES) =>
  Layer.effect(
    ScenarioCache,
    Effect.gen(function* () {
      const store = yield* Ref.make<CacheState>({ entries: HashMap.empty(), insertionOrder: [] });

      const insert = (key: string, comparison: ScenarioComparison) =>
        Ref.update(store, ({ entries, insertionOrder }): CacheState => {
          if (maxEntries <= 0 || HashMap.has(entries, key)) {
            return { entries, insertionOrder };
          }

          const evicted = insertionOrder.slice(0, Math.max(0, insertionOrder.length - maxEntries + 1));
          return {
            entries: HashMap.set(HashMap.removeMany(entries, evicted), key, comparison),
            insertionOrder: [...insertionOrder.slice(evicted.length), key],
          };
        });

      const getOrRun = <E>(key: string, run: Effect.Effect<ScenarioComparison, E>) =>
        Effect.gen(function* () {
          const hit = HashMap.get((yield* Ref.get(store)).entries, key);
          if (Option.isSome(hit)) {
            return { comparison: hit.value, cached: true };
          }

          const comparison = yield* run;
          yield* insert(key, comparison);

          return { comparison, cached: false };
        });

      return ScenarioCache.of({
        getOrRun,
        size: () => Ref.get(store).pipe(Effect.map(({ entries }) => HashMap.size(entries))),
      });
    })
  );
