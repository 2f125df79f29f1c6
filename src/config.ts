import { Config as EffectConfig } from "effect";
import { DEFAULT_CACHE_ENTRIES } from "./scenario/cache.js";


export const AppConfig = {
  scenario: {
    configFiles: EffectConfig.array(EffectConfig.string(), "SCENARIO_CONFIG_FILES"),
    seriesFile: EffectConfig.string("SERIES_FILE"),
    batchConcurrency: EffectConfig.integer("BATCH_CONCURRENCY").pipe(
      EffectConfig.withDefault(4)
    ),
    cacheEntries: EffectConfig.integer("SCENARIO_CACHE_ENTRIES").pipe(
      EffectConfig.withDefault(DEFAULT_CACHE_ENTRIES)
    ),
  },

  sentry: {
    dsn: EffectConfig.option(EffectConfig.string("SENTRY_DSN")),
  },
};
