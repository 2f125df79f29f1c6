import { Effect, Layer, Schema } from "effect";
import { FileSystem } from "@effect/platform";
import { marketRange, type MarketConfig } from "../configuration/index.js";
import { DataUnavailableError } from "../errors/data-unavailable.error.js";
import { PricePointSchema, SolarPointSchema, TimeSeriesSource } from "./types.js";

// { "prices": [{ "timestamp": ISO-8601, "price": number }], "solar"?: [{ "timestamp", "solarMw" }] }
export const SeriesFileSchema = Schema.Struct({
  prices: Schema.Array(PricePointSchema),
  solar: Schema.optional(Schema.Array(SolarPointSchema)),
});

const SeriesFileJson = Schema.parseJson(SeriesFileSchema);

export const JsonFileTimeSeriesSourceLayer = (
  path: string
): Layer.Layer<TimeSeriesSource, never, FileSystem.FileSystem> =>
  Layer.effect(
    TimeSeriesSource,
    Effect.gen(function* () {
      const fileSystem = yield* FileSystem.FileSystem;

      const load = (market: MarketConfig) =>
        Effect.gen(function* () {
          const content = yield* fileSystem.readFileString(path);
          const decoded = yield* Schema.decodeUnknown(SeriesFileJson)(content);

          yield* Effect.logDebug(`Loaded series file ${path}`, {
            prices: decoded.prices.length,
            solar: decoded.solar?.length ?? 0,
          });

          return decoded;
        }).pipe(
          Effect.catchAll((error) =>
            Effect.fail(new DataUnavailableError({
              series: "price",
              timestamp: new Date(marketRange(market).startMs),
              reason: `could not read ${path}: ${error.message}`,
            }))
          )
        );

      return TimeSeriesSource.of({ load });
    })
  );
