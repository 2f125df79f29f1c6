import { Context, Effect, Schema } from "effect";
import type { DataUnavailableError } from "../errors/data-unavailable.error.js";
import type { MarketConfig } from "../configuration/index.js";

export const PricePointSchema = Schema.Struct({
  timestamp: Schema.Date,
  price: Schema.Number.pipe(Schema.finite()), // currency per MWh
});

export const SolarPointSchema = Schema.Struct({
  timestamp: Schema.Date,
  solarMw: Schema.Number.pipe(Schema.finite()),
});

export type PricePoint = typeof PricePointSchema.Type;
export type SolarPoint = typeof SolarPointSchema.Type;

export type SeriesBundle = {
  readonly prices: readonly PricePoint[];
  readonly solar?: readonly SolarPoint[];
};

// One step of the common time index, after gap checks.
export type AlignedInterval = {
  readonly timestamp: Date;
  readonly rawPrice: number;
  readonly solarMw: number | null;
};

export class TimeSeriesSource extends Context.Tag("TimeSeriesSource")<
  TimeSeriesSource,
  {
    readonly load: (market: MarketConfig) => Effect.Effect<SeriesBundle, DataUnavailableError>;
  }
>() {}

export type ITimeSeriesSource = Context.Tag.Service<typeof TimeSeriesSource>;
