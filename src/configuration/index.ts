import { Effect, ParseResult, Schema } from "effect";
import { ConfigurationError } from "../errors/configuration.error.js";
import { ConfigurationSchema, type BatteryConfig, type Configuration, type MarketConfig } from "./schema.js";

export * from "./schema.js";

const MS_PER_MINUTE = 60_000;
const MS_PER_DAY = 24 * 60 * MS_PER_MINUTE;

/**
 * Decodes raw input into an immutable Configuration. Fails with the first violated
 * field constraint; time-series data is never consulted.
 */
export const validateConfiguration = (
  input: unknown
): Effect.Effect<Configuration, ConfigurationError> =>
  Schema.decodeUnknown(ConfigurationSchema)(input, { errors: "first" }).pipe(
    Effect.mapError((error) => {
      const [issue] = ParseResult.ArrayFormatter.formatErrorSync(error);

      return new ConfigurationError({
        field: issue ? issue.path.map(String).join(".") : "",
        message: issue ? issue.message : error.message,
      });
    })
  );

export const intervalHours = (config: Configuration): number =>
  config.market.resolutionMinutes / 60;

export const usableEnergyMwh = (battery: BatteryConfig): number =>
  (battery.maxSoc - battery.minSoc) * battery.energyMwh;

// Grid-side energy the inverter can move in one interval.
export const maxChargeEnergyPerIntervalMwh = (config: Configuration): number =>
  config.battery.powerMw * intervalHours(config);

export const maxDischargeEnergyPerIntervalMwh = (config: Configuration): number =>
  config.battery.powerMw * intervalHours(config);

export const dateToUtcMs = (calendarDate: string): number =>
  new Date(`${calendarDate}T00:00:00Z`).getTime();

/**
 * Half-open [startMs, endMs) covering every calendar day of the market range,
 * with day boundaries at market midnight.
 */
export const marketRange = (market: MarketConfig): { readonly startMs: number; readonly endMs: number } => {
  const offsetMs = market.utcOffsetMinutes * MS_PER_MINUTE;

  return {
    startMs: dateToUtcMs(market.startDate) - offsetMs,
    endMs: dateToUtcMs(market.endDate) + MS_PER_DAY - offsetMs,
  };
};

export const resolutionMs = (market: MarketConfig): number =>
  market.resolutionMinutes * MS_PER_MINUTE;

export const expectedIntervalCount = (market: MarketConfig): number => {
  const { startMs, endMs } = marketRange(market);
  return (endMs - startMs) / resolutionMs(market);
};

export const clampPrice = (market: MarketConfig, price: number): number =>
  Math.min(market.priceCeiling, Math.max(market.priceFloor, price));
