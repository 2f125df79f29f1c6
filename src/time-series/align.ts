import { Effect } from "effect";
import { DataUnavailableError, type SeriesName } from "../errors/data-unavailable.error.js";
import { marketRange, resolutionMs, type MarketConfig } from "../configuration/index.js";
import type { AlignedInterval, PricePoint, SolarPoint } from "./types.js";

const indexSeries = <P extends { readonly timestamp: Date }>(
  series: SeriesName,
  points: readonly P[],
  market: MarketConfig
): Effect.Effect<Map<number, P>, DataUnavailableError> =>
  Effect.gen(function* () {
    const { startMs, endMs } = marketRange(market);
    const stepMs = resolutionMs(market);
    const indexed = new Map<number, P>();

    for (const point of points) {
      const ms = point.timestamp.getTime();

      if (ms < startMs || ms >= endMs) {
        continue;
      }
      if ((ms - startMs) % stepMs !== 0) {
        return yield* Effect.fail(new DataUnavailableError({
          series,
          timestamp: point.timestamp,
          reason: `timestamp is not on the ${market.resolutionMinutes}-minute grid`,
        }));
      }
      if (indexed.has(ms)) {
        return yield* Effect.fail(new DataUnavailableError({
          series,
          timestamp: point.timestamp,
          reason: "duplicate timestamp",
        }));
      }
      indexed.set(ms, point);
    }

    return indexed;
  });

/**
 * Lays the price series (and the solar series, when given) onto the evenly spaced index
 * implied by the market's date range and resolution. Points outside the range are
 * ignored; any missing or non-finite step fails the whole alignment.
 */
export const alignSeries = (
  market: MarketConfig,
  prices: readonly PricePoint[],
  solar?: readonly SolarPoint[]
): Effect.Effect<readonly AlignedInterval[], DataUnavailableError> =>
  Effect.gen(function* () {
    const { startMs, endMs } = marketRange(market);
    const stepMs = resolutionMs(market);

    const priceIndex = yield* indexSeries("price", prices, market);
    const solarIndex = solar ? yield* indexSeries("solar", solar, market) : null;

    const intervals: AlignedInterval[] = [];

    for (let ms = startMs; ms < endMs; ms += stepMs) {
      const timestamp = new Date(ms);
      const pricePoint = priceIndex.get(ms);

      if (pricePoint === undefined || !Number.isFinite(pricePoint.price)) {
        return yield* Effect.fail(new DataUnavailableError({ series: "price", timestamp, reason: "missing value" }));
      }

      let solarMw: number | null = null;
      if (solarIndex) {
        const solarPoint = solarIndex.get(ms);
        if (solarPoint === undefined || !Number.isFinite(solarPoint.solarMw)) {
          return yield* Effect.fail(new DataUnavailableError({ series: "solar", timestamp, reason: "missing value" }));
        }
        solarMw = solarPoint.solarMw;
      }

      intervals.push({ timestamp, rawPrice: pricePoint.price, solarMw });
    }

    return intervals;
  });
