import { Effect, Record } from "effect";
import { clampPrice, type MarketConfig, type TariffConfig } from "../configuration/index.js";
import { DataUnavailableError } from "../errors/data-unavailable.error.js";
import type { EnergyFlowRecord } from "../simulation/types.js";
import type { PricePoint } from "../time-series/types.js";
import { calendarYearOf, demandCharge, peakImportByMonth, proratedFixedCharge } from "./tariffs.js";
import type { IntervalFinancials, ScenarioEvaluation, ScenarioMetrics } from "./types.js";

const weightedPrice = (weightedSum: number, weight: number) => (weight > 0 ? weightedSum / weight : 0);

/**
 * Prices a simulation trace. Energy is settled at the clamped price scaled by the
 * network loss factor; volumetric charges apply per interval, while the demand and
 * fixed charges are computed once over the whole trace.
 */
export const evaluate = (
  flows: readonly EnergyFlowRecord[],
  prices: readonly PricePoint[],
  tariff: TariffConfig,
  market: MarketConfig,
): Effect.Effect<ScenarioEvaluation, DataUnavailableError> =>
  Effect.gen(function* () {
    const priceByTime = new Map(prices.map((point) => [point.timestamp.getTime(), point.price]));

    const intervals: IntervalFinancials[] = [];
    let priceSum = 0;
    let energyRevenue = 0;
    let energyCost = 0;
    let networkCost = 0;

    const totals = {
      charge: 0,
      discharge: 0,
      gridImport: 0,
      gridExport: 0,
      pvProduction: 0,
      pvToBattery: 0,
      pvToGrid: 0,
    };
    const weighted = { charge: 0, discharge: 0, pvProduction: 0, pvToGrid: 0 };

    for (const flow of flows) {
      const rawPrice = priceByTime.get(flow.timestamp.getTime());
      if (rawPrice === undefined) {
        return yield* Effect.fail(new DataUnavailableError({
          series: "price",
          timestamp: flow.timestamp,
          reason: "no price for simulated interval",
        }));
      }

      const price = clampPrice(market, rawPrice);
      const settlementPrice = price * tariff.networkLossFactor;

      const interval: IntervalFinancials = {
        timestamp: flow.timestamp,
        price,
        energyRevenue: flow.gridExportMwh * settlementPrice,
        energyCost: flow.gridImportMwh * settlementPrice,
        networkCost: flow.gridImportMwh * tariff.importRate + flow.gridExportMwh * tariff.exportRate,
      };
      intervals.push(interval);

      priceSum += price;
      energyRevenue += interval.energyRevenue;
      energyCost += interval.energyCost;
      networkCost += interval.networkCost;

      totals.charge += flow.batteryChargeMwh;
      totals.discharge += flow.batteryDischargeMwh;
      totals.gridImport += flow.gridImportMwh;
      totals.gridExport += flow.gridExportMwh;
      totals.pvProduction += flow.pvProductionMwh;
      totals.pvToBattery += flow.pvToBatteryMwh;
      totals.pvToGrid += flow.pvToGridMwh;

      weighted.charge += flow.batteryChargeMwh * price;
      weighted.discharge += flow.batteryDischargeMwh * price;
      weighted.pvProduction += flow.pvProductionMwh * price;
      weighted.pvToGrid += flow.pvToGridMwh * price;
    }

    const fixedCharge = proratedFixedCharge(flows, tariff, market);
    const demand = demandCharge(flows, tariff, market);
    const peakImportMw = Math.max(0, ...peakImportByMonth(flows, { ...tariff, demandWindow: undefined }, market).values());
    const bessImportWeightedPrice = weightedPrice(weighted.charge, totals.charge);
    const bessExportWeightedPrice = weightedPrice(weighted.discharge, totals.discharge);
    const grossProfit = energyRevenue - energyCost;
    const last = flows.at(-1);

    const metrics: ScenarioMetrics = {
      intervalCount: flows.length,
      simulatedDays: (flows.length * market.resolutionMinutes) / (24 * 60),
      totalChargeMwh: totals.charge,
      totalDischargeMwh: totals.discharge,
      totalGridImportMwh: totals.gridImport,
      totalGridExportMwh: totals.gridExport,
      totalPvProductionMwh: totals.pvProduction,
      totalPvToBatteryMwh: totals.pvToBattery,
      totalPvToGridMwh: totals.pvToGrid,
      roundTripEfficiency: totals.charge > 0 ? totals.discharge / totals.charge : 0,
      finalSoc: last ? last.soc : 0,
      peakImportMw,
      timeWeightedAveragePrice: flows.length > 0 ? priceSum / flows.length : 0,
      bessImportWeightedPrice,
      bessExportWeightedPrice,
      solarWeightedPrice: weightedPrice(weighted.pvProduction, totals.pvProduction),
      solarExportWeightedPrice: weightedPrice(weighted.pvToGrid, totals.pvToGrid),
      spreadCaptured: bessExportWeightedPrice - bessImportWeightedPrice,
      energyRevenue,
      energyCost,
      grossProfit,
      networkCost,
      fixedCharge,
      demandCharge: demand,
      netProfit: grossProfit - networkCost - fixedCharge - demand,
    };

    return { metrics, intervals };
  });

/**
 * Field-wise `minuend - subtrahend` over every metric.
 */
export const diffMetrics = (minuend: ScenarioMetrics, subtrahend: ScenarioMetrics): ScenarioMetrics =>
  Record.map(minuend, (value, key) => value - subtrahend[key]);

/**
 * Evaluates each calendar year (market time) of a trace on its own.
 */
export const summarizeByYear = (
  flows: readonly EnergyFlowRecord[],
  prices: readonly PricePoint[],
  tariff: TariffConfig,
  market: MarketConfig,
): Effect.Effect<ReadonlyArray<{ readonly year: number; readonly metrics: ScenarioMetrics }>, DataUnavailableError> => {
  const byYear = new Map<number, EnergyFlowRecord[]>();
  for (const flow of flows) {
    const year = calendarYearOf(flow.timestamp, market);
    const bucket = byYear.get(year);
    if (bucket) {
      bucket.push(flow);
    } else {
      byYear.set(year, [flow]);
    }
  }

  return Effect.forEach([...byYear.entries()], ([year, yearFlows]) =>
    evaluate(yearFlows, prices, tariff, market).pipe(
      Effect.map(({ metrics }) => ({ year, metrics }))
    )
  );
};
