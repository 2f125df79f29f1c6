import type { MarketConfig, TariffConfig } from "../configuration/index.js";
import { isInWindow, minuteOfDay } from "../configuration/time-of-day.js";
import type { EnergyFlowRecord } from "../simulation/types.js";

const MS_PER_MINUTE = 60_000;

const toMarketTime = (timestamp: Date, market: MarketConfig) =>
  new Date(timestamp.getTime() + market.utcOffsetMinutes * MS_PER_MINUTE);

export const billingMonthOf = (timestamp: Date, market: MarketConfig): string =>
  toMarketTime(timestamp, market).toISOString().slice(0, 7);

export const calendarYearOf = (timestamp: Date, market: MarketConfig): number =>
  toMarketTime(timestamp, market).getUTCFullYear();

export const daysInYear = (year: number): number =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0 ? 366 : 365;

/**
 * Highest import MW seen in each billing month. Only intervals inside the demand
 * window count when one is configured.
 */
export const peakImportByMonth = (
  flows: readonly EnergyFlowRecord[],
  tariff: TariffConfig,
  market: MarketConfig,
): ReadonlyMap<string, number> => {
  const hours = market.resolutionMinutes / 60;
  const peaks = new Map<string, number>();

  for (const flow of flows) {
    const month = billingMonthOf(flow.timestamp, market);
    const counted = tariff.demandWindow === undefined
      || isInWindow(minuteOfDay(flow.timestamp, market.utcOffsetMinutes), tariff.demandWindow);
    const importMw = counted ? flow.gridImportMwh / hours : 0;

    peaks.set(month, Math.max(peaks.get(month) ?? 0, importMw));
  }

  return peaks;
};

export const demandCharge = (
  flows: readonly EnergyFlowRecord[],
  tariff: TariffConfig,
  market: MarketConfig,
): number => {
  let total = 0;
  for (const peakMw of peakImportByMonth(flows, tariff, market).values()) {
    total += peakMw * tariff.demandChargeRate;
  }
  return total;
};

export const proratedFixedCharge = (
  flows: readonly EnergyFlowRecord[],
  tariff: TariffConfig,
  market: MarketConfig,
): number => {
  const first = flows[0];
  if (first === undefined) {
    return 0;
  }

  const simulatedDays = (flows.length * market.resolutionMinutes) / (24 * 60);

  if (tariff.fixedChargeCadence === "daily") {
    return tariff.fixedCharge * simulatedDays;
  }

  return tariff.fixedCharge * (simulatedDays / daysInYear(calendarYearOf(first.timestamp, market)));
};
