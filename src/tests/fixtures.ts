import { Effect } from "effect";
import { validateConfiguration, type Configuration, type ConfigurationInput } from "../configuration/index.js";
import type { EnergyFlowRecord } from "../simulation/types.js";
import type { PricePoint, SolarPoint } from "../time-series/types.js";

const HOUR_MS = 60 * 60 * 1000;

// 1 MW / 2 MWh, charges 00:00-03:00 and discharges 12:00-15:00 on hourly intervals.
export const baseConfigInput: ConfigurationInput = {
  battery: {
    powerMw: 1,
    energyMwh: 2,
    minSoc: 0.1,
    maxSoc: 1,
    chargeEfficiency: 0.95,
    dischargeEfficiency: 0.95,
    initialSoc: 0.1,
  },
  pv: {
    capacityMw: 2,
    efficiency: 1,
    exportEfficiency: 1,
    bidirectionalCharging: false,
  },
  market: {
    region: "NSW1",
    startDate: "2024-01-01",
    endDate: "2024-01-01",
    resolutionMinutes: 60,
  },
  windows: {
    charge: { start: "00:00", end: "03:00" },
    discharge: { start: "12:00", end: "15:00" },
  },
};

export const configure = (overrides: Partial<{ [K in keyof ConfigurationInput]: Record<string, unknown> }> = {}): Configuration =>
  Effect.runSync(validateConfiguration({
    battery: { ...baseConfigInput.battery, ...overrides.battery },
    pv: { ...baseConfigInput.pv, ...overrides.pv },
    market: { ...baseConfigInput.market, ...overrides.market },
    windows: { ...baseConfigInput.windows, ...overrides.windows },
    tariff: { ...baseConfigInput.tariff, ...overrides.tariff },
  }));

export const hourlyPrices = (startIso: string, hours: number, price: (hour: number) => number): PricePoint[] =>
  Array.from({ length: hours }, (_, hour) => ({
    timestamp: new Date(new Date(startIso).getTime() + hour * HOUR_MS),
    price: price(hour),
  }));

export const hourlySolar = (startIso: string, hours: number, solarMw: (hour: number) => number): SolarPoint[] =>
  Array.from({ length: hours }, (_, hour) => ({
    timestamp: new Date(new Date(startIso).getTime() + hour * HOUR_MS),
    solarMw: solarMw(hour),
  }));

export const idleFlow = (timestamp: Date, overrides: Partial<EnergyFlowRecord> = {}): EnergyFlowRecord => ({
  timestamp,
  price: 0,
  gridImportMwh: 0,
  gridExportMwh: 0,
  batteryChargeMwh: 0,
  batteryDischargeMwh: 0,
  pvProductionMwh: 0,
  pvToBatteryMwh: 0,
  pvToGridMwh: 0,
  gridToBatteryMwh: 0,
  soc: 0.5,
  ...overrides,
});
