import type { IntervalFinancials, ScenarioMetrics } from "../finance/types.js";
import type { EnergyFlowRecord } from "../simulation/types.js";
import type { SeriesBundle } from "../time-series/types.js";

export type ScenarioResult = {
  readonly metrics: ScenarioMetrics;
  readonly flows: readonly EnergyFlowRecord[];
  readonly intervals: readonly IntervalFinancials[];
};

export type ScenarioComparison = {
  readonly batteryOnly: ScenarioResult;
  readonly hybrid: ScenarioResult;
  readonly delta: ScenarioMetrics; // hybrid - batteryOnly
};

export type ScenarioRequest = {
  readonly label: string;
  readonly config: unknown; // validated before anything runs
  readonly series?: SeriesBundle; // loaded from the TimeSeriesSource when absent
};
