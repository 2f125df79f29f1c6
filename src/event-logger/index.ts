import type { IRunLogger } from "./types.js";
import type { ScenarioComparison } from "../scenario/types.js";
import { Effect } from "effect";

const round = (value: number, digits = 2) => Number(value.toFixed(digits));

export class RunLogger implements IRunLogger {

  public onRunStarted(label: string, intervalCount: number) {
    return Effect.logInfo(`Comparing scenarios for ${label}`, { intervals: intervalCount });
  }

  public onRunCompleted(label: string, comparison: ScenarioComparison, cached: boolean) {
    return Effect.logInfo(`Scenarios compared for ${label}${cached ? " (cached)" : ""}`, {
      batteryOnlyNetProfit: round(comparison.batteryOnly.metrics.netProfit),
      hybridNetProfit: round(comparison.hybrid.metrics.netProfit),
      netProfitDelta: round(comparison.delta.netProfit),
      roundTripEfficiency: round(comparison.batteryOnly.metrics.roundTripEfficiency, 4),
    });
  }

  public onRunFailed(label: string, error: { readonly _tag: string; readonly message: string }) {
    return Effect.logWarning(`Scenario comparison failed for ${label}: ${error.message}`, { error: error._tag });
  }
}
