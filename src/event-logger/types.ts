import type { Effect } from "effect";
import type { ScenarioComparison } from "../scenario/types.js";

export type IRunLogger = {
  onRunStarted: (label: string, intervalCount: number) => Effect.Effect<void>;
  onRunCompleted: (label: string, comparison: ScenarioComparison, cached: boolean) => Effect.Effect<void>;
  onRunFailed: (label: string, error: { readonly _tag: string; readonly message: string }) => Effect.Effect<void>;
};
