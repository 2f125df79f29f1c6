import type { Configuration } from "../configuration/index.js";
import type { BatteryStateSnapshot } from "../simulation/battery-state.js";

export type DispatchContext = {
  readonly timestamp: Date;
  readonly price: number; // clamped
  readonly minuteOfDay: number; // market time
  readonly state: BatteryStateSnapshot;
  readonly config: Configuration;
};

export type DispatchAction = "charge" | "discharge" | "idle";

export type DispatchDecision = {
  readonly action: DispatchAction;
  // Whether PV output may be stored this interval. Ignored while discharging.
  readonly pvMayCharge: boolean;
};

/**
 * Chooses what the battery does in one interval. The engine applies power, energy
 * and efficiency limits to whatever is decided here.
 */
export type DispatchPolicy = {
  readonly decide: (context: DispatchContext) => DispatchDecision;
};
