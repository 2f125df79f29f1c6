import type { DispatchWindowConfig, PvConfig } from "../configuration/index.js";
import { isInWindow } from "../configuration/time-of-day.js";
import type { DispatchContext, DispatchDecision, DispatchPolicy } from "./types.js";

export class TimeWindowDispatchPolicy implements DispatchPolicy {
  public constructor(
    private readonly windows: DispatchWindowConfig,
    private readonly pv: PvConfig,
  ) { }

  public decide(context: DispatchContext): DispatchDecision {
    if (isInWindow(context.minuteOfDay, this.windows.charge)) {
      return { action: "charge", pvMayCharge: true };
    }

    if (isInWindow(context.minuteOfDay, this.windows.discharge)) {
      return { action: "discharge", pvMayCharge: false };
    }

    return { action: "idle", pvMayCharge: this.pv.bidirectionalCharging };
  }
}
