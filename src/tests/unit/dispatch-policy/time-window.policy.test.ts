import { describe, it, expect } from "@effect/vitest";
import { TimeWindowDispatchPolicy } from "../../../dispatch-policy/time-window.policy.js";
import type { DispatchContext } from "../../../dispatch-policy/types.js";
import { configure } from "../../fixtures.js";

const contextAt = (minute: number, bidirectionalCharging: boolean): DispatchContext => {
  const config = configure({ pv: { bidirectionalCharging } });
  return {
    timestamp: new Date("2024-01-01T00:00:00Z"),
    price: 50,
    minuteOfDay: minute,
    state: { soc: 0.5, chargedMwh: 0, dischargedMwh: 0 },
    config,
  };
};

describe("TimeWindowDispatchPolicy", () => {
  it("should charge inside the charge window with PV allowed", () => {
    const context = contextAt(60, false);
    const policy = new TimeWindowDispatchPolicy(context.config.windows, context.config.pv);

    expect(policy.decide(context)).toEqual({ action: "charge", pvMayCharge: true });
  });

  it("should discharge inside the discharge window without storing PV", () => {
    const context = contextAt(12 * 60, true);
    const policy = new TimeWindowDispatchPolicy(context.config.windows, context.config.pv);

    expect(policy.decide(context)).toEqual({ action: "discharge", pvMayCharge: false });
  });

  it("should idle outside both windows and let PV charge only when bidirectional", () => {
    const idle = contextAt(6 * 60, false);
    const idleBidirectional = contextAt(6 * 60, true);

    expect(new TimeWindowDispatchPolicy(idle.config.windows, idle.config.pv).decide(idle))
      .toEqual({ action: "idle", pvMayCharge: false });
    expect(new TimeWindowDispatchPolicy(idleBidirectional.config.windows, idleBidirectional.config.pv).decide(idleBidirectional))
      .toEqual({ action: "idle", pvMayCharge: true });
  });
});
