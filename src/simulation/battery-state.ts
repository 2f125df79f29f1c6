import type { BatteryConfig } from "../configuration/index.js";

export type BatteryStateSnapshot = {
  readonly soc: number;
  readonly chargedMwh: number;
  readonly dischargedMwh: number;
};

/**
 * Mutable state of one simulation run. Created at the initial SOC and advanced
 * once per interval, in time order.
 */
export class BatteryState {
  private soc: number;
  private chargedMwh = 0;
  private dischargedMwh = 0;

  public constructor(private readonly battery: BatteryConfig) {
    this.soc = battery.initialSoc;
  }

  public get currentSoc(): number {
    return this.soc;
  }

  // Stored energy that can still be added before reaching maxSoc.
  public headroomMwh(): number {
    return Math.max(0, (this.battery.maxSoc - this.soc) * this.battery.energyMwh);
  }

  // Stored energy above minSoc.
  public availableMwh(): number {
    return Math.max(0, (this.soc - this.battery.minSoc) * this.battery.energyMwh);
  }

  public advance(chargeMwh: number, dischargeMwh: number, nextSoc: number): void {
    this.chargedMwh += chargeMwh;
    this.dischargedMwh += dischargeMwh;
    this.soc = nextSoc;
  }

  public snapshot(): BatteryStateSnapshot {
    return {
      soc: this.soc,
      chargedMwh: this.chargedMwh,
      dischargedMwh: this.dischargedMwh,
    };
  }
}
