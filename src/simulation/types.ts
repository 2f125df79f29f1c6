// All energy quantities are MWh for a single interval.
export type EnergyFlowRecord = {
  readonly timestamp: Date;
  readonly price: number; // clamped to the market floor/ceiling
  readonly gridImportMwh: number;
  readonly gridExportMwh: number; // battery discharge plus PV delivered to the grid
  readonly batteryChargeMwh: number; // input before charge losses, PV and grid combined
  readonly batteryDischargeMwh: number; // output after discharge losses
  readonly pvProductionMwh: number;
  readonly pvToBatteryMwh: number;
  readonly pvToGridMwh: number; // after export losses
  readonly gridToBatteryMwh: number;
  readonly soc: number; // after this interval
};
