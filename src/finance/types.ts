export type ScenarioMetrics = {
  readonly intervalCount: number;
  readonly simulatedDays: number;

  readonly totalChargeMwh: number;
  readonly totalDischargeMwh: number;
  readonly totalGridImportMwh: number;
  readonly totalGridExportMwh: number;
  readonly totalPvProductionMwh: number;
  readonly totalPvToBatteryMwh: number;
  readonly totalPvToGridMwh: number;
  readonly roundTripEfficiency: number;
  readonly finalSoc: number;
  readonly peakImportMw: number;

  // currency per MWh
  readonly timeWeightedAveragePrice: number;
  readonly bessImportWeightedPrice: number;
  readonly bessExportWeightedPrice: number;
  readonly solarWeightedPrice: number;
  readonly solarExportWeightedPrice: number;
  readonly spreadCaptured: number;

  // currency
  readonly energyRevenue: number;
  readonly energyCost: number;
  readonly grossProfit: number;
  readonly networkCost: number;
  readonly fixedCharge: number;
  readonly demandCharge: number;
  readonly netProfit: number;
};

export type IntervalFinancials = {
  readonly timestamp: Date;
  readonly price: number;
  readonly energyRevenue: number;
  readonly energyCost: number;
  readonly networkCost: number;
};

export type ScenarioEvaluation = {
  readonly metrics: ScenarioMetrics;
  readonly intervals: readonly IntervalFinancials[];
};
