import { Schema } from "effect";
import { MINUTES_PER_DAY, TIME_OF_DAY_PATTERN, windowsOverlap } from "./time-of-day.js";

export const Regions = ["NSW1", "VIC1", "QLD1", "SA1", "TAS1"] as const;

const FiniteNumber = Schema.Number.pipe(Schema.finite());
const NonNegative = FiniteNumber.pipe(Schema.nonNegative());
const Fraction = FiniteNumber.pipe(Schema.between(0, 1));
const Efficiency = FiniteNumber.pipe(Schema.greaterThan(0), Schema.lessThanOrEqualTo(1));

const isCalendarDate = (value: string) => {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
};

export const CalendarDateSchema = Schema.String.pipe(
  Schema.pattern(/^\d{4}-\d{2}-\d{2}$/),
  Schema.filter((value) => isCalendarDate(value) || `${value} is not a calendar date`)
);

export const TimeWindowSchema = Schema.Struct({
  start: Schema.String.pipe(Schema.pattern(TIME_OF_DAY_PATTERN)),
  end: Schema.String.pipe(Schema.pattern(TIME_OF_DAY_PATTERN)),
});

export const BatteryConfigSchema = Schema.Struct({
  powerMw: NonNegative,
  energyMwh: NonNegative,
  minSoc: Fraction,
  maxSoc: Fraction,
  chargeEfficiency: Efficiency,
  dischargeEfficiency: Efficiency,
  initialSoc: Fraction,
}).pipe(
  Schema.filter((battery) =>
    battery.minSoc < battery.maxSoc || {
      path: ["maxSoc"],
      message: `maxSoc (${battery.maxSoc}) must be greater than minSoc (${battery.minSoc})`,
    }
  ),
  Schema.filter((battery) =>
    (battery.initialSoc >= battery.minSoc && battery.initialSoc <= battery.maxSoc) || {
      path: ["initialSoc"],
      message: `initialSoc (${battery.initialSoc}) must lie within [${battery.minSoc}, ${battery.maxSoc}]`,
    }
  )
);

export const PvConfigSchema = Schema.Struct({
  capacityMw: NonNegative,
  efficiency: Schema.optionalWith(Efficiency, { default: () => 0.95 }),
  exportEfficiency: Schema.optionalWith(Efficiency, { default: () => 0.98 }),
  // Lets PV charge the battery outside the charge window.
  bidirectionalCharging: Schema.optionalWith(Schema.Boolean, { default: () => false }),
});

export const MarketConfigSchema = Schema.Struct({
  region: Schema.Literal(...Regions),
  startDate: CalendarDateSchema,
  endDate: CalendarDateSchema,
  resolutionMinutes: Schema.optionalWith(
    Schema.Number.pipe(Schema.int(), Schema.positive()),
    { default: () => 5 }
  ),
  priceFloor: Schema.optionalWith(FiniteNumber, { default: () => -1000 }),
  priceCeiling: Schema.optionalWith(FiniteNumber, { default: () => 15000 }),
  utcOffsetMinutes: Schema.optionalWith(
    Schema.Number.pipe(Schema.int(), Schema.between(-14 * 60, 14 * 60)),
    { default: () => 0 }
  ),
}).pipe(
  Schema.filter((market) =>
    market.startDate <= market.endDate || {
      path: ["endDate"],
      message: `endDate (${market.endDate}) is before startDate (${market.startDate})`,
    }
  ),
  Schema.filter((market) =>
    market.priceFloor <= market.priceCeiling || {
      path: ["priceCeiling"],
      message: `priceCeiling (${market.priceCeiling}) is below priceFloor (${market.priceFloor})`,
    }
  ),
  Schema.filter((market) =>
    MINUTES_PER_DAY % market.resolutionMinutes === 0 || {
      path: ["resolutionMinutes"],
      message: `resolutionMinutes (${market.resolutionMinutes}) must divide a day evenly`,
    }
  )
);

export const DispatchWindowConfigSchema = Schema.Struct({
  charge: TimeWindowSchema,
  discharge: TimeWindowSchema,
}).pipe(
  Schema.filter((windows) =>
    !windowsOverlap(windows.charge, windows.discharge) || {
      path: ["discharge"],
      message: `discharge window ${windows.discharge.start}-${windows.discharge.end} overlaps charge window ${windows.charge.start}-${windows.charge.end}`,
    }
  )
);

export const TariffConfigSchema = Schema.Struct({
  fixedCharge: Schema.optionalWith(NonNegative, { default: () => 0 }),
  fixedChargeCadence: Schema.optionalWith(Schema.Literal("yearly", "daily"), { default: () => "yearly" as const }),
  importRate: Schema.optionalWith(NonNegative, { default: () => 0 }),
  exportRate: Schema.optionalWith(NonNegative, { default: () => 0 }),
  // currency per MW of peak import, per monthly billing period
  demandChargeRate: Schema.optionalWith(NonNegative, { default: () => 0 }),
  demandWindow: Schema.optional(TimeWindowSchema),
  networkLossFactor: Schema.optionalWith(FiniteNumber.pipe(Schema.positive()), { default: () => 1 }),
});

export const ConfigurationSchema = Schema.Struct({
  battery: BatteryConfigSchema,
  pv: Schema.optionalWith(PvConfigSchema, {
    default: () => ({
      capacityMw: 0,
      efficiency: 0.95,
      exportEfficiency: 0.98,
      bidirectionalCharging: false,
    }),
  }),
  market: MarketConfigSchema,
  windows: DispatchWindowConfigSchema,
  tariff: Schema.optionalWith(TariffConfigSchema, {
    default: () => ({
      fixedCharge: 0,
      fixedChargeCadence: "yearly" as const,
      importRate: 0,
      exportRate: 0,
      demandChargeRate: 0,
      networkLossFactor: 1,
    }),
  }),
});

export type BatteryConfig = typeof BatteryConfigSchema.Type;
export type PvConfig = typeof PvConfigSchema.Type;
export type MarketConfig = typeof MarketConfigSchema.Type;
export type DispatchWindowConfig = typeof DispatchWindowConfigSchema.Type;
export type TariffConfig = typeof TariffConfigSchema.Type;
export type Region = MarketConfig["region"];

export type Configuration = typeof ConfigurationSchema.Type;
export type ConfigurationInput = typeof ConfigurationSchema.Encoded;
