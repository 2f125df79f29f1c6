import { Effect } from "effect";
import {
  clampPrice,
  intervalHours,
  maxChargeEnergyPerIntervalMwh,
  maxDischargeEnergyPerIntervalMwh,
  type Configuration,
} from "../configuration/index.js";
import { minuteOfDay } from "../configuration/time-of-day.js";
import { ComputationInvariantError } from "../errors/computation-invariant.error.js";
import type { DataUnavailableError } from "../errors/data-unavailable.error.js";
import { TimeWindowDispatchPolicy } from "../dispatch-policy/time-window.policy.js";
import type { DispatchPolicy } from "../dispatch-policy/types.js";
import { alignSeries } from "../time-series/align.js";
import type { AlignedInterval, PricePoint, SolarPoint } from "../time-series/types.js";
import { BatteryState } from "./battery-state.js";
import type { EnergyFlowRecord } from "./types.js";

export const TOLERANCE = 1e-9;

const nonNegative = (value: number) => Math.max(0, value);

/**
 * Advances the battery through already aligned intervals. SOC at each step depends on
 * the previous one, so the intervals are processed strictly in order.
 */
export const runDispatch = (
  config: Configuration,
  intervals: readonly AlignedInterval[],
  policy: DispatchPolicy = new TimeWindowDispatchPolicy(config.windows, config.pv),
): Effect.Effect<readonly EnergyFlowRecord[], ComputationInvariantError> =>
  Effect.gen(function* () {
    const { battery, pv, market } = config;
    const hours = intervalHours(config);
    const chargeLimitMwh = maxChargeEnergyPerIntervalMwh(config);
    const dischargeLimitMwh = maxDischargeEnergyPerIntervalMwh(config);
    const state = new BatteryState(battery);
    const trace: EnergyFlowRecord[] = [];

    for (const interval of intervals) {
      const { timestamp } = interval;
      const price = clampPrice(market, interval.rawPrice);

      const pvProductionMwh = interval.solarMw === null
        ? 0
        : Math.min(pv.capacityMw, nonNegative(interval.solarMw)) * pv.efficiency * hours;

      const decision = policy.decide({
        timestamp,
        price,
        minuteOfDay: minuteOfDay(timestamp, market.utcOffsetMinutes),
        state: state.snapshot(),
        config,
      });

      // PV is stored first; the grid tops up within whatever power and energy headroom remains.
      let pvToBatteryMwh = 0;
      if (decision.pvMayCharge && decision.action !== "discharge") {
        pvToBatteryMwh = nonNegative(Math.min(
          pvProductionMwh,
          chargeLimitMwh,
          state.headroomMwh() / battery.chargeEfficiency,
        ));
      }

      let gridToBatteryMwh = 0;
      let batteryDischargeMwh = 0;

      if (decision.action === "charge") {
        const headroomAfterPvMwh = state.headroomMwh() - pvToBatteryMwh * battery.chargeEfficiency;
        gridToBatteryMwh = nonNegative(Math.min(
          chargeLimitMwh - pvToBatteryMwh,
          headroomAfterPvMwh / battery.chargeEfficiency,
        ));
      } else if (decision.action === "discharge") {
        batteryDischargeMwh = nonNegative(Math.min(
          dischargeLimitMwh,
          state.availableMwh() * battery.dischargeEfficiency,
        ));
      }

      const pvToGridMwh = (pvProductionMwh - pvToBatteryMwh) * pv.exportEfficiency;
      const batteryChargeMwh = pvToBatteryMwh + gridToBatteryMwh;

      const storedDeltaMwh =
        batteryChargeMwh * battery.chargeEfficiency - batteryDischargeMwh / battery.dischargeEfficiency;
      const previousSoc = state.currentSoc;
      const unboundedSoc = battery.energyMwh > 0
        ? previousSoc + storedDeltaMwh / battery.energyMwh
        : previousSoc;

      // written so that NaN fails every check
      if (!(unboundedSoc <= battery.maxSoc + TOLERANCE && unboundedSoc >= battery.minSoc - TOLERANCE)) {
        return yield* Effect.fail(new ComputationInvariantError({
          check: "soc-bounds",
          timestamp,
          expected: unboundedSoc > battery.maxSoc ? battery.maxSoc : battery.minSoc,
          actual: unboundedSoc,
        }));
      }

      // only floating-point noise is absorbed here
      const soc = Math.min(battery.maxSoc, Math.max(battery.minSoc, unboundedSoc));
      const socDeltaMwh = (soc - previousSoc) * battery.energyMwh;

      if (!(Math.abs(storedDeltaMwh - socDeltaMwh) <= TOLERANCE * Math.max(1, battery.energyMwh))) {
        return yield* Effect.fail(new ComputationInvariantError({
          check: "battery-energy-balance",
          timestamp,
          expected: storedDeltaMwh,
          actual: socDeltaMwh,
        }));
      }

      const pvAccountedMwh = pvToBatteryMwh + pvToGridMwh / pv.exportEfficiency;
      if (!(Math.abs(pvProductionMwh - pvAccountedMwh) <= TOLERANCE * Math.max(1, pvProductionMwh))) {
        return yield* Effect.fail(new ComputationInvariantError({
          check: "pv-energy-balance",
          timestamp,
          expected: pvProductionMwh,
          actual: pvAccountedMwh,
        }));
      }

      state.advance(batteryChargeMwh, batteryDischargeMwh, soc);

      trace.push({
        timestamp,
        price,
        gridImportMwh: gridToBatteryMwh,
        gridExportMwh: batteryDischargeMwh + pvToGridMwh,
        batteryChargeMwh,
        batteryDischargeMwh,
        pvProductionMwh,
        pvToBatteryMwh,
        pvToGridMwh,
        gridToBatteryMwh,
        soc,
      });
    }

    return trace;
  });

/**
 * Simulates one run over the market range. Without a solar series no PV is produced,
 * which is how the battery-only scenario is expressed.
 */
export const simulate = (
  config: Configuration,
  prices: readonly PricePoint[],
  solar?: readonly SolarPoint[],
  policy?: DispatchPolicy,
): Effect.Effect<readonly EnergyFlowRecord[], DataUnavailableError | ComputationInvariantError> =>
  Effect.gen(function* () {
    const intervals = yield* alignSeries(config.market, prices, solar);
    const trace = yield* runDispatch(config, intervals, policy);
    const finalState = trace.at(-1);

    yield* Effect.logDebug("Dispatch simulation completed", {
      region: config.market.region,
      intervals: trace.length,
      withPv: solar !== undefined,
      finalSoc: finalState ? finalState.soc : config.battery.initialSoc,
    });

    return trace;
  });
