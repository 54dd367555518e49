import { Injectable } from "@nestjs/common";

import type { BatteryConfig, ControlMode, PlanningParameters } from "@wattplan/domain";
import { DEFAULT_PLANNING_PARAMETERS, Duration, Energy, Percentage } from "@wattplan/domain";

import { validateBatteryConfig } from "../optimisation/battery-model";
import type { ConfigDocument } from "./schemas";

export interface ControlSettings {
  mode: ControlMode;
  tickSeconds: number;
  deadbandW: number;
  telemetryMaxAgeSeconds: number;
}

export interface PlannerSettings {
  battery: BatteryConfig;
  params: PlanningParameters;
  stepDuration: Duration;
  planningInterval: Duration;
  fixedFeedInEurPerKwh: number;
  forecastFile: string | null;
  control: ControlSettings;
}

export function coerceNumber(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!trimmed) {
      return null;
    }
    const parsed = Number(trimmed);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return null;
}

function positiveOr(value: unknown, fallback: number): number {
  const numeric = coerceNumber(value);
  return numeric != null && numeric > 0 ? numeric : fallback;
}

function nonNegativeOr(value: unknown, fallback: number): number {
  const numeric = coerceNumber(value);
  return numeric != null && numeric >= 0 ? numeric : fallback;
}

@Injectable()
export class PlannerSettingsFactory {
  create(config: ConfigDocument): PlannerSettings {
    const battery = config.battery ?? {};
    const planning = config.planning ?? {};
    const pv = config.pv ?? {};
    const price = config.price ?? {};
    const control = config.control ?? {};

    const capacity = Energy.fromKilowattHours(coerceNumber(battery.capacity_kwh) ?? 10);
    // Out-of-range percentages are left for validation to reject
    const socMin = coerceNumber(battery.soc_min_percent) ?? 10;
    const socMax = coerceNumber(battery.soc_max_percent) ?? 90;

    const batteryConfig: BatteryConfig = {
      capacityWh: capacity.wattHours,
      socMinWh: (capacity.wattHours * socMin) / 100,
      socMaxWh: (capacity.wattHours * socMax) / 100,
      maxChargePowerW: coerceNumber(battery.max_charge_power_w) ?? 5000,
      maxDischargePowerW: coerceNumber(battery.max_discharge_power_w) ?? 5000,
      roundTripEfficiency: coerceNumber(battery.round_trip_efficiency) ?? 0.9,
      degradationCostEurPerKwh: coerceNumber(battery.degradation_cost_eur_per_kwh) ?? 0.03,
    };
    validateBatteryConfig(batteryConfig);

    const defaults = DEFAULT_PLANNING_PARAMETERS;
    const params: PlanningParameters = {
      minPriceSpreadEurPerKwh: nonNegativeOr(planning.min_price_spread_eur_per_kwh, defaults.minPriceSpreadEurPerKwh),
      socResolutionWh: positiveOr(planning.soc_resolution_wh, defaults.socResolutionWh),
      powerStepW: positiveOr(planning.power_step_w, defaults.powerStepW),
      oscillationWindowHours: nonNegativeOr(planning.oscillation_window_hours, defaults.oscillationWindowHours),
      pv: {
        acEfficiency: Percentage.fromRatio(positiveOr(pv.ac_efficiency, defaults.pv.acEfficiency)).ratio,
        dcEfficiency: Percentage.fromRatio(positiveOr(pv.dc_efficiency, defaults.pv.dcEfficiency)).ratio,
        dcSpillEfficiency: Percentage.fromRatio(positiveOr(pv.dc_spill_efficiency, defaults.pv.dcSpillEfficiency)).ratio,
      },
    };

    return {
      battery: batteryConfig,
      params,
      stepDuration: Duration.fromMinutes(positiveOr(planning.step_minutes, 15)),
      planningInterval: Duration.fromMinutes(positiveOr(planning.interval_minutes, 15)),
      fixedFeedInEurPerKwh: coerceNumber(price.fixed_feed_in_eur_per_kwh) ?? 0.07,
      forecastFile: config.forecast?.file?.trim() || null,
      control: {
        mode: control.mode ?? "hybrid",
        tickSeconds: positiveOr(control.tick_seconds, 5),
        deadbandW: nonNegativeOr(control.deadband_w, 50),
        telemetryMaxAgeSeconds: positiveOr(control.telemetry_max_age_seconds, 30),
      },
    };
  }
}
