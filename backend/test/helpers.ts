import type { BatteryConfig, HorizonForecast, PlanSnapshot, PvArrayForecast, ScheduleEntry } from "@wattplan/domain";
import { Duration } from "@wattplan/domain";

import type { ConfigDocument } from "../src/config/schemas";

export const testBattery: BatteryConfig = {
  capacityWh: 10_000,
  socMinWh: 1_000,
  socMaxWh: 9_000,
  maxChargePowerW: 5_000,
  maxDischargePowerW: 5_000,
  roundTripEfficiency: 0.9,
  degradationCostEurPerKwh: 0.03,
};

export interface ForecastShape {
  buy: number | (number | null)[];
  feedIn: number | (number | null)[];
  consumptionW?: number | number[];
  pvArrays?: PvArrayForecast[];
  start?: Date;
}

function expand<T>(value: T | T[], steps: number): T[] {
  return Array.isArray(value) ? value : new Array<T>(steps).fill(value);
}

export function buildForecast(steps: number, shape: ForecastShape): HorizonForecast {
  return {
    steps,
    stepDuration: Duration.fromMinutes(15),
    start: shape.start,
    buyPriceEurPerKwh: expand<number | null>(shape.buy, steps),
    feedInPriceEurPerKwh: expand<number | null>(shape.feedIn, steps),
    consumptionW: expand<number>(shape.consumptionW ?? 0, steps),
    pvArrays: shape.pvArrays ?? [],
  };
}

export function buildEntry(overrides: Partial<ScheduleEntry> = {}): ScheduleEntry {
  return {
    index: 0,
    start: null,
    end: null,
    power_w: 0,
    mode: "idle",
    soc_start_wh: 5_000,
    soc_wh: 5_000,
    grid_energy_wh: 0,
    cost_eur: 0,
    profit_eur: 0,
    buy_price_eur_per_kwh: 0.3,
    feed_in_price_eur_per_kwh: 0.07,
    ...overrides,
  };
}

export function buildSnapshot(schedule: ScheduleEntry[], overrides: Partial<PlanSnapshot> = {}): PlanSnapshot {
  return {
    timestamp: "2026-01-01T00:00:00.000Z",
    status: "ok",
    step_minutes: 15,
    capacity_wh: 10_000,
    current_soc_wh: 5_000,
    current_soc_percent: 50,
    soc_source: "live",
    schedule,
    shadow_price: {
      shadow_price_eur_per_kwh: 0.12,
      discharge_threshold_eur_per_kwh: 0.11,
      charge_threshold_eur_per_kwh: 0.13,
    },
    diagnostics: {
      total_cost_eur: 1.5,
      baseline_cost_eur: 2,
      savings_eur: 0.5,
      filtered_steps: 0,
      soc_states: 81,
      actions: 21,
      solve_ms: 3,
    },
    warnings: [],
    errors: [],
    ...overrides,
  };
}

export function buildConfigDocument(overrides: Partial<ConfigDocument> = {}): ConfigDocument {
  return {
    battery: {
      capacity_kwh: 10,
      soc_min_percent: 10,
      soc_max_percent: 90,
      max_charge_power_w: 5000,
      max_discharge_power_w: 5000,
      round_trip_efficiency: 0.9,
      degradation_cost_eur_per_kwh: 0.03,
    },
    planning: {
      step_minutes: 15,
      interval_minutes: 15,
    },
    control: {
      mode: "hybrid",
      deadband_w: 10,
      telemetry_max_age_seconds: 30,
    },
    forecast: {
      file: "horizon.json",
    },
    logging: {
      level: "error",
    },
    ...overrides,
  };
}
