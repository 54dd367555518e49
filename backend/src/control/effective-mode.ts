import type { ControlMode, EffectiveMode, ScheduleEntry } from "@wattplan/domain";
import { assertNever } from "@wattplan/domain";

import type { LiveMeasurement } from "./real-time-balancer";

export interface ModeResolutionInput {
  controlMode: ControlMode;
  /** Current and upcoming plan entries, current first. */
  upcoming: readonly ScheduleEntry[];
  measurement: LiveMeasurement | null;
}

function scheduledMode(entry: ScheduleEntry): EffectiveMode {
  switch (entry.mode) {
    case "charging":
      return {kind: "charging", powerW: entry.power_w};
    case "discharging":
      return {kind: "discharging", powerW: entry.power_w};
    case "idle":
      return {kind: "idle"};
    default:
      return assertNever(entry.mode);
  }
}

function resolveHybrid(current: ScheduleEntry, input: ModeResolutionInput): EffectiveMode {
  const gridPowerW = input.measurement?.gridPowerW ?? null;
  const exporting = gridPowerW !== null && gridPowerW < 0;
  const buy = current.buy_price_eur_per_kwh;
  const feedIn = current.feed_in_price_eur_per_kwh;

  switch (current.mode) {
    case "idle": {
      // Hold energy back for a planned discharge, unless PV is already exporting
      const dischargeLater = input.upcoming.slice(1).some((entry) => entry.mode === "discharging");
      return dischargeLater && !exporting ? {kind: "idle"} : {kind: "zero_grid"};
    }
    case "discharging":
      if (buy > 0 && feedIn >= buy) {
        return {kind: "discharging", powerW: current.power_w};
      }
      return {kind: "zero_grid"};
    case "charging":
      if (!exporting || feedIn < 0) {
        return {kind: "charging", powerW: current.power_w};
      }
      return {kind: "zero_grid"};
    default:
      return assertNever(current.mode);
  }
}

/** Maps the operator's control mode and the plan's current step to what the balancer does now. */
export function resolveEffectiveMode(input: ModeResolutionInput): EffectiveMode {
  const current = input.upcoming.length > 0 ? input.upcoming[0] : null;
  switch (input.controlMode) {
    case "manual":
      return {kind: "manual"};
    case "zero_grid":
      return {kind: "zero_grid"};
    case "follow_schedule":
      return current ? scheduledMode(current) : {kind: "zero_grid"};
    case "hybrid":
      return current ? resolveHybrid(current, input) : {kind: "zero_grid"};
    default:
      return assertNever(input.controlMode);
  }
}
