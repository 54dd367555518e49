import type { ScheduleMode } from "@wattplan/domain";

import { replaySchedule } from "./trajectory";
import type { PlannedStep, PlanningContext } from "./types";

const PV_SURPLUS_THRESHOLD_W = 50;

export interface OscillationFilterResult {
  schedule: PlannedStep[];
  filteredSteps: number;
}

function oppositeOf(mode: ScheduleMode): ScheduleMode {
  return mode === "charging" ? "discharging" : "charging";
}

/**
 * Drops charge/discharge pairs that sit close together and whose price spread
 * does not cover losses, degradation and the minimum spread. The SoC
 * trajectory is replayed afterwards so later steps stay feasible.
 */
export function filterOscillations(schedule: PlannedStep[], context: PlanningContext): OscillationFilterResult {
  const {battery, costModel, params, profiles, stepHours} = context;
  if (schedule.length < 2) {
    return {schedule, filteredSteps: 0};
  }

  const windowSteps = Math.max(1, Math.round(params.oscillationWindowHours / stepHours));
  const rte = battery.roundTripEfficiency;
  const threshold =
    (2 * battery.config.degradationCostEurPerKwh + params.minPriceSpreadEurPerKwh) / Math.sqrt(rte);

  const powers = schedule.map((step) => step.powerW);
  const modes = schedule.map((step) => step.mode);
  let filteredSteps = 0;

  for (let first = 0; first < schedule.length; first += 1) {
    const mode = modes[first];
    if (mode === "idle") {
      continue;
    }
    const wanted = oppositeOf(mode);
    const last = Math.min(schedule.length - 1, first + windowSteps);
    for (let second = first + 1; second <= last; second += 1) {
      if (modes[second] !== wanted) {
        continue;
      }
      const chargeStep = mode === "charging" ? first : second;
      const dischargeStep = mode === "charging" ? second : first;
      const chargeProfile = profiles[chargeStep];
      const chargeCost = costModel.pvSurplusW(chargeProfile) > PV_SURPLUS_THRESHOLD_W
        ? chargeProfile.feedInPriceEurPerKwh
        : chargeProfile.buyPriceEurPerKwh;
      const spread = profiles[dischargeStep].buyPriceEurPerKwh - chargeCost / rte;
      if (spread < threshold) {
        powers[first] = 0;
        powers[second] = 0;
        modes[first] = "idle";
        modes[second] = "idle";
        filteredSteps += 2;
      }
      break;
    }
  }

  if (filteredSteps === 0) {
    return {schedule, filteredSteps};
  }
  return {
    schedule: replaySchedule(context, schedule[0].socStartIndex, powers),
    filteredSteps,
  };
}
