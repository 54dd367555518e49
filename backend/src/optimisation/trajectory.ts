import { scheduleModeFromPower } from "@wattplan/domain";

import type { PlannedStep, PlanningContext } from "./types";

export function buildStep(context: PlanningContext, stepIndex: number, socIndex: number, actionIndex: number): PlannedStep {
  const {lattice, actions, socDeltas, costModel, profiles, stepCosts, baselineCosts} = context;
  const powerW = actions.powers[actionIndex];
  const socStartWh = lattice.energyAt(socIndex);
  const nextIndex = lattice.indexAtOrBelow(socStartWh + socDeltas[actionIndex]);
  const breakdown = costModel.evaluate(profiles[stepIndex], powerW);
  const costEur = stepCosts[stepIndex][actionIndex];
  const baselineCostEur = baselineCosts[stepIndex];
  return {
    index: stepIndex,
    powerW,
    mode: scheduleModeFromPower(powerW),
    socStartIndex: socIndex,
    socIndex: nextIndex,
    socStartWh,
    socWh: lattice.energyAt(nextIndex),
    gridEnergyWh: breakdown.gridEnergyWh,
    costEur,
    baselineCostEur,
    profitEur: baselineCostEur - costEur,
    buyPriceEurPerKwh: profiles[stepIndex].buyPriceEurPerKwh,
    feedInPriceEurPerKwh: profiles[stepIndex].feedInPriceEurPerKwh,
  };
}

function isFeasibleAt(context: PlanningContext, socIndex: number, actionIndex: number): boolean {
  return context.battery.isFeasible(
    context.lattice.energyAt(socIndex),
    context.actions.powers[actionIndex],
    context.stepHours,
  );
}

/**
 * Picks the action to execute for a requested power: the exact action when it
 * is feasible, otherwise the largest feasible action in the same direction,
 * otherwise idle.
 */
export function fitAction(context: PlanningContext, socIndex: number, requestedPowerW: number): number {
  const {actions} = context;
  const exact = actions.indexOf(requestedPowerW);
  if (exact >= 0 && isFeasibleAt(context, socIndex, exact)) {
    return exact;
  }
  let best = actions.indexOf(0);
  let bestMagnitude = 0;
  actions.powers.forEach((powerW, actionIndex) => {
    const sameDirection = Math.sign(powerW) === Math.sign(requestedPowerW) && powerW !== 0;
    const magnitude = Math.abs(powerW);
    if (!sameDirection || magnitude > Math.abs(requestedPowerW) || magnitude <= bestMagnitude) {
      return;
    }
    if (isFeasibleAt(context, socIndex, actionIndex)) {
      best = actionIndex;
      bestMagnitude = magnitude;
    }
  });
  return best;
}

/** Re-walks the lattice from `startIndex` with the given per-step powers. */
export function replaySchedule(context: PlanningContext, startIndex: number, powersW: readonly number[]): PlannedStep[] {
  const steps: PlannedStep[] = [];
  let socIndex = startIndex;
  for (let stepIndex = 0; stepIndex < context.horizon; stepIndex += 1) {
    const actionIndex = fitAction(context, socIndex, powersW[stepIndex] ?? 0);
    const step = buildStep(context, stepIndex, socIndex, actionIndex);
    steps.push(step);
    socIndex = step.socIndex;
  }
  return steps;
}
