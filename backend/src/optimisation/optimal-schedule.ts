import { performance } from "node:perf_hooks";

import type { HorizonForecast, PlanningParameters } from "@wattplan/domain";
import {
  DEFAULT_PLANNING_PARAMETERS,
  InvariantViolationError,
  MissingInputError,
  SensorUnavailableError,
} from "@wattplan/domain";

import { BatteryModel } from "./battery-model";
import { CostModel } from "./cost-model";
import { ActionSet, SocLattice } from "./lattice";
import { filterOscillations } from "./oscillation-filter";
import { computeShadowPrice } from "./shadow-price";
import { buildStep } from "./trajectory";
import type {
  OptimizerInput,
  PlannedStep,
  PlanningContext,
  PlanningParameterOverrides,
  PlanResult,
  StepProfile,
  ValueFunction,
} from "./types";

const WATT_HOURS_PER_KWH = 1000;
const TIE_TOLERANCE = 1e-9;

export function resolvePlanningParameters(overrides: PlanningParameterOverrides = {}): PlanningParameters {
  const {pv, ...rest} = overrides;
  return {
    ...DEFAULT_PLANNING_PARAMETERS,
    ...rest,
    pv: {...DEFAULT_PLANNING_PARAMETERS.pv, ...pv},
  };
}

export function optimizeSchedule(input: OptimizerInput): PlanResult {
  const startedAt = performance.now();
  const context = preparePlanningContext(input);
  const {valueFunction, policy} = runBackwardPass(context);
  const unfiltered = runForwardPass(context, policy);
  const {schedule, filteredSteps} = filterOscillations(unfiltered, context);
  const shadowPrice = computeShadowPrice(
    valueFunction[0],
    context.initialSocIndex,
    context.lattice.resolutionWh,
    context.battery.roundTripEfficiency,
  );
  return buildPlanResult(context, schedule, shadowPrice, filteredSteps, performance.now() - startedAt);
}

function requireSeries(name: string, series: readonly (number | null)[] | undefined, steps: number): number[] {
  if (!series || series.length < steps) {
    throw new MissingInputError(
      `${name} covers ${series?.length ?? 0} of ${steps} steps`,
      {series: name, length: series?.length ?? 0, steps},
    );
  }
  const values: number[] = [];
  for (let index = 0; index < steps; index += 1) {
    const value = series[index];
    if (value === null || !Number.isFinite(value)) {
      throw new MissingInputError(`${name} has no usable value at step ${index}`, {series: name, index});
    }
    values.push(value);
  }
  return values;
}

function buildStepProfiles(
  forecast: HorizonForecast,
  params: PlanningParameters,
  durationHours: number,
): StepProfile[] {
  const {steps} = forecast;
  const buy = requireSeries("buy price", forecast.buyPriceEurPerKwh, steps);
  const feedIn = requireSeries("feed-in price", forecast.feedInPriceEurPerKwh, steps);
  const consumption = requireSeries("consumption", forecast.consumptionW, steps);
  const acPv = new Array<number>(steps).fill(0);
  const dcPv = new Array<number>(steps).fill(0);
  for (const array of forecast.pvArrays) {
    const values = requireSeries(`PV array ${array.id}`, array.powerW, steps);
    const target = array.coupling === "dc" ? dcPv : acPv;
    const efficiency = array.coupling === "dc" ? 1 : params.pv.acEfficiency;
    values.forEach((value, index) => {
      target[index] += Math.max(0, value) * efficiency;
    });
  }
  return buy.map((buyPriceEurPerKwh, index) => ({
    index,
    durationHours,
    buyPriceEurPerKwh,
    feedInPriceEurPerKwh: feedIn[index],
    consumptionW: Math.max(0, consumption[index]),
    acPvW: acPv[index],
    dcPvW: dcPv[index],
  }));
}

export function preparePlanningContext(input: OptimizerInput): PlanningContext {
  const {forecast, currentSocWh} = input;
  const params = resolvePlanningParameters(input.params);
  const battery = new BatteryModel(input.battery);

  if (!Number.isInteger(forecast.steps) || forecast.steps < 1) {
    throw new MissingInputError("forecast horizon is empty", {steps: forecast.steps});
  }
  const stepHours = forecast.stepDuration.hours;
  if (!(stepHours > 0)) {
    throw new MissingInputError("forecast step duration must be positive", {stepHours});
  }
  if (!Number.isFinite(currentSocWh)) {
    throw new SensorUnavailableError("current state of charge is unknown", {currentSocWh});
  }

  const profiles = buildStepProfiles(forecast, params, stepHours);
  const lattice = new SocLattice(battery.socMinWh, battery.socMaxWh, params.socResolutionWh);
  const actions = ActionSet.fromLimits(
    input.battery.maxChargePowerW,
    input.battery.maxDischargePowerW,
    params.powerStepW,
  );
  const costModel = new CostModel(battery, params.pv);
  const socDeltas = actions.powers.map((powerW) => battery.socDeltaWh(powerW, stepHours));
  const stepCosts = profiles.map((profile) => actions.powers.map((powerW) => costModel.stepCost(profile, powerW)));
  const baselineCosts = profiles.map((profile) => costModel.baselineCost(profile));

  return {
    battery,
    costModel,
    params,
    lattice,
    actions,
    profiles,
    horizon: forecast.steps,
    stepHours,
    socDeltas,
    stepCosts,
    baselineCosts,
    terminalPriceEurPerKwh: profiles[profiles.length - 1].feedInPriceEurPerKwh,
    initialSocIndex: lattice.nearestIndex(battery.clampSoc(currentSocWh)),
  };
}

export function runBackwardPass(context: PlanningContext): ValueFunction {
  const {horizon, lattice, terminalPriceEurPerKwh} = context;
  const valueFunction: number[][] = Array.from({length: horizon + 1}, () =>
    new Array<number>(lattice.size).fill(Number.POSITIVE_INFINITY),
  );
  const policy: number[][] = Array.from({length: horizon}, () => new Array<number>(lattice.size).fill(0));

  // Energy left at the end is worth what it would fetch on the last feed-in price
  for (let socIndex = 0; socIndex < lattice.size; socIndex += 1) {
    valueFunction[horizon][socIndex] = -(lattice.energyAt(socIndex) / WATT_HOURS_PER_KWH) * terminalPriceEurPerKwh;
  }

  for (let stepIndex = horizon - 1; stepIndex >= 0; stepIndex -= 1) {
    const nextRow = valueFunction[stepIndex + 1];
    for (let socIndex = 0; socIndex < lattice.size; socIndex += 1) {
      const evaluation = evaluateStateTransitions(context, stepIndex, socIndex, nextRow);
      valueFunction[stepIndex][socIndex] = evaluation.cost;
      policy[stepIndex][socIndex] = evaluation.actionIndex;
    }
  }

  return {valueFunction, policy};
}

function evaluateStateTransitions(
  context: PlanningContext,
  stepIndex: number,
  socIndex: number,
  costToGoNextRow: number[],
): { cost: number; actionIndex: number } {
  const {battery, lattice, actions, socDeltas, stepCosts, stepHours} = context;
  const socWh = lattice.energyAt(socIndex);
  const costs = stepCosts[stepIndex];

  let bestCost = Number.POSITIVE_INFINITY;
  let bestAction = -1;
  for (let actionIndex = 0; actionIndex < actions.size; actionIndex += 1) {
    if (!battery.isFeasible(socWh, actions.powers[actionIndex], stepHours)) {
      continue;
    }
    const nextIndex = lattice.indexAtOrBelow(socWh + socDeltas[actionIndex]);
    const candidate = costs[actionIndex] + costToGoNextRow[nextIndex];
    if (bestAction < 0 || candidate < bestCost - TIE_TOLERANCE * Math.max(1, Math.abs(bestCost))) {
      bestCost = candidate;
      bestAction = actionIndex;
    }
  }

  if (bestAction < 0 || !Number.isFinite(bestCost)) {
    throw new InvariantViolationError(
      `no feasible action at step ${stepIndex} from ${socWh.toFixed(1)} Wh`,
      {step: stepIndex, socIndex, socWh},
    );
  }
  return {cost: bestCost, actionIndex: bestAction};
}

export function runForwardPass(context: PlanningContext, policy: number[][]): PlannedStep[] {
  const steps: PlannedStep[] = [];
  let socIndex = context.initialSocIndex;
  for (let stepIndex = 0; stepIndex < context.horizon; stepIndex += 1) {
    const step = buildStep(context, stepIndex, socIndex, policy[stepIndex][socIndex]);
    if (step.socIndex < 0 || step.socIndex >= context.lattice.size) {
      throw new InvariantViolationError(
        `SoC index ${step.socIndex} left the lattice at step ${stepIndex}`,
        {step: stepIndex, socIndex: step.socIndex, socWh: step.socWh},
      );
    }
    steps.push(step);
    socIndex = step.socIndex;
  }
  return steps;
}

function buildPlanResult(
  context: PlanningContext,
  schedule: PlannedStep[],
  shadowPrice: PlanResult["shadowPrice"],
  filteredSteps: number,
  solveMs: number,
): PlanResult {
  const initialSocWh = context.lattice.energyAt(context.initialSocIndex);
  const finalSocWh = schedule.length > 0 ? schedule[schedule.length - 1].socWh : initialSocWh;
  const stepCostSum = schedule.reduce((acc, step) => acc + step.costEur, 0);
  const baselineCostEur = schedule.reduce((acc, step) => acc + step.baselineCostEur, 0);
  const storedValueChange = (context.terminalPriceEurPerKwh * (finalSocWh - initialSocWh)) / WATT_HOURS_PER_KWH;
  const totalCostEur = stepCostSum - storedValueChange;

  return {
    schedule,
    shadowPrice,
    initialSocWh,
    diagnostics: {
      totalCostEur,
      baselineCostEur,
      savingsEur: baselineCostEur - totalCostEur,
      filteredSteps,
      socStates: context.lattice.size,
      actions: context.actions.size,
      solveMs,
    },
  };
}
