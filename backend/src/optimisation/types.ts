import type { BatteryConfig, HorizonForecast, PlanningParameters, PvEfficiencies, ScheduleMode } from "@wattplan/domain";

import type { BatteryModel } from "./battery-model";
import type { CostModel } from "./cost-model";
import type { ActionSet, SocLattice } from "./lattice";

export interface PlanningParameterOverrides extends Partial<Omit<PlanningParameters, "pv">> {
  pv?: Partial<PvEfficiencies>;
}

export interface OptimizerInput {
  battery: BatteryConfig;
  forecast: HorizonForecast;
  currentSocWh: number;
  params?: PlanningParameterOverrides;
}

/** Per-step inputs to the cost model, already validated and converted. */
export interface StepProfile {
  index: number;
  durationHours: number;
  buyPriceEurPerKwh: number;
  feedInPriceEurPerKwh: number;
  consumptionW: number;
  /** AC-coupled PV after the AC efficiency. */
  acPvW: number;
  /** Raw DC-coupled PV, before any conversion. */
  dcPvW: number;
}

export interface PlanningContext {
  battery: BatteryModel;
  costModel: CostModel;
  params: PlanningParameters;
  lattice: SocLattice;
  actions: ActionSet;
  profiles: StepProfile[];
  horizon: number;
  stepHours: number;
  // socDeltas[a]: stored energy change of action a over one step
  socDeltas: number[];
  // stepCosts[t][a]: independent of the SoC level
  stepCosts: number[][];
  baselineCosts: number[];
  terminalPriceEurPerKwh: number;
  initialSocIndex: number;
}

export interface PlannedStep {
  index: number;
  powerW: number;
  mode: ScheduleMode;
  socStartIndex: number;
  socIndex: number;
  socStartWh: number;
  socWh: number;
  gridEnergyWh: number;
  costEur: number;
  baselineCostEur: number;
  profitEur: number;
  buyPriceEurPerKwh: number;
  feedInPriceEurPerKwh: number;
}

export interface ShadowPrice {
  shadowPriceEurPerKwh: number;
  dischargeThresholdEurPerKwh: number;
  chargeThresholdEurPerKwh: number;
}

export interface PlanDiagnosticsResult {
  totalCostEur: number;
  baselineCostEur: number;
  savingsEur: number;
  filteredSteps: number;
  socStates: number;
  actions: number;
  solveMs: number;
}

export interface PlanResult {
  schedule: PlannedStep[];
  shadowPrice: ShadowPrice;
  diagnostics: PlanDiagnosticsResult;
  initialSocWh: number;
}

export interface ValueFunction {
  // valueFunction[t][s]: minimum cost-to-go from step t at lattice index s
  valueFunction: number[][];
  // policy[t][s]: index into the action set
  policy: number[][];
}
