export interface BatteryConfig {
  capacityWh: number;
  socMinWh: number;
  socMaxWh: number;
  maxChargePowerW: number;
  maxDischargePowerW: number;
  roundTripEfficiency: number;
  degradationCostEurPerKwh: number;
}

export interface PvEfficiencies {
  /** Applied to AC-coupled array forecasts. 1 when forecasts are already inverter-side. */
  acEfficiency: number;
  /** MPPT + DC-DC path straight into the battery. */
  dcEfficiency: number;
  /** DC output the battery cannot take, converted by the inverter. */
  dcSpillEfficiency: number;
}

export interface PlanningParameters {
  minPriceSpreadEurPerKwh: number;
  socResolutionWh: number;
  powerStepW: number;
  oscillationWindowHours: number;
  pv: PvEfficiencies;
}

export const DEFAULT_PV_EFFICIENCIES: PvEfficiencies = {
  acEfficiency: 1,
  dcEfficiency: 0.97,
  dcSpillEfficiency: 0.96,
};

export const DEFAULT_PLANNING_PARAMETERS: PlanningParameters = {
  minPriceSpreadEurPerKwh: 0.05,
  socResolutionWh: 100,
  powerStepW: 500,
  oscillationWindowHours: 2,
  pv: DEFAULT_PV_EFFICIENCIES,
};
