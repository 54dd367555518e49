import type { PvEfficiencies } from "@wattplan/domain";

import type { BatteryModel } from "./battery-model";
import type { StepProfile } from "./types";

const WATT_HOURS_PER_KWH = 1000;

export interface StepCostBreakdown {
  /** Signed grid energy, positive = import. */
  gridEnergyWh: number;
  importCostEur: number;
  feedInRevenueEur: number;
  degradationCostEur: number;
  costEur: number;
  storedEnergyWh: number;
  dcChargeW: number;
  dcSpillW: number;
}

/**
 * Money cost of one step for a given battery power. DC-coupled PV charges the
 * battery first; whatever the battery does not absorb is spilled through the
 * inverter at the (lower) spill efficiency.
 */
export class CostModel {
  constructor(
    private readonly battery: BatteryModel,
    private readonly pv: PvEfficiencies,
  ) {}

  evaluate(profile: StepProfile, powerW: number): StepCostBreakdown {
    const hours = profile.durationHours;
    const storedEnergyWh = this.battery.socDeltaWh(powerW, hours);

    let batteryDrawW = 0;
    let dcChargeW = 0;
    let dcSpillW = profile.dcPvW;
    if (powerW > 0) {
      const storedW = powerW * this.battery.chargeEfficiency;
      dcChargeW = Math.min(storedW, profile.dcPvW * this.pv.dcEfficiency);
      dcSpillW = Math.max(0, profile.dcPvW - dcChargeW / this.pv.dcEfficiency);
      batteryDrawW = (storedW - dcChargeW) / this.battery.chargeEfficiency;
    } else if (powerW < 0) {
      batteryDrawW = powerW;
    }

    const acBusPvW = profile.acPvW + dcSpillW * this.pv.dcSpillEfficiency;
    const netGridW = profile.consumptionW - acBusPvW + batteryDrawW;
    const gridEnergyWh = netGridW * hours;

    const importCostEur = gridEnergyWh > 0
      ? (profile.buyPriceEurPerKwh * gridEnergyWh) / WATT_HOURS_PER_KWH
      : 0;
    const feedInRevenueEur = gridEnergyWh < 0
      ? (profile.feedInPriceEurPerKwh * -gridEnergyWh) / WATT_HOURS_PER_KWH
      : 0;
    const degradationCostEur =
      (this.battery.config.degradationCostEurPerKwh * Math.abs(storedEnergyWh)) / WATT_HOURS_PER_KWH;

    return {
      gridEnergyWh,
      importCostEur,
      feedInRevenueEur,
      degradationCostEur,
      costEur: importCostEur + degradationCostEur - feedInRevenueEur,
      storedEnergyWh,
      dcChargeW,
      dcSpillW,
    };
  }

  stepCost(profile: StepProfile, powerW: number): number {
    return this.evaluate(profile, powerW).costEur;
  }

  baselineCost(profile: StepProfile): number {
    return this.stepCost(profile, 0);
  }

  /** PV power reaching the AC bus with the battery idle, minus consumption. */
  pvSurplusW(profile: StepProfile): number {
    return profile.acPvW + profile.dcPvW * this.pv.dcSpillEfficiency - profile.consumptionW;
  }
}
