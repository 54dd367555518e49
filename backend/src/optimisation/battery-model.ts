import type { BatteryConfig } from "@wattplan/domain";
import { ConfigurationError } from "@wattplan/domain";

const SOC_EPSILON_WH = 1e-6;

export function validateBatteryConfig(config: BatteryConfig): void {
  const {
    capacityWh,
    socMinWh,
    socMaxWh,
    maxChargePowerW,
    maxDischargePowerW,
    roundTripEfficiency,
    degradationCostEurPerKwh,
  } = config;
  if (!Number.isFinite(capacityWh) || capacityWh <= 0) {
    throw new ConfigurationError(`battery capacity must be > 0 Wh (got ${capacityWh})`, {capacityWh});
  }
  if (!Number.isFinite(roundTripEfficiency) || roundTripEfficiency <= 0 || roundTripEfficiency > 1) {
    throw new ConfigurationError(
      `round-trip efficiency must be within (0, 1] (got ${roundTripEfficiency})`,
      {roundTripEfficiency},
    );
  }
  if (!Number.isFinite(socMinWh) || !Number.isFinite(socMaxWh) || socMinWh < 0 || socMaxWh > capacityWh) {
    throw new ConfigurationError(
      `SoC bounds must lie within [0, ${capacityWh}] Wh (got ${socMinWh}..${socMaxWh})`,
      {socMinWh, socMaxWh, capacityWh},
    );
  }
  if (socMinWh > socMaxWh) {
    throw new ConfigurationError(`SoC minimum ${socMinWh} Wh exceeds maximum ${socMaxWh} Wh`, {socMinWh, socMaxWh});
  }
  if (!Number.isFinite(maxChargePowerW) || maxChargePowerW < 0) {
    throw new ConfigurationError(`max charge power must be >= 0 W (got ${maxChargePowerW})`);
  }
  if (!Number.isFinite(maxDischargePowerW) || maxDischargePowerW < 0) {
    throw new ConfigurationError(`max discharge power must be >= 0 W (got ${maxDischargePowerW})`);
  }
  if (!Number.isFinite(degradationCostEurPerKwh) || degradationCostEurPerKwh < 0) {
    throw new ConfigurationError(`degradation cost must be >= 0 EUR/kWh (got ${degradationCostEurPerKwh})`);
  }
}

/**
 * Physical limits and efficiency conversion of a single battery.
 *
 * Power is signed and measured on the AC side: positive charges, negative discharges.
 * Charging stores P·Δt·ηc, discharging removes P·Δt/ηd, with ηc = ηd = √RTE.
 */
export class BatteryModel {
  readonly chargeEfficiency: number;
  readonly dischargeEfficiency: number;

  constructor(readonly config: BatteryConfig) {
    validateBatteryConfig(config);
    this.chargeEfficiency = Math.sqrt(config.roundTripEfficiency);
    this.dischargeEfficiency = Math.sqrt(config.roundTripEfficiency);
  }

  get roundTripEfficiency(): number {
    return this.config.roundTripEfficiency;
  }

  get socMinWh(): number {
    return this.config.socMinWh;
  }

  get socMaxWh(): number {
    return this.config.socMaxWh;
  }

  socDeltaWh(powerW: number, durationHours: number): number {
    if (powerW > 0) {
      return powerW * durationHours * this.chargeEfficiency;
    }
    if (powerW < 0) {
      return (powerW * durationHours) / this.dischargeEfficiency;
    }
    return 0;
  }

  withinPowerLimits(powerW: number): boolean {
    return powerW <= this.config.maxChargePowerW + SOC_EPSILON_WH
      && -powerW <= this.config.maxDischargePowerW + SOC_EPSILON_WH;
  }

  isFeasible(socWh: number, powerW: number, durationHours: number): boolean {
    if (!this.withinPowerLimits(powerW)) {
      return false;
    }
    const next = socWh + this.socDeltaWh(powerW, durationHours);
    return next >= this.config.socMinWh - SOC_EPSILON_WH && next <= this.config.socMaxWh + SOC_EPSILON_WH;
  }

  clampSoc(socWh: number): number {
    return Math.min(Math.max(socWh, this.config.socMinWh), this.config.socMaxWh);
  }
}
