import type { BatteryConfig, EffectiveMode } from "@wattplan/domain";
import { assertNever, Power } from "@wattplan/domain";

/** One reading from the site meter and the battery inverter. Positive grid = import, positive battery = charging. */
export interface LiveMeasurement {
  gridPowerW: number | null;
  batteryPowerW: number | null;
  socWh: number | null;
}

export interface BalancerSettings {
  battery: BatteryConfig;
  deadbandW: number;
}

export interface BalancerOutput {
  targetW: number;
  rawTargetW: number;
  inert: boolean;
}

/**
 * Tactical controller. Only the previously commanded target survives between ticks.
 */
export class RealTimeBalancer {
  private previousTargetW = 0;

  constructor(private readonly settings: BalancerSettings) {}

  get previousTarget(): number {
    return this.previousTargetW;
  }

  reset(): void {
    this.previousTargetW = 0;
  }

  tick(measurement: LiveMeasurement, mode: EffectiveMode): BalancerOutput {
    const rawTargetW = this.rawTarget(measurement, mode);
    if (rawTargetW === null) {
      // Inverter falls back to its own self-consumption logic
      return {targetW: 0, rawTargetW: 0, inert: true};
    }

    const limited = this.clampToLimits(rawTargetW, measurement.socWh);
    const previous = Power.fromWatts(this.previousTargetW);
    if (!previous.differsBy(Power.fromWatts(limited), Power.fromWatts(this.settings.deadbandW))) {
      return {targetW: this.previousTargetW, rawTargetW, inert: false};
    }
    this.previousTargetW = limited;
    return {targetW: limited, rawTargetW, inert: false};
  }

  private rawTarget(measurement: LiveMeasurement, mode: EffectiveMode): number | null {
    switch (mode.kind) {
      case "zero_grid": {
        const {gridPowerW, batteryPowerW} = measurement;
        if (gridPowerW === null || batteryPowerW === null) {
          return null;
        }
        return batteryPowerW - gridPowerW;
      }
      case "charging":
      case "discharging":
        return mode.powerW;
      case "idle":
      case "manual":
        return 0;
      default:
        return assertNever(mode);
    }
  }

  private clampToLimits(targetW: number, socWh: number | null): number {
    const {battery} = this.settings;
    let target = Power.fromWatts(targetW)
      .limit(Power.fromWatts(battery.maxChargePowerW), Power.fromWatts(battery.maxDischargePowerW))
      .watts;
    if (socWh !== null) {
      if (socWh >= battery.socMaxWh && target > 0) {
        target = 0;
      }
      if (socWh <= battery.socMinWh && target < 0) {
        target = 0;
      }
    }
    return target;
  }
}
