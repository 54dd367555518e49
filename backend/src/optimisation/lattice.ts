import { ConfigurationError } from "@wattplan/domain";

const EPSILON = 1e-9;

/** Discrete SoC levels from `minWh` to `maxWh` at a fixed resolution. */
export class SocLattice {
  readonly size: number;

  constructor(readonly minWh: number, readonly maxWh: number, readonly resolutionWh: number) {
    if (!Number.isFinite(resolutionWh) || resolutionWh <= 0) {
      throw new ConfigurationError(`SoC resolution must be > 0 Wh (got ${resolutionWh})`);
    }
    this.size = Math.floor((maxWh - minWh) / resolutionWh + EPSILON) + 1;
  }

  energyAt(index: number): number {
    return this.minWh + index * this.resolutionWh;
  }

  nearestIndex(energyWh: number): number {
    const raw = Math.round((energyWh - this.minWh) / this.resolutionWh);
    return Math.max(0, Math.min(this.size - 1, raw));
  }

  /**
   * Highest level not above `energyWh`. Transitions land here so that snapping
   * only ever loses stored energy, charge and discharge alike.
   */
  indexAtOrBelow(energyWh: number): number {
    const raw = Math.floor((energyWh - this.minWh) / this.resolutionWh + EPSILON);
    return Math.max(0, Math.min(this.size - 1, raw));
  }
}

/**
 * Power levels a step may choose from, ordered by distance from idle
 * (0, +step, -step, +2·step, ...). Iterating in this order and only replacing
 * the incumbent on a strictly lower cost breaks ties towards idle.
 */
export class ActionSet {
  readonly powers: readonly number[];

  private constructor(powers: number[]) {
    this.powers = powers;
  }

  static fromLimits(maxChargeW: number, maxDischargeW: number, stepW: number): ActionSet {
    if (!Number.isFinite(stepW) || stepW <= 0) {
      throw new ConfigurationError(`power step must be > 0 W (got ${stepW})`);
    }
    const chargeLevels = Math.floor(maxChargeW / stepW + EPSILON);
    const dischargeLevels = Math.floor(maxDischargeW / stepW + EPSILON);
    const powers = [0];
    const levels = Math.max(chargeLevels, dischargeLevels);
    for (let level = 1; level <= levels; level += 1) {
      if (level <= chargeLevels) {
        powers.push(level * stepW);
      }
      if (level <= dischargeLevels) {
        powers.push(-level * stepW);
      }
    }
    return new ActionSet(powers);
  }

  get size(): number {
    return this.powers.length;
  }

  indexOf(powerW: number): number {
    return this.powers.findIndex((candidate) => Math.abs(candidate - powerW) < EPSILON);
  }
}
