import type { Duration } from "./duration";

export type PvCoupling = "ac" | "dc";

export interface PvArrayForecast {
  id: string;
  /** "ac" arrays feed the house through their own inverter, "dc" arrays sit on the battery inverter's DC bus. */
  coupling: PvCoupling;
  powerW: readonly number[];
}

/**
 * Everything the optimizer needs about the future, one entry per step.
 * Price entries are nullable so that gaps from a source survive until validation;
 * the optimizer refuses to plan across them.
 */
export interface HorizonForecast {
  steps: number;
  stepDuration: Duration;
  start?: Date;
  buyPriceEurPerKwh: readonly (number | null)[];
  feedInPriceEurPerKwh: readonly (number | null)[];
  pvArrays: readonly PvArrayForecast[];
  consumptionW: readonly number[];
}
