import type { ShadowPrice } from "./types";

const WATT_HOURS_PER_KWH = 1000;

/**
 * Marginal value of stored energy at the current SoC, read off the first row
 * of the value function. Central difference where both neighbours exist,
 * one-sided at the lattice edges.
 */
export function computeShadowPrice(
  valueRow: readonly number[],
  socIndex: number,
  stepEnergyWh: number,
  roundTripEfficiency: number,
): ShadowPrice {
  const stepKwh = stepEnergyWh / WATT_HOURS_PER_KWH;
  let shadowPriceEurPerKwh = 0;
  if (valueRow.length > 1 && stepKwh > 0) {
    const lower = Math.max(0, socIndex - 1);
    const upper = Math.min(valueRow.length - 1, socIndex + 1);
    shadowPriceEurPerKwh = (valueRow[lower] - valueRow[upper]) / ((upper - lower) * stepKwh);
  }
  const efficiency = Math.sqrt(roundTripEfficiency);
  return {
    shadowPriceEurPerKwh,
    dischargeThresholdEurPerKwh: shadowPriceEurPerKwh * efficiency,
    chargeThresholdEurPerKwh: shadowPriceEurPerKwh / efficiency,
  };
}
