export { Duration } from "./duration";
export { Power } from "./power";
export { Energy } from "./energy";
export { EnergyPrice } from "./energy-price";
export { Percentage } from "./percentage";
export { TimeSlot } from "./time-slot";
export * from "./errors";
export * from "./modes";
export * from "./plan";
export { DEFAULT_PLANNING_PARAMETERS, DEFAULT_PV_EFFICIENCIES } from "./battery";
export type { BatteryConfig, PlanningParameters, PvEfficiencies } from "./battery";
export type { HorizonForecast, PvArrayForecast, PvCoupling } from "./forecast";
