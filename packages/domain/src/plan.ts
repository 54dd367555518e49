import { z } from "zod";

import { controlModeSchema, effectiveModeSchema, scheduleModeSchema } from "./modes";

export const scheduleEntrySchema = z.object({
  index: z.number().int().nonnegative(),
  start: z.string().nullable(),
  end: z.string().nullable(),
  power_w: z.number(),
  mode: scheduleModeSchema,
  soc_start_wh: z.number(),
  soc_wh: z.number(),
  grid_energy_wh: z.number(),
  cost_eur: z.number(),
  profit_eur: z.number(),
  buy_price_eur_per_kwh: z.number(),
  feed_in_price_eur_per_kwh: z.number(),
});
export type ScheduleEntry = z.infer<typeof scheduleEntrySchema>;

export const shadowPriceSchema = z.object({
  shadow_price_eur_per_kwh: z.number(),
  discharge_threshold_eur_per_kwh: z.number(),
  charge_threshold_eur_per_kwh: z.number(),
});
export type ShadowPricePayload = z.infer<typeof shadowPriceSchema>;

export const planDiagnosticsSchema = z.object({
  total_cost_eur: z.number(),
  baseline_cost_eur: z.number(),
  savings_eur: z.number(),
  filtered_steps: z.number().int().nonnegative(),
  soc_states: z.number().int().positive(),
  actions: z.number().int().positive(),
  solve_ms: z.number().nonnegative(),
});
export type PlanDiagnostics = z.infer<typeof planDiagnosticsSchema>;

export const planStatusSchema = z.enum(["ok", "degraded"]);
export type PlanStatus = z.infer<typeof planStatusSchema>;

export const planSnapshotSchema = z.object({
  timestamp: z.string(),
  status: planStatusSchema,
  step_minutes: z.number().positive(),
  capacity_wh: z.number().positive(),
  current_soc_wh: z.number(),
  current_soc_percent: z.number(),
  soc_source: z.enum(["live", "last_known"]),
  schedule: z.array(scheduleEntrySchema),
  shadow_price: shadowPriceSchema,
  diagnostics: planDiagnosticsSchema,
  warnings: z.array(z.string()),
  errors: z.array(z.string()),
});
export type PlanSnapshot = z.infer<typeof planSnapshotSchema>;

export const planSummarySchema = z.object({
  timestamp: z.string(),
  status: planStatusSchema,
  current_soc_percent: z.number(),
  current_mode: scheduleModeSchema,
  current_power_w: z.number(),
  shadow_price_ct_per_kwh: z.number(),
  charge_threshold_ct_per_kwh: z.number(),
  discharge_threshold_ct_per_kwh: z.number(),
  projected_cost_eur: z.number(),
  baseline_cost_eur: z.number(),
  projected_savings_eur: z.number(),
  forecast_hours: z.number(),
  forecast_samples: z.number().int(),
  warnings: z.array(z.string()),
  errors: z.array(z.string()),
});
export type PlanSummary = z.infer<typeof planSummarySchema>;

export const telemetryReportSchema = z.object({
  grid_power_w: z.number().finite().nullable(),
  battery_power_w: z.number().finite().nullable(),
  soc_percent: z.number().min(0).max(100).nullable().optional(),
});
export type TelemetryReport = z.infer<typeof telemetryReportSchema>;

export const controlStateSchema = z.object({
  timestamp: z.string(),
  control_mode: controlModeSchema,
  effective_mode: effectiveModeSchema,
  target_power_w: z.number(),
  raw_target_w: z.number(),
  inert: z.boolean(),
  grid_power_w: z.number().nullable(),
  battery_power_w: z.number().nullable(),
  plan_timestamp: z.string().nullable(),
});
export type ControlState = z.infer<typeof controlStateSchema>;
