import { z } from "zod";

import { controlModeSchema } from "@wattplan/domain";

// Numbers may arrive as strings from YAML anchors or env substitution
const numeric = z.union([z.number(), z.string()]).optional();

const batterySchema = z.object({
  capacity_kwh: numeric,
  soc_min_percent: numeric,
  soc_max_percent: numeric,
  max_charge_power_w: numeric,
  max_discharge_power_w: numeric,
  round_trip_efficiency: numeric,
  degradation_cost_eur_per_kwh: numeric,
});

const planningSchema = z.object({
  step_minutes: numeric,
  interval_minutes: numeric,
  soc_resolution_wh: numeric,
  power_step_w: numeric,
  min_price_spread_eur_per_kwh: numeric,
  oscillation_window_hours: numeric,
});

const pvSchema = z.object({
  ac_efficiency: numeric,
  dc_efficiency: numeric,
  dc_spill_efficiency: numeric,
});

const priceSchema = z.object({
  fixed_feed_in_eur_per_kwh: numeric,
});

const controlSchema = z.object({
  mode: controlModeSchema.optional(),
  tick_seconds: numeric,
  deadband_w: numeric,
  telemetry_max_age_seconds: numeric,
});

const forecastSchema = z.object({
  file: z.string().optional(),
});

const loggingSchema = z.object({
  level: z.string().optional(),
});

export const configDocumentSchema = z.object({
  battery: batterySchema.optional(),
  planning: planningSchema.optional(),
  pv: pvSchema.optional(),
  price: priceSchema.optional(),
  control: controlSchema.optional(),
  forecast: forecastSchema.optional(),
  logging: loggingSchema.optional(),
}).passthrough();

export type ConfigDocument = z.infer<typeof configDocumentSchema>;

const seriesValues = z.array(z.number().nullable());

export const forecastSeriesSchema = z.object({
  interval_minutes: z.number().positive(),
  values: seriesValues,
});
export type ForecastSeries = z.infer<typeof forecastSeriesSchema>;

export const pvSeriesSchema = forecastSeriesSchema.extend({
  id: z.string().min(1),
  coupling: z.enum(["ac", "dc"]),
});

/** On-disk horizon document written by whatever fetches prices and forecasts. */
export const horizonFileSchema = z.object({
  start: z.string().datetime({offset: true}).optional(),
  buy_price: forecastSeriesSchema,
  feed_in_price: forecastSeriesSchema.optional(),
  consumption_w: forecastSeriesSchema,
  pv: z.array(pvSeriesSchema).default([]),
});
export type HorizonFile = z.infer<typeof horizonFileSchema>;
