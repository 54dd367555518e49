import { z } from "zod";

export const scheduleModeSchema = z.enum(["charging", "discharging", "idle"]);
export type ScheduleMode = z.infer<typeof scheduleModeSchema>;

/** What the operator selected. */
export const controlModeSchema = z.enum(["zero_grid", "follow_schedule", "hybrid", "manual"]);
export type ControlMode = z.infer<typeof controlModeSchema>;

/** What the tactical loop actually does this tick. */
export type EffectiveMode =
  | { kind: "charging"; powerW: number }
  | { kind: "discharging"; powerW: number }
  | { kind: "idle" }
  | { kind: "zero_grid" }
  | { kind: "manual" };

export type EffectiveModeKind = EffectiveMode["kind"];

export const effectiveModeSchema = z.discriminatedUnion("kind", [
  z.object({kind: z.literal("charging"), powerW: z.number()}),
  z.object({kind: z.literal("discharging"), powerW: z.number()}),
  z.object({kind: z.literal("idle")}),
  z.object({kind: z.literal("zero_grid")}),
  z.object({kind: z.literal("manual")}),
]);

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

export function scheduleModeFromPower(powerW: number): ScheduleMode {
  if (powerW > 0) {
    return "charging";
  }
  if (powerW < 0) {
    return "discharging";
  }
  return "idle";
}

export function describeEffectiveMode(mode: EffectiveMode): string {
  switch (mode.kind) {
    case "charging":
      return `CHARGING@${Math.round(mode.powerW)}W`;
    case "discharging":
      return `DISCHARGING@${Math.round(Math.abs(mode.powerW))}W`;
    case "idle":
      return "IDLE";
    case "zero_grid":
      return "ZERO_GRID";
    case "manual":
      return "MANUAL";
    default:
      return assertNever(mode);
  }
}
