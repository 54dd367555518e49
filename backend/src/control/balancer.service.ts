import { Inject, Injectable, Logger, OnModuleDestroy } from "@nestjs/common";

import type { ControlMode, ControlState, PlanSnapshot, ScheduleEntry } from "@wattplan/domain";
import { describeEffectiveMode, describeError } from "@wattplan/domain";

import type { PlannerSettings } from "../config/planner-settings.factory";
import { PlannerSettingsService } from "../config/planner-settings.service";
import { SetpointTranslator } from "../hardware/setpoint-translator.service";
import { PlanStore } from "../planning/plan-store";
import { resolveEffectiveMode } from "./effective-mode";
import type { LiveMeasurement } from "./real-time-balancer";
import { RealTimeBalancer } from "./real-time-balancer";
import { TelemetryService } from "./telemetry.service";

const NO_MEASUREMENT: LiveMeasurement = {gridPowerW: null, batteryPowerW: null, socWh: null};

/** Plan entries that have not ended yet; entries without timestamps are taken in order. */
export function upcomingEntries(plan: PlanSnapshot | null, now: Date): readonly ScheduleEntry[] {
  if (!plan) {
    return [];
  }
  return plan.schedule.filter((entry) => entry.end === null || new Date(entry.end).getTime() > now.getTime());
}

@Injectable()
export class BalancerService implements OnModuleDestroy {
  private readonly logger = new Logger(BalancerService.name);
  private timer: ReturnType<typeof setInterval> | null = null;
  private balancer: RealTimeBalancer | null = null;
  private balancerSettings: PlannerSettings | null = null;
  private controlModeOverride: ControlMode | null = null;
  private lastState: ControlState | null = null;

  constructor(
    @Inject(PlannerSettingsService) private readonly settings: PlannerSettingsService,
    @Inject(PlanStore) private readonly planStore: PlanStore,
    @Inject(TelemetryService) private readonly telemetry: TelemetryService,
    @Inject(SetpointTranslator) private readonly translator: SetpointTranslator,
  ) {
  }

  get controlMode(): ControlMode {
    return this.controlModeOverride ?? this.settings.get().control.mode;
  }

  setControlMode(mode: ControlMode): ControlMode {
    this.controlModeOverride = mode;
    this.logger.log(`Control mode set to ${mode}`);
    return mode;
  }

  getState(): ControlState | null {
    return this.lastState;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    const intervalMs = this.settings.get().control.tickSeconds * 1000;
    this.timer = setInterval(() => {
      try {
        this.tick();
      } catch (error) {
        this.logger.error(`Balancer tick failed: ${describeError(error)}`);
      }
    }, intervalMs);
    this.logger.log(`Balancer ticking every ${intervalMs} ms`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  onModuleDestroy(): void {
    this.stop();
  }

  tick(now: Date = new Date()): ControlState {
    const settings = this.settings.get();
    if (!this.balancer || this.balancerSettings !== settings) {
      this.balancer = new RealTimeBalancer({battery: settings.battery, deadbandW: settings.control.deadbandW});
      this.balancerSettings = settings;
    }

    const plan = this.planStore.latest();
    const measurement = this.telemetry.current(now);
    const controlMode = this.controlMode;
    const effectiveMode = resolveEffectiveMode({
      controlMode,
      upcoming: upcomingEntries(plan, now),
      measurement,
    });
    const output = this.balancer.tick(measurement ?? NO_MEASUREMENT, effectiveMode);

    const state: ControlState = {
      timestamp: now.toISOString(),
      control_mode: controlMode,
      effective_mode: effectiveMode,
      target_power_w: output.targetW,
      raw_target_w: output.rawTargetW,
      inert: output.inert,
      grid_power_w: measurement?.gridPowerW ?? null,
      battery_power_w: measurement?.batteryPowerW ?? null,
      plan_timestamp: plan?.timestamp ?? null,
    };
    this.logger.verbose(
      `${describeEffectiveMode(effectiveMode)} target=${output.targetW} W${output.inert ? " (inert)" : ""}`,
    );
    this.translator.apply(state);
    this.lastState = state;
    return state;
  }
}
