import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { PlannerSettingsFactory } from "../src/config/planner-settings.factory";
import { PlannerSettingsService } from "../src/config/planner-settings.service";
import { RuntimeConfigService, setRuntimeConfig } from "../src/config/runtime-config.service";
import { BalancerService, upcomingEntries } from "../src/control/balancer.service";
import { TelemetryService } from "../src/control/telemetry.service";
import { describeCommand, SetpointTranslator } from "../src/hardware/setpoint-translator.service";
import { PlanStore } from "../src/planning/plan-store";
import { StorageService } from "../src/storage/storage.service";
import { buildConfigDocument, buildEntry, buildSnapshot } from "./helpers";

const NOW = new Date("2026-01-01T00:20:00Z");

const timedPlan = buildSnapshot([
  buildEntry({index: 0, start: "2026-01-01T00:00:00.000Z", end: "2026-01-01T00:15:00.000Z", mode: "discharging", power_w: -1_000}),
  buildEntry({index: 1, start: "2026-01-01T00:15:00.000Z", end: "2026-01-01T00:30:00.000Z", mode: "charging", power_w: 2_000}),
  buildEntry({index: 2, start: "2026-01-01T00:30:00.000Z", end: "2026-01-01T00:45:00.000Z"}),
]);

describe("upcomingEntries", () => {
  it("drops entries that have already ended", () => {
    expect(upcomingEntries(timedPlan, NOW).map((entry) => entry.index)).toEqual([1, 2]);
    expect(upcomingEntries(timedPlan, new Date("2026-01-01T00:15:00Z")).map((entry) => entry.index)).toEqual([1, 2]);
  });

  it("keeps untimed entries in order", () => {
    const plan = buildSnapshot([buildEntry({index: 0}), buildEntry({index: 1})]);
    expect(upcomingEntries(plan, NOW)).toHaveLength(2);
    expect(upcomingEntries(null, NOW)).toEqual([]);
  });
});

describe("BalancerService", () => {
  let settings: PlannerSettingsService;
  let storage: StorageService;
  let planStore: PlanStore;
  let telemetry: TelemetryService;
  let translator: SetpointTranslator;
  let service: BalancerService;

  beforeEach(() => {
    setRuntimeConfig(buildConfigDocument());
    settings = new PlannerSettingsService(new RuntimeConfigService(), new PlannerSettingsFactory());
    storage = new StorageService();
    planStore = new PlanStore();
    telemetry = new TelemetryService(settings, storage);
    translator = new SetpointTranslator();
    service = new BalancerService(settings, planStore, telemetry, translator);
  });

  afterEach(() => {
    service.stop();
    storage.onModuleDestroy();
    vi.restoreAllMocks();
  });

  it("balances grid flow to zero when there is no plan", () => {
    const apply = vi.spyOn(translator, "apply");
    telemetry.report({grid_power_w: 300, battery_power_w: 0, soc_percent: 50}, NOW);

    const state = service.tick(NOW);
    expect(state).toEqual({
      timestamp: "2026-01-01T00:20:00.000Z",
      control_mode: "hybrid",
      effective_mode: {kind: "zero_grid"},
      target_power_w: -300,
      raw_target_w: -300,
      inert: false,
      grid_power_w: 300,
      battery_power_w: 0,
      plan_timestamp: null,
    });
    expect(apply).toHaveBeenCalledWith(state);
    expect(apply).toHaveReturnedWith({kind: "power", watts: -300});
    expect(service.getState()).toBe(state);
  });

  it("hands control back to the inverter without telemetry", () => {
    const state = service.tick(NOW);
    expect(state.inert).toBe(true);
    expect(translator.fromControlState(state)).toEqual({kind: "self_consumption"});
  });

  it("treats stale telemetry as missing", () => {
    telemetry.report({grid_power_w: 300, battery_power_w: 0}, new Date("2026-01-01T00:19:29Z"));
    expect(service.tick(NOW).inert).toBe(true);
  });

  it("follows the current plan step", () => {
    planStore.publish(timedPlan);
    service.setControlMode("follow_schedule");
    telemetry.report({grid_power_w: 300, battery_power_w: 0}, NOW);

    const state = service.tick(NOW);
    expect(state.effective_mode).toEqual({kind: "charging", powerW: 2_000});
    expect(state.target_power_w).toBe(2_000);
    expect(state.plan_timestamp).toBe("2026-01-01T00:00:00.000Z");
  });

  it("sends no command in manual mode", () => {
    expect(service.controlMode).toBe("hybrid");
    service.setControlMode("manual");
    telemetry.report({grid_power_w: 300, battery_power_w: 0}, NOW);

    const state = service.tick(NOW);
    expect(state.control_mode).toBe("manual");
    expect(state.target_power_w).toBe(0);
    expect(translator.fromControlState(state)).toEqual({kind: "none"});
  });

  it("picks up a new deadband after reconfiguration", () => {
    telemetry.report({grid_power_w: 300, battery_power_w: 0}, NOW);
    expect(service.tick(NOW).target_power_w).toBe(-300);

    settings.replace(buildConfigDocument({control: {mode: "hybrid", deadband_w: 500}}));
    telemetry.report({grid_power_w: 100, battery_power_w: -300}, NOW);
    const state = service.tick(NOW);
    expect(state.raw_target_w).toBe(-400);
    expect(state.target_power_w).toBe(0);
  });
});

describe("describeCommand", () => {
  it("renders each command kind", () => {
    expect(describeCommand({kind: "power", watts: -1_234.4})).toBe("POWER -1234 W");
    expect(describeCommand({kind: "self_consumption"})).toBe("SELF_CONSUMPTION");
    expect(describeCommand({kind: "none"})).toBe("NONE");
  });
});
