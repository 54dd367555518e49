import { describe, expect, it } from "vitest";

import type { EffectiveMode } from "@wattplan/domain";

import { RealTimeBalancer } from "../src/control/real-time-balancer";
import type { LiveMeasurement } from "../src/control/real-time-balancer";
import { testBattery } from "./helpers";

const ZERO_GRID: EffectiveMode = {kind: "zero_grid"};

function reading(batteryPowerW: number | null, gridPowerW: number | null, socWh: number | null = 5_000): LiveMeasurement {
  return {batteryPowerW, gridPowerW, socWh};
}

describe("RealTimeBalancer", () => {
  it("chases zero grid flow and holds the target inside the deadband", () => {
    const balancer = new RealTimeBalancer({battery: testBattery, deadbandW: 10});

    expect(balancer.tick(reading(0, 300), ZERO_GRID)).toEqual({targetW: -300, rawTargetW: -300, inert: false});
    expect(balancer.tick(reading(-300, 0), ZERO_GRID).targetW).toBe(-300);

    const small = balancer.tick(reading(-300, 5), ZERO_GRID);
    expect(small.rawTargetW).toBe(-305);
    expect(small.targetW).toBe(-300);

    expect(balancer.tick(reading(-300, 50), ZERO_GRID).targetW).toBe(-350);
    expect(balancer.previousTarget).toBe(-350);
  });

  it("goes inert without grid or battery telemetry and keeps the last target", () => {
    const balancer = new RealTimeBalancer({battery: testBattery, deadbandW: 10});
    balancer.tick(reading(0, 400), ZERO_GRID);

    expect(balancer.tick(reading(0, null), ZERO_GRID)).toEqual({targetW: 0, rawTargetW: 0, inert: true});
    expect(balancer.tick(reading(null, 100), ZERO_GRID).inert).toBe(true);
    expect(balancer.previousTarget).toBe(-400);
  });

  it("clamps to the inverter limits", () => {
    const balancer = new RealTimeBalancer({battery: testBattery, deadbandW: 10});
    const output = balancer.tick(reading(0, -8_000), ZERO_GRID);
    expect(output.rawTargetW).toBe(8_000);
    expect(output.targetW).toBe(5_000);
    expect(balancer.tick(reading(0, 9_000), ZERO_GRID).targetW).toBe(-5_000);
  });

  it("stops charging at the top of the SoC window and discharging at the bottom", () => {
    const balancer = new RealTimeBalancer({battery: testBattery, deadbandW: 10});
    expect(balancer.tick(reading(0, -500, 9_000), ZERO_GRID).targetW).toBe(0);
    expect(balancer.tick(reading(0, 500, 1_000), ZERO_GRID).targetW).toBe(0);
    expect(balancer.tick(reading(0, 500, 1_100), ZERO_GRID).targetW).toBe(-500);
  });

  it("passes scheduled power through and parks at zero when idle", () => {
    const balancer = new RealTimeBalancer({battery: testBattery, deadbandW: 10});
    expect(balancer.tick(reading(null, null), {kind: "charging", powerW: 2_000}).targetW).toBe(2_000);
    expect(balancer.tick(reading(null, null), {kind: "discharging", powerW: -1_500}).targetW).toBe(-1_500);
    expect(balancer.tick(reading(null, null), {kind: "idle"}).targetW).toBe(0);
    expect(balancer.tick(reading(null, null), {kind: "manual"}).inert).toBe(false);
  });

  it("forgets the previous target on reset", () => {
    const balancer = new RealTimeBalancer({battery: testBattery, deadbandW: 10});
    balancer.tick(reading(0, 250), ZERO_GRID);
    balancer.reset();
    expect(balancer.previousTarget).toBe(0);
  });
});
