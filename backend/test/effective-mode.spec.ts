import { describe, expect, it } from "vitest";

import type { ControlMode, ScheduleEntry } from "@wattplan/domain";

import { resolveEffectiveMode } from "../src/control/effective-mode";
import type { LiveMeasurement } from "../src/control/real-time-balancer";
import { buildEntry } from "./helpers";

const importing: LiveMeasurement = {gridPowerW: 400, batteryPowerW: 0, socWh: 5_000};
const exporting: LiveMeasurement = {gridPowerW: -1_200, batteryPowerW: 0, socWh: 5_000};

function resolve(controlMode: ControlMode, upcoming: ScheduleEntry[], measurement: LiveMeasurement | null = importing) {
  return resolveEffectiveMode({controlMode, upcoming, measurement});
}

describe("resolveEffectiveMode", () => {
  it("honours manual and zero_grid regardless of the plan", () => {
    const upcoming = [buildEntry({mode: "charging", power_w: 2_000})];
    expect(resolve("manual", upcoming)).toEqual({kind: "manual"});
    expect(resolve("zero_grid", upcoming)).toEqual({kind: "zero_grid"});
  });

  it("falls back to zero_grid without a plan", () => {
    expect(resolve("follow_schedule", [])).toEqual({kind: "zero_grid"});
    expect(resolve("hybrid", [])).toEqual({kind: "zero_grid"});
  });

  it("maps the current step directly when following the schedule", () => {
    expect(resolve("follow_schedule", [buildEntry({mode: "charging", power_w: 2_500})])).toEqual({
      kind: "charging",
      powerW: 2_500,
    });
    expect(resolve("follow_schedule", [buildEntry({mode: "discharging", power_w: -1_000})])).toEqual({
      kind: "discharging",
      powerW: -1_000,
    });
    expect(resolve("follow_schedule", [buildEntry()])).toEqual({kind: "idle"});
  });

  describe("hybrid", () => {
    it("holds energy for a later discharge while importing", () => {
      const upcoming = [buildEntry(), buildEntry({index: 1}), buildEntry({index: 2, mode: "discharging", power_w: -2_000})];
      expect(resolve("hybrid", upcoming)).toEqual({kind: "idle"});
    });

    it("balances an idle step when PV is exporting", () => {
      const upcoming = [buildEntry(), buildEntry({index: 1, mode: "discharging", power_w: -2_000})];
      expect(resolve("hybrid", upcoming, exporting)).toEqual({kind: "zero_grid"});
    });

    it("balances an idle step with no discharge ahead", () => {
      expect(resolve("hybrid", [buildEntry(), buildEntry({index: 1})])).toEqual({kind: "zero_grid"});
    });

    it("discharges at the planned power when exporting pays at least the buy price", () => {
      const entry = buildEntry({mode: "discharging", power_w: -1_000, buy_price_eur_per_kwh: 0.2, feed_in_price_eur_per_kwh: 0.25});
      expect(resolve("hybrid", [entry])).toEqual({kind: "discharging", powerW: -1_000});
      const even = buildEntry({mode: "discharging", power_w: -500, buy_price_eur_per_kwh: 0.1, feed_in_price_eur_per_kwh: 0.1});
      expect(resolve("hybrid", [even])).toEqual({kind: "discharging", powerW: -500});
    });

    it("only covers the house load on an ordinary discharge step", () => {
      const entry = buildEntry({mode: "discharging", power_w: -1_000, buy_price_eur_per_kwh: 0.35});
      expect(resolve("hybrid", [entry])).toEqual({kind: "zero_grid"});
      const free = buildEntry({mode: "discharging", power_w: -1_000, buy_price_eur_per_kwh: 0, feed_in_price_eur_per_kwh: 0.05});
      expect(resolve("hybrid", [free])).toEqual({kind: "zero_grid"});
    });

    it("follows a charge step unless PV is already exporting", () => {
      const entry = buildEntry({mode: "charging", power_w: 3_000});
      expect(resolve("hybrid", [entry])).toEqual({kind: "charging", powerW: 3_000});
      expect(resolve("hybrid", [entry], null)).toEqual({kind: "charging", powerW: 3_000});
      expect(resolve("hybrid", [entry], exporting)).toEqual({kind: "zero_grid"});
    });

    it("keeps charging through export when feed-in is negative", () => {
      const entry = buildEntry({mode: "charging", power_w: 3_000, feed_in_price_eur_per_kwh: -0.01});
      expect(resolve("hybrid", [entry], exporting)).toEqual({kind: "charging", powerW: 3_000});
    });
  });
});
