import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { Duration, MissingInputError } from "@wattplan/domain";

import { ForecastAssemblyService, padSeries, resampleSeries } from "../src/config/forecast-assembly.service";
import { horizonFileSchema } from "../src/config/schemas";

const FIXTURE = join(process.cwd(), "fixtures", "horizon.json");
const settings = {stepDuration: Duration.fromMinutes(15), fixedFeedInEurPerKwh: 0.07};

function expectSeries(actual: (number | null)[], expected: (number | null)[]): void {
  expect(actual).toHaveLength(expected.length);
  expected.forEach((value, index) => {
    if (value === null) {
      expect(actual[index]).toBeNull();
    } else {
      expect(actual[index]).toBeCloseTo(value, 4);
    }
  });
}

describe("resampleSeries", () => {
  it("averages when coarsening", () => {
    expect(resampleSeries([1, 2, 3, 4], 15, 30)).toEqual([1.5, 3.5]);
  });

  it("repeats when refining", () => {
    expect(resampleSeries([10, 20], 60, 15)).toEqual([10, 10, 10, 10, 20, 20, 20, 20]);
  });

  it("weights by overlap on uneven ratios", () => {
    expectSeries(resampleSeries([1, 2, 3], 20, 30), [1.3333, 2.6667]);
  });

  it("carries gaps through", () => {
    expect(resampleSeries([1, null], 60, 30)).toEqual([1, 1, null, null]);
    expect(resampleSeries([1, null, 3, 4], 15, 30)).toEqual([null, 3.5]);
  });

  it("drops a trailing partial step", () => {
    expect(resampleSeries([1, 2, 3], 15, 30)).toEqual([1.5]);
  });
});

describe("padSeries", () => {
  it("extends with the filler and truncates overlong input", () => {
    expect(padSeries([1, 2], 4, (last) => last ?? 0)).toEqual([1, 2, 2, 2]);
    expect(padSeries([1, 2, 3], 2, () => 0)).toEqual([1, 2]);
    expect(padSeries<number>([], 2, (last) => last ?? 9)).toEqual([9, 9]);
  });
});

describe("ForecastAssemblyService", () => {
  const service = new ForecastAssemblyService();

  it("falls back to the fixed feed-in price with a warning", () => {
    const file = horizonFileSchema.parse({
      buy_price: {interval_minutes: 15, values: [0.3, 0.2, 0.1, 0.2]},
      consumption_w: {interval_minutes: 15, values: [500, 500, 500, 500]},
    });
    const {forecast, warnings} = service.assemble(file, settings);

    expect(warnings).toEqual(["No feed-in price forecast; using fixed 7.00 ct/kWh"]);
    expect(forecast.steps).toBe(4);
    expect(forecast.feedInPriceEurPerKwh).toEqual([0.07, 0.07, 0.07, 0.07]);
    expect(forecast.pvArrays).toEqual([]);
    expect(forecast.start).toBeUndefined();
  });

  it("pads short feed-in, consumption and PV series", () => {
    const file = horizonFileSchema.parse({
      start: "2026-03-01T12:00:00Z",
      buy_price: {interval_minutes: 15, values: [0.3, 0.3, 0.3, 0.3]},
      feed_in_price: {interval_minutes: 15, values: [0.06, 0.08]},
      consumption_w: {interval_minutes: 15, values: [400, 600, 800]},
      pv: [{id: "garage", coupling: "ac", interval_minutes: 15, values: [100, null]}],
    });
    const {forecast, warnings} = service.assemble(file, settings);

    expect(warnings).toEqual(["Feed-in price forecast covers 2 of 4 steps; repeating its last value"]);
    expect(forecast.feedInPriceEurPerKwh).toEqual([0.06, 0.08, 0.08, 0.08]);
    expect(forecast.consumptionW).toEqual([400, 600, 800, 800]);
    expect(forecast.pvArrays).toEqual([{id: "garage", coupling: "ac", powerW: [100, 0, 0, 0]}]);
    expect(forecast.start?.toISOString()).toBe("2026-03-01T12:00:00.000Z");
  });

  it("keeps buy price gaps for the optimizer to refuse", () => {
    const file = horizonFileSchema.parse({
      buy_price: {interval_minutes: 15, values: [0.3, null]},
      feed_in_price: {interval_minutes: 15, values: [0.07, 0.07]},
      consumption_w: {interval_minutes: 15, values: [400, 400]},
    });
    expect(service.assemble(file, settings).forecast.buyPriceEurPerKwh).toEqual([0.3, null]);
  });

  it("rejects a consumption gap", () => {
    const file = horizonFileSchema.parse({
      buy_price: {interval_minutes: 15, values: [0.3, 0.3]},
      consumption_w: {interval_minutes: 15, values: [400, null]},
    });
    expect(() => service.assemble(file, settings)).toThrow("consumption forecast has a gap at step 1");
  });

  it("loads and resamples the bundled horizon file", async () => {
    const file = await service.loadHorizonFile(FIXTURE);
    const {forecast} = service.assemble(file, settings);

    expect(forecast.steps).toBe(96);
    expectSeries(forecast.buyPriceEurPerKwh.slice(0, 5), [0.28, 0.28, 0.28, 0.28, 0.26]);
    expect(forecast.pvArrays.map((array) => array.id)).toEqual(["roof-south"]);
    expect(forecast.start?.toISOString()).toBe("2026-05-31T22:00:00.000Z");
  });

  describe("with files on disk", () => {
    let directory: string;

    beforeAll(async () => {
      directory = await mkdtemp(join(tmpdir(), "wattplan-forecast-"));
      await writeFile(join(directory, "broken.json"), "{ not json");
      await writeFile(join(directory, "incomplete.json"), JSON.stringify({buy_price: {interval_minutes: 15, values: []}}));
    });

    afterAll(async () => {
      await rm(directory, {recursive: true, force: true});
    });

    it("reports an unreadable file as missing input", async () => {
      await expect(service.loadHorizonFile(join(directory, "absent.json"))).rejects.toBeInstanceOf(MissingInputError);
    });

    it("reports invalid JSON as missing input", async () => {
      await expect(service.loadHorizonFile(join(directory, "broken.json"))).rejects.toThrow("is not valid JSON");
    });

    it("reports a schema mismatch as missing input", async () => {
      await expect(service.loadHorizonFile(join(directory, "incomplete.json"))).rejects.toThrow("is malformed");
    });
  });
});
