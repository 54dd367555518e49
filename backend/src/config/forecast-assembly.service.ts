import { readFile } from "node:fs/promises";
import { Injectable, Logger } from "@nestjs/common";

import type { HorizonForecast, PvArrayForecast } from "@wattplan/domain";
import { describeError, Duration, EnergyPrice, MissingInputError } from "@wattplan/domain";

import type { ForecastSeries, HorizonFile } from "./schemas";
import { horizonFileSchema } from "./schemas";

export interface AssemblySettings {
  stepDuration: Duration;
  fixedFeedInEurPerKwh: number;
}

export interface AssembledForecast {
  forecast: HorizonForecast;
  warnings: string[];
}

/**
 * Resamples a series onto a new step length. Each target step is the
 * overlap-weighted mean of the source steps it covers; a gap in any of those
 * makes the target step a gap too. Trailing partial steps are dropped.
 */
export function resampleSeries(
  values: readonly (number | null)[],
  sourceMinutes: number,
  targetMinutes: number,
): (number | null)[] {
  if (sourceMinutes === targetMinutes) {
    return [...values];
  }
  if (!values.length) {
    return [];
  }
  const totalMinutes = values.length * sourceMinutes;
  const targetSteps = Math.floor(totalMinutes / targetMinutes + 1e-9);
  const resampled: (number | null)[] = [];
  for (let index = 0; index < targetSteps; index += 1) {
    const targetStart = index * targetMinutes;
    const targetEnd = targetStart + targetMinutes;
    const first = Math.floor(targetStart / sourceMinutes);
    const last = Math.min(values.length - 1, Math.ceil(targetEnd / sourceMinutes) - 1);
    let weightedSum = 0;
    let totalWeight = 0;
    let gap = false;
    for (let source = first; source <= last; source += 1) {
      const overlap = Math.min(targetEnd, (source + 1) * sourceMinutes) - Math.max(targetStart, source * sourceMinutes);
      if (overlap <= 0) {
        continue;
      }
      const value = values[source];
      if (value === null) {
        gap = true;
        break;
      }
      weightedSum += value * overlap;
      totalWeight += overlap;
    }
    resampled.push(gap || totalWeight === 0 ? null : weightedSum / totalWeight);
  }
  return resampled;
}

export function padSeries<T>(values: readonly T[], length: number, filler: (last: T | undefined) => T): T[] {
  const result = values.slice(0, length);
  while (result.length < length) {
    result.push(filler(result.length > 0 ? result[result.length - 1] : undefined));
  }
  return result;
}

@Injectable()
export class ForecastAssemblyService {
  private readonly logger = new Logger(ForecastAssemblyService.name);

  async loadHorizonFile(path: string): Promise<HorizonFile> {
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch (error) {
      throw new MissingInputError(`Cannot read forecast file ${path}: ${describeError(error)}`, {path});
    }
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new MissingInputError(`Forecast file ${path} is not valid JSON: ${describeError(error)}`, {path});
    }
    const result = horizonFileSchema.safeParse(json);
    if (!result.success) {
      throw new MissingInputError(`Forecast file ${path} is malformed: ${result.error.issues[0]?.message ?? "unknown"}`, {path});
    }
    return result.data;
  }

  assemble(file: HorizonFile, settings: AssemblySettings): AssembledForecast {
    const stepMinutes = settings.stepDuration.minutes;
    const warnings: string[] = [];
    const resample = (series: ForecastSeries) => resampleSeries(series.values, series.interval_minutes, stepMinutes);

    const buy = resample(file.buy_price);
    const steps = buy.length;

    let feedIn: (number | null)[];
    if (file.feed_in_price) {
      const resampled = resample(file.feed_in_price);
      if (resampled.length < steps) {
        const message = `Feed-in price forecast covers ${resampled.length} of ${steps} steps; repeating its last value`;
        this.logger.warn(message);
        warnings.push(message);
      }
      feedIn = padSeries(resampled, steps, (last) => last ?? null);
    } else {
      const fixed = EnergyPrice.fromEurPerKwh(settings.fixedFeedInEurPerKwh);
      const message = `No feed-in price forecast; using fixed ${fixed.format()}`;
      this.logger.warn(message);
      warnings.push(message);
      feedIn = new Array<number | null>(steps).fill(fixed.eurPerKwh);
    }

    const consumptionRaw = resample(file.consumption_w);
    const consumptionW = padSeries(consumptionRaw, steps, (last) => last ?? null)
      .map((value, index) => {
        if (value === null) {
          throw new MissingInputError(`consumption forecast has a gap at step ${index}`, {index});
        }
        return value;
      });

    const pvArrays: PvArrayForecast[] = file.pv.map((array) => ({
      id: array.id,
      coupling: array.coupling,
      powerW: padSeries(resample(array), steps, () => 0).map((value) => value ?? 0),
    }));

    if (steps > 0 && buy.some((value) => value === null)) {
      this.logger.warn("Buy price forecast contains gaps; planning will be refused");
    }
    this.logger.verbose(
      `Assembled ${steps} steps of ${stepMinutes} min (${pvArrays.length} PV arrays, feed-in ${file.feed_in_price ? "forecast" : "fixed"})`,
    );

    return {
      forecast: {
        steps,
        stepDuration: settings.stepDuration,
        start: file.start ? new Date(file.start) : undefined,
        buyPriceEurPerKwh: buy,
        feedInPriceEurPerKwh: feedIn,
        pvArrays,
        consumptionW,
      },
      warnings,
    };
  }
}
