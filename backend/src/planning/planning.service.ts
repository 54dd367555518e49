import { Inject, Injectable, Logger, OnModuleInit } from "@nestjs/common";

import type { HorizonForecast, PlanSnapshot, ScheduleEntry } from "@wattplan/domain";
import {
  ConfigurationError,
  describeError,
  isPlanningError,
  Percentage,
  SensorUnavailableError,
  TimeSlot,
} from "@wattplan/domain";

import { PlannerSettingsService } from "../config/planner-settings.service";
import { optimizeSchedule } from "../optimisation/optimal-schedule";
import type { PlannedStep, PlanResult } from "../optimisation/types";
import { StorageService } from "../storage/storage.service";
import { PlanStore } from "./plan-store";

export interface PlanningCycleInput {
  forecast: HorizonForecast;
  /** Live SoC in Wh, null when the sensor is unavailable or stale. */
  liveSocWh: number | null;
  warnings?: string[];
  now?: Date;
}

interface ResolvedSoc {
  socWh: number;
  source: PlanSnapshot["soc_source"];
  warnings: string[];
}

@Injectable()
export class PlanningService implements OnModuleInit {
  private readonly logger = new Logger(PlanningService.name);

  constructor(
    @Inject(PlannerSettingsService) private readonly settings: PlannerSettingsService,
    @Inject(StorageService) private readonly storage: StorageService,
    @Inject(PlanStore) private readonly planStore: PlanStore,
  ) {
  }

  onModuleInit(): void {
    const record = this.storage.getLatestPlan();
    if (record) {
      this.planStore.publish(record.payload);
      this.logger.log(`Restored plan from ${record.timestamp}`);
    }
  }

  getLatestPlan(): PlanSnapshot | null {
    return this.planStore.latest();
  }

  /** Runs the optimizer and builds a snapshot without publishing it. */
  compute(input: PlanningCycleInput): PlanSnapshot {
    const now = input.now ?? new Date();
    const {battery, params} = this.settings.get();
    const soc = this.resolveSoc(input.liveSocWh);

    this.logger.log(
      `Planning ${input.forecast.steps} steps of ${input.forecast.stepDuration.minutes} min from ${soc.socWh.toFixed(0)} Wh (${soc.source})`,
    );
    const result = optimizeSchedule({
      battery,
      forecast: input.forecast,
      currentSocWh: soc.socWh,
      params,
    });
    this.logger.log(
      `Plan ready: cost=${result.diagnostics.totalCostEur.toFixed(3)} EUR, ` +
      `savings=${result.diagnostics.savingsEur.toFixed(3)} EUR, filtered=${result.diagnostics.filteredSteps}, ` +
      `solve=${result.diagnostics.solveMs.toFixed(1)} ms`,
    );
    for (const step of result.schedule) {
      this.logger.verbose(
        `step ${step.index}: ${step.mode} ${step.powerW} W, soc ${step.socStartWh}->${step.socWh} Wh, cost ${step.costEur.toFixed(4)} EUR`,
      );
    }

    return this.buildSnapshot(result, input, soc, now);
  }

  publish(snapshot: PlanSnapshot): PlanSnapshot {
    const published = this.planStore.publish(snapshot);
    this.storage.replacePlan(published);
    return published;
  }

  /**
   * Keeps the previous plan after a failed cycle and flags it as degraded.
   * Configuration problems are rethrown.
   */
  recordFailure(error: unknown): PlanSnapshot | null {
    if (error instanceof ConfigurationError) {
      this.logger.error(`Planning configuration invalid: ${error.message}`);
      throw error;
    }
    const message = describeError(error);
    if (isPlanningError(error) && error.kind === "invariant_violation") {
      this.logger.error(`Planning invariant violated: ${message} ${JSON.stringify(error.details)}`);
    } else {
      this.logger.error(`Planning cycle failed: ${message}`);
    }
    const degraded = this.planStore.markDegraded([message]);
    if (degraded) {
      this.storage.replacePlan(degraded);
    } else {
      this.logger.warn("No previous plan to fall back to");
    }
    return degraded;
  }

  /** compute + publish, with failures handled by {@link recordFailure}. */
  runCycle(input: PlanningCycleInput): PlanSnapshot | null {
    try {
      return this.publish(this.compute(input));
    } catch (error) {
      return this.recordFailure(error);
    }
  }

  private resolveSoc(liveSocWh: number | null): ResolvedSoc {
    if (liveSocWh !== null && Number.isFinite(liveSocWh)) {
      return {socWh: liveSocWh, source: "live", warnings: []};
    }
    const observed = this.storage.getLastObservedSoc();
    if (!observed) {
      throw new SensorUnavailableError("No live SoC and no stored observation; cannot plan");
    }
    const message = `Live SoC unavailable; using last observation ${observed.socWh.toFixed(0)} Wh from ${observed.timestamp}`;
    this.logger.warn(message);
    return {socWh: observed.socWh, source: "last_known", warnings: [message]};
  }

  private buildSnapshot(result: PlanResult, input: PlanningCycleInput, soc: ResolvedSoc, now: Date): PlanSnapshot {
    const {battery} = this.settings.get();
    const {forecast} = input;
    const toEntry = (step: PlannedStep): ScheduleEntry => {
      const slot = forecast.start ? TimeSlot.nth(forecast.start, forecast.stepDuration, step.index) : null;
      return {
        index: step.index,
        start: slot ? slot.start.toISOString() : null,
        end: slot ? slot.end.toISOString() : null,
        power_w: step.powerW,
        mode: step.mode,
        soc_start_wh: step.socStartWh,
        soc_wh: step.socWh,
        grid_energy_wh: step.gridEnergyWh,
        cost_eur: step.costEur,
        profit_eur: step.profitEur,
        buy_price_eur_per_kwh: step.buyPriceEurPerKwh,
        feed_in_price_eur_per_kwh: step.feedInPriceEurPerKwh,
      };
    };

    return {
      timestamp: now.toISOString(),
      status: "ok",
      step_minutes: forecast.stepDuration.minutes,
      capacity_wh: battery.capacityWh,
      current_soc_wh: soc.socWh,
      current_soc_percent: Percentage.fromRatio(soc.socWh / battery.capacityWh).percent,
      soc_source: soc.source,
      schedule: result.schedule.map(toEntry),
      shadow_price: {
        shadow_price_eur_per_kwh: result.shadowPrice.shadowPriceEurPerKwh,
        discharge_threshold_eur_per_kwh: result.shadowPrice.dischargeThresholdEurPerKwh,
        charge_threshold_eur_per_kwh: result.shadowPrice.chargeThresholdEurPerKwh,
      },
      diagnostics: {
        total_cost_eur: result.diagnostics.totalCostEur,
        baseline_cost_eur: result.diagnostics.baselineCostEur,
        savings_eur: result.diagnostics.savingsEur,
        filtered_steps: result.diagnostics.filteredSteps,
        soc_states: result.diagnostics.socStates,
        actions: result.diagnostics.actions,
        solve_ms: result.diagnostics.solveMs,
      },
      warnings: [...(input.warnings ?? []), ...soc.warnings],
      errors: [],
    };
  }
}
