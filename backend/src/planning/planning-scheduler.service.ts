import { resolve } from "node:path";
import { Inject, Injectable, Logger, OnModuleDestroy } from "@nestjs/common";

import type { PlanSnapshot } from "@wattplan/domain";
import { describeError, MissingInputError } from "@wattplan/domain";

import { TelemetryService } from "../control/telemetry.service";
import { ForecastAssemblyService } from "../config/forecast-assembly.service";
import { PlannerSettingsService } from "../config/planner-settings.service";
import type { ConfigDocument } from "../config/schemas";
import { PlanningService } from "./planning.service";

/**
 * Strategic loop. One cycle at a time; a cycle that started before the last
 * reconfiguration is thrown away instead of being published.
 */
@Injectable()
export class PlanningSchedulerService implements OnModuleDestroy {
  private readonly logger = new Logger(PlanningSchedulerService.name);
  private schedulerTimer: ReturnType<typeof setTimeout> | null = null;
  private runInProgress = false;
  private active = false;
  private generation = 0;

  constructor(
    @Inject(PlannerSettingsService) private readonly settings: PlannerSettingsService,
    @Inject(ForecastAssemblyService) private readonly forecastAssembly: ForecastAssemblyService,
    @Inject(PlanningService) private readonly planningService: PlanningService,
    @Inject(TelemetryService) private readonly telemetry: TelemetryService,
  ) {
  }

  get currentGeneration(): number {
    return this.generation;
  }

  start(): void {
    this.active = true;
    this.runOnce().catch((error) => this.logger.error(`Initial planning run failed: ${describeError(error)}`));
  }

  stop(): void {
    this.active = false;
    if (this.schedulerTimer) {
      clearTimeout(this.schedulerTimer);
      this.schedulerTimer = null;
    }
  }

  onModuleDestroy(): void {
    this.stop();
  }

  reconfigure(document: ConfigDocument): void {
    this.settings.replace(document);
    this.generation += 1;
    this.logger.log(`Configuration replaced; planning generation is now ${this.generation}`);
  }

  async runOnce(): Promise<PlanSnapshot | null> {
    if (this.runInProgress) {
      this.logger.warn("Planning already running; skipping new request.");
      return null;
    }
    this.runInProgress = true;
    const generation = this.generation;
    try {
      const settings = this.settings.get();
      if (!settings.forecastFile) {
        throw new MissingInputError("forecast.file is not configured");
      }
      const file = await this.forecastAssembly.loadHorizonFile(resolve(process.cwd(), settings.forecastFile));
      const {forecast, warnings} = this.forecastAssembly.assemble(file, settings);
      const snapshot = this.planningService.compute({
        forecast,
        warnings,
        liveSocWh: this.telemetry.currentSocWh(),
      });
      if (generation !== this.generation) {
        this.logger.warn(`Discarding plan from stale generation ${generation}`);
        return null;
      }
      return this.planningService.publish(snapshot);
    } catch (error) {
      if (generation !== this.generation) {
        this.logger.warn(`Ignoring failure from stale generation ${generation}: ${describeError(error)}`);
        return null;
      }
      return this.planningService.recordFailure(error);
    } finally {
      this.runInProgress = false;
      this.scheduleNextRun();
    }
  }

  private scheduleNextRun(): void {
    if (this.schedulerTimer) {
      clearTimeout(this.schedulerTimer);
      this.schedulerTimer = null;
    }
    if (!this.active) {
      return;
    }
    const delayMs = Math.max(1000, this.settings.get().planningInterval.milliseconds);
    this.schedulerTimer = setTimeout(() => {
      this.runOnce().catch((error) => this.logger.error(`Scheduled run failed: ${describeError(error)}`));
    }, delayMs);
    this.logger.log(`Next planning run in ${(delayMs / 60000).toFixed(2)} minutes`);
  }
}
