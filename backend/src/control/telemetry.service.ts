import { Inject, Injectable, Logger } from "@nestjs/common";

import type { TelemetryReport } from "@wattplan/domain";
import { Duration, Percentage } from "@wattplan/domain";

import { PlannerSettingsService } from "../config/planner-settings.service";
import { StorageService } from "../storage/storage.service";
import type { LiveMeasurement } from "./real-time-balancer";

interface StoredMeasurement {
  measurement: LiveMeasurement;
  receivedAt: Date;
}

/** Latest readings pushed by the site agent. */
@Injectable()
export class TelemetryService {
  private readonly logger = new Logger(TelemetryService.name);
  private latest: StoredMeasurement | null = null;

  constructor(
    @Inject(PlannerSettingsService) private readonly settings: PlannerSettingsService,
    @Inject(StorageService) private readonly storage: StorageService,
  ) {
  }

  report(report: TelemetryReport, now: Date = new Date()): LiveMeasurement {
    const {battery} = this.settings.get();
    const socWh = report.soc_percent == null
      ? null
      : Percentage.fromPercent(report.soc_percent).of(battery.capacityWh);
    const measurement: LiveMeasurement = {
      gridPowerW: report.grid_power_w,
      batteryPowerW: report.battery_power_w,
      socWh,
    };
    this.latest = {measurement, receivedAt: now};
    if (socWh !== null) {
      this.storage.recordSoc({timestamp: now.toISOString(), socWh});
    }
    this.logger.verbose(
      `Telemetry: grid=${report.grid_power_w ?? "n/a"} W, battery=${report.battery_power_w ?? "n/a"} W, soc=${socWh ?? "n/a"} Wh`,
    );
    return measurement;
  }

  /** The latest measurement, or null once it is older than the configured maximum age. */
  current(now: Date = new Date()): LiveMeasurement | null {
    if (!this.latest) {
      return null;
    }
    const maxAge = Duration.fromSeconds(this.settings.get().control.telemetryMaxAgeSeconds);
    if (Duration.between(this.latest.receivedAt, now).milliseconds > maxAge.milliseconds) {
      return null;
    }
    return this.latest.measurement;
  }

  currentSocWh(now: Date = new Date()): number | null {
    return this.current(now)?.socWh ?? null;
  }
}
