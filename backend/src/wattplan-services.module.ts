import { Module } from "@nestjs/common";

import { ConfigFileService } from "./config/config-file.service";
import { ForecastAssemblyService } from "./config/forecast-assembly.service";
import { PlannerSettingsFactory } from "./config/planner-settings.factory";
import { PlannerSettingsService } from "./config/planner-settings.service";
import { RuntimeConfigService } from "./config/runtime-config.service";
import { BalancerService } from "./control/balancer.service";
import { TelemetryService } from "./control/telemetry.service";
import { SetpointTranslator } from "./hardware/setpoint-translator.service";
import { PlanStore } from "./planning/plan-store";
import { PlanningSchedulerService } from "./planning/planning-scheduler.service";
import { PlanningService } from "./planning/planning.service";
import { SummaryService } from "./planning/summary.service";
import { StorageModule } from "./storage/storage.module";

@Module({
  imports: [StorageModule],
  providers: [
    ConfigFileService,
    RuntimeConfigService,
    PlannerSettingsFactory,
    PlannerSettingsService,
    ForecastAssemblyService,
    PlanStore,
    PlanningService,
    PlanningSchedulerService,
    SummaryService,
    TelemetryService,
    BalancerService,
    SetpointTranslator,
  ],
  exports: [
    ConfigFileService,
    RuntimeConfigService,
    PlannerSettingsService,
    ForecastAssemblyService,
    PlanStore,
    PlanningService,
    PlanningSchedulerService,
    SummaryService,
    TelemetryService,
    BalancerService,
    SetpointTranslator,
  ],
})
export class WattplanServicesModule {}
