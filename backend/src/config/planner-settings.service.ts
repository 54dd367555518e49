import { Inject, Injectable } from "@nestjs/common";

import type { PlannerSettings } from "./planner-settings.factory";
import type { ConfigDocument } from "./schemas";
import { PlannerSettingsFactory } from "./planner-settings.factory";
import { RuntimeConfigService } from "./runtime-config.service";

@Injectable()
export class PlannerSettingsService {
  private cached: PlannerSettings | null = null;

  constructor(
    @Inject(RuntimeConfigService) private readonly configState: RuntimeConfigService,
    @Inject(PlannerSettingsFactory) private readonly factory: PlannerSettingsFactory,
  ) {
  }

  get(): PlannerSettings {
    this.cached ??= this.factory.create(this.configState.getDocument());
    return this.cached;
  }

  /** Validates and installs a new document. Throws before anything changes if it is invalid. */
  replace(document: ConfigDocument): PlannerSettings {
    const next = this.factory.create(document);
    this.configState.replaceDocument(document);
    this.cached = next;
    return next;
  }
}
