import { Injectable, Logger } from "@nestjs/common";

import type { PlanSnapshot, PlanSummary } from "@wattplan/domain";
import { EnergyPrice } from "@wattplan/domain";

@Injectable()
export class SummaryService {
  private readonly logger = new Logger(SummaryService.name);

  toSummary(snapshot: PlanSnapshot): PlanSummary {
    this.logger.verbose(`Building summary for plan ${snapshot.timestamp}`);
    const first = snapshot.schedule.length > 0 ? snapshot.schedule[0] : null;
    const shadow = EnergyPrice.fromEurPerKwh(snapshot.shadow_price.shadow_price_eur_per_kwh);
    const chargeThreshold = EnergyPrice.fromEurPerKwh(snapshot.shadow_price.charge_threshold_eur_per_kwh);
    const dischargeThreshold = EnergyPrice.fromEurPerKwh(snapshot.shadow_price.discharge_threshold_eur_per_kwh);

    return {
      timestamp: snapshot.timestamp,
      status: snapshot.status,
      current_soc_percent: snapshot.current_soc_percent,
      current_mode: first?.mode ?? "idle",
      current_power_w: first?.power_w ?? 0,
      shadow_price_ct_per_kwh: shadow.ctPerKwh,
      charge_threshold_ct_per_kwh: chargeThreshold.ctPerKwh,
      discharge_threshold_ct_per_kwh: dischargeThreshold.ctPerKwh,
      projected_cost_eur: snapshot.diagnostics.total_cost_eur,
      baseline_cost_eur: snapshot.diagnostics.baseline_cost_eur,
      projected_savings_eur: snapshot.diagnostics.savings_eur,
      forecast_hours: (snapshot.schedule.length * snapshot.step_minutes) / 60,
      forecast_samples: snapshot.schedule.length,
      warnings: [...snapshot.warnings],
      errors: [...snapshot.errors],
    };
  }
}
