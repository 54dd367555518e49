import { Inject, Injectable } from "@nestjs/common";
import { initTRPC, TRPCError } from "@trpc/server";
import { z } from "zod";

import type { ControlState, PlanSnapshot, PlanSummary } from "@wattplan/domain";
import { controlModeSchema, isPlanningError, telemetryReportSchema } from "@wattplan/domain";

import { BalancerService } from "../control/balancer.service";
import { TelemetryService } from "../control/telemetry.service";
import { PlanningSchedulerService } from "../planning/planning-scheduler.service";
import { PlanningService } from "../planning/planning.service";
import { SummaryService } from "../planning/summary.service";

export interface TrpcContext {
  requestId?: string;
}

const t = initTRPC.context<TrpcContext>().create();

export interface ProcedureInfo {
  path: string;
  type: "query" | "mutation";
}

export interface RouterDependencies {
  planningService: PlanningService;
  scheduler: PlanningSchedulerService;
  summaryService: SummaryService;
  telemetry: TelemetryService;
  balancer: BalancerService;
}

function requirePlan(planningService: PlanningService): PlanSnapshot {
  const plan = planningService.getLatestPlan();
  if (!plan) {
    throw new TRPCError({code: "NOT_FOUND", message: "No plan has been published yet"});
  }
  return plan;
}

export function createAppRouter(deps: RouterDependencies) {
  return t.router({
    plan: t.procedure.query((): PlanSnapshot => requirePlan(deps.planningService)),
    summary: t.procedure.query((): PlanSummary => deps.summaryService.toSummary(requirePlan(deps.planningService))),
    control: t.procedure.query((): ControlState | null => deps.balancer.getState()),
    reportTelemetry: t.procedure
      .input(telemetryReportSchema)
      .mutation(({input}) => {
        const measurement = deps.telemetry.report(input);
        return {
          accepted: true,
          soc_wh: measurement.socWh,
        };
      }),
    setControlMode: t.procedure
      .input(z.object({mode: controlModeSchema}))
      .mutation(({input}) => ({mode: deps.balancer.setControlMode(input.mode)})),
    replan: t.procedure.mutation(async (): Promise<PlanSnapshot | null> => {
      try {
        return await deps.scheduler.runOnce();
      } catch (error) {
        if (isPlanningError(error)) {
          throw new TRPCError({code: "PRECONDITION_FAILED", message: error.message, cause: error});
        }
        throw error;
      }
    }),
  });
}

export type AppRouter = ReturnType<typeof createAppRouter>;

const PROCEDURES: ProcedureInfo[] = [
  {path: "plan", type: "query"},
  {path: "summary", type: "query"},
  {path: "control", type: "query"},
  {path: "reportTelemetry", type: "mutation"},
  {path: "setControlMode", type: "mutation"},
  {path: "replan", type: "mutation"},
];

@Injectable()
export class TrpcRouter {
  readonly router: AppRouter;

  constructor(
    @Inject(PlanningService) planningService: PlanningService,
    @Inject(PlanningSchedulerService) scheduler: PlanningSchedulerService,
    @Inject(SummaryService) summaryService: SummaryService,
    @Inject(TelemetryService) telemetry: TelemetryService,
    @Inject(BalancerService) balancer: BalancerService,
  ) {
    this.router = createAppRouter({planningService, scheduler, summaryService, telemetry, balancer});
  }

  listProcedures(): ProcedureInfo[] {
    return PROCEDURES.map((procedure) => ({...procedure}));
  }

  createCaller(ctx: TrpcContext = {}) {
    return this.router.createCaller(ctx);
  }
}
