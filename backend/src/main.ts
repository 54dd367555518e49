import "reflect-metadata";

import type { AddressInfo } from "node:net";

import cors from "@fastify/cors";
import type { FastifyInstance } from "fastify";
import { fastifyTRPCPlugin } from "@trpc/server/adapters/fastify";
import type { FastifyTRPCPluginOptions } from "@trpc/server/adapters/fastify";
import { Logger, LogLevel } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";

import { describeError } from "@wattplan/domain";
import { AppModule } from "./app.module";
import { ConfigFileService } from "./config/config-file.service";
import { PlannerSettingsFactory } from "./config/planner-settings.factory";
import { setRuntimeConfig } from "./config/runtime-config.service";
import type { ConfigDocument } from "./config/schemas";
import { BalancerService } from "./control/balancer.service";
import { PlanningSchedulerService } from "./planning/planning-scheduler.service";
import type { AppRouter } from "./trpc/trpc.router";
import { TrpcRouter } from "./trpc/trpc.router";

const isAddressInfo = (value: AddressInfo | string | null): value is AddressInfo =>
  typeof value === "object" && value !== null && "port" in value;

async function bootstrap(): Promise<NestFastifyApplication> {
  const initialConfig = await configureGlobalLogging();
  validateConfigDocument(initialConfig);
  setRuntimeConfig(initialConfig);
  const adapter = new FastifyAdapter({logger: false});
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, adapter, {
    bufferLogs: true,
  });

  app.useLogger(new Logger("bootstrap"));
  app.flushLogs();
  app.enableShutdownHooks();

  const fastify: FastifyInstance = app.getHttpAdapter().getInstance();
  await fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
  });

  const trpcRouter = app.get(TrpcRouter);
  await fastify.register(fastifyTRPCPlugin, {
    prefix: "/trpc",
    trpcOptions: {
      router: trpcRouter.router,
      createContext: () => ({}),
    },
  } satisfies FastifyTRPCPluginOptions<AppRouter>);

  const port = Number(process.env.PORT ?? 4000);
  const host = process.env.HOST ?? "0.0.0.0";
  await app.listen(port, host);

  app.get(PlanningSchedulerService).start();
  app.get(BalancerService).start();
  watchConfigReload(app);

  const logger = new Logger("wattplan");
  const address = fastify.server.address();
  let baseUrl = `http://localhost:${port}`;
  if (isAddressInfo(address)) {
    const resolvedHost = address.address === "::" || address.address === "0.0.0.0" ? "localhost" : address.address;
    baseUrl = `http://${resolvedHost}:${address.port}`;
  }
  logger.log(`API ready at ${baseUrl}`);

  const trpcProcedures = trpcRouter.listProcedures();
  const formatted = trpcProcedures
    .map(({path, type}, index) => {
      const prefix = index === trpcProcedures.length - 1 ? "└──" : "├──";
      return `${prefix} ${type.toUpperCase()} /trpc/${path}`;
    })
    .join("\n");
  logger.log(`tRPC procedures:\n${formatted}`);

  return app;
}

function watchConfigReload(app: NestFastifyApplication): void {
  const logger = new Logger("config");
  const configFileService = new ConfigFileService();
  process.on("SIGHUP", () => {
    configFileService
      .loadDocument(configFileService.resolvePath())
      .then((document) => {
        app.get(PlanningSchedulerService).reconfigure(document);
        logger.log("Configuration reloaded");
      })
      .catch((error: unknown) => {
        logger.error(`Configuration reload rejected: ${describeError(error)}`);
      });
  });
}

async function configureGlobalLogging(): Promise<ConfigDocument> {
  const bootstrapLogger = new Logger("bootstrap");
  const configFileService = new ConfigFileService();

  let levels: LogLevel[];
  let normalizedLevel: string;
  let document: ConfigDocument;

  try {
    const configPath = configFileService.resolvePath();
    document = await configFileService.loadDocument(configPath);

    const rawLevel = document.logging?.level ?? "info";
    const {levels: resolvedLevels, normalized, fallbackUsed} = resolveLogLevels(rawLevel);
    levels = resolvedLevels;
    normalizedLevel = normalized;
    if (fallbackUsed) {
      bootstrapLogger.warn(`Unknown logging.level value '${rawLevel}'; defaulting to INFO`);
    }
  } catch (error) {
    bootstrapLogger.error(`Failed to load configuration: ${describeError(error)}`);
    throw error instanceof Error ? error : new Error(String(error));
  }

  Logger.overrideLogger(levels);
  bootstrapLogger.log(`Logger minimum level set to ${normalizedLevel.toUpperCase()}`);
  return document;
}

export function validateConfigDocument(document: ConfigDocument): void {
  const settings = new PlannerSettingsFactory().create(document);
  new Logger("bootstrap").verbose(
    `Configuration valid: ${settings.battery.capacityWh} Wh, ${settings.stepDuration.minutes} min steps, mode ${settings.control.mode}`,
  );
}

export function resolveLogLevels(level: unknown): { levels: LogLevel[]; normalized: string; fallbackUsed: boolean } {
  const normalizedInput = typeof level === "string" ? level.trim().toLowerCase() : "info";
  const aliasMap: Record<string, string> = {
    log: "info",
    info: "info",
    warning: "warn",
  };
  const canonical = aliasMap[normalizedInput] ?? normalizedInput;

  switch (canonical) {
    case "fatal":
      return {levels: ["fatal"], normalized: "fatal", fallbackUsed: false};
    case "error":
      return {levels: ["fatal", "error"], normalized: "error", fallbackUsed: false};
    case "warn":
      return {levels: ["fatal", "error", "warn"], normalized: "warn", fallbackUsed: false};
    case "info":
      return {levels: ["fatal", "error", "warn", "log"], normalized: "info", fallbackUsed: false};
    case "debug":
      return {levels: ["fatal", "error", "warn", "log", "debug"], normalized: "debug", fallbackUsed: false};
    case "verbose":
      return {levels: ["fatal", "error", "warn", "log", "debug", "verbose"], normalized: "verbose", fallbackUsed: false};
    default:
      return {levels: ["fatal", "error", "warn", "log"], normalized: "info", fallbackUsed: true};
  }
}

if (process.env.NODE_ENV !== "test") {
  bootstrap().catch((error) => {
    new Logger("bootstrap").fatal(`Startup failed: ${describeError(error)}`);
    process.exitCode = 1;
  });
}

export { bootstrap };
