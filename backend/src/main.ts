import "reflect-metadata";

import type { AddressInfo } from "node:net";

import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import { FastifyAdapter, type NestFastifyApplication } from "@nestjs/platform-fastify";

import { describeError } from "@spotwindow/domain";
import { AppModule } from "./app.module";
import { parseCliArgs } from "./cli-args";
import { ConfigFileService } from "./config/config-file.service";
import { setRuntimeConfig } from "./config/runtime-config";
import { ScheduleConfigFactory } from "./config/schedule-config.factory";
import type { ConfigDocument } from "./config/schemas";
import { resolveLogLevels, StderrConsoleLogger } from "./logging";
import { ScheduleService } from "./schedule/schedule.service";
import { registerTrpc, TRPC_PREFIX } from "./trpc/trpc.http";
import { TrpcRouter } from "./trpc/trpc.router";

const isAddressInfo = (value: AddressInfo | string | null): value is AddressInfo =>
  typeof value === "object" && value !== null && "port" in value;

/** Resolves to the process exit code, or null while the API keeps serving. */
async function bootstrap(argv: readonly string[] = process.argv.slice(2)): Promise<number | null> {
  const args = parseCliArgs(argv);
  const {document, logger} = await configureGlobalLogging();
  validateConfigDocument(document);
  setRuntimeConfig(document);
  if (args.serve) {
    await serve(logger);
    return null;
  }
  return runOnce(args.day, logger);
}

async function runOnce(day: string | null, appLogger: StderrConsoleLogger): Promise<number> {
  const app = await NestFactory.createApplicationContext(AppModule, {bufferLogs: true});
  app.useLogger(appLogger);
  app.flushLogs();
  const logger = new Logger("spotwindow");

  try {
    const response = await app.get(ScheduleService).computeForDay(day ?? undefined);
    for (const line of response.lines) {
      process.stdout.write(`${line}\n`);
    }
    return 0;
  } catch (error) {
    logger.fatal(`Unable to produce a schedule: ${describeError(error)}`);
    return 1;
  } finally {
    await app.close();
  }
}

async function serve(appLogger: StderrConsoleLogger): Promise<NestFastifyApplication> {
  const adapter = new FastifyAdapter({logger: false});
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, adapter, {bufferLogs: true});
  app.useLogger(appLogger);
  app.flushLogs();
  const logger = new Logger("spotwindow");

  const fastify = await registerTrpc(app);

  try {
    await app.get(ScheduleService).computeForDay();
  } catch (error) {
    logger.error(`Initial schedule unavailable: ${describeError(error)}`);
  }

  const env = app.get(ConfigService);
  const port = Number(env.get<string>("PORT") ?? 4000);
  const host = env.get<string>("HOST") ?? "0.0.0.0";
  await app.listen(port, host);

  const address = fastify.server.address();
  let baseUrl = `http://localhost:${port}`;
  if (isAddressInfo(address)) {
    const resolvedHost = address.address === "::" || address.address === "0.0.0.0" ? "localhost" : address.address;
    baseUrl = `http://${resolvedHost}:${address.port}`;
  }
  logger.log(`API ready at ${baseUrl}`);

  const procedures = app.get(TrpcRouter).listProcedures();
  if (procedures.length) {
    const formatted = procedures
      .map(({path, type}, index) => {
        const prefix = index === procedures.length - 1 ? "└──" : "├──";
        return `${prefix} ${type.toUpperCase()} ${TRPC_PREFIX}/${path}`;
      })
      .join("\n");
    logger.log(`tRPC procedures:\n${formatted}`);
  }

  return app;
}

async function configureGlobalLogging(): Promise<{ document: ConfigDocument; logger: StderrConsoleLogger }> {
  Logger.overrideLogger(new StderrConsoleLogger());
  const bootstrapLogger = new Logger("bootstrap");
  const configFileService = new ConfigFileService();

  let document: ConfigDocument;
  try {
    document = await configFileService.loadDocument(configFileService.resolvePath());
  } catch (error) {
    bootstrapLogger.error(`Failed to load configuration: ${describeError(error)}`);
    throw error instanceof Error ? error : new Error(String(error));
  }

  const rawLevel = document.logging?.level ?? "info";
  const {levels, normalized, fallbackUsed} = resolveLogLevels(rawLevel);
  const logger = new StderrConsoleLogger("spotwindow", {logLevels: levels});
  Logger.overrideLogger(logger);
  if (fallbackUsed) {
    bootstrapLogger.warn(`Unknown logging.level value '${rawLevel}'; defaulting to INFO`);
  }
  bootstrapLogger.verbose(`Logger minimum level set to ${normalized.toUpperCase()}`);
  return {document, logger};
}

function validateConfigDocument(document: ConfigDocument): void {
  try {
    new ScheduleConfigFactory().create(document);
  } catch (error) {
    throw new Error(`Configuration invalid: ${describeError(error)}`);
  }
  new Logger("bootstrap").verbose("Configuration validation successful.");
}

if (process.env.NODE_ENV !== "test") {
  void bootstrap().then(
    (code) => {
      if (code !== null) {
        process.exitCode = code;
      }
    },
    (error: unknown) => {
      new Logger("bootstrap").fatal(describeError(error));
      process.exitCode = 1;
    },
  );
}

export { bootstrap };
