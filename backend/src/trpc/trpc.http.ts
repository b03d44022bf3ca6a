import cors from "@fastify/cors";
import type { FastifyInstance } from "fastify";
import { fastifyTRPCPlugin } from "@trpc/server/adapters/fastify";
import type { NestFastifyApplication } from "@nestjs/platform-fastify";

import { ScheduleService } from "../schedule/schedule.service";
import { TrpcRouter } from "./trpc.router";

export const TRPC_PREFIX = "/trpc";

/** Registers CORS and the tRPC router on the app's Fastify instance. */
export async function registerTrpc(app: NestFastifyApplication): Promise<FastifyInstance> {
  const fastify = app.getHttpAdapter().getInstance() as unknown as FastifyInstance;
  await fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
  });

  const trpcRouter = app.get(TrpcRouter);
  const scheduleService = app.get(ScheduleService);
  await fastify.register(fastifyTRPCPlugin, {
    prefix: TRPC_PREFIX,
    trpcOptions: {
      router: trpcRouter.router,
      createContext: () => ({scheduleService}),
    },
  });
  return fastify;
}
