import { Inject, Injectable } from "@nestjs/common";
import { initTRPC, TRPCError, type AnyProcedure, type AnyRouter, type ProcedureType } from "@trpc/server";
import { z } from "zod";

import { EmptyDataError, PriceAcquisitionError, rawPriceRecordSchema } from "@spotwindow/domain";
import { RuntimeConfigService } from "../config/runtime-config.service";
import { ScheduleService } from "../schedule/schedule.service";

interface TrpcContext {
  scheduleService?: ScheduleService;
}

const t = initTRPC.context<TrpcContext>().create();

const daySelectorSchema = z.union([
  z.literal("today"),
  z.literal("tomorrow"),
  z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD"),
]);

const overridesSchema = z
  .object({
    maxChargeHours: z.number().int().min(1).max(24).optional(),
    capacityRatio: z.number().positive().optional(),
    requiredMargin: z.number().nonnegative().optional(),
  })
  .default({});

const computeInputSchema = z.object({
  records: z.array(rawPriceRecordSchema),
  day: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
  overrides: overridesSchema,
});

function toTrpcError(error: unknown): TRPCError {
  if (error instanceof TRPCError) {
    return error;
  }
  if (error instanceof EmptyDataError) {
    return new TRPCError({code: "NOT_FOUND", message: error.message, cause: error});
  }
  if (error instanceof PriceAcquisitionError) {
    return new TRPCError({code: "INTERNAL_SERVER_ERROR", message: error.message, cause: error});
  }
  return new TRPCError({
    code: "INTERNAL_SERVER_ERROR",
    message: error instanceof Error ? error.message : String(error),
    cause: error,
  });
}

@Injectable()
export class TrpcRouter {
  public readonly router;

  constructor(
    @Inject(ScheduleService) private readonly scheduleService: ScheduleService,
    @Inject(RuntimeConfigService) private readonly configState: RuntimeConfigService,
  ) {
    this.router = t.router({
      health: t.procedure.query(() => ({status: "ok"})),
      config: t.procedure.query(() => this.configState.getSettings()),
      schedule: t.router({
        latest: t.procedure.query(({ctx}) => (ctx.scheduleService ?? this.scheduleService).getLatest()),
        forDay: t.procedure
          .input(z.object({day: daySelectorSchema}).optional())
          .mutation(async ({ctx, input}) => {
            const service = ctx.scheduleService ?? this.scheduleService;
            try {
              return await service.computeForDay(input?.day);
            } catch (error) {
              throw toTrpcError(error);
            }
          }),
        compute: t.procedure.input(computeInputSchema).mutation(({ctx, input}) => {
          const service = ctx.scheduleService ?? this.scheduleService;
          try {
            return service.computeFromRecords(input.records, input.overrides, input.day);
          } catch (error) {
            throw toTrpcError(error);
          }
        }),
      }),
    });
  }

  public listProcedures(): { path: string; type: ProcedureType }[] {
    return this.collectProcedures(this.router);
  }

  private collectProcedures(router: AnyRouter, parent = ""): { path: string; type: ProcedureType }[] {
    const result: { path: string; type: ProcedureType }[] = [];
    const entries = Object.entries(router._def.procedures as Record<string, unknown>);

    for (const [key, value] of entries) {
      const path = parent ? `${parent}.${key}` : key;
      if (this.isRouter(value)) {
        result.push(...this.collectProcedures(value, path));
        continue;
      }

      const procedure = value as AnyProcedure;
      result.push({path, type: procedure._def.type});
    }

    return result;
  }

  private isRouter(value: unknown): value is AnyRouter {
    if (typeof value !== "object" || value === null) {
      return false;
    }
    const rawDef = (value as { _def?: unknown })._def;
    if (typeof rawDef !== "object" || rawDef === null) {
      return false;
    }
    return Object.prototype.hasOwnProperty.call(rawDef, "procedures");
  }
}

export type AppRouter = TrpcRouter["router"];
