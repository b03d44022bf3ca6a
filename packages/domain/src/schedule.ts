import { z } from "zod";

import { optionalTimestampSchema, requiredNumberSchema, requiredTimestampSchema } from "./parsing";

export const rawPriceRecordSchema = z
  .object({
    time_start: requiredTimestampSchema,
    time_end: optionalTimestampSchema.optional(),
    spot_price: requiredNumberSchema,
  })
  .strip();

/** One spot price as delivered by a price source, in currency per kWh. */
export type RawPriceRecord = z.infer<typeof rawPriceRecordSchema>;

export const rawPriceRecordListSchema = z.array(rawPriceRecordSchema);

export type ScheduleAction = "charge" | "discharge";

export interface ScheduleRangePayload {
  start: string;
  end: string;
  action: ScheduleAction;
  line: string;
}

export interface ScheduleAssignmentPayload {
  charge_start: string;
  charge_hours: number;
  charge_average_cost: number;
  discharge_start: string | null;
  discharge_hours: number;
  discharge_value: number;
}

export interface ScheduleResponse {
  day: string;
  generated_at: string;
  time_zone: string;
  required_margin: number;
  hours: number;
  ranges: ScheduleRangePayload[];
  assignments: ScheduleAssignmentPayload[];
  lines: string[];
}
