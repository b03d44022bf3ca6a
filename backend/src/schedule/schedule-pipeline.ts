import type { RawPriceRecord } from "@spotwindow/domain";

import { generateChargeBlocks } from "./block-generator";
import { assertScheduleInvariants, assignGreedy, collectCandidates } from "./greedy-assigner";
import { normalizePrices } from "./price-normalizer";
import { buildSchedule, formatScheduleLine } from "./schedule-formatter";
import type { HourlyPrice, PricingParameters, ScheduleParameters, ScheduleResult } from "./types";

export function scheduleHours(hours: readonly HourlyPrice[], params: ScheduleParameters): ScheduleResult {
  const blocks = generateChargeBlocks(hours, params);
  const candidates = collectCandidates(blocks, hours, params);
  const assignments = assignGreedy(candidates);
  assertScheduleInvariants(assignments, params);
  const ranges = buildSchedule(assignments);
  return {
    day: hours[0]?.day ?? "",
    hours,
    assignments,
    ranges,
    lines: ranges.map(formatScheduleLine),
  };
}

export function runSchedulePipeline(
  records: readonly RawPriceRecord[],
  pricing: PricingParameters,
  params: ScheduleParameters,
  day?: string,
): ScheduleResult {
  const hours = normalizePrices(records, pricing, day);
  return scheduleHours(hours, params);
}
