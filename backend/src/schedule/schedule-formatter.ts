import type { ScheduleAction } from "@spotwindow/domain";

import { HOUR_MS, type Assignment, type HourlyPrice, type ScheduleRange } from "./types";

/** Weekday mask understood by the battery controller; every schedule line applies to all days. */
export const WEEKDAY_MASK = "1234567";

const ACTION_SYMBOL: Record<ScheduleAction, string> = {
  charge: "+",
  discharge: "-",
};

interface ScheduledHour {
  hour: HourlyPrice;
  action: ScheduleAction;
}

function closeRange(first: ScheduledHour, last: ScheduledHour): ScheduleRange {
  const start = first.hour.start;
  const end = last.hour.start.plus({hours: 1});
  const displayEnd = end.hasSame(start, "day") ? end : start.endOf("day");
  return {start, end, displayEnd, action: first.action};
}

/**
 * Charge and discharge hours of all assignments as chronological ranges, merging
 * neighbouring hours that share an action.
 */
export function buildSchedule(assignments: readonly Assignment[]): ScheduleRange[] {
  const scheduled: ScheduledHour[] = assignments
    .flatMap((assignment) => [
      ...assignment.block.hours.map((hour) => ({hour, action: "charge" as const})),
      ...assignment.discharge.map((hour) => ({hour, action: "discharge" as const})),
    ])
    .sort((a, b) => a.hour.start.toMillis() - b.hour.start.toMillis());

  const ranges: ScheduleRange[] = [];
  let first: ScheduledHour | null = null;
  let last: ScheduledHour | null = null;

  for (const entry of scheduled) {
    const continuesRange = first !== null && last !== null &&
      entry.action === last.action &&
      entry.hour.start.toMillis() - last.hour.start.toMillis() === HOUR_MS;
    if (continuesRange) {
      last = entry;
      continue;
    }
    if (first && last) {
      ranges.push(closeRange(first, last));
    }
    first = entry;
    last = entry;
  }
  if (first && last) {
    ranges.push(closeRange(first, last));
  }

  return ranges;
}

export function formatScheduleLine(range: ScheduleRange): string {
  return `${range.start.toFormat("HH:mm")}-${range.displayEnd.toFormat("HH:mm")}/${WEEKDAY_MASK}/${ACTION_SYMBOL[range.action]}`;
}
