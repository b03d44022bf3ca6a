import { ScheduleInvariantError } from "@spotwindow/domain";

import { matchDischargeRun, qualifiesForDischarge } from "./discharge-matcher";
import {
  hourKey,
  isNextHour,
  type Assignment,
  type CandidatePair,
  type ChargeBlock,
  type HourlyPrice,
  type ScheduleParameters,
} from "./types";

export function collectCandidates(
  blocks: readonly ChargeBlock[],
  hours: readonly HourlyPrice[],
  params: Pick<ScheduleParameters, "capacityRatio" | "requiredMargin">,
): CandidatePair[] {
  const candidates: CandidatePair[] = [];
  for (const block of blocks) {
    const run = matchDischargeRun(block, hours, params);
    if (run) {
      candidates.push({block, run});
    }
  }
  return candidates;
}

const blockStart = (block: ChargeBlock): number => block.hours[0]?.start.toMillis() ?? 0;

/** Cheapest charging first; equal averages go to the earlier block. */
export function compareCandidates(a: CandidatePair, b: CandidatePair): number {
  if (a.block.averageCost !== b.block.averageCost) {
    return a.block.averageCost - b.block.averageCost;
  }
  return blockStart(a.block) - blockStart(b.block);
}

/**
 * Commits candidates in ranked order. A candidate touching any hour taken by an
 * earlier commit is skipped as a whole.
 */
export function assignGreedy(candidates: readonly CandidatePair[]): Assignment[] {
  const ranked = [...candidates].sort(compareCandidates);
  const used = new Set<number>();
  const assignments: Assignment[] = [];

  for (const {block, run} of ranked) {
    const keys = [...block.hours, ...run.hours].map(hourKey);
    if (keys.some((key) => used.has(key))) {
      continue;
    }
    keys.forEach((key) => used.add(key));
    assignments.push(Object.freeze({
      block,
      discharge: run.hours,
      consumed: new Set(keys),
    }));
  }

  return assignments;
}

/**
 * Re-checks a finished assignment list. Failing here means a bug upstream, never bad input.
 */
export function assertScheduleInvariants(
  assignments: readonly Assignment[],
  params: Pick<ScheduleParameters, "requiredMargin" | "capacityRatio" | "maxChargeHours">,
): void {
  const seen = new Map<number, number>();

  assignments.forEach((assignment, index) => {
    const {block, discharge} = assignment;
    const first = block.hours[0];
    if (!first || block.hours.length > params.maxChargeHours) {
      throw new ScheduleInvariantError("Charge block has an invalid length", {
        assignment: index,
        length: block.hours.length,
      });
    }
    block.hours.forEach((hour, position) => {
      const previous = position > 0 ? block.hours[position - 1] : undefined;
      if (hour.day !== first.day || (previous && !isNextHour(previous, hour))) {
        throw new ScheduleInvariantError("Charge block hours are not consecutive on one day", {
          assignment: index,
          hour: hour.start.toISO(),
        });
      }
    });

    if (discharge.length > params.capacityRatio * block.hours.length) {
      throw new ScheduleInvariantError("Discharge run exceeds the capacity of its charge block", {
        assignment: index,
        dischargeHours: discharge.length,
        chargeHours: block.hours.length,
      });
    }
    for (const hour of discharge) {
      if (!qualifiesForDischarge(hour, block, params.requiredMargin)) {
        throw new ScheduleInvariantError("Discharge hour does not meet the required margin", {
          assignment: index,
          hour: hour.start.toISO(),
          cost: hour.cost,
          averageCost: block.averageCost,
          requiredMargin: params.requiredMargin,
        });
      }
    }

    for (const key of assignment.consumed) {
      const owner = seen.get(key);
      if (owner !== undefined) {
        throw new ScheduleInvariantError("Hour assigned twice", {
          hour: new Date(key).toISOString(),
          first: owner,
          second: index,
        });
      }
      seen.set(key, index);
    }
  });
}
