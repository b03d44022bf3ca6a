import {
  isNextHour,
  type ChargeBlock,
  type DischargeRun,
  type HourlyPrice,
  type ScheduleParameters,
} from "./types";

// Costs come out of float arithmetic; keep a hair of slack on the margin comparison.
const EPSILON = 1e-9;

export function qualifiesForDischarge(hour: HourlyPrice, block: ChargeBlock, requiredMargin: number): boolean {
  return hour.cost + EPSILON >= block.averageCost + requiredMargin;
}

export function maxDischargeHours(block: ChargeBlock, capacityRatio: number): number {
  return Math.max(0, Math.floor(capacityRatio * block.hours.length));
}

const runValue = (hours: readonly HourlyPrice[], averageCost: number): number =>
  hours.reduce((sum, hour) => sum + (hour.cost - averageCost), 0);

/** Maximal stretches of consecutive hours. */
export function splitContiguous(hours: readonly HourlyPrice[]): HourlyPrice[][] {
  const runs: HourlyPrice[][] = [];
  let current: HourlyPrice[] = [];
  for (const hour of hours) {
    const previous = current.at(-1);
    if (previous && !isNextHour(previous, hour)) {
      runs.push(current);
      current = [];
    }
    current.push(hour);
  }
  if (current.length) {
    runs.push(current);
  }
  return runs;
}

/**
 * Best discharge run funded by `block`: among the contiguous stretches of later same-day
 * hours priced at least `requiredMargin` above the block average, each cut to the
 * capacity limit, the one with the largest summed premium (earliest wins a tie).
 * Returns null when no later hour qualifies.
 */
export function matchDischargeRun(
  block: ChargeBlock,
  hours: readonly HourlyPrice[],
  params: Pick<ScheduleParameters, "capacityRatio" | "requiredMargin">,
): DischargeRun | null {
  const lastCharge = block.hours.at(-1);
  if (!lastCharge) {
    return null;
  }
  const limit = maxDischargeHours(block, params.capacityRatio);
  if (limit === 0) {
    return null;
  }

  const qualifying = hours.filter((hour) =>
    hour.day === lastCharge.day &&
    hour.start.toMillis() > lastCharge.start.toMillis() &&
    qualifiesForDischarge(hour, block, params.requiredMargin),
  );

  let best: DischargeRun | null = null;
  for (const run of splitContiguous(qualifying)) {
    const truncated = run.slice(0, limit);
    const totalValue = runValue(truncated, block.averageCost);
    if (!best || totalValue > best.totalValue) {
      best = {hours: truncated, totalValue};
    }
  }
  return best;
}
