import { isNextHour, type ChargeBlock, type ChargeWindow, type HourlyPrice, type ScheduleParameters } from "./types";

const WHOLE_DAY: ChargeWindow = {startHour: 0, endHour: 24};

const withinWindow = (window: ChargeWindow, hour: HourlyPrice): boolean =>
  hour.start.hour >= window.startHour && hour.start.hour < window.endHour;

export function averageCost(hours: readonly HourlyPrice[]): number {
  if (!hours.length) {
    return 0;
  }
  return hours.reduce((sum, hour) => sum + hour.cost, 0) / hours.length;
}

/**
 * One candidate block per starting hour: the longest run of up to `maxChargeHours`
 * consecutive hours that stays on the same local day and inside the starting hour's
 * charge window. Blocks shrink towards day and window ends but are never empty.
 */
export function generateChargeBlocks(
  hours: readonly HourlyPrice[],
  params: Pick<ScheduleParameters, "maxChargeHours" | "chargeWindows">,
): ChargeBlock[] {
  const maxLength = Math.max(1, Math.floor(params.maxChargeHours));
  const windows = params.chargeWindows ?? [WHOLE_DAY];
  const blocks: ChargeBlock[] = [];

  hours.forEach((first, index) => {
    const window = windows.find((candidate) => withinWindow(candidate, first));
    if (!window) {
      return;
    }

    const collected: HourlyPrice[] = [first];
    let last = first;
    while (collected.length < maxLength) {
      const next = hours.at(index + collected.length);
      if (!next || next.day !== first.day || !isNextHour(last, next) || !withinWindow(window, next)) {
        break;
      }
      collected.push(next);
      last = next;
    }

    blocks.push({hours: collected, averageCost: averageCost(collected)});
  });

  return blocks;
}
