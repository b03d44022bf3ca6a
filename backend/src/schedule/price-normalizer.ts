import { DateTime } from "luxon";

import { EmptyDataError, EnergyPrice } from "@spotwindow/domain";
import type { RawPriceRecord } from "@spotwindow/domain";

import { HOUR_MS, type HourlyPrice, type PricingParameters } from "./types";

interface HourAccumulator {
  start: DateTime;
  day: string;
  weightedSpot: number;
  weight: number;
}

export function totalCost(spotPrice: number, pricing: Pick<PricingParameters, "supplierFee" | "vatMultiplier">): number {
  return EnergyPrice.fromPerKwh(spotPrice)
    .withVatInclusiveFee(pricing.supplierFee, pricing.vatMultiplier)
    .subunitsPerKwh;
}

/**
 * Turns raw spot prices into one all-in cost per local hour, sorted by time.
 * Sub-hourly records (15 minute feeds) are folded into their hour by a duration-weighted mean.
 * Only one local date is kept: `day` when given, otherwise the date of the earliest hour.
 */
export function normalizePrices(
  records: readonly RawPriceRecord[],
  pricing: PricingParameters,
  day?: string,
): HourlyPrice[] {
  const byHour = new Map<number, HourAccumulator>();

  for (const record of records) {
    const instant = DateTime.fromISO(record.time_start, {zone: pricing.timeZone});
    if (!instant.isValid || !Number.isFinite(record.spot_price)) {
      continue;
    }
    const start = instant.startOf("hour");
    const localDay = start.toISODate();
    if (!localDay || (day !== undefined && localDay !== day)) {
      continue;
    }

    let weight = 1;
    if (record.time_end) {
      const end = DateTime.fromISO(record.time_end, {zone: pricing.timeZone});
      const spanMs = end.isValid ? end.toMillis() - instant.toMillis() : 0;
      if (spanMs > 0) {
        weight = Math.min(spanMs, HOUR_MS) / HOUR_MS;
      }
    }

    const key = start.toMillis();
    const acc = byHour.get(key) ?? {start, day: localDay, weightedSpot: 0, weight: 0};
    acc.weightedSpot += record.spot_price * weight;
    acc.weight += weight;
    byHour.set(key, acc);
  }

  const sorted = [...byHour.entries()].sort(([a], [b]) => a - b);
  const targetDay = day ?? sorted[0]?.[1].day;
  const hours: HourlyPrice[] = sorted
    .filter(([, acc]) => acc.day === targetDay)
    .map(([, acc]) => ({
      start: acc.start,
      day: acc.day,
      cost: totalCost(acc.weightedSpot / acc.weight, pricing),
    }));

  if (!hours.length) {
    throw new EmptyDataError(
      day ? `No price data available for ${day}` : "No price data available",
    );
  }
  return hours;
}
