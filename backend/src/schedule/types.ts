import type { DateTime } from "luxon";

import type { ScheduleAction } from "@spotwindow/domain";

export const HOUR_MS = 3_600_000;

/** One hour of the target day with its all-in cost (subunits per kWh). */
export interface HourlyPrice {
  readonly start: DateTime;
  /** Local calendar date, `YYYY-MM-DD`. */
  readonly day: string;
  readonly cost: number;
}

export interface ChargeBlock {
  readonly hours: readonly HourlyPrice[];
  readonly averageCost: number;
}

export interface DischargeRun {
  readonly hours: readonly HourlyPrice[];
  readonly totalValue: number;
}

export interface CandidatePair {
  readonly block: ChargeBlock;
  readonly run: DischargeRun;
}

export interface Assignment {
  readonly block: ChargeBlock;
  readonly discharge: readonly HourlyPrice[];
  readonly consumed: ReadonlySet<number>;
}

export interface ScheduleRange {
  readonly start: DateTime;
  /** Exclusive. */
  readonly end: DateTime;
  /** `end`, or the last instant of `start`'s day when `end` falls on the next day. */
  readonly displayEnd: DateTime;
  readonly action: ScheduleAction;
}

/** Local hours `[startHour, endHour)` in which charging may take place. */
export interface ChargeWindow {
  readonly startHour: number;
  readonly endHour: number;
}

export interface PricingParameters {
  /** Supplier fee per kWh in subunits, VAT included. */
  readonly supplierFee: number;
  readonly vatMultiplier: number;
  readonly timeZone: string;
}

export interface ScheduleParameters {
  readonly maxChargeHours: number;
  /** Discharge hours a single charge hour can fund. */
  readonly capacityRatio: number;
  readonly requiredMargin: number;
  readonly chargeWindows: readonly ChargeWindow[] | null;
}

export interface ScheduleResult {
  readonly day: string;
  readonly hours: readonly HourlyPrice[];
  readonly assignments: readonly Assignment[];
  readonly ranges: readonly ScheduleRange[];
  readonly lines: readonly string[];
}

export const hourKey = (hour: HourlyPrice): number => hour.start.toMillis();

export const isNextHour = (previous: HourlyPrice, next: HourlyPrice): boolean =>
  next.start.toMillis() - previous.start.toMillis() === HOUR_MS;
