import { Injectable } from "@nestjs/common";
import { IANAZone } from "luxon";

import { Percentage } from "@spotwindow/domain";
import type { ChargeWindow, PricingParameters, ScheduleParameters } from "../schedule/types";
import type { PriceSourceSettings } from "./providers/provider.types";
import type { ConfigDocument } from "./schemas";

export const DEFAULT_PRICE_API_URL = "https://www.elprisetjustnu.se/api/v1/prices";
const DEFAULT_PRICE_ZONE = "SE3";
const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_TIME_ZONE = "Europe/Stockholm";
const DEFAULT_SUPPLIER_FEE = 8.6;
const DEFAULT_VAT_MULTIPLIER = 1.25;
const DEFAULT_MAX_CHARGE_HOURS = 3;
const DEFAULT_REQUIRED_MARGIN = 25;
const DEFAULT_ROUND_TRIP_EFFICIENCY = 0.857;
const DEFAULT_DAY = "tomorrow";

export interface ScheduleSettings {
  pricing: PricingParameters;
  schedule: ScheduleParameters;
  source: PriceSourceSettings;
  /** `today`, `tomorrow` or an ISO date. */
  day: string;
}

const WINDOW_PATTERN = /^(\d{1,2})(?::00)?\s*-\s*(\d{1,2})(?::00)?$/;

export function parseChargeWindow(value: string): ChargeWindow {
  const match = WINDOW_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid charge window '${value}'; expected e.g. "00:00-05:00"`);
  }
  const startHour = Number(match[1]);
  const endHour = Number(match[2]);
  if (startHour >= endHour || endHour > 24) {
    throw new Error(`Invalid charge window '${value}'; start must precede end within one day`);
  }
  return {startHour, endHour};
}

/**
 * Margin a discharge hour must clear over the charge average. An explicit value wins;
 * otherwise the fixed per-kWh cost scaled by the round-trip loss, otherwise the default.
 */
export function resolveRequiredMargin(schedule: ConfigDocument["schedule"]): number {
  const explicit = schedule?.required_margin;
  if (explicit !== undefined) {
    if (explicit < 0) {
      throw new Error("schedule.required_margin must not be negative");
    }
    return explicit;
  }
  const fixedCost = schedule?.fixed_cost;
  if (fixedCost !== undefined) {
    const efficiency = Percentage.fromRatioOrPercent(schedule?.round_trip_efficiency ?? DEFAULT_ROUND_TRIP_EFFICIENCY);
    return efficiency.invert().of(fixedCost);
  }
  return DEFAULT_REQUIRED_MARGIN;
}

const positiveOr = (value: number | undefined, fallback: number, key: string): number => {
  if (value === undefined) {
    return fallback;
  }
  if (!(value > 0)) {
    throw new Error(`${key} must be a positive number`);
  }
  return value;
};

@Injectable()
export class ScheduleConfigFactory {
  create(config: ConfigDocument): ScheduleSettings {
    const source = config.price_source ?? {};
    const price = config.price ?? {};
    const schedule = config.schedule ?? {};

    const timeZone = schedule.time_zone ?? DEFAULT_TIME_ZONE;
    if (!IANAZone.isValidZone(timeZone)) {
      throw new Error(`schedule.time_zone '${timeZone}' is not a known IANA time zone`);
    }

    const maxChargeHours = Math.floor(
      positiveOr(schedule.max_charge_hours, DEFAULT_MAX_CHARGE_HOURS, "schedule.max_charge_hours"),
    );
    if (maxChargeHours < 1 || maxChargeHours > 24) {
      throw new Error("schedule.max_charge_hours must be between 1 and 24");
    }

    const windows = (schedule.charge_windows ?? [])
      .filter((entry): entry is string => typeof entry === "string")
      .map(parseChargeWindow);

    const provider = source.provider ?? "elprisetjustnu";
    const file = source.file ?? null;
    if (provider === "file" && !file) {
      throw new Error("price_source.file must be set when price_source.provider is 'file'");
    }

    return {
      pricing: {
        supplierFee: price.supplier_fee ?? DEFAULT_SUPPLIER_FEE,
        vatMultiplier: positiveOr(price.vat_multiplier, DEFAULT_VAT_MULTIPLIER, "price.vat_multiplier"),
        timeZone,
      },
      schedule: {
        maxChargeHours,
        capacityRatio: positiveOr(schedule.capacity_ratio, maxChargeHours, "schedule.capacity_ratio"),
        requiredMargin: resolveRequiredMargin(schedule),
        chargeWindows: windows.length ? windows : null,
      },
      source: {
        provider,
        baseUrl: (source.base_url ?? DEFAULT_PRICE_API_URL).replace(/\/+$/, ""),
        zone: source.zone ?? DEFAULT_PRICE_ZONE,
        currency: source.currency ?? "SEK",
        timeoutMs: positiveOr(source.timeout_ms, DEFAULT_TIMEOUT_MS, "price_source.timeout_ms"),
        file,
      },
      day: schedule.day ?? DEFAULT_DAY,
    };
  }
}
