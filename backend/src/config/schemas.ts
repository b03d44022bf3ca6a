import { z } from "zod";

import {
  optionalNumberSchema,
  optionalStringSchema,
  requiredNumberSchema,
  requiredTimestampSchema,
  optionalTimestampSchema,
  rawPriceRecordListSchema,
  type RawPriceRecord,
} from "@spotwindow/domain";

const upperCased = (value: unknown): unknown => (typeof value === "string" ? value.trim().toUpperCase() : value);
const lowerCased = (value: unknown): unknown => (typeof value === "string" ? value.trim().toLowerCase() : value);

export const PRICE_PROVIDERS = ["elprisetjustnu", "file"] as const;
export type PriceProviderKey = (typeof PRICE_PROVIDERS)[number];

export const PRICE_CURRENCIES = ["SEK", "EUR"] as const;
export type PriceCurrency = (typeof PRICE_CURRENCIES)[number];

const loggingConfigSchema = z
  .object({
    level: optionalStringSchema.optional(),
  })
  .strip();

const priceSourceConfigSchema = z
  .object({
    provider: z.preprocess(lowerCased, z.enum(PRICE_PROVIDERS)).optional(),
    base_url: optionalStringSchema.optional(),
    zone: z.preprocess(upperCased, z.string().regex(/^SE[1-4]$/, "Expected a price zone SE1-SE4")).optional(),
    currency: z.preprocess(upperCased, z.enum(PRICE_CURRENCIES)).optional(),
    timeout_ms: optionalNumberSchema.optional(),
    file: optionalStringSchema.optional(),
  })
  .strip();

const priceConfigSchema = z
  .object({
    supplier_fee: optionalNumberSchema.optional(),
    vat_multiplier: optionalNumberSchema.optional(),
  })
  .strip();

const scheduleConfigSchema = z
  .object({
    time_zone: optionalStringSchema.optional(),
    day: optionalStringSchema.optional(),
    max_charge_hours: optionalNumberSchema.optional(),
    capacity_ratio: optionalNumberSchema.optional(),
    required_margin: optionalNumberSchema.optional(),
    fixed_cost: optionalNumberSchema.optional(),
    round_trip_efficiency: optionalNumberSchema.optional(),
    charge_windows: z.array(optionalStringSchema).optional(),
  })
  .strip();

export const configDocumentSchema = z
  .object({
    logging: loggingConfigSchema.optional(),
    price_source: priceSourceConfigSchema.optional(),
    price: priceConfigSchema.optional(),
    schedule: scheduleConfigSchema.optional(),
  })
  .passthrough();

export type ConfigDocument = z.infer<typeof configDocumentSchema>;
export type PriceSourceConfig = NonNullable<ConfigDocument["price_source"]>;

export const parseConfigDocument = (input: unknown): ConfigDocument =>
  configDocumentSchema.parse(input ?? {});

const elprisetEntrySchema = z
  .object({
    time_start: requiredTimestampSchema,
    time_end: optionalTimestampSchema.optional(),
    SEK_per_kWh: requiredNumberSchema,
    EUR_per_kWh: requiredNumberSchema,
  })
  .strip();

const elprisetPayloadSchema = z.array(elprisetEntrySchema);

/**
 * Reads an elprisetjustnu.se day file. Plain `{time_start, spot_price}` lists are
 * accepted as well so local fixtures can skip the currency columns.
 */
export const parsePricePayload = (input: unknown, currency: PriceCurrency): RawPriceRecord[] => {
  const elpriset = elprisetPayloadSchema.safeParse(input);
  if (elpriset.success) {
    return elpriset.data.map((entry) => ({
      time_start: entry.time_start,
      time_end: entry.time_end,
      spot_price: currency === "SEK" ? entry.SEK_per_kWh : entry.EUR_per_kWh,
    }));
  }
  const plain = rawPriceRecordListSchema.safeParse(input);
  if (plain.success) {
    return plain.data;
  }
  throw new Error(`Unrecognised price payload: ${elpriset.error.issues[0]?.message ?? "invalid shape"}`);
};
