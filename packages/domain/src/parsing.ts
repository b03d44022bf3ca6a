import { z } from "zod";

const INVALID_NUMBER_MESSAGE = "Expected a finite number or numeric string";
const INVALID_STRING_MESSAGE = "Expected a non-empty string";
const INVALID_TIMESTAMP_MESSAGE = "Expected a valid timestamp";

// Decimal commas ("8,6") are common in Swedish tariff sheets.
const parseNumericString = (value: string): number | undefined => {
  const trimmed = value.trim();
  if (!trimmed) {
    return undefined;
  }
  const normalized = /^-?\d+,\d+$/.test(trimmed) ? trimmed.replace(",", ".") : trimmed;
  return Number(normalized);
};

export const optionalNumberSchema = z.unknown().transform((value, ctx) => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      ctx.addIssue({code: z.ZodIssueCode.custom, message: INVALID_NUMBER_MESSAGE});
      return z.NEVER;
    }
    return value;
  }
  if (typeof value === "string") {
    const numeric = parseNumericString(value);
    if (numeric === undefined) {
      return undefined;
    }
    if (!Number.isFinite(numeric)) {
      ctx.addIssue({code: z.ZodIssueCode.custom, message: INVALID_NUMBER_MESSAGE});
      return z.NEVER;
    }
    return numeric;
  }
  ctx.addIssue({code: z.ZodIssueCode.custom, message: INVALID_NUMBER_MESSAGE});
  return z.NEVER;
});

export const requiredNumberSchema = z.unknown().transform((value, ctx) => {
  const parsed = optionalNumberSchema.safeParse(value);
  if (!parsed.success || parsed.data === undefined) {
    ctx.addIssue({code: z.ZodIssueCode.custom, message: INVALID_NUMBER_MESSAGE});
    return z.NEVER;
  }
  return parsed.data;
});

export const optionalStringSchema = z.unknown().transform((value, ctx) => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  ctx.addIssue({code: z.ZodIssueCode.custom, message: INVALID_STRING_MESSAGE});
  return z.NEVER;
});

export const optionalTimestampSchema = z.unknown().transform((value, ctx) => {
  if (value === undefined || value === null) {
    return undefined;
  }
  let dateValue: Date | null = null;
  if (value instanceof Date) {
    dateValue = new Date(value.getTime());
  } else if (typeof value === "number") {
    const timestamp = value > 1e12 ? value : value * 1000;
    dateValue = new Date(timestamp);
  } else if (typeof value === "string") {
    const trimmed = value.trim();
    if (!trimmed) {
      return undefined;
    }
    dateValue = new Date(trimmed);
  }

  if (!dateValue || Number.isNaN(dateValue.getTime())) {
    ctx.addIssue({code: z.ZodIssueCode.custom, message: INVALID_TIMESTAMP_MESSAGE});
    return z.NEVER;
  }

  return dateValue.toISOString();
});

export const requiredTimestampSchema = z.unknown().transform((value, ctx) => {
  const parsed = optionalTimestampSchema.safeParse(value);
  if (!parsed.success || !parsed.data) {
    ctx.addIssue({code: z.ZodIssueCode.custom, message: INVALID_TIMESTAMP_MESSAGE});
    return z.NEVER;
  }
  return parsed.data;
});
