import { DateTime } from "luxon";

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Resolves `today`, `tomorrow` or an ISO date to a calendar date in `timeZone`.
 * Day-ahead prices are published around 13:00, so `tomorrow` is the usual choice.
 */
export function resolveTargetDay(selector: string, timeZone: string, now: DateTime = DateTime.now()): string {
  const normalized = selector.trim().toLowerCase();
  const local = now.setZone(timeZone);
  let target: DateTime;
  if (normalized === "today") {
    target = local;
  } else if (normalized === "tomorrow") {
    target = local.plus({days: 1});
  } else if (ISO_DAY.test(normalized)) {
    target = DateTime.fromISO(normalized, {zone: timeZone});
  } else {
    throw new Error(`Unrecognised day '${selector}'; use today, tomorrow or YYYY-MM-DD`);
  }

  const day = target.isValid ? target.toISODate() : null;
  if (!day) {
    throw new Error(`Unrecognised day '${selector}'; use today, tomorrow or YYYY-MM-DD`);
  }
  return day;
}
