import { DateTime } from "luxon";

import type { PriceSourceSettings } from "./provider.types";

/** `{base}/{yyyy}/{MM-dd}_{zone}.json` */
export function buildDayUrl(settings: Pick<PriceSourceSettings, "baseUrl" | "zone">, day: string): string {
  const date = DateTime.fromISO(day);
  if (!date.isValid) {
    throw new Error(`Invalid day '${day}'`);
  }
  return `${settings.baseUrl}/${date.toFormat("yyyy")}/${date.toFormat("MM-dd")}_${settings.zone}.json`;
}

export async function fetchJson(url: string, timeoutMs: number): Promise<unknown> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, {signal: controller.signal, headers: {Accept: "application/json"}});
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`);
    }
    const payload: unknown = await response.json();
    return payload;
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(`Request timed out after ${timeoutMs} ms`, {cause: error});
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}
