import type { RawPriceRecord } from "@spotwindow/domain";

import type { PriceCurrency, PriceProviderKey } from "../schemas";

export interface PriceSourceSettings {
  provider: PriceProviderKey;
  baseUrl: string;
  zone: string;
  currency: PriceCurrency;
  timeoutMs: number;
  file: string | null;
}

export interface PriceProviderContext {
  /** Local calendar date, `YYYY-MM-DD`. */
  day: string;
  settings: PriceSourceSettings;
}

export interface PriceProvider {
  readonly key: PriceProviderKey;
  /** Rejects with `PriceAcquisitionError`; there is no fallback provider. */
  fetchDay(ctx: PriceProviderContext): Promise<RawPriceRecord[]>;
}
