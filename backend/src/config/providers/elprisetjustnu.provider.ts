import { Logger } from "@nestjs/common";

import { describeError, PriceAcquisitionError, type RawPriceRecord } from "@spotwindow/domain";
import { parsePricePayload } from "../schemas";
import type { PriceProvider, PriceProviderContext } from "./provider.types";
import { buildDayUrl, fetchJson } from "./provider.utils";

export class ElprisetJustNuProvider implements PriceProvider {
  readonly key = "elprisetjustnu";
  private readonly logger = new Logger(ElprisetJustNuProvider.name);

  async fetchDay(ctx: PriceProviderContext): Promise<RawPriceRecord[]> {
    const {settings, day} = ctx;
    const url = buildDayUrl(settings, day);
    this.logger.log(`Fetching ${settings.zone} spot prices for ${day}`);
    this.logger.verbose(`GET ${url}`);

    let payload: unknown;
    try {
      payload = await fetchJson(url, settings.timeoutMs);
    } catch (error) {
      throw new PriceAcquisitionError(`Failed to fetch prices for ${day}: ${describeError(error)}`, {cause: error});
    }

    try {
      const records = parsePricePayload(payload, settings.currency);
      this.logger.verbose(`Price feed returned ${records.length} record(s) in ${settings.currency}`);
      return records;
    } catch (error) {
      throw new PriceAcquisitionError(`Price feed answered with an unreadable payload: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}
