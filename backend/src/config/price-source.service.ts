import { Injectable, Logger } from "@nestjs/common";

import type { RawPriceRecord } from "@spotwindow/domain";
import { ElprisetJustNuProvider } from "./providers/elprisetjustnu.provider";
import { FilePriceProvider } from "./providers/file.provider";
import type { PriceProvider, PriceSourceSettings } from "./providers/provider.types";

@Injectable()
export class PriceSourceService {
  private readonly logger = new Logger(PriceSourceService.name);

  createProvider(settings: PriceSourceSettings): PriceProvider {
    switch (settings.provider) {
      case "elprisetjustnu":
        return new ElprisetJustNuProvider();
      case "file":
        return new FilePriceProvider();
    }
  }

  async fetchDay(settings: PriceSourceSettings, day: string): Promise<RawPriceRecord[]> {
    const provider = this.createProvider(settings);
    this.logger.log(`Collecting spot prices via provider ${provider.key}`);
    const records = await provider.fetchDay({day, settings});
    this.logger.verbose(`Provider ${provider.key} returned ${records.length} record(s) for ${day}`);
    return records;
  }
}
