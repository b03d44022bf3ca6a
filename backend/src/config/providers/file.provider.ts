import { Logger } from "@nestjs/common";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import { describeError, PriceAcquisitionError, type RawPriceRecord } from "@spotwindow/domain";
import { parsePricePayload } from "../schemas";
import type { PriceProvider, PriceProviderContext } from "./provider.types";

/**
 * Reads a saved day file instead of calling the feed. `{day}` in the path is
 * replaced with the target date.
 */
export class FilePriceProvider implements PriceProvider {
  readonly key = "file";
  private readonly logger = new Logger(FilePriceProvider.name);

  async fetchDay(ctx: PriceProviderContext): Promise<RawPriceRecord[]> {
    const template = ctx.settings.file;
    if (!template) {
      throw new PriceAcquisitionError("price_source.file is not configured");
    }
    const path = resolve(process.cwd(), template.replaceAll("{day}", ctx.day));
    this.logger.log(`Reading spot prices for ${ctx.day} from ${path}`);

    try {
      const raw: unknown = JSON.parse(await readFile(path, "utf-8"));
      return parsePricePayload(raw, ctx.settings.currency);
    } catch (error) {
      throw new PriceAcquisitionError(`Failed to read prices from ${path}: ${describeError(error)}`, {cause: error});
    }
  }
}
