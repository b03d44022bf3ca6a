import { Inject, Injectable } from "@nestjs/common";

import { getRuntimeConfig } from "./runtime-config";
import { ScheduleConfigFactory, type ScheduleSettings } from "./schedule-config.factory";

@Injectable()
export class RuntimeConfigService {
  private readonly settings: ScheduleSettings;

  constructor(@Inject(ScheduleConfigFactory) factory: ScheduleConfigFactory) {
    const config = getRuntimeConfig();
    if (!config) {
      throw new Error("Runtime configuration not initialised");
    }
    this.settings = factory.create(config);
  }

  getSettings(): ScheduleSettings {
    return this.settings;
  }
}
