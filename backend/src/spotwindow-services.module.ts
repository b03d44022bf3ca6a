import { Module } from "@nestjs/common";

import { PriceSourceService } from "./config/price-source.service";
import { RuntimeConfigService } from "./config/runtime-config.service";
import { ScheduleConfigFactory } from "./config/schedule-config.factory";
import { ScheduleService } from "./schedule/schedule.service";

@Module({
  providers: [
    ScheduleService,
    PriceSourceService,
    ScheduleConfigFactory,
    RuntimeConfigService,
  ],
  exports: [
    ScheduleService,
    PriceSourceService,
    ScheduleConfigFactory,
    RuntimeConfigService,
  ],
})
export class SpotwindowServicesModule {}
