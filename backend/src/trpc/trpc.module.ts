import { Module } from "@nestjs/common";

import { TrpcRouter } from "./trpc.router";
import { SpotwindowServicesModule } from "../spotwindow-services.module";

@Module({
  imports: [SpotwindowServicesModule],
  providers: [TrpcRouter],
  exports: [TrpcRouter],
})
export class TrpcModule {
}
