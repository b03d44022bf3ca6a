import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { SpotwindowServicesModule } from "./spotwindow-services.module";
import { TrpcModule } from "./trpc/trpc.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [".env", "../.env"],
      cache: true,
    }),
    SpotwindowServicesModule,
    TrpcModule,
  ],
})
export class AppModule {
}
