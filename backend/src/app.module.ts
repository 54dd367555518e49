import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";

import { StorageModule } from "./storage/storage.module";
import { TrpcRouter } from "./trpc/trpc.router";
import { WattplanServicesModule } from "./wattplan-services.module";

// .env may set WATTPLAN_STORAGE_PATH before StorageService reads it
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: [".env"],
      cache: true,
    }),
    StorageModule,
    WattplanServicesModule,
  ],
  providers: [TrpcRouter],
  exports: [TrpcRouter],
})
export class AppModule {
}
