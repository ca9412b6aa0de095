import { Module } from "@nestjs/common";
import { REMOTE_DATA_SOURCE } from "./base/remote-data-source.interface";
import { SolarApiAdapter } from "./solar/solar-api.adapter";

@Module({
  providers: [
    SolarApiAdapter,
    {
      provide: REMOTE_DATA_SOURCE,
      useExisting: SolarApiAdapter,
    },
  ],
  exports: [REMOTE_DATA_SOURCE, SolarApiAdapter],
})
export class AdaptersModule {}
