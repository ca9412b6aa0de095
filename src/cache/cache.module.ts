import { Module } from "@nestjs/common";
import { CACHE_STORE } from "./cache.constants";
import { FileCacheService } from "./file-cache.service";

@Module({
  providers: [
    FileCacheService,
    {
      provide: CACHE_STORE,
      useExisting: FileCacheService,
    },
  ],
  exports: [CACHE_STORE, FileCacheService],
})
export class CacheModule {}
