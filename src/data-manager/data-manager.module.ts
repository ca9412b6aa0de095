import { Module } from "@nestjs/common";
import { AdaptersModule } from "@/adapters/adapters.module";
import { ErrorHandlingModule } from "@/error-handling/error-handling.module";
import { fetchLimiterProvider, FETCH_LIMITER } from "./fetch-limiter.provider";
import { ReadingFetcherService } from "./reading-fetcher.service";
import { DayValidator } from "./validation/day-validator";

@Module({
  imports: [AdaptersModule, ErrorHandlingModule],
  providers: [fetchLimiterProvider, ReadingFetcherService, DayValidator],
  exports: [FETCH_LIMITER, ReadingFetcherService, DayValidator],
})
export class DataManagerModule {}
