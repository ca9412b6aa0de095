import type { Provider } from "@nestjs/common";
import { ConcurrencyLimiter } from "@/common/utils/concurrency-limiter";
import { ConfigService } from "@/config/config.service";

export const FETCH_LIMITER = Symbol("FETCH_LIMITER");

/**
 * One limiter per application context, sized from `maxConcurrentRequests`.
 */
export const fetchLimiterProvider: Provider = {
  provide: FETCH_LIMITER,
  useFactory: (configService: ConfigService) =>
    new ConcurrencyLimiter(configService.getPipelineConfig().maxConcurrentRequests),
  inject: [ConfigService],
};
