import { Inject, Injectable } from "@nestjs/common";
import { REMOTE_DATA_SOURCE, type RemoteDataSource } from "@/adapters/base/remote-data-source.interface";
import { StandardService } from "@/common/base/composed.service";
import { isFetchError } from "@/common/errors";
import type { PipelineConfig } from "@/common/types/config";
import type { DataType, DateKey, PartialReading } from "@/common/types/core";
import { ConcurrencyLimiter } from "@/common/utils/concurrency-limiter";
import { errorMessage } from "@/common/utils/error.utils";
import { RetryService, retryConfigFromPipeline } from "@/error-handling/retry.service";
import { FETCH_LIMITER } from "./fetch-limiter.provider";

/**
 * One bounded, retried remote read per (data type, date).
 *
 * The limiter slot is taken before the first attempt and held through every
 * backoff sleep until the read settles.
 */
@Injectable()
export class ReadingFetcherService extends StandardService {
  constructor(
    @Inject(REMOTE_DATA_SOURCE) private readonly source: RemoteDataSource,
    @Inject(FETCH_LIMITER) private readonly limiter: ConcurrencyLimiter,
    private readonly retryService: RetryService
  ) {
    super();
  }

  async fetch(dataType: DataType, date: DateKey, config: PipelineConfig): Promise<PartialReading[]> {
    try {
      const readings = await this.limiter.run(() =>
        this.retryService.executeWithRetry(() => this.source.read(dataType, date, config), {
          serviceId: this.source.sourceName,
          operationName: `fetch ${dataType} ${date}`,
          retryConfig: retryConfigFromPipeline(config),
        })
      );

      if (readings.length === 0) {
        this.logDebug(`No ${dataType} data reported for ${date}`, "Fetch");
      }
      return readings;
    } catch (error) {
      const kind = isFetchError(error) ? `${error.name} (${error.kind})` : "unexpected error";
      this.logWarning(`Fetch of ${dataType} for ${date} failed with ${kind}: ${errorMessage(error)}`, "Fetch");
      throw error;
    }
  }

  getLimiterStats(): { capacity: number; inFlight: number; peakInFlight: number; pending: number } {
    return {
      capacity: this.limiter.capacity,
      inFlight: this.limiter.inFlight,
      peakInFlight: this.limiter.peakInFlight,
      pending: this.limiter.pending,
    };
  }
}
