import { Inject, Injectable } from "@nestjs/common";
import { concatInOrder } from "@/aggregators/reading-merge";
import { CACHE_STORE } from "@/cache/cache.constants";
import { StandardService } from "@/common/base/composed.service";
import type { CacheStore } from "@/common/types/cache";
import type { PipelineConfig } from "@/common/types/config";
import { ErrorCode } from "@/common/types/error-handling";
import type { DayRejection, MonthResult, MonthSummary, RangeResult } from "@/common/types/core";
import { executeWithConcurrency } from "@/common/utils/async.utils";
import { ConcurrencyLimiter } from "@/common/utils/concurrency-limiter";
import { monthsInRange } from "@/common/utils/date.utils";
import { errorMessage, toError } from "@/common/utils/error.utils";
import { FETCH_LIMITER } from "@/data-manager/fetch-limiter.provider";
import { ARTIFACT_WRITER, type ArtifactWriter } from "@/output/artifact-writer.interface";
import { MonthOrchestratorService } from "./month-orchestrator.service";

/**
 * Drives a whole run: sweeps the cache, walks the months of the configured range
 * and concatenates their sets in month order.
 */
@Injectable()
export class RangeControllerService extends StandardService {
  constructor(
    private readonly monthOrchestrator: MonthOrchestratorService,
    @Inject(CACHE_STORE) private readonly cache: CacheStore,
    @Inject(ARTIFACT_WRITER) private readonly artifactWriter: ArtifactWriter,
    @Inject(FETCH_LIMITER) private readonly limiter: ConcurrencyLimiter
  ) {
    super({ useEnhancedLogging: true });
  }

  async runRange(config: PipelineConfig, now: Date = new Date()): Promise<RangeResult> {
    const startedAt = Date.now();
    const { dateRangeStart: start, dateRangeEnd: end } = config;

    this.logCriticalOperation("range_run_started", {
      start,
      end,
      maxConcurrentRequests: config.maxConcurrentRequests,
      monthConcurrency: config.monthConcurrency,
    });

    await this.sweepCache(config);

    const monthKeys = monthsInRange(start, end);
    const execution = await executeWithConcurrency(
      monthKeys,
      month => this.monthOrchestrator.runMonth(month, config, now),
      { concurrency: config.monthConcurrency, onError: "continue", logger: this.logger }
    );

    const monthResults: MonthResult[] = monthKeys.map((month, index) => {
      const result = execution.results[index];
      if (result) {
        return result;
      }
      this.logWarning(
        `Month ${month} failed and contributes no rows: ${errorMessage(execution.errors[index])}`,
        "Range"
      );
      return { month, readings: [], acceptedDays: [], rejectedDays: [] };
    });

    const readings = concatInOrder(monthResults.map(result => result.readings));
    const rejectedDays: DayRejection[] = monthResults.flatMap(result => result.rejectedDays);
    const acceptedDays = monthResults.reduce((total, result) => total + result.acceptedDays.length, 0);
    const months: MonthSummary[] = monthResults.map((result, index) => ({
      month: result.month,
      rows: result.readings.length,
      acceptedDays: result.acceptedDays.length,
      rejectedDays: result.rejectedDays.length,
      failed: execution.errors[index] !== null,
    }));

    let artifactPath: string | undefined;
    try {
      artifactPath = await this.artifactWriter.writeRange(start, end, readings, config);
    } catch (error) {
      this.logError(toError(error), "Range artifact", { code: ErrorCode.ARTIFACT_WRITE_ERROR });
    }

    const durationMs = Date.now() - startedAt;
    this.logCriticalOperation("range_run_completed", {
      start,
      end,
      months: monthKeys.length,
      rows: readings.length,
      acceptedDays,
      rejectedDays: rejectedDays.length,
      peakInFlightRequests: this.limiter.peakInFlight,
      artifactPath,
      durationMs,
    });

    return { start, end, readings, months, acceptedDays, rejectedDays, artifactPath, durationMs };
  }

  private async sweepCache(config: PipelineConfig): Promise<void> {
    try {
      const removed = await this.cache.sweep(config);
      this.logDebug(`Cache sweep removed ${removed} entries before the run`, "Range");
    } catch (error) {
      this.logWarning(`Cache sweep failed: ${errorMessage(error)}`, "Range");
    }
  }
}
