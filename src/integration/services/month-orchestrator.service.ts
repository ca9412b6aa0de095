import { Inject, Injectable } from "@nestjs/common";
import { dedupeAndSort } from "@/aggregators/reading-merge";
import { StandardService } from "@/common/base/composed.service";
import type { PipelineConfig } from "@/common/types/config";
import { ErrorCode } from "@/common/types/error-handling";
import type { DateKey, DayRejection, MonthKey, MonthResult, Reading } from "@/common/types/core";
import { eligibleDaysOfMonth } from "@/common/utils/date.utils";
import { toError } from "@/common/utils/error.utils";
import { ARTIFACT_WRITER, type ArtifactWriter } from "@/output/artifact-writer.interface";
import { DayOrchestratorService } from "./day-orchestrator.service";

/**
 * Runs every eligible day of a month and folds the accepted days into one sorted set.
 *
 * All day tasks are dispatched at once; the shared fetch limiter is what bounds the
 * remote reads they issue.
 */
@Injectable()
export class MonthOrchestratorService extends StandardService {
  constructor(
    private readonly dayOrchestrator: DayOrchestratorService,
    @Inject(ARTIFACT_WRITER) private readonly artifactWriter: ArtifactWriter
  ) {
    super({ useEnhancedLogging: true });
  }

  async runMonth(month: MonthKey, config: PipelineConfig, now: Date = new Date()): Promise<MonthResult> {
    const days = eligibleDaysOfMonth(month, config.dateRangeStart, config.dateRangeEnd, now);

    if (days.length === 0) {
      this.logDebug(`No eligible days in ${month}`, "Month");
      return { month, readings: [], acceptedDays: [], rejectedDays: [] };
    }

    const timerId = `month_${month}`;
    this.startPerformanceTimer(timerId, "run_month", { month, days: days.length });

    const results = await Promise.all(days.map(date => this.dayOrchestrator.runDay(date, config)));

    const dayReadings: Reading[][] = [];
    const acceptedDays: DateKey[] = [];
    const rejectedDays: DayRejection[] = [];
    for (const result of results) {
      if (result.status === "accepted") {
        dayReadings.push(result.readings);
        acceptedDays.push(result.date);
      } else {
        rejectedDays.push({ date: result.date, reason: result.reason });
      }
    }

    const readings = dedupeAndSort(dayReadings.flat());
    this.enhancedLogger?.logDataFlow("DayOrchestrator", "MonthOrchestrator", "reading", readings.length, { month });

    let artifactPath: string | undefined;
    try {
      artifactPath = await this.artifactWriter.writeMonth(month, readings, config);
    } catch (error) {
      this.logError(toError(error), `Month ${month} artifact`, { code: ErrorCode.ARTIFACT_WRITE_ERROR });
    }

    this.endPerformanceTimer(timerId, true, { rows: readings.length });
    this.logSummary(month, days.length, acceptedDays.length, rejectedDays, readings.length);

    return { month, readings, acceptedDays, rejectedDays, artifactPath };
  }

  private logSummary(
    month: MonthKey,
    eligible: number,
    accepted: number,
    rejectedDays: readonly DayRejection[],
    rows: number
  ): void {
    const message = `Month ${month}: ${accepted}/${eligible} days accepted, ${rows} rows`;
    if (rejectedDays.length === 0) {
      this.logger.log(message);
      return;
    }

    const missing = rejectedDays.map(rejection => `${rejection.date} (${rejection.reason})`).join(", ");
    this.logger.warn(`${message}; missing ${missing}`);
  }
}
