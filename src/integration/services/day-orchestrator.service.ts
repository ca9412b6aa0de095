import { Inject, Injectable } from "@nestjs/common";
import { mergeByTimestamp, withinWindow } from "@/aggregators/reading-merge";
import { CACHE_STORE } from "@/cache/cache.constants";
import { StandardService } from "@/common/base/composed.service";
import type { CachePayload, CacheStore } from "@/common/types/cache";
import type { PipelineConfig } from "@/common/types/config";
import { REQUIRED_DATA_TYPES, type DataType, type DateKey, type Reading } from "@/common/types/core";
import type { DayResult, RejectedDay } from "@/common/types/core";
import { dayWindow } from "@/common/utils/date.utils";
import { errorMessage, toError } from "@/common/utils/error.utils";
import { ReadingFetcherService } from "@/data-manager/reading-fetcher.service";
import { DayValidator } from "@/data-manager/validation/day-validator";

export const DAY_REJECTIONS = {
  FETCH_FAILURE: "fetch failure",
  UNEXPECTED_ERROR: "unexpected error",
} as const;

type TypedPayload = { dataType: DataType; payload: CachePayload };

/**
 * Assembles one calendar day: cache lookup per data type, concurrent fetch of
 * the misses, merge, validation and write-back of fresh payloads.
 *
 * Never rejects. Every failure ends as a rejected day.
 */
@Injectable()
export class DayOrchestratorService extends StandardService {
  constructor(
    @Inject(CACHE_STORE) private readonly cache: CacheStore,
    private readonly fetcher: ReadingFetcherService,
    private readonly validator: DayValidator
  ) {
    super();
  }

  async runDay(date: DateKey, config: PipelineConfig): Promise<DayResult> {
    try {
      return await this.assembleDay(date, config);
    } catch (error) {
      this.logError(toError(error), `Day ${date}`);
      return this.reject(date, DAY_REJECTIONS.UNEXPECTED_ERROR);
    }
  }

  private async assembleDay(date: DateKey, config: PipelineConfig): Promise<DayResult> {
    const lookups = await Promise.all(
      REQUIRED_DATA_TYPES.map(async dataType => ({ dataType, payload: await this.cache.get(dataType, date, config) }))
    );

    const hits: TypedPayload[] = [];
    const missing: DataType[] = [];
    for (const { dataType, payload } of lookups) {
      if (payload === undefined) {
        missing.push(dataType);
      } else {
        hits.push({ dataType, payload });
      }
    }

    if (missing.length === 0) {
      const readings = this.clipToDay(mergeByTimestamp(hits.map(hit => hit.payload)), date);
      this.logDebug(`Day ${date} served from cache (${readings.length} rows)`, "Day");
      return { date, status: "accepted", readings, source: "cache" };
    }

    const outcomes = await Promise.allSettled(missing.map(dataType => this.fetcher.fetch(dataType, date, config)));

    const fetched: TypedPayload[] = [];
    const failures: Array<{ dataType: DataType; error: unknown }> = [];
    outcomes.forEach((outcome, index) => {
      const dataType = missing[index];
      if (outcome.status === "fulfilled") {
        fetched.push({ dataType, payload: outcome.value });
      } else {
        failures.push({ dataType, error: outcome.reason });
      }
    });

    if (failures.length > 0) {
      const detail = failures.map(({ dataType, error }) => `${dataType}: ${errorMessage(error)}`).join("; ");
      return this.reject(
        date,
        DAY_REJECTIONS.FETCH_FAILURE,
        failures.map(failure => failure.dataType),
        detail
      );
    }

    const byType = new Map<DataType, CachePayload>();
    [...hits, ...fetched].forEach(({ dataType, payload }) => byType.set(dataType, payload));
    const readings = this.clipToDay(
      mergeByTimestamp(REQUIRED_DATA_TYPES.map(dataType => byType.get(dataType) ?? [])),
      date
    );

    const verdict = this.validator.validate(readings, date, config);
    if (!verdict.accepted) {
      return this.reject(date, verdict.reason, undefined, `${verdict.diagnostics.pointCount} points`);
    }

    await this.writeBack(date, fetched, config);

    return { date, status: "accepted", readings, source: hits.length > 0 ? "mixed" : "fetched" };
  }

  /**
   * Keep only readings inside the local calendar day of `date`.
   */
  private clipToDay(readings: Reading[], date: DateKey): Reading[] {
    const { start, end } = dayWindow(date);
    const clipped = withinWindow(readings, start, end);
    if (clipped.length < readings.length) {
      this.logDebug(`Day ${date}: dropped ${readings.length - clipped.length} rows outside the day`, "Day");
    }
    return clipped;
  }

  /**
   * Cache only what was fetched in this run; cached payloads keep their original storedAt.
   */
  private async writeBack(date: DateKey, fetched: readonly TypedPayload[], config: PipelineConfig): Promise<void> {
    const writes = await Promise.allSettled(
      fetched.map(({ dataType, payload }) => this.cache.put(dataType, date, payload, config))
    );

    writes.forEach((write, index) => {
      if (write.status === "rejected") {
        this.logWarning(
          `Could not cache ${fetched[index].dataType} for ${date}: ${errorMessage(write.reason)}`,
          "Day"
        );
      }
    });
  }

  private reject(date: DateKey, reason: string, failedTypes?: DataType[], detail?: string): RejectedDay {
    this.logWarning(`Day ${date} rejected: ${reason}${detail ? ` (${detail})` : ""}`, "Day");
    return failedTypes ? { date, status: "rejected", reason, failedTypes } : { date, status: "rejected", reason };
  }
}
