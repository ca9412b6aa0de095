import type { PipelineConfig } from "@/common/types/config";
import type { DateKey, PartialReading, Reading } from "@/common/types/core";
import { mergeByTimestamp } from "@/aggregators/reading-merge";
import { parseDateKey } from "@/common/utils/date.utils";

type PayloadOptions = {
  /** Number of points, defaults to expectedPointsPerDay */
  count?: number;
  /** Index of the first point within the day */
  startIndex?: number;
};

/**
 * Builder pattern for creating test data objects
 */
export class TestDataBuilder {
  /**
   * Small-day configuration: 24 hourly points with a tolerance of 2, February 2023
   */
  static createPipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
    return Object.freeze({
      apiDomain: "http://solar.test",
      requestHeaders: {},
      requestTimeoutMs: 5000,
      maxConcurrentRequests: 3,
      monthConcurrency: 1,
      maxRetryAttempts: 3,
      retryInitialDelayMs: 1,
      retryBackoffMultiplier: 2,
      retryMaxDelayMs: 5,
      cacheDir: "cache-not-used",
      cacheExpiryHours: 24,
      cacheSweepIntervalMs: 0,
      dateRangeStart: "2023-02-01",
      dateRangeEnd: "2023-02-28",
      expectedPointsPerDay: 24,
      allowedMissingPoints: 2,
      timeIntervalMinutes: 60,
      powerOutlierMin: -1,
      powerOutlierMax: 50,
      outputDir: "output-not-used",
      ...overrides,
    });
  }

  static dayStart(date: DateKey): number {
    const parsed = parseDateKey(date);
    if (!parsed) {
      throw new Error(`Bad test date ${date}`);
    }
    return parsed.getTime();
  }

  static timestampAt(date: DateKey, index: number, config: PipelineConfig): number {
    return TestDataBuilder.dayStart(date) + index * config.timeIntervalMinutes * 60 * 1000;
  }

  static createPowerPayload(date: DateKey, config: PipelineConfig, options: PayloadOptions = {}): PartialReading[] {
    const { count = config.expectedPointsPerDay, startIndex = 0 } = options;
    return Array.from({ length: count }, (_, i) => ({
      timestamp: TestDataBuilder.timestampAt(date, startIndex + i, config),
      power: (startIndex + i) % 10,
    }));
  }

  static createWeatherPayload(date: DateKey, config: PipelineConfig, options: PayloadOptions = {}): PartialReading[] {
    const { count = config.expectedPointsPerDay, startIndex = 0 } = options;
    return Array.from({ length: count }, (_, i) => ({
      timestamp: TestDataBuilder.timestampAt(date, startIndex + i, config),
      rainfall: 0,
      temperature: 15 + ((startIndex + i) % 5),
      solar_radiation: 100 + startIndex + i,
      wind_speed: 3,
    }));
  }

  /**
   * A complete, valid day: both data types merged
   */
  static createDaySet(date: DateKey, config: PipelineConfig, options: PayloadOptions = {}): Reading[] {
    return mergeByTimestamp([
      TestDataBuilder.createPowerPayload(date, config, options),
      TestDataBuilder.createWeatherPayload(date, config, options),
    ]);
  }

  static createReading(timestamp: number, overrides: Partial<Omit<Reading, "timestamp">> = {}): Reading {
    return {
      timestamp,
      power: 1,
      rainfall: 0,
      temperature: 20,
      solar_radiation: 300,
      wind_speed: 2,
      ...overrides,
    };
  }
}
