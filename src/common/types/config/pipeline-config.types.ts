import type { DateKey } from "../core";

/**
 * Run parameters. Built once at startup, frozen, and passed explicitly to every
 * component call.
 */
export interface PipelineConfig {
  readonly apiDomain: string;
  readonly requestHeaders: Readonly<Record<string, string>>;
  readonly requestTimeoutMs: number;

  readonly maxConcurrentRequests: number;
  readonly monthConcurrency: number;

  readonly maxRetryAttempts: number;
  readonly retryInitialDelayMs: number;
  readonly retryBackoffMultiplier: number;
  readonly retryMaxDelayMs: number;

  readonly cacheDir: string;
  readonly cacheExpiryHours: number;
  readonly cacheSweepIntervalMs: number;

  readonly dateRangeStart: DateKey;
  readonly dateRangeEnd: DateKey;

  readonly expectedPointsPerDay: number;
  readonly allowedMissingPoints: number;
  readonly timeIntervalMinutes: number;
  readonly powerOutlierMin: number;
  readonly powerOutlierMax: number;

  readonly outputDir: string;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}
