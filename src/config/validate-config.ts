/**
 * Pipeline configuration assembly and validation
 */

import { isBefore } from "date-fns";
import { parseDateKey } from "@/common/utils/date.utils";
import type { ConfigValidationResult, PipelineConfig } from "@/common/types/config";
import type { PipelineEnvironment } from "./environment.constants";

const MINUTES_PER_DAY = 24 * 60;

/**
 * Accept only a flat object of string values; anything else is reported.
 */
export function normalizeRequestHeaders(value: unknown): { headers: Record<string, string>; error?: string } {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return { headers: {}, error: "REQUEST_HEADERS must be a JSON object" };
  }

  const headers: Record<string, string> = {};
  for (const [name, headerValue] of Object.entries(value)) {
    if (typeof headerValue !== "string") {
      return { headers: {}, error: `REQUEST_HEADERS.${name} must be a string` };
    }
    headers[name] = headerValue;
  }
  return { headers };
}

export function buildPipelineConfig(env: PipelineEnvironment): { config: PipelineConfig; errors: string[] } {
  const { headers, error } = normalizeRequestHeaders(env.REQUEST_HEADERS);

  const config: PipelineConfig = Object.freeze({
    apiDomain: env.API_DOMAIN.replace(/\/+$/, ""),
    requestHeaders: Object.freeze(headers),
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    maxConcurrentRequests: env.MAX_CONCURRENT_REQUESTS,
    monthConcurrency: env.MONTH_CONCURRENCY,
    maxRetryAttempts: env.MAX_RETRY_ATTEMPTS,
    retryInitialDelayMs: env.RETRY_INITIAL_DELAY_MS,
    retryBackoffMultiplier: env.RETRY_BACKOFF_MULTIPLIER,
    retryMaxDelayMs: env.RETRY_MAX_DELAY_MS,
    cacheDir: env.CACHE_DIR,
    cacheExpiryHours: env.CACHE_EXPIRY_HOURS,
    cacheSweepIntervalMs: env.CACHE_SWEEP_INTERVAL_MS,
    dateRangeStart: env.DATE_RANGE_START,
    dateRangeEnd: env.DATE_RANGE_END,
    expectedPointsPerDay: env.EXPECTED_POINTS_PER_DAY,
    allowedMissingPoints: env.ALLOWED_MISSING_POINTS,
    timeIntervalMinutes: env.TIME_INTERVAL_MINUTES,
    powerOutlierMin: env.POWER_OUTLIER_MIN,
    powerOutlierMax: env.POWER_OUTLIER_MAX,
    outputDir: env.OUTPUT_DIR,
  });

  return { config, errors: error ? [error] : [] };
}

export function validatePipelineConfig(config: PipelineConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const start = parseDateKey(config.dateRangeStart);
  const end = parseDateKey(config.dateRangeEnd);
  if (!start) {
    errors.push(`dateRangeStart "${config.dateRangeStart}" is not a valid YYYY-MM-DD date`);
  }
  if (!end) {
    errors.push(`dateRangeEnd "${config.dateRangeEnd}" is not a valid YYYY-MM-DD date`);
  }
  if (start && end && isBefore(end, start)) {
    errors.push(`dateRangeStart ${config.dateRangeStart} is after dateRangeEnd ${config.dateRangeEnd}`);
  }

  if (!config.apiDomain) {
    errors.push("apiDomain must not be empty");
  }
  if (config.maxConcurrentRequests < 1) {
    errors.push("maxConcurrentRequests must be at least 1");
  }
  if (config.monthConcurrency < 1) {
    errors.push("monthConcurrency must be at least 1");
  }
  if (config.maxRetryAttempts < 1) {
    errors.push("maxRetryAttempts must be at least 1");
  }
  if (config.timeIntervalMinutes <= 0) {
    errors.push("timeIntervalMinutes must be positive");
  }
  if (config.expectedPointsPerDay <= 0) {
    errors.push("expectedPointsPerDay must be positive");
  }
  if (config.allowedMissingPoints < 0) {
    errors.push("allowedMissingPoints must not be negative");
  }
  if (config.cacheExpiryHours <= 0) {
    errors.push("cacheExpiryHours must be positive");
  }
  if (config.powerOutlierMin >= config.powerOutlierMax) {
    errors.push(`powerOutlierMin (${config.powerOutlierMin}) must be below powerOutlierMax (${config.powerOutlierMax})`);
  }
  if (config.retryMaxDelayMs < config.retryInitialDelayMs) {
    warnings.push("retryMaxDelayMs is below retryInitialDelayMs; every retry waits retryMaxDelayMs");
  }

  if (config.expectedPointsPerDay * config.timeIntervalMinutes > MINUTES_PER_DAY) {
    warnings.push(
      `expectedPointsPerDay (${config.expectedPointsPerDay}) at ${config.timeIntervalMinutes} min intervals spans more than one day`
    );
  }
  if (config.allowedMissingPoints >= config.expectedPointsPerDay && config.expectedPointsPerDay > 0) {
    warnings.push("allowedMissingPoints is not below expectedPointsPerDay; the point-count rule never rejects");
  }

  return { isValid: errors.length === 0, errors, warnings };
}
