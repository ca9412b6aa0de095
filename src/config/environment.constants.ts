/**
 * Environment Constants - Centralized Environment Variable Management
 */

import { EnvironmentUtils } from "@/common/utils/environment.utils";
import { isLogLevel, type LogLevel } from "@/common/types/logging";

function parseLogLevel(): LogLevel {
  const level = EnvironmentUtils.parseString("LOG_LEVEL", "log");
  return isLogLevel(level) ? level : "log";
}

/**
 * Read the pipeline settings from the current environment.
 * Read on demand so that a config assembled later sees the environment as it is then.
 */
export function readPipelineEnvironment() {
  return {
    // Remote source
    API_DOMAIN: EnvironmentUtils.parseString("API_DOMAIN", "http://localhost:8080"),
    REQUEST_HEADERS: EnvironmentUtils.parseJSON("REQUEST_HEADERS", {}),
    REQUEST_TIMEOUT_MS: EnvironmentUtils.parseInt("REQUEST_TIMEOUT_MS", 30000, { min: 1000, max: 300000 }),

    // Concurrency
    MAX_CONCURRENT_REQUESTS: EnvironmentUtils.parseInt("MAX_CONCURRENT_REQUESTS", 5),
    MONTH_CONCURRENCY: EnvironmentUtils.parseInt("MONTH_CONCURRENCY", 1),

    // Retry
    MAX_RETRY_ATTEMPTS: EnvironmentUtils.parseInt("MAX_RETRY_ATTEMPTS", 3),
    RETRY_INITIAL_DELAY_MS: EnvironmentUtils.parseInt("RETRY_INITIAL_DELAY_MS", 1000, { min: 0, max: 60000 }),
    RETRY_BACKOFF_MULTIPLIER: EnvironmentUtils.parseFloat("RETRY_BACKOFF_MULTIPLIER", 2.0, { min: 1.0, max: 10.0 }),
    RETRY_MAX_DELAY_MS: EnvironmentUtils.parseInt("RETRY_MAX_DELAY_MS", 30000, { min: 0, max: 600000 }),

    // Cache
    CACHE_DIR: EnvironmentUtils.parseString("CACHE_DIR", ".cache/readings"),
    CACHE_EXPIRY_HOURS: EnvironmentUtils.parseFloat("CACHE_EXPIRY_HOURS", 168),
    CACHE_SWEEP_INTERVAL_MS: EnvironmentUtils.parseInt("CACHE_SWEEP_INTERVAL_MS", 0, { min: 0 }),

    // Date range
    DATE_RANGE_START: EnvironmentUtils.parseString("DATE_RANGE_START", "2024-01-01"),
    DATE_RANGE_END: EnvironmentUtils.parseString("DATE_RANGE_END", "2024-12-31"),

    // Data quality
    EXPECTED_POINTS_PER_DAY: EnvironmentUtils.parseInt("EXPECTED_POINTS_PER_DAY", 288),
    ALLOWED_MISSING_POINTS: EnvironmentUtils.parseInt("ALLOWED_MISSING_POINTS", 12),
    TIME_INTERVAL_MINUTES: EnvironmentUtils.parseInt("TIME_INTERVAL_MINUTES", 5),
    POWER_OUTLIER_MIN: EnvironmentUtils.parseFloat("POWER_OUTLIER_MIN", -1),
    POWER_OUTLIER_MAX: EnvironmentUtils.parseFloat("POWER_OUTLIER_MAX", 50),

    // Output
    OUTPUT_DIR: EnvironmentUtils.parseString("OUTPUT_DIR", "output"),
  };
}

export type PipelineEnvironment = ReturnType<typeof readPipelineEnvironment>;

export const ENV = {
  // Application Settings
  APPLICATION: {
    NODE_ENV: EnvironmentUtils.parseString("NODE_ENV", "production"),
  },

  // Logging Configuration
  LOGGING: {
    LOG_LEVEL: parseLogLevel(),
    LOG_DIRECTORY: EnvironmentUtils.parseString("LOG_DIRECTORY", "logs"),
    ENABLE_FILE_LOGGING: EnvironmentUtils.parseBoolean("ENABLE_FILE_LOGGING", false),
    ENABLE_PERFORMANCE_LOGGING: EnvironmentUtils.parseBoolean("ENABLE_PERFORMANCE_LOGGING", false),
    ENABLE_DEBUG_LOGGING: EnvironmentUtils.parseBoolean("ENABLE_DEBUG_LOGGING", false),
  },

  // Error Handling
  ERROR_HANDLING: {
    WARNING_COOLDOWN_MS: EnvironmentUtils.parseInt("ERROR_HANDLING_WARNING_COOLDOWN_MS", 0, {
      min: 0,
      max: 300000,
    }),
  },
};
