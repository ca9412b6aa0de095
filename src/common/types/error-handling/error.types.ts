/**
 * Common error codes used across the pipeline
 */
export enum ErrorCode {
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",

  // Remote source
  NETWORK_ERROR = "NETWORK_ERROR",
  TIMEOUT_ERROR = "TIMEOUT_ERROR",
  RATE_LIMIT_EXCEEDED = "RATE_LIMIT_EXCEEDED",
  SERVICE_UNAVAILABLE = "SERVICE_UNAVAILABLE",
  DATA_NOT_FOUND = "DATA_NOT_FOUND",
  DATA_SOURCE_ERROR = "DATA_SOURCE_ERROR",
  DATA_PARSE_ERROR = "DATA_PARSE_ERROR",

  // Local persistence
  CACHE_CORRUPTION = "CACHE_CORRUPTION",
  ARTIFACT_WRITE_ERROR = "ARTIFACT_WRITE_ERROR",
}

/**
 * How a failed fetch should be treated.
 * - transient: retried with backoff
 * - fatal: the request itself is wrong, not retried
 * - malformed: the response could not be understood, not retried
 */
export type FetchErrorKind = "transient" | "fatal" | "malformed";

/**
 * Backoff settings consumed by the retry service
 */
export interface RetryConfig {
  /** Total attempts, the first one included */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitter: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: false,
};
