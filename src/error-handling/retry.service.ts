import { Injectable } from "@nestjs/common";
import { StandardService } from "@/common/base/composed.service";
import { isTransientFetchError } from "@/common/errors";
import type { PipelineConfig } from "@/common/types/config";
import { DEFAULT_RETRY_CONFIG, type RetryConfig } from "@/common/types/error-handling";
import { sleepFor } from "@/common/utils/common.utils";
import { toError } from "@/common/utils/error.utils";
import { ENV } from "@/config/environment.constants";

type RetryStatistics = {
  totalAttempts: number;
  successfulOperations: number;
  failedOperations: number;
  retriedOperations: number;
  averageOperationTime: number;
  lastOperationTime?: Date;
};

export interface RetryContext {
  serviceId?: string;
  operationName: string;
  retryConfig?: Partial<RetryConfig>;
  /** Decides whether a failed attempt may be repeated. Defaults to transient fetch errors only. */
  isRetryable?: (error: unknown) => boolean;
}

/**
 * Delay before the attempt following attempt number `attempt` (1-based).
 */
export function computeBackoffDelay(attempt: number, config: RetryConfig): number {
  const exponential = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);
  return Math.min(exponential, config.maxDelayMs);
}

export function retryConfigFromPipeline(config: PipelineConfig): RetryConfig {
  return {
    ...DEFAULT_RETRY_CONFIG,
    maxAttempts: config.maxRetryAttempts,
    initialDelayMs: config.retryInitialDelayMs,
    maxDelayMs: config.retryMaxDelayMs,
    backoffMultiplier: config.retryBackoffMultiplier,
  };
}

/**
 * Retry executor with exponential backoff. Whether an error is retried is decided
 * from its kind, never from its message.
 */
@Injectable()
export class RetryService extends StandardService {
  private readonly retryStats = new Map<string, RetryStatistics>();
  private isShuttingDown = false;

  // Rate limiting for warnings
  private warningLastLogged = new Map<string, number>();
  private readonly WARNING_COOLDOWN_MS = ENV.ERROR_HANDLING.WARNING_COOLDOWN_MS;

  constructor() {
    super({ useEnhancedLogging: true });
  }

  async executeWithRetry<T>(operation: () => Promise<T>, context: RetryContext): Promise<T> {
    const { operationName, isRetryable = isTransientFetchError } = context;
    const serviceId = context.serviceId ?? "default";
    const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...context.retryConfig };
    const maxAttempts = Math.max(1, config.maxAttempts);

    const startTime = Date.now();

    for (let attempt = 1; ; attempt++) {
      if (this.isShuttingDown) {
        throw new Error(`Retry executor is shutting down, aborting ${operationName}`);
      }

      try {
        this.enhancedLogger?.debug(`Executing ${operationName} (attempt ${attempt}/${maxAttempts})`, {
          component: "RetryService",
          operation: "execute_with_retry",
          serviceId,
          operationName,
          attempt,
        });

        const result = await operation();
        this.recordOutcome(serviceId, attempt, Date.now() - startTime, true);
        return result;
      } catch (error) {
        if (attempt >= maxAttempts || !isRetryable(error) || this.isShuttingDown) {
          this.recordOutcome(serviceId, attempt, Date.now() - startTime, false);
          throw error;
        }

        const baseDelay = computeBackoffDelay(attempt, config);
        const delayMs = config.jitter ? Math.round(baseDelay * (0.5 + Math.random() * 0.5)) : baseDelay;
        this.warnRetry(serviceId, operationName, attempt, maxAttempts, toError(error), delayMs);

        await sleepFor(delayMs);
      }
    }
  }

  getRetryStatistics(): Record<string, RetryStatistics> {
    const stats: Record<string, RetryStatistics> = {};
    for (const [serviceId, serviceStats] of this.retryStats.entries()) {
      stats[serviceId] = {
        ...serviceStats,
        averageOperationTime: Math.round(serviceStats.averageOperationTime * 100) / 100,
      };
    }
    return stats;
  }

  private warnRetry(
    serviceId: string,
    operationName: string,
    attempt: number,
    maxAttempts: number,
    error: Error,
    delayMs: number
  ): void {
    const now = Date.now();
    const warningKey = `${serviceId}_retry_warning`;
    const lastLogged = this.warningLastLogged.get(warningKey) ?? 0;

    if (this.WARNING_COOLDOWN_MS === 0 || now - lastLogged > this.WARNING_COOLDOWN_MS) {
      this.logger.warn(
        `${operationName}: attempt ${attempt}/${maxAttempts} failed: ${error.message}. Retrying in ${delayMs}ms...`
      );
      this.warningLastLogged.set(warningKey, now);
    }
  }

  private recordOutcome(serviceId: string, attempts: number, totalTime: number, success: boolean): void {
    let stats = this.retryStats.get(serviceId);
    if (!stats) {
      stats = {
        totalAttempts: 0,
        successfulOperations: 0,
        failedOperations: 0,
        retriedOperations: 0,
        averageOperationTime: 0,
      };
      this.retryStats.set(serviceId, stats);
    }

    const completed = stats.successfulOperations + stats.failedOperations;
    stats.totalAttempts += attempts;
    stats.averageOperationTime = (stats.averageOperationTime * completed + totalTime) / (completed + 1);
    stats.lastOperationTime = new Date();
    if (attempts > 1) stats.retriedOperations++;

    if (success) {
      stats.successfulOperations++;
    } else {
      stats.failedOperations++;
    }
  }

  override async cleanup(): Promise<void> {
    this.isShuttingDown = true;
    this.retryStats.clear();
    this.logger.debug("RetryService cleanup completed");
  }
}
