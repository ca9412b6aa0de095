import { Logger } from "@nestjs/common";
import { EnhancedLoggerService } from "../../logging/enhanced-logger.service";
import type { Constructor, AbstractConstructor } from "../../types/services/mixins";

/**
 * Logging capabilities interface
 */
export interface LoggingCapabilities {
  logError(error: Error, context?: string, additionalData?: Record<string, unknown>): void;
  logWarning(message: string, context?: string, additionalData?: Record<string, unknown>): void;
  logDebug(message: string, context?: string, additionalData?: unknown): void;
  logCriticalOperation(operation: string, details: Record<string, unknown>, success?: boolean): void;
  startPerformanceTimer(operationId: string, operation: string, metadata?: Record<string, unknown>): void;
  endPerformanceTimer(operationId: string, success?: boolean, additionalMetadata?: Record<string, unknown>): void;
}

/**
 * Mixin that adds logging capabilities to a service
 */
export function WithLogging<TBase extends Constructor | AbstractConstructor>(Base: TBase) {
  return class LoggingMixin extends Base implements LoggingCapabilities {
    public readonly logger: Logger;
    public enhancedLogger?: EnhancedLoggerService;

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
      this.logger = new Logger(this.constructor.name);
    }

    initializeEnhancedLogging(useEnhancedLogging: boolean): void {
      if (useEnhancedLogging) {
        this.enhancedLogger = new EnhancedLoggerService(this.constructor.name);
      } else {
        this.enhancedLogger = undefined;
      }
    }

    logError(error: Error, context?: string, additionalData?: Record<string, unknown>): void {
      const contextMessage = context ? `[${context}] ` : "";
      this.logger.error(`${contextMessage}${error.message}`, error.stack, additionalData);
    }

    logWarning(message: string, context?: string, additionalData?: Record<string, unknown>): void {
      const contextMessage = context ? `[${context}] ` : "";
      if (additionalData) {
        this.logger.warn(`${contextMessage}${message}`, additionalData);
      } else {
        this.logger.warn(`${contextMessage}${message}`);
      }
    }

    logDebug(message: string, context?: string, additionalData?: unknown): void {
      const contextMessage = context ? `[${context}] ` : "";
      if (additionalData !== undefined) {
        this.logger.debug(`${contextMessage}${message}`, additionalData);
      } else {
        this.logger.debug(`${contextMessage}${message}`);
      }
    }

    logCriticalOperation(operation: string, details: Record<string, unknown>, success = true): void {
      if (this.enhancedLogger) {
        this.enhancedLogger.logCriticalOperation(operation, this.constructor.name, details, success);
      } else {
        const message = `Critical Operation: ${operation} ${success ? "completed successfully" : "failed"}`;
        if (success) {
          this.logger.log(message, details);
        } else {
          this.logger.error(message, details);
        }
      }
    }

    startPerformanceTimer(operationId: string, operation: string, metadata?: Record<string, unknown>): void {
      this.enhancedLogger?.startPerformanceTimer(operationId, operation, this.constructor.name, metadata);
    }

    endPerformanceTimer(operationId: string, success = true, additionalMetadata?: Record<string, unknown>): void {
      this.enhancedLogger?.endPerformanceTimer(operationId, success, additionalMetadata);
    }
  };
}
