import * as fs from "fs";
import * as path from "path";
import { Injectable, Logger } from "@nestjs/common";
import type { EnhancedLogContext, LogLevel, LogMessage, PerformanceLogEntry, StructuredLogEntry } from "../types/logging";
import { shouldLog } from "../types/logging";

import { ENV } from "@/config/environment.constants";

/**
 * Structured logger on top of the Nest logger. Adds component/operation context,
 * performance timers and, when enabled, JSON-lines files under LOG_DIRECTORY.
 */
@Injectable()
export class EnhancedLoggerService {
  private readonly logger: Logger;
  private readonly logDirectory: string;
  private readonly applicationLogFile: string;
  private readonly auditLogFile: string;

  private readonly enableFileLogging: boolean;
  private readonly enablePerformanceLogging: boolean;
  private readonly enableDebugLogging: boolean;
  private readonly currentLogLevel: LogLevel;

  private readonly timers = new Map<string, PerformanceLogEntry>();

  constructor(context: string = "EnhancedLogger") {
    this.logger = new Logger(context);

    this.enableFileLogging = ENV.LOGGING.ENABLE_FILE_LOGGING;
    this.enablePerformanceLogging = ENV.LOGGING.ENABLE_PERFORMANCE_LOGGING;
    this.enableDebugLogging = ENV.LOGGING.ENABLE_DEBUG_LOGGING;
    this.logDirectory = path.join(process.cwd(), ENV.LOGGING.LOG_DIRECTORY);
    this.currentLogLevel = ENV.LOGGING.LOG_LEVEL;

    this.applicationLogFile = path.join(this.logDirectory, "application.log");
    this.auditLogFile = path.join(this.logDirectory, "audit.log");

    this.initializeLogDirectory();
  }

  log(message: LogMessage, context?: EnhancedLogContext): void {
    this.write("log", message, context);
  }

  error(message: LogMessage, context?: EnhancedLogContext): void {
    this.write("error", message, context);
  }

  warn(message: LogMessage, context?: EnhancedLogContext): void {
    this.write("warn", message, context);
  }

  debug(message: LogMessage, context?: EnhancedLogContext): void {
    if (!this.enableDebugLogging) {
      return;
    }
    this.write("debug", message, context);
  }

  /**
   * Log critical operations with enhanced context, mirrored to the audit log
   */
  logCriticalOperation(
    operation: string,
    component: string,
    details: Record<string, unknown>,
    success: boolean = true
  ): void {
    const context: EnhancedLogContext = {
      component,
      operation,
      severity: success ? "low" : "high",
      metadata: details,
    };

    const message = `Critical Operation: ${operation} ${success ? "completed successfully" : "failed"}`;

    if (success) {
      this.log(message, context);
    } else {
      this.error(message, context);
    }

    if (this.enableFileLogging) {
      this.appendLine(this.auditLogFile, {
        timestamp: new Date().toISOString(),
        operation,
        component,
        success,
        details,
        pid: process.pid,
      });
    }
  }

  /**
   * Log a batch of records moving between pipeline stages
   */
  logDataFlow(
    source: string,
    destination: string,
    dataType: string,
    count: number,
    metadata?: Record<string, unknown>
  ): void {
    this.debug(`Data flow: ${count} ${dataType} records from ${source} to ${destination}`, {
      component: "DataFlow",
      operation: "data_transfer",
      metadata: { source, destination, dataType, count, ...metadata },
    });
  }

  startPerformanceTimer(
    operationId: string,
    operation: string,
    component: string,
    metadata?: Record<string, unknown>
  ): void {
    if (!this.enablePerformanceLogging) {
      return;
    }

    this.timers.set(operationId, {
      operation,
      component,
      startTime: performance.now(),
      duration: 0,
      success: false,
      metadata,
    });
  }

  endPerformanceTimer(
    operationId: string,
    success: boolean = true,
    additionalMetadata?: Record<string, unknown>
  ): PerformanceLogEntry | undefined {
    const entry = this.timers.get(operationId);
    if (!entry) {
      return undefined;
    }
    this.timers.delete(operationId);

    const completed: PerformanceLogEntry = {
      ...entry,
      duration: performance.now() - entry.startTime,
      success,
      metadata: { ...entry.metadata, ...additionalMetadata },
    };

    this.log(`Performance: ${completed.operation} took ${completed.duration.toFixed(2)}ms`, {
      component: completed.component,
      operation: completed.operation,
      metadata: completed.metadata,
    });

    return completed;
  }

  private write(level: LogLevel, message: LogMessage, context?: EnhancedLogContext): void {
    if (!shouldLog(level, this.currentLogLevel)) {
      return;
    }

    const entry = this.createLogEntry(level, message, context);

    switch (level) {
      case "error":
        this.logger.error(entry.message, message instanceof Error ? message.stack : undefined);
        break;
      case "warn":
        this.logger.warn(entry.message);
        break;
      case "debug":
        this.logger.debug(entry.message);
        break;
      default:
        this.logger.log(entry.message);
    }

    if (this.enableFileLogging) {
      this.appendLine(this.applicationLogFile, { ...entry, timestamp: new Date(entry.timestamp).toISOString() });
    }
  }

  private createLogEntry(level: LogLevel, message: LogMessage, context?: EnhancedLogContext): StructuredLogEntry {
    return {
      level,
      message: typeof message === "string" ? message : message.message,
      timestamp: Date.now(),
      context: {
        pid: process.pid,
        ...context,
      },
    };
  }

  private initializeLogDirectory(): void {
    if (!this.enableFileLogging) {
      return;
    }

    try {
      fs.mkdirSync(this.logDirectory, { recursive: true });
    } catch (error) {
      this.logger.error("Failed to create log directory:", error);
    }
  }

  private appendLine(file: string, entry: object): void {
    try {
      fs.appendFileSync(file, JSON.stringify(entry) + "\n");
    } catch (error) {
      // Don't log file write errors through the file logger to avoid loops
      console.error("Failed to write to log file:", error);
    }
  }
}
