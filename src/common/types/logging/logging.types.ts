import type { LogLevel as NestLogLevel } from "@nestjs/common";

/**
 * Use NestJS LogLevel type for consistency with framework
 * Valid values: "error" | "warn" | "log" | "debug" | "verbose" | "fatal"
 */
export type LogLevel = NestLogLevel;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  log: 3,
  debug: 4,
  verbose: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Check if a message should be logged based on current log level
 */
export function shouldLog(messageLevel: LogLevel, currentLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] <= LOG_LEVEL_PRIORITY[currentLevel];
}

/**
 * All levels enabled at the given level, most severe first
 */
export function enabledLogLevels(currentLevel: LogLevel): LogLevel[] {
  const levels: LogLevel[] = ["fatal", "error", "warn", "log", "debug", "verbose"];
  return levels.filter(level => shouldLog(level, currentLevel));
}

export type SeverityLevel = "low" | "medium" | "high" | "critical" | "fatal";

/**
 * Base interface for common contextual information.
 */
export interface IContext {
  component?: string;
  operation?: string;
}

export interface LogContext extends IContext {
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: LogContext;
  timestamp: number;
}

/**
 * Minimal logger surface accepted by the async utilities.
 */
export interface ILogger {
  log(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

export interface PerformanceLogEntry {
  operation: string;
  component: string;
  startTime: number;
  duration: number;
  success: boolean;
  metadata?: Record<string, unknown>;
}

export type LogMessage = string | Error;

export interface EnhancedLogContext extends IContext {
  severity?: SeverityLevel;
  metadata?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface StructuredLogEntry extends LogEntry {
  context: EnhancedLogContext;
}
