import { ConsoleLogger } from "@nestjs/common";
import { enabledLogLevels, type LogLevel } from "../types/logging";

/**
 * Application logger whose enabled levels follow LOG_LEVEL
 */
export class FilteredLogger extends ConsoleLogger {
  constructor(context: string, level: LogLevel) {
    super(context, { logLevels: enabledLogLevels(level) });
  }
}
