import type { Logger } from "@nestjs/common";
import type { LoggingCapabilities } from "../../base/mixins/logging.mixin";
import type { ConfigurableCapabilities } from "../../base/mixins/configurable.mixin";
import type { EnhancedLoggerService } from "../../logging/enhanced-logger.service";

/**
 * Base configuration interface that all services extend
 */
export interface BaseServiceConfig extends Record<string, unknown> {
  useEnhancedLogging?: boolean;
}

/**
 * Base interface that all services implement
 */
export interface IBaseService extends LoggingCapabilities, ConfigurableCapabilities<BaseServiceConfig> {
  readonly logger: Logger;
  enhancedLogger?: EnhancedLoggerService;
}
