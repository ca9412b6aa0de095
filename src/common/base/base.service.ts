import { WithConfiguration } from "./mixins/configurable.mixin";
import { WithLogging } from "./mixins/logging.mixin";
import type { BaseServiceConfig, IBaseService } from "../types/services/base.types";

const defaultConfig: BaseServiceConfig = {
  useEnhancedLogging: false,
};

class SimpleBase {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  constructor(..._args: any[]) {
    // Empty constructor
  }
}

// Apply mixins step by step
const ConfigurableBase = WithConfiguration<BaseServiceConfig>(defaultConfig)(SimpleBase);
const LoggingBase = WithLogging(ConfigurableBase);

/**
 * Base service class that provides common logging functionality with configurable enhanced logging
 */
export abstract class BaseService extends LoggingBase implements IBaseService {
  constructor(config?: Partial<BaseServiceConfig>) {
    super();
    if (config) this.updateConfig(config);
  }

  /**
   * Handle config updates to reinitialize enhanced logging when needed
   */
  override onConfigUpdated(oldConfig: BaseServiceConfig, newConfig: BaseServiceConfig): void {
    if (oldConfig.useEnhancedLogging !== newConfig.useEnhancedLogging && newConfig.useEnhancedLogging !== undefined) {
      this.initializeEnhancedLogging(newConfig.useEnhancedLogging);
    }
  }
}
