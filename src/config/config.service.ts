/**
 * Config Service
 * Assembles the pipeline configuration once, at construction, and refuses to start on an invalid one
 */

import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base/base.service";
import { ConfigurationError } from "@/common/errors";
import type { PipelineConfig } from "@/common/types/config";
import { readPipelineEnvironment, type PipelineEnvironment } from "./environment.constants";
import { buildPipelineConfig, validatePipelineConfig } from "./validate-config";

@Injectable()
export class ConfigService extends BaseService {
  private readonly pipelineConfig: PipelineConfig;

  constructor(env: PipelineEnvironment = readPipelineEnvironment()) {
    super({ useEnhancedLogging: true });

    const { config, errors: parseErrors } = buildPipelineConfig(env);
    const validation = validatePipelineConfig(config);
    const errors = [...parseErrors, ...validation.errors];

    if (errors.length > 0) {
      errors.forEach(error => this.logger.error(`Configuration error: ${error}`));
      throw new ConfigurationError(errors);
    }

    validation.warnings.forEach(warning => this.logWarning(warning, "Configuration"));
    this.pipelineConfig = config;

    this.logger.log(
      `Configuration loaded: ${config.dateRangeStart}..${config.dateRangeEnd} from ${config.apiDomain}, ` +
        `${config.maxConcurrentRequests} concurrent requests, cache ${config.cacheDir} (${config.cacheExpiryHours}h)`
    );
  }

  getPipelineConfig(): PipelineConfig {
    return this.pipelineConfig;
  }
}
