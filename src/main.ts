import "reflect-metadata";
import * as dotenv from "dotenv";
dotenv.config();

import { NestFactory } from "@nestjs/core";
import type { INestApplicationContext } from "@nestjs/common";
import { AppModule } from "@/app.module";
import { ConfigurationError } from "@/common/errors";
import { EnhancedLoggerService } from "@/common/logging/enhanced-logger.service";
import { FilteredLogger } from "@/common/logging/filtered-logger";
import { toError } from "@/common/utils/error.utils";
import { ConfigService } from "@/config/config.service";
import { ENV } from "@/config/environment.constants";
import { RangeControllerService } from "@/integration/services/range-controller.service";

/**
 * Build the application context. Resolves to null when configuration or wiring fails.
 */
async function createContext(
  logger: FilteredLogger,
  enhancedLogger: EnhancedLoggerService
): Promise<INestApplicationContext | null> {
  try {
    return await NestFactory.createApplicationContext(AppModule, {
      logger,
      abortOnError: false,
    });
  } catch (error) {
    const errObj = toError(error);
    const phase = errObj instanceof ConfigurationError ? "configuration" : "bootstrap";
    enhancedLogger.error(errObj, {
      component: "Bootstrap",
      operation: "application_startup",
      severity: "critical",
      metadata: { phase, environment: ENV.APPLICATION.NODE_ENV },
    });
    return null;
  }
}

async function bootstrap(): Promise<void> {
  const logger = new FilteredLogger("Bootstrap", ENV.LOGGING.LOG_LEVEL);
  const enhancedLogger = new EnhancedLoggerService("Bootstrap");
  const operationId = `acquisition_run_${Date.now()}`;

  const app = await createContext(logger, enhancedLogger);
  if (!app) {
    process.exitCode = 1;
    return;
  }

  enhancedLogger.startPerformanceTimer(operationId, "acquisition_run", "Bootstrap");

  try {
    const config = app.get(ConfigService).getPipelineConfig();
    const result = await app.get(RangeControllerService).runRange(config);

    for (const month of result.months) {
      logger.log(
        `${month.month}: ${month.rows} rows, ${month.acceptedDays} days accepted, ${month.rejectedDays} rejected` +
          (month.failed ? " (month failed)" : "")
      );
    }
    logger.log(
      `Run ${result.start}..${result.end} finished in ${result.durationMs}ms: ${result.readings.length} rows, ` +
        `${result.acceptedDays} days accepted, ${result.rejectedDays.length} rejected` +
        (result.artifactPath ? `, written to ${result.artifactPath}` : ", no artifact written")
    );

    enhancedLogger.endPerformanceTimer(operationId, true, { rows: result.readings.length });
  } catch (error) {
    const errObj = toError(error);
    enhancedLogger.error(errObj, {
      component: "Bootstrap",
      operation: "acquisition_run",
      severity: "critical",
    });
    enhancedLogger.endPerformanceTimer(operationId, false, { error: errObj.message });
    process.exitCode = 1;
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  console.error("Fatal error during startup:", error);
  process.exitCode = 1;
});
