import { Module } from "@nestjs/common";
import { CacheModule } from "@/cache/cache.module";
import { DataManagerModule } from "@/data-manager/data-manager.module";
import { OutputModule } from "@/output/output.module";
import { DayOrchestratorService } from "./services/day-orchestrator.service";
import { MonthOrchestratorService } from "./services/month-orchestrator.service";
import { RangeControllerService } from "./services/range-controller.service";

@Module({
  imports: [CacheModule, DataManagerModule, OutputModule],
  providers: [DayOrchestratorService, MonthOrchestratorService, RangeControllerService],
  exports: [DayOrchestratorService, MonthOrchestratorService, RangeControllerService],
})
export class IntegrationModule {}
