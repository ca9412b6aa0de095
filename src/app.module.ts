import { Module } from "@nestjs/common";
import { ConfigModule } from "@/config/config.module";
import { IntegrationModule } from "@/integration/integration.module";

@Module({
  imports: [ConfigModule, IntegrationModule],
})
export class AppModule {}
