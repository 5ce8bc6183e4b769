import { Module } from '@nestjs/common';
import { AnalysisModule } from './analysis/analysis.module';
import { DatabaseModule } from './database/database.module';
import { HealthController } from './health/health.controller';
import { IngestionModule } from './ingestion';

@Module({
  imports: [DatabaseModule, IngestionModule, AnalysisModule],
  controllers: [HealthController],
})
export class AppModule {}
