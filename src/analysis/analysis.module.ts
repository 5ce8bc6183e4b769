import { Module } from '@nestjs/common';
import { TelemetryModule } from '../telemetry/telemetry.module';
import { AnalysisController } from './analysis.controller';
import { AnalysisService } from './analysis.service';
import { analysisSettingsProvider } from './analysis-settings.provider';
import { DeviceDayAnalyzer } from './device-day.analyzer';

/**
 * AnalysisModule
 *
 * Components:
 * - AnalysisController: report and diagnostics endpoints
 * - AnalysisService: runs the pipeline over a date range with a per-day error boundary
 * - DeviceDayAnalyzer: quality gate, envelope fit and energy accounting for one device-day
 */
@Module({
  imports: [TelemetryModule],
  controllers: [AnalysisController],
  providers: [AnalysisService, DeviceDayAnalyzer, analysisSettingsProvider],
  exports: [AnalysisService],
})
export class AnalysisModule {}
