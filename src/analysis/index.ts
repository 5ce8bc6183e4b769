// Re-export public API
export { AnalysisModule } from './analysis.module';
export { AnalysisService, parseLocalDate } from './analysis.service';
export type {
  AnalysisReport,
  AnalysisRunOptions,
  DateRange,
} from './analysis.service';
export { DeviceDayAnalyzer } from './device-day.analyzer';
export { AnalysisError, FitUndefinedError } from './analysis.errors';
export { FitCurve, fitQuadratic } from './fit-curve';
export { fitEnvelope, flagCloudy } from './curve-fitter';
export type { EnvelopeFit } from './curve-fitter';
export {
  accountEnergy,
  doubledExceedance,
  estimatedSeries,
  generatedEnergy,
} from './power-accountant';
export { inspectDeviceDay, shouldAbort } from './quality-gate';
export type { QualityReport, GapStatistics } from './quality-gate';
export { reconstructDays, appendReading } from './reconstructor';
export type { RawReading, ReconstructedDay } from './reconstructor';
export type {
  AnalysisResult,
  AnalysisSettings,
  DataQualityFailure,
  DeviceDay,
  DeviceDayOutcome,
  Sample,
  StrictnessMode,
} from './analysis.types';
