import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Environment, analysisSettingsFromConfig } from '../config/environment';
import { AnalysisSettings } from './analysis.types';

export const ANALYSIS_SETTINGS = Symbol('ANALYSIS_SETTINGS');

/**
 * Run defaults, read once from validated configuration.
 */
export const analysisSettingsProvider: Provider<AnalysisSettings> = {
  provide: ANALYSIS_SETTINGS,
  useFactory: (config: ConfigService<Environment, true>) =>
    analysisSettingsFromConfig(config),
  inject: [ConfigService],
};
