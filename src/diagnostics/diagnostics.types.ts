import {
  AnalysisResult,
  DataQualityFailure,
  Sample,
} from '../analysis/analysis.types';
import { FitCurveData } from '../analysis/fit-curve';

/**
 * How a sample was treated by the envelope fit.
 * - low: at or below the low-power cutoff, never fitted
 * - clipped: at or above the ceiling, replaced by the envelope
 * - cloudy: shaded relative to the refined curve, excluded from the final fit
 * - normal: fed the final fit
 */
export type SampleClassification = 'low' | 'cloudy' | 'clipped' | 'normal';

export interface ClassifiedSample extends Sample {
  classification: SampleClassification;
}

/**
 * Everything needed to chart one analysed device-day.
 */
export interface DayDiagnostics {
  date: string;
  serialNumber: number;
  ceilingWatts: number;
  lowCutoffWatts: number;
  cloudThresholdWatts: number;
  samples: ClassifiedSample[];
  curves: {
    initial: FitCurveData;
    refined: FitCurveData;
    final: FitCurveData;
  };
  /** Samples flagged cloudy against each curve */
  cloudyCounts: {
    initial: number;
    refined: number;
    final: number;
  };
  fitPointCount: number;
  tooCloudy: boolean;
  failures: DataQualityFailure[];
  /** Vertex of the final curve, when it opens downward */
  estimatedPeak: { offset: number; watts: number } | null;
  /** First and last offsets at or above the ceiling */
  exceedanceWindow: { first: number; last: number } | null;
  result: AnalysisResult;
}

/**
 * Consumer of per-day diagnostics (chart renderer, file writer, HTTP response).
 */
export interface DiagnosticSink {
  /**
   * Whether days without any sample at the ceiling should still be fitted
   * so they can be emitted.
   */
  readonly wantsDaysWithoutExceedance: boolean;

  emit(diagnostics: DayDiagnostics): void;
}
