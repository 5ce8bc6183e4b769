/**
 * A single point of a device-day series.
 */
export interface Sample {
  /** Seconds past local midnight, in [0, 86400) */
  offset: number;
  /** Non-negative integer power reading */
  watts: number;
}

/**
 * One device's reconstructed series for one calendar day.
 *
 * The first and last samples are always real readings; synthesized
 * hold-value samples only ever appear in between.
 */
export interface DeviceDay {
  /** Local calendar date, formatted yyyy-MM-dd */
  date: string;
  serialNumber: number;
  samples: Sample[];
}

/**
 * Energy figures for a device-day, all in watt-seconds.
 *
 * An absent field means the figure was not computed: the day failed quality
 * gating, no sample reached the ceiling (exceedance), or the modelled curve
 * never rose above the measured one (shaved).
 */
export interface AnalysisResult {
  generatedEnergy: number;
  exceedanceEnergy?: number;
  shavedEnergy?: number;
}

/**
 * How the quality gate treats failed checks.
 * - gated: a failed check ends the day with generated energy only
 * - forced: failures are recorded but fitting proceeds
 */
export type StrictnessMode = 'gated' | 'forced';

export const STRICTNESS_MODES = ['gated', 'forced'] as const;

/**
 * Tunables of the analysis pipeline. Defaults live in config/environment.ts.
 */
export interface AnalysisSettings {
  /** Maximum continuous power (watts) */
  ceilingWatts: number;
  /** Expected seconds between raw telemetry updates */
  cadenceSeconds: number;
  /** Samples at or below this level are not parabolic and never fitted */
  lowCutoffWatts: number;
  /** Margin below a fitted curve before a sample counts as shaded */
  cloudThresholdWatts: number;
  /** Minimum samples for a usable day */
  minSamples: number;
  /** Minimum samples left for the final fit after cloud rejection */
  minFitSamples: number;
  /** Highest acceptable first reading of the day */
  maxStartupWatts: number;
  /** Highest acceptable last reading of the day */
  maxShutdownWatts: number;
  strictness: StrictnessMode;
}

/**
 * Reasons a device-day is considered unfit for curve fitting.
 */
export type DataQualityFailure =
  | 'startup-power'
  | 'insufficient-data'
  | 'shutdown-power'
  | 'too-cloudy';

/**
 * Outcome of one device-day as handed to the report sink.
 */
export interface DeviceDayOutcome {
  date: string;
  serialNumber: number;
  status: 'analyzed' | 'partial' | 'failed';
  result: AnalysisResult;
  failures: DataQualityFailure[];
  error?: string;
}
