import {
  AnalysisSettings,
  DataQualityFailure,
  DeviceDay,
} from './analysis.types';

/**
 * Spacing statistics of a device-day's samples (seconds).
 */
export interface GapStatistics {
  min: number;
  max: number;
  average: number;
}

/**
 * Result of inspecting a device-day before curve fitting.
 */
export interface QualityReport {
  /** Failed checks, in the order they were evaluated */
  failures: DataQualityFailure[];
  /** Human-readable warnings and failure details for the log */
  warnings: string[];
  /** Number of samples at or above the ceiling */
  clippedCount: number;
  gaps: GapStatistics | null;
}

export function gapStatistics(day: DeviceDay): GapStatistics | null {
  const { samples } = day;
  if (samples.length < 2) return null;

  let min = Infinity;
  let max = 0;
  for (let i = 1; i < samples.length; i++) {
    const delta = samples[i].offset - samples[i - 1].offset;
    if (delta > max) max = delta;
    if (delta < min) min = delta;
  }
  const average = Math.round(
    (samples[samples.length - 1].offset - samples[0].offset) /
      (samples.length - 1),
  );
  return { min, max, average };
}

/**
 * Run the sanity checks on a device-day. Every check is computed regardless
 * of strictness; whether a failure aborts is decided by {@link shouldAbort}.
 */
export function inspectDeviceDay(
  day: DeviceDay,
  settings: AnalysisSettings,
): QualityReport {
  const { samples } = day;
  const failures: DataQualityFailure[] = [];
  const warnings: string[] = [];

  const gaps = gapStatistics(day);
  if (gaps) {
    if (gaps.max * 2 > gaps.average * 3) {
      warnings.push(
        `max delta too high: ${gaps.max} secs (avg delta: ${gaps.average} secs)`,
      );
    }
    if (gaps.min * 2 < gaps.average) {
      warnings.push(
        `min delta too low: ${gaps.min} secs (avg delta: ${gaps.average} secs)`,
      );
    }
  }

  const first = samples[0];
  const last = samples[samples.length - 1];

  if (first && first.watts > settings.maxStartupWatts) {
    failures.push('startup-power');
    warnings.push(`startup power too high: ${first.watts} W`);
  }
  if (samples.length < settings.minSamples) {
    failures.push('insufficient-data');
    warnings.push(
      `insufficient data for analysis: ${samples.length} records`,
    );
  }
  if (last && last.watts > settings.maxShutdownWatts) {
    failures.push('shutdown-power');
    warnings.push(`shutdown power too high: ${last.watts} W`);
  }

  const clippedCount = samples.filter(
    (s) => s.watts >= settings.ceilingWatts,
  ).length;

  return { failures, warnings, clippedCount, gaps };
}

/**
 * Whether recorded failures end the analysis early.
 */
export function shouldAbort(
  failures: readonly DataQualityFailure[],
  settings: Pick<AnalysisSettings, 'strictness'>,
): boolean {
  return settings.strictness === 'gated' && failures.length > 0;
}
