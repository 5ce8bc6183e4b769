import { FitUndefinedError } from './analysis.errors';
import { AnalysisSettings, DeviceDay, Sample } from './analysis.types';
import { FitCurve, fitQuadratic } from './fit-curve';

/**
 * Artifacts of the three-pass envelope fit for one device-day.
 */
export interface EnvelopeFit {
  /** Pass 1: all unclipped samples above the low cutoff */
  initial: FitCurve;
  /** Pass 2: pass-1 input minus samples shaded relative to pass 1 */
  refined: FitCurve;
  /** Pass 3, the production envelope. Null when a gated day was too cloudy */
  final: FitCurve | null;
  /** Per-sample cloud flags against the initial curve */
  cloudyInitial: boolean[];
  /** Per-sample cloud flags against the refined curve */
  cloudyRefined: boolean[];
  /** Samples that fed the final pass */
  fitPointCount: number;
  tooCloudy: boolean;
}

type FitterSettings = Pick<
  AnalysisSettings,
  | 'ceilingWatts'
  | 'lowCutoffWatts'
  | 'cloudThresholdWatts'
  | 'minFitSamples'
  | 'strictness'
>;

/**
 * Flags samples sitting more than the cloud threshold below a curve.
 * Evaluated over the whole day, clipped samples included.
 */
export function flagCloudy(
  samples: readonly Sample[],
  curve: FitCurve,
  settings: Pick<AnalysisSettings, 'lowCutoffWatts' | 'cloudThresholdWatts'>,
): boolean[] {
  return samples.map(
    ({ offset, watts }) =>
      settings.lowCutoffWatts < watts &&
      watts < curve.evaluate(offset) - settings.cloudThresholdWatts,
  );
}

/**
 * Estimate the device's unclipped production envelope for the day.
 *
 * Low-power samples are never parabolic and clipped samples are capped by
 * the inverter, so only the band between the cutoff and the ceiling is fit.
 * Two rounds of cloud rejection remove shaded dips that would otherwise
 * drag the curve down.
 *
 * @throws FitUndefinedError when a pass has fewer than 3 usable points
 */
export function fitEnvelope(
  day: DeviceDay,
  settings: FitterSettings,
): EnvelopeFit {
  const { samples } = day;
  const unclipped = (s: Sample) =>
    settings.lowCutoffWatts < s.watts && s.watts < settings.ceilingWatts;
  const fit = (points: Sample[]) => fitWithContext(points, day);

  const initial = fit(samples.filter(unclipped));
  const cloudyInitial = flagCloudy(samples, initial, settings);

  const refined = fit(
    samples.filter((s, i) => unclipped(s) && !cloudyInitial[i]),
  );
  const cloudyRefined = flagCloudy(samples, refined, settings);

  const finalPoints = samples.filter(
    (s, i) => unclipped(s) && !cloudyRefined[i],
  );
  const tooCloudy = finalPoints.length < settings.minFitSamples;

  const final =
    tooCloudy && settings.strictness === 'gated' ? null : fit(finalPoints);

  return {
    initial,
    refined,
    final,
    cloudyInitial,
    cloudyRefined,
    fitPointCount: finalPoints.length,
    tooCloudy,
  };
}

function fitWithContext(points: Sample[], day: DeviceDay): FitCurve {
  try {
    return fitQuadratic(points);
  } catch (error) {
    if (error instanceof FitUndefinedError) {
      throw new FitUndefinedError(
        error.pointCount,
        day.date,
        day.serialNumber,
      );
    }
    throw error;
  }
}
