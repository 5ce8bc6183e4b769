import { AnalysisResult, Sample } from './analysis.types';
import { FitCurve } from './fit-curve';

/**
 * Generated energy (watt-seconds) by the trapezoidal rule.
 *
 * Inputs are integers, so the doubled sum stays an exact integer until the
 * single final halving.
 */
export function generatedEnergy(samples: readonly Sample[]): number {
  let doubled = 0;
  for (let i = 1; i < samples.length; i++) {
    const previous = samples[i - 1];
    const current = samples[i];
    doubled +=
      (current.offset - previous.offset) * (previous.watts + current.watts);
  }
  return Math.round(doubled / 2);
}

/**
 * Twice the integral of max(watts - ceiling, 0) over a series.
 *
 * Intervals where the series crosses the ceiling contribute only the
 * triangle between the linearly interpolated crossing time and the
 * endpoint at or above the ceiling.
 */
export function doubledExceedance(
  series: readonly Sample[],
  ceiling: number,
): number {
  let doubled = 0;
  for (let i = 1; i < series.length; i++) {
    const { offset: t0, watts: w0 } = series[i - 1];
    const { offset: t1, watts: w1 } = series[i];
    if (w0 < ceiling && w1 < ceiling) continue;

    if (w0 < ceiling) {
      const crossing = t0 + ((ceiling - w0) * (t1 - t0)) / (w1 - w0);
      doubled += (t1 - crossing) * (w1 - ceiling);
    } else if (w1 < ceiling) {
      const crossing = t0 + ((ceiling - w0) * (t1 - t0)) / (w1 - w0);
      doubled += (crossing - t0) * (w0 - ceiling);
    } else {
      doubled += (t1 - t0) * (w0 - ceiling + (w1 - ceiling));
    }
  }
  return doubled;
}

/**
 * The raw series with every sample at or above the ceiling replaced by the
 * modelled, unclipped value.
 */
export function estimatedSeries(
  samples: readonly Sample[],
  ceiling: number,
  envelope: FitCurve,
): Sample[] {
  return samples.map(({ offset, watts }) => ({
    offset,
    watts: watts < ceiling ? watts : envelope.evaluate(offset),
  }));
}

/**
 * Attribute a device-day's energy: generated, measured exceedance above the
 * ceiling, and the estimated energy shaved off by clipping.
 *
 * Exceedance is absent when no sample reached the ceiling; shaved energy is
 * absent without an envelope or when the estimate does not exceed the
 * measured exceedance.
 */
export function accountEnergy(
  samples: readonly Sample[],
  ceiling: number,
  envelope: FitCurve | null,
): AnalysisResult {
  const result: AnalysisResult = { generatedEnergy: generatedEnergy(samples) };

  const reachesCeiling = samples.some((s) => s.watts >= ceiling);
  if (!reachesCeiling) {
    return result;
  }

  const measured = doubledExceedance(samples, ceiling);
  result.exceedanceEnergy = Math.round(measured / 2);

  if (envelope) {
    const estimated = doubledExceedance(
      estimatedSeries(samples, ceiling, envelope),
      ceiling,
    );
    if (estimated > measured) {
      result.shavedEnergy = Math.round((estimated - measured) / 2);
    }
  }

  return result;
}
