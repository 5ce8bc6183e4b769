import { z } from 'zod';
import { DayDiagnostics } from './diagnostics.types';

export const VISUALIZATION_MODES = [
  'ALL',
  'GOOD_DATA',
  'NOT_CLOUDY',
  'EXCEEDANCE',
  'SHAVED',
  'NONE',
] as const;

/**
 * Which analysed days are worth looking at.
 * - ALL: every analysed day
 * - GOOD_DATA: days that passed the start-up, shut-down and sample-count checks
 * - NOT_CLOUDY: good data and enough clear samples for the final fit
 * - EXCEEDANCE: exceedance of at least the limit
 * - SHAVED: shaved energy of at least the limit
 * - NONE: nothing
 */
export type VisualizationMode = (typeof VISUALIZATION_MODES)[number];

export const VisualizationFilterSchema = z.object({
  mode: z.enum(VISUALIZATION_MODES).default('NONE'),
  /** Threshold for EXCEEDANCE / SHAVED, in watt-hours */
  limitWattHours: z.coerce.number().min(0).default(0),
});

export type VisualizationFilter = z.infer<typeof VisualizationFilterSchema>;

/**
 * Whether a filter mode can select days on which no sample reached the ceiling.
 */
export function admitsDaysWithoutExceedance(mode: VisualizationMode): boolean {
  return mode === 'ALL' || mode === 'GOOD_DATA' || mode === 'NOT_CLOUDY';
}

export function selectsDay(
  filter: VisualizationFilter,
  diagnostics: DayDiagnostics,
): boolean {
  const limit = filter.limitWattHours * 3600;
  const { result, failures } = diagnostics;

  switch (filter.mode) {
    case 'ALL':
      return true;
    case 'GOOD_DATA':
      return failures.every((f) => f === 'too-cloudy');
    case 'NOT_CLOUDY':
      return failures.length === 0;
    case 'EXCEEDANCE':
      return (
        result.exceedanceEnergy !== undefined &&
        result.exceedanceEnergy >= limit
      );
    case 'SHAVED':
      return (
        result.shavedEnergy !== undefined && result.shavedEnergy >= limit
      );
    case 'NONE':
      return false;
  }
}
