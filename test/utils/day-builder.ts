/**
 * Synthetic inverter days for analysis tests.
 *
 * All timestamps are built with the local-time Date constructor in June so
 * that day boundaries match the local-calendar logic of the reconstructor.
 */
import {
  AnalysisSettings,
  DeviceDay,
  Sample,
} from '../../src/analysis/analysis.types';
import { RawReading } from '../../src/analysis/reconstructor';
import { DayDiagnostics } from '../../src/diagnostics/diagnostics.types';
import {
  ReadingFilter,
  TelemetryStore,
} from '../../src/telemetry/telemetry-store.interface';

export const TEST_DATE = '2024-06-03';
export const TEST_SERIAL = 121900012345;

/**
 * Configured defaults, as produced by an empty environment.
 */
export const DEFAULT_SETTINGS: AnalysisSettings = {
  ceilingWatts: 349,
  cadenceSeconds: 331,
  lowCutoffWatts: 75,
  cloudThresholdWatts: 5,
  minSamples: 50,
  minFitSamples: 50,
  maxStartupWatts: 20,
  maxShutdownWatts: 0,
  strictness: 'gated',
};

export function settingsWith(
  overrides: Partial<AnalysisSettings> = {},
): AnalysisSettings {
  return { ...DEFAULT_SETTINGS, ...overrides };
}

export function samplesOf(
  points: ReadonlyArray<readonly [number, number]>,
): Sample[] {
  return points.map(([offset, watts]) => ({ offset, watts }));
}

export function deviceDay(
  samples: Sample[],
  serialNumber: number = TEST_SERIAL,
  date: string = TEST_DATE,
): DeviceDay {
  return { date, serialNumber, samples };
}

/**
 * A clear-sky day whose true output peaks at 400 W at noon:
 * w(t) = 400 - 400 * ((t - 43200) / 21600)^2, from 06:00 to 18:00,
 * sampled every 331 s and clipped at the ceiling.
 */
export function clippedParabolaSamples(ceilingWatts = 349): Sample[] {
  const samples: Sample[] = [];
  for (let offset = 21600; offset <= 64630; offset += 331) {
    const x = (offset - 43200) / 21600;
    const watts = Math.max(0, Math.round(400 - 400 * x * x));
    samples.push({ offset, watts: Math.min(watts, ceilingWatts) });
  }
  samples.push({ offset: 64800, watts: 0 });
  return samples;
}

/**
 * Integral of max(w(t) - 349, 0) for the day above, in watt-seconds.
 */
export const PARABOLA_SHAVED_ENERGY =
  2 * (51 * Math.sqrt(51 / 400) - (400 / 3) * Math.sqrt(51 / 400) ** 3) *
  21600;

/**
 * Readings for one device on a June day of 2024 at the given offsets.
 */
export function readingsOn(
  dayOfMonth: number,
  serialNumber: number,
  samples: readonly Sample[],
): RawReading[] {
  return samples.map(({ offset, watts }) => ({
    reportedAt: new Date(2024, 5, dayOfMonth, 0, 0, offset),
    serialNumber,
    watts,
  }));
}

/**
 * TelemetryStore over an in-memory list, honouring range and filter.
 */
export class InMemoryTelemetryStore implements TelemetryStore {
  private readonly rows: RawReading[];

  constructor(rows: RawReading[]) {
    this.rows = [...rows].sort(
      (a, b) =>
        a.reportedAt.getTime() - b.reportedAt.getTime() ||
        a.serialNumber - b.serialNumber,
    );
  }

  async *readings(
    start: Date,
    end: Date,
    filter: ReadingFilter = {},
  ): AsyncGenerator<RawReading> {
    for (const row of this.rows) {
      if (row.reportedAt < start || row.reportedAt >= end) continue;
      if (
        filter.serialNumber !== undefined &&
        row.serialNumber !== filter.serialNumber
      ) {
        continue;
      }
      yield row;
    }
  }
}

/**
 * Minimal diagnostics record for filter tests.
 */
export function dayDiagnostics(
  overrides: Partial<DayDiagnostics> = {},
): DayDiagnostics {
  const curve = { coefficients: [0, 0, 0], domain: [0, 1] } as const;
  return {
    date: TEST_DATE,
    serialNumber: TEST_SERIAL,
    ceilingWatts: 349,
    lowCutoffWatts: 75,
    cloudThresholdWatts: 5,
    samples: [],
    curves: { initial: curve, refined: curve, final: curve },
    cloudyCounts: { initial: 0, refined: 0, final: 0 },
    fitPointCount: 0,
    tooCloudy: false,
    failures: [],
    estimatedPeak: null,
    exceedanceWindow: null,
    result: { generatedEnergy: 0 },
    ...overrides,
  };
}
