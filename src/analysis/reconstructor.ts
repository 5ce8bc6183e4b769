import { format } from 'date-fns';
import { Sample } from './analysis.types';

/**
 * Raw telemetry row as stored by the capture side: only written when the
 * device's power output changed.
 */
export interface RawReading {
  reportedAt: Date;
  serialNumber: number;
  watts: number;
}

/**
 * All device series for one local calendar day.
 */
export interface ReconstructedDay {
  date: string;
  devices: Map<number, Sample[]>;
}

/**
 * Seconds past local midnight of a timestamp.
 */
export function secondsPastMidnight(reportedAt: Date): number {
  return (
    reportedAt.getHours() * 3600 +
    reportedAt.getMinutes() * 60 +
    reportedAt.getSeconds()
  );
}

/**
 * Append a reading to a device series, first filling any gap longer than
 * 1.5x the nominal cadence with copies of the previous value. Filled offsets
 * are rounded from the exact gap fraction so the spacing never drifts.
 */
export function appendReading(
  series: Sample[],
  offset: number,
  watts: number,
  cadenceSeconds: number,
): void {
  const previous = series[series.length - 1];

  if (previous && (offset - previous.offset) * 2 > cadenceSeconds * 3) {
    const gap = offset - previous.offset;
    const intervals = Math.round(gap / cadenceSeconds);
    for (let i = 1; i < intervals; i++) {
      series.push({
        offset: previous.offset + Math.round((gap * i) / intervals),
        watts: previous.watts,
      });
    }
  }

  series.push({ offset, watts });
}

/**
 * Rebuild dense per-day, per-device series from a de-duplicated reading stream.
 *
 * The stream must be ordered by time (then device). A day is yielded as soon
 * as a reading from a later date arrives, so memory stays proportional to the
 * number of devices rather than the length of the history.
 */
export async function* reconstructDays(
  readings: AsyncIterable<RawReading>,
  cadenceSeconds: number,
): AsyncGenerator<ReconstructedDay> {
  let current: ReconstructedDay | null = null;

  for await (const reading of readings) {
    const date = format(reading.reportedAt, 'yyyy-MM-dd');

    if (!current || current.date !== date) {
      if (current && current.devices.size > 0) {
        yield current;
      }
      // fresh map: the consumer may still hold the previous one
      current = { date, devices: new Map() };
    }

    let series = current.devices.get(reading.serialNumber);
    if (!series) {
      series = [];
      current.devices.set(reading.serialNumber, series);
    }

    appendReading(
      series,
      secondsPastMidnight(reading.reportedAt),
      reading.watts,
      cadenceSeconds,
    );
  }

  if (current && current.devices.size > 0) {
    yield current;
  }
}
