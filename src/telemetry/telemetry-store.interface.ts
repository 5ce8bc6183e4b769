import { RawReading } from '../analysis/reconstructor';

/**
 * Injection token for the TelemetryStore implementation.
 */
export const TELEMETRY_STORE = Symbol('TELEMETRY_STORE');

export interface ReadingFilter {
  /** Restrict to a single inverter */
  serialNumber?: number;
}

/**
 * TelemetryStore - source of raw, de-duplicated inverter readings
 *
 * Implementations must yield readings in `[start, end)` ordered by report
 * time, then by serial number. Iteration is pull-based: the next page is
 * only fetched once the consumer has drained the current one.
 */
export interface TelemetryStore {
  readings(
    start: Date,
    end: Date,
    filter?: ReadingFilter,
  ): AsyncGenerator<RawReading>;
}
