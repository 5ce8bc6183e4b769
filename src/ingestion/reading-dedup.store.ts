/**
 * What to do with an incoming reading.
 * - store: new value; insert it at `reportedAt`
 * - resend: the gateway repeated the last report verbatim
 * - unchanged: same watts as the last stored value; nothing to insert
 */
export type DedupDecision =
  | { action: 'store'; reportedAt: Date; conflict: boolean }
  | { action: 'resend' }
  | { action: 'unchanged' };

export interface KnownReading {
  serialNumber: number;
  reportedAt: Date;
  watts: number;
}

/**
 * ReadingDedupStore - last seen report date and last stored watts per inverter
 *
 * Readings are stored only when an inverter's output changes; the analysis
 * side reconstructs the gaps. One instance is shared by reference with the
 * ingestion service for the lifetime of the process.
 */
export class ReadingDedupStore {
  private readonly lastReportTime = new Map<number, number>();
  private readonly lastWatts = new Map<number, number>();

  get size(): number {
    return this.lastWatts.size;
  }

  /**
   * Seed from the latest stored reading of each inverter.
   */
  prime(readings: Iterable<KnownReading>): void {
    this.lastReportTime.clear();
    this.lastWatts.clear();
    for (const reading of readings) {
      this.remember(reading.serialNumber, reading.reportedAt, reading.watts);
    }
  }

  /**
   * Classify a reading. An `unchanged` decision advances the last seen
   * report date; a `store` decision must be followed by {@link remember}
   * once the row is written.
   *
   * A report date that repeats with different watts is a conflict: the
   * change is kept under the receive time, truncated to whole seconds.
   */
  decide(
    serialNumber: number,
    reportedAt: Date,
    watts: number,
    receivedAt: Date,
  ): DedupDecision {
    let effectiveDate = reportedAt;
    let conflict = false;

    if (this.lastReportTime.get(serialNumber) === reportedAt.getTime()) {
      if (this.lastWatts.get(serialNumber) === watts) {
        return { action: 'resend' };
      }
      conflict = true;
      effectiveDate = new Date(Math.floor(receivedAt.getTime() / 1000) * 1000);
    }

    if (this.lastWatts.get(serialNumber) === watts) {
      this.lastReportTime.set(serialNumber, effectiveDate.getTime());
      return { action: 'unchanged' };
    }

    return { action: 'store', reportedAt: effectiveDate, conflict };
  }

  remember(serialNumber: number, reportedAt: Date, watts: number): void {
    this.lastReportTime.set(serialNumber, reportedAt.getTime());
    this.lastWatts.set(serialNumber, watts);
  }

  lastWattsOf(serialNumber: number): number | undefined {
    return this.lastWatts.get(serialNumber);
  }
}
