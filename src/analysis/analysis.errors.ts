/**
 * Base class for failures raised while analysing a single device-day.
 * Carries the day and device so the per-day boundary can report them.
 */
export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly date?: string,
    public readonly serialNumber?: number,
  ) {
    super(
      date !== undefined && serialNumber !== undefined
        ? `${date} SN${serialNumber}: ${message}`
        : message,
    );
    this.name = 'AnalysisError';
  }
}

/**
 * A quadratic fit was requested over fewer than 3 usable points
 * (or fewer than 3 distinct offsets).
 */
export class FitUndefinedError extends AnalysisError {
  constructor(
    public readonly pointCount: number,
    date?: string,
    serialNumber?: number,
  ) {
    super(
      `quadratic fit undefined over ${pointCount} point(s)`,
      date,
      serialNumber,
    );
    this.name = 'FitUndefinedError';
  }
}
