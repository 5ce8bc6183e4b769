import { DeviceDayOutcome } from '../analysis/analysis.types';

/**
 * Consumer of per-device-day outcomes.
 */
export interface ReportSink {
  record(outcome: DeviceDayOutcome): void;
}

/**
 * Largest value of a figure, with the device and day that produced it.
 */
export interface Attribution {
  energy: number;
  serialNumber: number | null;
  date: string | null;
}

export interface ReportSummary {
  days: number;
  deviceDays: number;
  partialDeviceDays: number;
  failedDeviceDays: number;
  totalGenerated: number;
  totalExceedance: number;
  totalShaved: number;
  maxGenerated: Attribution;
  maxExceedance: Attribution;
  maxShaved: Attribution;
}

const emptyAttribution = (): Attribution => ({
  energy: 0,
  serialNumber: null,
  date: null,
});

/**
 * Watt-seconds as watt-hours with two decimals and thousands separators.
 */
export function formatWattHours(wattSeconds: number): string {
  return (wattSeconds / 3600).toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
}

/**
 * One line per device-day, e.g.
 * `2024-06-01 SN121900012345 2,530.00Whr generated, 12.00Whr exceedance`
 */
export function formatDetailLine(outcome: DeviceDayOutcome): string {
  const { date, serialNumber, result, status } = outcome;
  let line = `${date} SN${serialNumber} ${formatWattHours(result.generatedEnergy)}Whr generated`;
  if (result.exceedanceEnergy !== undefined) {
    line += `, ${formatWattHours(result.exceedanceEnergy)}Whr exceedance`;
  }
  if (result.shavedEnergy !== undefined) {
    line += `, ${formatWattHours(result.shavedEnergy)}Whr shaved`;
  }
  if (status === 'partial') {
    line += ` [partial: ${outcome.failures.join(', ')}]`;
  } else if (status === 'failed') {
    line += ` [failed: ${outcome.error ?? 'unknown error'}]`;
  }
  return line;
}

/**
 * ReportAggregator - run-level totals and maxima across device-days
 */
export class ReportAggregator implements ReportSink {
  private readonly dates = new Set<string>();
  private readonly summaryState: ReportSummary = {
    days: 0,
    deviceDays: 0,
    partialDeviceDays: 0,
    failedDeviceDays: 0,
    totalGenerated: 0,
    totalExceedance: 0,
    totalShaved: 0,
    maxGenerated: emptyAttribution(),
    maxExceedance: emptyAttribution(),
    maxShaved: emptyAttribution(),
  };

  record(outcome: DeviceDayOutcome): void {
    const s = this.summaryState;
    const { date, serialNumber, result } = outcome;

    this.dates.add(date);
    s.days = this.dates.size;
    s.deviceDays++;
    if (outcome.status === 'partial') s.partialDeviceDays++;
    if (outcome.status === 'failed') s.failedDeviceDays++;

    s.totalGenerated += result.generatedEnergy;
    track(s.maxGenerated, result.generatedEnergy, serialNumber, date);

    if (result.exceedanceEnergy !== undefined) {
      s.totalExceedance += result.exceedanceEnergy;
      track(s.maxExceedance, result.exceedanceEnergy, serialNumber, date);
    }
    if (result.shavedEnergy !== undefined) {
      s.totalShaved += result.shavedEnergy;
      track(s.maxShaved, result.shavedEnergy, serialNumber, date);
    }
  }

  summary(): ReportSummary {
    const s = this.summaryState;
    return {
      ...s,
      maxGenerated: { ...s.maxGenerated },
      maxExceedance: { ...s.maxExceedance },
      maxShaved: { ...s.maxShaved },
    };
  }

  summaryLines(): string[] {
    const s = this.summaryState;
    if (s.days === 0) {
      return ['No inverter data in the selected range.'];
    }

    const devicesPerDay = (s.deviceDays / s.days).toLocaleString('en-US', {
      maximumFractionDigits: 2,
    });
    const by = (a: Attribution) =>
      a.serialNumber === null ? '' : ` (by SN${a.serialNumber} on ${a.date})`;
    const ratio =
      s.totalGenerated > 0
        ? `${((s.totalShaved / s.totalGenerated) * 100).toFixed(2)}%`
        : 'n/a';

    return [
      `Processed ${s.days} days of data for ${devicesPerDay} inverters with a total output of ${formatWattHours(s.totalGenerated)}Whr.`,
      `Average generated energy per day: ${formatWattHours(s.totalGenerated / s.days)}Whr (${formatWattHours(s.totalGenerated / s.deviceDays)}Whr per inverter)`,
      `Maximum inverter energy: ${formatWattHours(s.maxGenerated.energy)}Whr${by(s.maxGenerated)}`,
      `Total exceedance energy: ${formatWattHours(s.totalExceedance)}Whr`,
      `Maximum exceedance energy: ${formatWattHours(s.maxExceedance.energy)}Whr${by(s.maxExceedance)}`,
      `Total shaved energy: ${formatWattHours(s.totalShaved)}Whr`,
      `Maximum shaved energy: ${formatWattHours(s.maxShaved.energy)}Whr${by(s.maxShaved)}`,
      `Shave ratio: ${ratio} (total shaved energy / total generated energy)`,
      `Incomplete inverter days: ${s.partialDeviceDays} partial, ${s.failedDeviceDays} failed`,
    ];
  }
}

function track(
  max: Attribution,
  energy: number,
  serialNumber: number,
  date: string,
): void {
  if (energy > max.energy) {
    max.energy = energy;
    max.serialNumber = serialNumber;
    max.date = date;
  }
}
