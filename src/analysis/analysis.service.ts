import { Inject, Injectable, Logger } from '@nestjs/common';
import { addDays, format, isValid, parse } from 'date-fns';
import { AnalysisError } from './analysis.errors';
import { ANALYSIS_SETTINGS } from './analysis-settings.provider';
import {
  AnalysisSettings,
  DeviceDay,
  DeviceDayOutcome,
} from './analysis.types';
import { DeviceDayAnalyzer } from './device-day.analyzer';
import { generatedEnergy } from './power-accountant';
import { reconstructDays } from './reconstructor';
import { DiagnosticSink } from '../diagnostics/diagnostics.types';
import {
  ReportAggregator,
  ReportSink,
  ReportSummary,
  formatDetailLine,
} from '../report/report.aggregator';
import {
  TELEMETRY_STORE,
  TelemetryStore,
} from '../telemetry/telemetry-store.interface';

/**
 * Inclusive range of local calendar dates, formatted yyyy-MM-dd.
 */
export interface DateRange {
  startDate: string;
  endDate: string;
}

export interface AnalysisRunOptions {
  /** Overrides of the configured defaults for this run */
  settings?: Partial<AnalysisSettings>;
  /** Additional consumers of each outcome */
  sinks?: ReportSink[];
  diagnostics?: DiagnosticSink;
  /** Restrict to one inverter */
  serialNumber?: number;
}

export interface AnalysisReport {
  range: DateRange;
  settings: AnalysisSettings;
  summary: ReportSummary;
  summaryLines: string[];
  detailLines?: string[];
  outcomes: DeviceDayOutcome[];
}

/**
 * Parse a yyyy-MM-dd string to local midnight.
 *
 * @throws AnalysisError for malformed or impossible dates
 */
export function parseLocalDate(value: string): Date {
  const parsed = parse(value, 'yyyy-MM-dd', new Date(0));
  if (!isValid(parsed) || format(parsed, 'yyyy-MM-dd') !== value) {
    throw new AnalysisError(`Invalid date: ${value}. Use YYYY-MM-DD.`);
  }
  return parsed;
}

/**
 * AnalysisService - drives the analysis pipeline over a date range
 *
 * Pulls readings from the TelemetryStore, reconstructs each day, and analyses
 * device-days one at a time. A device-day that cannot be fitted is recorded
 * as failed and the run continues; storage errors propagate to the caller.
 */
@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);

  constructor(
    @Inject(TELEMETRY_STORE)
    private readonly telemetryStore: TelemetryStore,
    private readonly analyzer: DeviceDayAnalyzer,
    @Inject(ANALYSIS_SETTINGS)
    private readonly defaults: AnalysisSettings,
  ) {}

  /**
   * Configured defaults with the run's overrides; undefined overrides are ignored.
   */
  resolveSettings(overrides: Partial<AnalysisSettings> = {}): AnalysisSettings {
    const d = this.defaults;
    return {
      ceilingWatts: overrides.ceilingWatts ?? d.ceilingWatts,
      cadenceSeconds: overrides.cadenceSeconds ?? d.cadenceSeconds,
      lowCutoffWatts: overrides.lowCutoffWatts ?? d.lowCutoffWatts,
      cloudThresholdWatts:
        overrides.cloudThresholdWatts ?? d.cloudThresholdWatts,
      minSamples: overrides.minSamples ?? d.minSamples,
      minFitSamples: overrides.minFitSamples ?? d.minFitSamples,
      maxStartupWatts: overrides.maxStartupWatts ?? d.maxStartupWatts,
      maxShutdownWatts: overrides.maxShutdownWatts ?? d.maxShutdownWatts,
      strictness: overrides.strictness ?? d.strictness,
    };
  }

  /**
   * Stream device-day outcomes for an inclusive date range.
   */
  async *outcomes(
    range: DateRange,
    options: AnalysisRunOptions = {},
  ): AsyncGenerator<DeviceDayOutcome> {
    const settings = this.resolveSettings(options.settings);
    const start = parseLocalDate(range.startDate);
    const end = addDays(parseLocalDate(range.endDate), 1);
    if (end <= start) {
      throw new AnalysisError(
        `End date ${range.endDate} is before start date ${range.startDate}`,
      );
    }

    const readings = this.telemetryStore.readings(start, end, {
      serialNumber: options.serialNumber,
    });

    for await (const { date, devices } of reconstructDays(
      readings,
      settings.cadenceSeconds,
    )) {
      const serialNumbers = [...devices.keys()].sort((a, b) => a - b);
      for (const serialNumber of serialNumbers) {
        const samples = devices.get(serialNumber) ?? [];
        const outcome = this.analyzeWithinBoundary(
          { date, serialNumber, samples },
          settings,
          options.diagnostics,
        );
        for (const sink of options.sinks ?? []) {
          sink.record(outcome);
        }
        yield outcome;
      }
    }
  }

  /**
   * Run the whole range and aggregate it into a report.
   */
  async report(
    range: DateRange,
    options: AnalysisRunOptions & { detail?: boolean } = {},
  ): Promise<AnalysisReport> {
    const startTime = Date.now();
    const aggregator = new ReportAggregator();
    const outcomes: DeviceDayOutcome[] = [];

    for await (const outcome of this.outcomes(range, {
      ...options,
      sinks: [aggregator, ...(options.sinks ?? [])],
    })) {
      outcomes.push(outcome);
    }

    const summary = aggregator.summary();
    this.logger.log(
      `Analysed ${summary.deviceDays} inverter days over ${summary.days} days in ${Date.now() - startTime}ms`,
    );

    return {
      range,
      settings: this.resolveSettings(options.settings),
      summary,
      summaryLines: aggregator.summaryLines(),
      detailLines: options.detail ? outcomes.map(formatDetailLine) : undefined,
      outcomes,
    };
  }

  /**
   * Per-day error boundary: analysis errors stay with their device-day.
   */
  private analyzeWithinBoundary(
    day: DeviceDay,
    settings: AnalysisSettings,
    diagnostics?: DiagnosticSink,
  ): DeviceDayOutcome {
    try {
      return this.analyzer.analyze(day, settings, diagnostics);
    } catch (error) {
      if (!(error instanceof AnalysisError)) {
        throw error;
      }
      this.logger.error(`Analysis failed: ${error.message}`);
      return {
        date: day.date,
        serialNumber: day.serialNumber,
        status: 'failed',
        result: { generatedEnergy: generatedEnergy(day.samples) },
        failures: [],
        error: error.message,
      };
    }
  }
}
