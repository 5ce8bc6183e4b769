import { Injectable, Logger } from '@nestjs/common';
import { FitUndefinedError } from './analysis.errors';
import {
  AnalysisSettings,
  DeviceDay,
  DeviceDayOutcome,
} from './analysis.types';
import { EnvelopeFit, fitEnvelope, flagCloudy } from './curve-fitter';
import { FitCurve } from './fit-curve';
import { accountEnergy, generatedEnergy } from './power-accountant';
import { inspectDeviceDay, shouldAbort } from './quality-gate';
import {
  ClassifiedSample,
  DayDiagnostics,
  DiagnosticSink,
} from '../diagnostics/diagnostics.types';

/**
 * DeviceDayAnalyzer - QualityGate -> RobustCurveFitter -> PowerAccountant
 *
 * Stateless: every call works only on the device-day it is given, so days
 * can be analysed in any order. FitUndefinedError is not caught here; the
 * caller decides where the per-day boundary sits. A diagnostic sink only
 * observes: the outcome is the same with or without one.
 */
@Injectable()
export class DeviceDayAnalyzer {
  private readonly logger = new Logger(DeviceDayAnalyzer.name);

  analyze(
    day: DeviceDay,
    settings: AnalysisSettings,
    sink?: DiagnosticSink,
  ): DeviceDayOutcome {
    const label = `${day.date} SN${day.serialNumber}`;
    const quality = inspectDeviceDay(day, settings);
    for (const warning of quality.warnings) {
      this.logger.warn(`${label} ${warning}`);
    }

    const failures = [...quality.failures];
    const base = { date: day.date, serialNumber: day.serialNumber };

    if (shouldAbort(failures, settings)) {
      return {
        ...base,
        status: 'partial',
        result: { generatedEnergy: generatedEnergy(day.samples) },
        failures,
      };
    }

    if (quality.clippedCount === 0) {
      const outcome: DeviceDayOutcome = {
        ...base,
        status: 'analyzed',
        result: { generatedEnergy: generatedEnergy(day.samples) },
        failures,
      };
      if (sink?.wantsDaysWithoutExceedance) {
        this.emitWithoutExceedance(day, settings, outcome, sink);
      }
      return outcome;
    }

    const envelope = fitEnvelope(day, settings);
    if (envelope.tooCloudy) {
      failures.push('too-cloudy');
      this.logger.warn(
        `${label} too cloudy, only ${envelope.fitPointCount} normal data points`,
      );
    }

    if (!envelope.final) {
      return {
        ...base,
        status: 'partial',
        result: { generatedEnergy: generatedEnergy(day.samples) },
        failures,
      };
    }

    const result = accountEnergy(
      day.samples,
      settings.ceilingWatts,
      envelope.final,
    );

    sink?.emit(
      this.buildDiagnostics(day, settings, envelope, envelope.final, {
        ...base,
        status: 'analyzed',
        result,
        failures,
      }),
    );

    return { ...base, status: 'analyzed', result, failures };
  }

  /**
   * Fit a day that never reached the ceiling for its diagnostics only.
   * The outcome is already final; a fit that cannot be made emits nothing.
   */
  private emitWithoutExceedance(
    day: DeviceDay,
    settings: AnalysisSettings,
    outcome: DeviceDayOutcome,
    sink: DiagnosticSink,
  ): void {
    let envelope: EnvelopeFit;
    try {
      envelope = fitEnvelope(day, settings);
    } catch (error) {
      if (!(error instanceof FitUndefinedError)) {
        throw error;
      }
      this.logger.debug(`No diagnostics: ${error.message}`);
      return;
    }
    if (!envelope.final) {
      return;
    }

    sink.emit(
      this.buildDiagnostics(day, settings, envelope, envelope.final, {
        ...outcome,
        failures: envelope.tooCloudy
          ? [...outcome.failures, 'too-cloudy']
          : outcome.failures,
      }),
    );
  }

  private buildDiagnostics(
    day: DeviceDay,
    settings: AnalysisSettings,
    envelope: EnvelopeFit,
    final: FitCurve,
    outcome: DeviceDayOutcome,
  ): DayDiagnostics {
    const { ceilingWatts, lowCutoffWatts, cloudThresholdWatts } = settings;
    const cloudyFinal = flagCloudy(day.samples, final, settings);

    const samples: ClassifiedSample[] = day.samples.map((s, i) => ({
      ...s,
      classification:
        s.watts <= lowCutoffWatts
          ? 'low'
          : s.watts >= ceilingWatts
            ? 'clipped'
            : envelope.cloudyRefined[i]
              ? 'cloudy'
              : 'normal',
    }));

    const clipped = day.samples.filter((s) => s.watts >= ceilingWatts);
    const count = (flags: boolean[]) => flags.filter(Boolean).length;

    return {
      date: day.date,
      serialNumber: day.serialNumber,
      ceilingWatts,
      lowCutoffWatts,
      cloudThresholdWatts,
      samples,
      curves: {
        initial: envelope.initial.toJSON(),
        refined: envelope.refined.toJSON(),
        final: final.toJSON(),
      },
      cloudyCounts: {
        initial: count(envelope.cloudyInitial),
        refined: count(envelope.cloudyRefined),
        final: count(cloudyFinal),
      },
      fitPointCount: envelope.fitPointCount,
      tooCloudy: envelope.tooCloudy,
      failures: outcome.failures,
      estimatedPeak: final.peak(),
      exceedanceWindow:
        clipped.length > 0
          ? {
              first: clipped[0].offset,
              last: clipped[clipped.length - 1].offset,
            }
          : null,
      result: outcome.result,
    };
  }
}
