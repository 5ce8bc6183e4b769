import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { FitUndefinedError } from './analysis.errors';
import { DeviceDayAnalyzer } from './device-day.analyzer';
import { DiagnosticsCollector } from '../diagnostics/diagnostics-collector';
import { DiagnosticSink } from '../diagnostics/diagnostics.types';
import {
  DEFAULT_SETTINGS,
  PARABOLA_SHAVED_ENERGY,
  clippedParabolaSamples,
  deviceDay,
  samplesOf,
  settingsWith,
} from '../../test/utils/day-builder';

describe('DeviceDayAnalyzer', () => {
  let analyzer: DeviceDayAnalyzer;
  let warnSpy: jest.SpyInstance;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [DeviceDayAnalyzer],
    }).compile();

    analyzer = module.get<DeviceDayAnalyzer>(DeviceDayAnalyzer);
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  // 10 samples, 100 s apart, rising to 200 W and back to 0
  const shortDay = deviceDay(
    samplesOf(
      [0, 50, 100, 150, 200, 200, 150, 100, 50, 0].map(
        (watts, i): [number, number] => [i * 100, watts],
      ),
    ),
    1,
  );

  // Four usable points around a single clipped sample
  const cloudyDay = deviceDay(
    samplesOf([
      [0, 0],
      [100, 100],
      [200, 200],
      [300, 400],
      [400, 200],
      [500, 100],
      [600, 0],
    ]),
    1,
  );

  describe('gated mode', () => {
    it('should stop at generated energy when a quality check fails', () => {
      const outcome = analyzer.analyze(shortDay, DEFAULT_SETTINGS);

      expect(outcome).toEqual({
        date: '2024-06-03',
        serialNumber: 1,
        status: 'partial',
        result: { generatedEnergy: 100000 },
        failures: ['insufficient-data'],
      });
      expect(warnSpy).toHaveBeenCalledWith(
        '2024-06-03 SN1 insufficient data for analysis: 10 records',
      );
    });

    it('should stop at generated energy when too cloudy to fit', () => {
      const outcome = analyzer.analyze(
        cloudyDay,
        settingsWith({ minSamples: 0 }),
      );

      expect(outcome.status).toBe('partial');
      expect(outcome.result).toEqual({ generatedEnergy: 100000 });
      expect(outcome.failures).toEqual(['too-cloudy']);
      expect(warnSpy).toHaveBeenCalledWith(
        '2024-06-03 SN1 too cloudy, only 4 normal data points',
      );
    });

    it('should skip fitting a day that never reached the ceiling', () => {
      const outcome = analyzer.analyze(
        deviceDay(clippedParabolaSamples(1000)),
        settingsWith({ ceilingWatts: 1000 }),
      );

      expect(outcome.status).toBe('analyzed');
      expect(Object.keys(outcome.result)).toEqual(['generatedEnergy']);
    });
  });

  describe('forced mode', () => {
    const forced = settingsWith({ minSamples: 0, strictness: 'forced' });

    it('should keep fitting a cloudy day and record the failure', () => {
      const outcome = analyzer.analyze(cloudyDay, forced);

      expect(outcome).toEqual({
        date: '2024-06-03',
        serialNumber: 1,
        status: 'analyzed',
        result: { generatedEnergy: 100000, exceedanceEnergy: 1301 },
        failures: ['too-cloudy'],
      });
    });

    it('should propagate FitUndefinedError when fewer than 3 points remain', () => {
      const day = deviceDay(
        samplesOf([
          [0, 0],
          [100, 400],
          [200, 400],
          [300, 0],
        ]),
        1,
      );

      expect(() => analyzer.analyze(day, forced)).toThrow(FitUndefinedError);
    });
  });

  describe('clipped clear-sky day', () => {
    it('should estimate the shaved energy from the fitted envelope', () => {
      const outcome = analyzer.analyze(
        deviceDay(clippedParabolaSamples()),
        DEFAULT_SETTINGS,
      );

      expect(outcome.status).toBe('analyzed');
      expect(outcome.failures).toEqual([]);
      expect(outcome.result.exceedanceEnergy).toBe(0);
      expect(outcome.result.shavedEnergy).toBeGreaterThan(
        PARABOLA_SHAVED_ENERGY * 0.99,
      );
      expect(outcome.result.shavedEnergy).toBeLessThan(
        PARABOLA_SHAVED_ENERGY * 1.01,
      );
    });

    it('should emit diagnostics for the fitted day', () => {
      const samples = clippedParabolaSamples();
      const collector = new DiagnosticsCollector({
        mode: 'ALL',
        limitWattHours: 0,
      });

      const outcome = analyzer.analyze(
        deviceDay(samples),
        DEFAULT_SETTINGS,
        collector,
      );

      expect(collector.collected).toHaveLength(1);
      const [diagnostics] = collector.collected;
      expect(diagnostics.result).toEqual(outcome.result);
      expect(diagnostics.fitPointCount).toBe(71);
      expect(diagnostics.exceedanceWindow).toEqual({
        first: 35502,
        last: 50728,
      });
      expect(
        diagnostics.samples.filter((s) => s.classification === 'clipped'),
      ).toHaveLength(47);
      expect(
        diagnostics.samples.filter((s) => s.classification === 'cloudy'),
      ).toHaveLength(0);
      expect(diagnostics.estimatedPeak?.offset).toBeCloseTo(43200, -2);
      expect(diagnostics.estimatedPeak?.watts).toBeCloseTo(400, 0);
    });
  });

  describe('diagnostic sinks', () => {
    // Exact parabola through its three unclipped points, peak 250 W
    const unclippedDay = deviceDay(
      samplesOf([
        [0, 0],
        [100, 50],
        [200, 200],
        [300, 250],
        [400, 200],
        [500, 50],
        [600, 0],
      ]),
      1,
    );
    const settings = settingsWith({ minSamples: 0, minFitSamples: 3 });

    it('should fit days without exceedance when the sink wants them', () => {
      const collector = new DiagnosticsCollector({
        mode: 'ALL',
        limitWattHours: 0,
      });

      const outcome = analyzer.analyze(unclippedDay, settings, collector);

      expect(outcome.result).toEqual({ generatedEnergy: 75000 });
      expect(collector.collected).toHaveLength(1);
      expect(
        collector.collected[0].samples.map((s) => s.classification),
      ).toEqual(['low', 'low', 'normal', 'normal', 'normal', 'low', 'low']);
      expect(collector.collected[0].exceedanceWindow).toBeNull();
      expect(collector.collected[0].estimatedPeak?.offset).toBeCloseTo(300, 6);
      expect(collector.collected[0].estimatedPeak?.watts).toBeCloseTo(250, 6);
    });

    it('should return the same outcome for a dark day with or without a sink', () => {
      // Below the low cutoff all day: nothing to fit
      const darkDay = deviceDay(
        Array.from({ length: 60 }, (_, i) => ({
          offset: 21600 + 331 * i,
          watts: i === 0 || i === 59 ? 0 : 40 + (i % 5),
        })),
      );
      const collector = new DiagnosticsCollector({
        mode: 'ALL',
        limitWattHours: 0,
      });

      const withoutSink = analyzer.analyze(darkDay, DEFAULT_SETTINGS);
      const withSink = analyzer.analyze(darkDay, DEFAULT_SETTINGS, collector);

      expect(withSink).toEqual(withoutSink);
      expect(withSink.status).toBe('analyzed');
      expect(collector.collected).toHaveLength(0);
    });

    it('should not let a too-cloudy diagnostics fit change the outcome', () => {
      const cloudySettings = settingsWith({ minSamples: 0, minFitSamples: 50 });
      const collector = new DiagnosticsCollector({
        mode: 'ALL',
        limitWattHours: 0,
      });

      const withoutSink = analyzer.analyze(unclippedDay, cloudySettings);
      const withSink = analyzer.analyze(
        unclippedDay,
        cloudySettings,
        collector,
      );

      expect(withSink).toEqual(withoutSink);
      expect(withSink).toMatchObject({ status: 'analyzed', failures: [] });
      expect(collector.collected).toHaveLength(0);
      expect(warnSpy).not.toHaveBeenCalled();
    });

    it('should report a forced too-cloudy fit in the diagnostics only', () => {
      const forced = settingsWith({
        minSamples: 0,
        minFitSamples: 50,
        strictness: 'forced',
      });
      const collector = new DiagnosticsCollector({
        mode: 'ALL',
        limitWattHours: 0,
      });

      const outcome = analyzer.analyze(unclippedDay, forced, collector);

      expect(outcome.failures).toEqual([]);
      expect(collector.collected).toHaveLength(1);
      expect(collector.collected[0].tooCloudy).toBe(true);
      expect(collector.collected[0].failures).toEqual(['too-cloudy']);
      expect(collector.collected[0].result).toEqual({ generatedEnergy: 75000 });
    });

    it('should not fit days without exceedance for other sinks', () => {
      const sink: DiagnosticSink = {
        wantsDaysWithoutExceedance: false,
        emit: jest.fn(),
      };

      const outcome = analyzer.analyze(unclippedDay, settings, sink);

      expect(outcome.result).toEqual({ generatedEnergy: 75000 });
      expect(sink.emit).not.toHaveBeenCalled();
    });
  });
});
