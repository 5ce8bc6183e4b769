import { gapStatistics, inspectDeviceDay, shouldAbort } from './quality-gate';
import {
  DEFAULT_SETTINGS,
  deviceDay,
  samplesOf,
  settingsWith,
} from '../../test/utils/day-builder';

describe('quality-gate', () => {
  describe('gapStatistics', () => {
    it('should compute min, max and rounded average spacing', () => {
      const day = deviceDay(
        samplesOf([
          [0, 0],
          [100, 10],
          [200, 20],
          [600, 0],
        ]),
      );

      expect(gapStatistics(day)).toEqual({ min: 100, max: 400, average: 200 });
    });

    it('should return null for fewer than two samples', () => {
      expect(gapStatistics(deviceDay(samplesOf([[0, 0]])))).toBeNull();
    });
  });

  describe('inspectDeviceDay', () => {
    it('should record failed checks in evaluation order', () => {
      const day = deviceDay(
        samplesOf([
          [0, 30],
          [100, 200],
          [200, 5],
        ]),
      );

      const report = inspectDeviceDay(day, DEFAULT_SETTINGS);

      expect(report.failures).toEqual([
        'startup-power',
        'insufficient-data',
        'shutdown-power',
      ]);
      expect(report.warnings).toEqual([
        'startup power too high: 30 W',
        'insufficient data for analysis: 3 records',
        'shutdown power too high: 5 W',
      ]);
    });

    it('should pass a well-formed day', () => {
      const samples = samplesOf(
        Array.from({ length: 60 }, (_, i): [number, number] => [
          21600 + i * 331,
          i === 0 || i === 59 ? 0 : 200,
        ]),
      );

      const report = inspectDeviceDay(deviceDay(samples), DEFAULT_SETTINGS);

      expect(report.failures).toEqual([]);
      expect(report.warnings).toEqual([]);
      expect(report.clippedCount).toBe(0);
    });

    it('should warn about irregular spacing without failing', () => {
      const day = deviceDay(
        samplesOf([
          [0, 0],
          [100, 10],
          [200, 20],
          [600, 0],
        ]),
      );

      const report = inspectDeviceDay(day, settingsWith({ minSamples: 0 }));

      expect(report.failures).toEqual([]);
      expect(report.warnings).toEqual([
        'max delta too high: 400 secs (avg delta: 200 secs)',
      ]);
    });

    it('should warn about samples closer than half the average spacing', () => {
      const day = deviceDay(
        samplesOf([
          [0, 0],
          [50, 10],
          [300, 20],
          [600, 0],
        ]),
      );

      const report = inspectDeviceDay(day, settingsWith({ minSamples: 0 }));

      expect(report.warnings).toEqual([
        'min delta too low: 50 secs (avg delta: 200 secs)',
      ]);
    });

    it('should count samples at or above the ceiling', () => {
      const day = deviceDay(
        samplesOf([
          [0, 0],
          [100, 348],
          [200, 349],
          [300, 350],
          [400, 0],
        ]),
      );

      expect(inspectDeviceDay(day, DEFAULT_SETTINGS).clippedCount).toBe(2);
    });

    it('should record failures in forced mode as well', () => {
      const day = deviceDay(samplesOf([[0, 30]]));

      const report = inspectDeviceDay(
        day,
        settingsWith({ strictness: 'forced' }),
      );

      expect(report.failures).toContain('startup-power');
    });
  });

  describe('shouldAbort', () => {
    it('should abort a gated day with failures', () => {
      expect(shouldAbort(['insufficient-data'], { strictness: 'gated' })).toBe(
        true,
      );
    });

    it('should never abort in forced mode', () => {
      expect(shouldAbort(['insufficient-data'], { strictness: 'forced' })).toBe(
        false,
      );
    });

    it('should not abort a gated day without failures', () => {
      expect(shouldAbort([], { strictness: 'gated' })).toBe(false);
    });
  });
});
