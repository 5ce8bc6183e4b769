import { FitUndefinedError } from './analysis.errors';
import { FitCurve, fitQuadratic } from './fit-curve';

describe('fitQuadratic', () => {
  // 100 + 20t - t^2, peak of 200 W at t = 10
  const points = Array.from({ length: 11 }, (_, t) => ({
    offset: t,
    watts: 100 + 20 * t - t * t,
  }));

  it('should recover an exact quadratic', () => {
    const curve = fitQuadratic(points);

    for (const { offset, watts } of points) {
      expect(curve.evaluate(offset)).toBeCloseTo(watts, 6);
    }
    expect(curve.evaluate(15)).toBeCloseTo(175, 6);
  });

  it('should report the domain of the fitted offsets', () => {
    expect(fitQuadratic(points).domain).toEqual([0, 10]);
  });

  it('should be deterministic for the same input', () => {
    expect(fitQuadratic(points).coefficients).toEqual(
      fitQuadratic(points).coefficients,
    );
  });

  it('should not depend on point order', () => {
    const forward = fitQuadratic(points);
    const reversed = fitQuadratic([...points].reverse());

    forward.coefficients.forEach((c, i) => {
      expect(reversed.coefficients[i]).toBeCloseTo(c, 9);
    });
  });

  it('should throw FitUndefinedError for fewer than 3 points', () => {
    expect(() => fitQuadratic(points.slice(0, 2))).toThrow(FitUndefinedError);
    expect(() => fitQuadratic([])).toThrow(
      'quadratic fit undefined over 0 point(s)',
    );
  });

  it('should throw FitUndefinedError for fewer than 3 distinct offsets', () => {
    const repeated = [
      { offset: 1, watts: 10 },
      { offset: 1, watts: 12 },
      { offset: 2, watts: 20 },
      { offset: 2, watts: 22 },
    ];

    let thrown: unknown;
    try {
      fitQuadratic(repeated);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(FitUndefinedError);
    expect(thrown).toMatchObject({ pointCount: 4 });
  });
});

describe('FitCurve', () => {
  it('should map the domain onto [-1, 1]', () => {
    const curve = new FitCurve([0, 0, 1], [0, 10]);

    expect(curve.toWindow(0)).toBeCloseTo(-1, 12);
    expect(curve.toWindow(5)).toBeCloseTo(0, 12);
    expect(curve.toWindow(10)).toBeCloseTo(1, 12);
    expect(curve.evaluate(10)).toBeCloseTo(1, 12);
  });

  it('should locate the peak of a downward-opening curve', () => {
    const curve = fitQuadratic(
      Array.from({ length: 11 }, (_, t) => ({
        offset: t,
        watts: 100 + 20 * t - t * t,
      })),
    );

    const peak = curve.peak();

    expect(peak).not.toBeNull();
    expect(peak?.offset).toBeCloseTo(10, 6);
    expect(peak?.watts).toBeCloseTo(200, 6);
  });

  it('should have no peak when the curve opens upward', () => {
    expect(new FitCurve([0, 0, 1], [0, 10]).peak()).toBeNull();
  });

  it('should serialise to coefficients and domain', () => {
    const curve = new FitCurve([1, 2, -3], [100, 200]);

    expect(JSON.parse(JSON.stringify(curve))).toEqual({
      coefficients: [1, 2, -3],
      domain: [100, 200],
    });
  });

  it('should keep its coefficients immutable', () => {
    const source: [number, number, number] = [1, 2, -3];
    const curve = new FitCurve(source, [0, 1]);

    source[0] = 99;

    expect(curve.coefficients[0]).toBe(1);
    expect(Object.isFrozen(curve.coefficients)).toBe(true);
  });
});
