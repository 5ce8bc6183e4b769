import { FitUndefinedError } from './analysis.errors';

export type QuadraticCoefficients = readonly [number, number, number];

/**
 * Serialisable form of a fitted curve, as exposed to diagnostics.
 */
export interface FitCurveData {
  coefficients: QuadraticCoefficients;
  domain: readonly [number, number];
}

/**
 * Immutable quadratic fitted over a day's offset domain.
 *
 * Coefficients apply to the offset mapped from `domain` onto the window
 * [-1, 1], which keeps the least-squares system well conditioned for offsets
 * in the tens of thousands of seconds.
 */
export class FitCurve {
  readonly coefficients: QuadraticCoefficients;
  readonly domain: readonly [number, number];
  private readonly scale: number;
  private readonly shift: number;

  constructor(
    coefficients: QuadraticCoefficients,
    domain: readonly [number, number],
  ) {
    this.coefficients = Object.freeze<[number, number, number]>([
      coefficients[0],
      coefficients[1],
      coefficients[2],
    ]);
    this.domain = Object.freeze<[number, number]>([domain[0], domain[1]]);
    this.scale = 2 / (domain[1] - domain[0]);
    this.shift = -1 - domain[0] * this.scale;
  }

  /** Offset mapped into the fit window */
  toWindow(offset: number): number {
    return this.shift + this.scale * offset;
  }

  evaluate(offset: number): number {
    const u = this.toWindow(offset);
    const [c0, c1, c2] = this.coefficients;
    return c0 + u * (c1 + u * c2);
  }

  /**
   * Vertex of a downward-opening curve: the estimated time and level of
   * peak production. Null when the curve does not open downward.
   */
  peak(): { offset: number; watts: number } | null {
    const [, c1, c2] = this.coefficients;
    if (!(c2 < 0)) return null;
    const u = -c1 / (2 * c2);
    const offset = (u - this.shift) / this.scale;
    return { offset, watts: this.evaluate(offset) };
  }

  toJSON(): FitCurveData {
    return { coefficients: this.coefficients, domain: this.domain };
  }
}

/**
 * Ordinary (unweighted) least-squares quadratic through (offset, watts) points.
 *
 * @throws FitUndefinedError when fewer than 3 points or 3 distinct offsets
 */
export function fitQuadratic(
  points: ReadonlyArray<{ offset: number; watts: number }>,
): FitCurve {
  const distinct = new Set(points.map((p) => p.offset));
  if (points.length < 3 || distinct.size < 3) {
    throw new FitUndefinedError(points.length);
  }

  let min = Infinity;
  let max = -Infinity;
  for (const { offset } of points) {
    if (offset < min) min = offset;
    if (offset > max) max = offset;
  }
  const scale = 2 / (max - min);
  const shift = -1 - min * scale;

  // Normal equations: sums of u^k (k = 0..4) and u^k * y (k = 0..2)
  const su = [0, 0, 0, 0, 0];
  const suy = [0, 0, 0];
  for (const { offset, watts } of points) {
    const u = shift + scale * offset;
    let uk = 1;
    for (let k = 0; k <= 4; k++) {
      su[k] += uk;
      if (k <= 2) suy[k] += uk * watts;
      uk *= u;
    }
  }

  const matrix = [
    [su[0], su[1], su[2], suy[0]],
    [su[1], su[2], su[3], suy[1]],
    [su[2], su[3], su[4], suy[2]],
  ];
  const solution = solve3(matrix);
  if (!solution) {
    throw new FitUndefinedError(points.length);
  }

  return new FitCurve(solution, [min, max]);
}

/**
 * Gaussian elimination with partial pivoting on a 3x4 augmented matrix.
 * Returns null for a singular system.
 */
function solve3(m: number[][]): QuadraticCoefficients | null {
  const n = 3;
  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let row = col + 1; row < n; row++) {
      if (Math.abs(m[row][col]) > Math.abs(m[pivot][col])) pivot = row;
    }
    if (Math.abs(m[pivot][col]) < 1e-12) return null;
    [m[col], m[pivot]] = [m[pivot], m[col]];

    for (let row = col + 1; row < n; row++) {
      const factor = m[row][col] / m[col][col];
      for (let k = col; k <= n; k++) {
        m[row][k] -= factor * m[col][k];
      }
    }
  }

  const x = [0, 0, 0];
  for (let row = n - 1; row >= 0; row--) {
    let sum = m[row][n];
    for (let k = row + 1; k < n; k++) {
      sum -= m[row][k] * x[k];
    }
    x[row] = sum / m[row][row];
  }
  return [x[0], x[1], x[2]];
}
