import { GeneralIssueInputArguments } from '../errors';

// 10-point Gauss-Legendre rule on [-1, 1]
const GAUSS_NODES = [
  -0.9739065285171717, -0.8650633666889845, -0.6794095682990244, -0.4333953941292472,
  -0.1488743389816312, 0.1488743389816312, 0.4333953941292472, 0.6794095682990244,
  0.8650633666889845, 0.9739065285171717,
];
const GAUSS_WEIGHTS = [
  0.0666713443086881, 0.1494513491505806, 0.219086362515982, 0.2692667193099963,
  0.2955242247147529, 0.2955242247147529, 0.2692667193099963, 0.219086362515982,
  0.1494513491505806, 0.0666713443086881,
];

/**
 * Composite Gauss-Legendre quadrature of a vector-valued integrand.
 * Integrates every component returned by `f` over [from, to] using `panels` equal panels.
 */
export function integrate(
  f: (t: number) => readonly number[],
  from: number,
  to: number,
  panels = 1
): number[] {
  const count = Math.max(1, Math.ceil(panels));
  const width = (to - from) / count;
  let sums: number[] = [];

  for (let p = 0; p < count; p++) {
    const mid = from + (p + 0.5) * width;
    for (let k = 0; k < GAUSS_NODES.length; k++) {
      const values = f(mid + 0.5 * width * GAUSS_NODES[k]);
      if (sums.length === 0) sums = values.map(() => 0);
      for (let i = 0; i < values.length; i++) {
        sums[i] += GAUSS_WEIGHTS[k] * values[i];
      }
    }
  }

  return sums.map((sum) => 0.5 * width * sum);
}

export interface FresnelValue {
  /** ∫ sin(πt²/2) dt */
  s: number;
  /** ∫ cos(πt²/2) dt */
  c: number;
}

/**
 * Fresnel integrals over [from, to].
 * Panels are sized so the phase πt²/2 advances at most half a radian per panel.
 */
export function fresnelIntegral(from: number, to: number): FresnelValue {
  if (from === to) return { s: 0, c: 0 };
  const reach = Math.max(Math.abs(from), Math.abs(to));
  const panels = Math.ceil(2 * Math.abs(to - from) * (1 + Math.PI * reach));
  const [s, c] = integrate(
    (t) => {
      const phase = 0.5 * Math.PI * t * t;
      return [Math.sin(phase), Math.cos(phase)];
    },
    from,
    to,
    panels
  );
  return { s, c };
}

/** Fresnel integrals S(x) and C(x) from 0 to x */
export function fresnel(x: number): FresnelValue {
  return fresnelIntegral(0, x);
}

/**
 * Solve A·x = b by Gaussian elimination with partial pivoting.
 * A and b are left untouched.
 */
export function solveLinearSystem(matrix: readonly (readonly number[])[], rhs: readonly number[]): number[] {
  const n = rhs.length;
  const a = matrix.map((row) => [...row]);
  const b = [...rhs];

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let row = col + 1; row < n; row++) {
      if (Math.abs(a[row][col]) > Math.abs(a[pivot][col])) pivot = row;
    }
    if (Math.abs(a[pivot][col]) < 1e-14) {
      throw new GeneralIssueInputArguments('Linear system is singular');
    }
    [a[col], a[pivot]] = [a[pivot], a[col]];
    [b[col], b[pivot]] = [b[pivot], b[col]];

    for (let row = col + 1; row < n; row++) {
      const factor = a[row][col] / a[col][col];
      for (let k = col; k < n; k++) a[row][k] -= factor * a[col][k];
      b[row] -= factor * b[col];
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let row = n - 1; row >= 0; row--) {
    let sum = b[row];
    for (let k = row + 1; k < n; k++) sum -= a[row][k] * x[k];
    x[row] = sum / a[row][row];
  }
  return x;
}

export interface Poly3Coefficients {
  a: number;
  b: number;
  c: number;
  d: number;
}

/**
 * Cubic width transition with zero slope at s = 0 and s = length.
 *
 * Without `widthEnd` the polynomial runs from `width` to 0, or from 0 to `width`
 * when `zeroStart` is set. With `widthEnd` it runs from `width` to `widthEnd`.
 */
export function getCoeffsForPoly3(
  length: number,
  width: number,
  zeroStart: boolean,
  widthEnd?: number
): Poly3Coefficients {
  const s0 = 0;
  const s1 = length;
  const matrix = [
    [0, 1, 2 * s0, 3 * s0 ** 2],
    [0, 1, 2 * s1, 3 * s1 ** 2],
    [1, s0, s0 ** 2, s0 ** 3],
    [1, s1, s1 ** 2, s1 ** 3],
  ];
  let rhs = zeroStart ? [0, 0, 0, width] : [0, 0, width, 0];
  if (widthEnd !== undefined) {
    rhs = [0, 0, width, widthEnd];
  }
  const [a, b, c, d] = solveLinearSystem(matrix, rhs);
  return { a, b, c, d };
}

export function evalPoly3(coeffs: Poly3Coefficients, ds: number): number {
  return coeffs.a + coeffs.b * ds + coeffs.c * ds ** 2 + coeffs.d * ds ** 3;
}
