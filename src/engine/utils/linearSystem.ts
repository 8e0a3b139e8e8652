/**
 * Dense linear solve for the small systems produced by the heat-balance
 * solvers (one row per free thermal node, typically ≤ 12).
 *
 * Gaussian elimination with partial pivoting.  The inputs are not modified.
 */

import { InvalidInputError } from '../../contracts/errors';

/** Pivots smaller than this (relative to the row scale) are treated as zero. */
const SINGULAR_TOLERANCE = 1e-14;

export function solveLinearSystem(matrix: readonly (readonly number[])[], rhs: readonly number[]): number[] {
  const n = rhs.length;
  if (matrix.length !== n || matrix.some(row => row.length !== n)) {
    throw new InvalidInputError('matrix', `${matrix.length} rows`, `expected a ${n}×${n} matrix`);
  }

  // Augmented working copy [A | b].
  const m = matrix.map((row, i) => [...row, rhs[i]]);
  const scale = m.map(row => Math.max(...row.slice(0, n).map(Math.abs)));

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(m[r][col]) > Math.abs(m[pivot][col])) pivot = r;
    }
    if (!(Math.abs(m[pivot][col]) > SINGULAR_TOLERANCE * scale[pivot])) {
      throw new InvalidInputError('matrix', `column ${col}`, 'matrix is singular');
    }
    if (pivot !== col) {
      [m[col], m[pivot]] = [m[pivot], m[col]];
      [scale[col], scale[pivot]] = [scale[pivot], scale[col]];
    }

    for (let r = col + 1; r < n; r++) {
      const factor = m[r][col] / m[col][col];
      if (factor === 0) continue;
      for (let k = col; k <= n; k++) {
        m[r][k] -= factor * m[col][k];
      }
    }
  }

  // Back substitution.
  const x = new Array<number>(n).fill(0);
  for (let r = n - 1; r >= 0; r--) {
    let sum = m[r][n];
    for (let k = r + 1; k < n; k++) {
      sum -= m[r][k] * x[k];
    }
    x[r] = sum / m[r][r];
  }
  return x;
}
