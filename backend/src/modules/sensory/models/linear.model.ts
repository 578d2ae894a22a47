/**
 * Linear-family regressors
 * ========================
 * Pure TypeScript, no external deps.
 * - linear: least squares (tiny jitter keeps under-determined systems solvable
 *   and converges on the minimum-norm solution)
 * - ridge:  (XᵀX + αI) w = Xᵀy
 * - lasso:  coordinate descent on (1/2n)‖y − Xw‖² + α‖w‖₁
 * Intercept is fitted by centering X and y.
 */

import type { LinearParams } from '../contracts/sensory_model.contract.js';

const LINEAR_JITTER = 1e-9;
const RIDGE_ALPHA = 1.0;
const LASSO_ALPHA = 1.0;
const LASSO_MAX_ITER = 1000;
const LASSO_TOL = 1e-6;

interface Centered {
  Xc: number[][];
  yc: number[];
  xMean: number[];
  yMean: number;
}

function center(X: number[][], y: number[]): Centered {
  const n = X.length;
  const m = X[0]?.length ?? 0;
  const xMean = new Array<number>(m).fill(0);
  let yMean = 0;

  for (let i = 0; i < n; i++) {
    yMean += y[i];
    for (let j = 0; j < m; j++) {
      xMean[j] += X[i][j];
    }
  }
  yMean /= Math.max(1, n);
  for (let j = 0; j < m; j++) {
    xMean[j] /= Math.max(1, n);
  }

  return {
    Xc: X.map((row) => row.map((v, j) => v - xMean[j])),
    yc: y.map((v) => v - yMean),
    xMean,
    yMean,
  };
}

function dot(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Gaussian elimination with partial pivoting. A is m x m, consumed in place.
 */
export function solveLinearSystem(A: number[][], b: number[]): number[] {
  const m = b.length;
  const M = A.map((row, i) => [...row, b[i]]);

  for (let col = 0; col < m; col++) {
    let pivot = col;
    for (let r = col + 1; r < m; r++) {
      if (Math.abs(M[r][col]) > Math.abs(M[pivot][col])) pivot = r;
    }
    if (pivot !== col) {
      [M[col], M[pivot]] = [M[pivot], M[col]];
    }

    const p = M[col][col];
    if (Math.abs(p) < 1e-300) continue;

    for (let r = col + 1; r < m; r++) {
      const factor = M[r][col] / p;
      if (factor === 0) continue;
      for (let c = col; c <= m; c++) {
        M[r][c] -= factor * M[col][c];
      }
    }
  }

  const x = new Array<number>(m).fill(0);
  for (let row = m - 1; row >= 0; row--) {
    const p = M[row][row];
    if (Math.abs(p) < 1e-300) continue;
    let sum = M[row][m];
    for (let c = row + 1; c < m; c++) {
      sum -= M[row][c] * x[c];
    }
    x[row] = sum / p;
  }
  return x;
}

function solveRidge(X: number[][], y: number[], alpha: number): { weights: number[]; bias: number } {
  const { Xc, yc, xMean, yMean } = center(X, y);
  const m = xMean.length;

  const gram: number[][] = Array.from({ length: m }, () => new Array<number>(m).fill(0));
  const rhs = new Array<number>(m).fill(0);

  for (let i = 0; i < Xc.length; i++) {
    const row = Xc[i];
    for (let a = 0; a < m; a++) {
      rhs[a] += row[a] * yc[i];
      for (let b = a; b < m; b++) {
        gram[a][b] += row[a] * row[b];
      }
    }
  }
  for (let a = 0; a < m; a++) {
    for (let b = 0; b < a; b++) {
      gram[a][b] = gram[b][a];
    }
    gram[a][a] += alpha;
  }

  const weights = solveLinearSystem(gram, rhs);
  return { weights, bias: yMean - dot(xMean, weights) };
}

export function fitLinear(X: number[][], y: number[]): LinearParams<'linear'> {
  const { weights, bias } = solveRidge(X, y, LINEAR_JITTER);
  return { algorithm: 'linear', weights, bias, alpha: 0 };
}

export function fitRidge(X: number[][], y: number[], alpha = RIDGE_ALPHA): LinearParams<'ridge'> {
  const { weights, bias } = solveRidge(X, y, alpha);
  return { algorithm: 'ridge', weights, bias, alpha };
}

function softThreshold(rho: number, lambda: number): number {
  if (rho > lambda) return rho - lambda;
  if (rho < -lambda) return rho + lambda;
  return 0;
}

export function fitLasso(X: number[][], y: number[], alpha = LASSO_ALPHA): LinearParams<'lasso'> {
  const { Xc, yc, xMean, yMean } = center(X, y);
  const n = Xc.length;
  const m = xMean.length;

  const weights = new Array<number>(m).fill(0);
  const residual = [...yc];
  const colNorm = new Array<number>(m).fill(0);
  for (let j = 0; j < m; j++) {
    for (let i = 0; i < n; i++) {
      colNorm[j] += Xc[i][j] * Xc[i][j];
    }
    colNorm[j] /= Math.max(1, n);
  }

  for (let iter = 0; iter < LASSO_MAX_ITER; iter++) {
    let maxDelta = 0;

    for (let j = 0; j < m; j++) {
      if (colNorm[j] === 0) continue;
      const old = weights[j];

      let rho = 0;
      for (let i = 0; i < n; i++) {
        rho += Xc[i][j] * (residual[i] + Xc[i][j] * old);
      }
      rho /= Math.max(1, n);

      const next = softThreshold(rho, alpha) / colNorm[j];
      const delta = next - old;
      if (delta !== 0) {
        for (let i = 0; i < n; i++) {
          residual[i] -= Xc[i][j] * delta;
        }
        weights[j] = next;
      }
      maxDelta = Math.max(maxDelta, Math.abs(delta));
    }

    if (maxDelta < LASSO_TOL) break;
  }

  return { algorithm: 'lasso', weights, bias: yMean - dot(xMean, weights), alpha };
}

export function predictLinear(params: LinearParams, x: number[]): number {
  return params.bias + dot(params.weights, x);
}
