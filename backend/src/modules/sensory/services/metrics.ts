/**
 * Holdout regression metrics
 */

import type { ValidationMetrics } from '../contracts/sensory_model.contract.js';

export function computeRegressionMetrics(yTrue: number[], yPred: number[]): ValidationMetrics {
  const n = yTrue.length;
  if (n === 0) {
    return { r2: null, mae: 0, rmse: 0 };
  }

  let absSum = 0;
  let sqSum = 0;
  let mean = 0;
  for (let i = 0; i < n; i++) {
    const err = yTrue[i] - yPred[i];
    absSum += Math.abs(err);
    sqSum += err * err;
    mean += yTrue[i];
  }
  mean /= n;

  let ssTot = 0;
  for (const v of yTrue) {
    ssTot += (v - mean) ** 2;
  }

  // R² is undefined on a single row or a constant holdout
  const r2 = n >= 2 && ssTot > 0 ? 1 - sqSum / ssTot : null;

  return {
    r2,
    mae: absSum / n,
    rmse: Math.sqrt(sqSum / n),
  };
}
