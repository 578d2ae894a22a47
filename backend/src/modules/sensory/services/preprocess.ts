/**
 * Holdout split + standardization
 */

import type { StandardScaler } from '../contracts/sensory_model.contract.js';
import { shuffledIndices, type Rng } from '../models/rng.js';
import { TrainingError } from '../errors/sensory.errors.js';

export interface HoldoutSplit {
  trainIdx: number[];
  validIdx: number[];
}

/**
 * Shuffled holdout; validation size = ceil(n * fraction).
 */
export function splitHoldout(n: number, fraction: number, rng: Rng): HoldoutSplit {
  if (!(fraction > 0 && fraction < 1)) {
    throw new TrainingError(`Holdout fraction must be in (0, 1), got ${fraction}`, { holdoutFraction: fraction });
  }

  const nValid = Math.ceil(n * fraction);
  const nTrain = n - nValid;

  if (nValid < 1 || nTrain < 2) {
    throw new TrainingError(
      `Dataset of ${n} rows is too small for a ${fraction} holdout (train=${nTrain}, validation=${nValid})`,
      { rows: n, holdoutFraction: fraction }
    );
  }

  const order = shuffledIndices(n, rng);
  return {
    trainIdx: order.slice(nValid),
    validIdx: order.slice(0, nValid),
  };
}

export function fitStandardScaler(X: number[][]): StandardScaler {
  const m = X[0]?.length ?? 0;
  const n = X.length;
  const mean = new Array<number>(m).fill(0);
  const std = new Array<number>(m).fill(0);

  for (const row of X) {
    for (let j = 0; j < m; j++) {
      mean[j] += row[j];
    }
  }
  for (let j = 0; j < m; j++) {
    mean[j] /= Math.max(1, n);
  }

  for (const row of X) {
    for (let j = 0; j < m; j++) {
      std[j] += (row[j] - mean[j]) ** 2;
    }
  }
  for (let j = 0; j < m; j++) {
    std[j] = Math.sqrt(std[j] / Math.max(1, n)) || 1;
  }

  return { mean, std };
}

export function applyStandardScaler(x: number[], scaler: StandardScaler): number[] {
  return x.map((v, j) => (v - scaler.mean[j]) / (scaler.std[j] || 1));
}
