/**
 * Mean Imputation
 * ===============
 * Statistics come from the dataset passed in, every call. Nothing is cached.
 */

import type {
  ImputationSummary,
  ImputationWarning,
  TrainingDataset,
} from '../contracts/sensory_model.contract.js';

export interface ImputedDataset {
  featureNames: string[];
  X: number[][];
  y: number[];
  summary: ImputationSummary;
}

export function imputeMeans(dataset: TrainingDataset): ImputedDataset {
  const { featureNames, rows } = dataset;
  const means: Record<string, number> = {};
  const fill: number[] = [];
  const warnings: ImputationWarning[] = [];

  featureNames.forEach((feature, j) => {
    let sum = 0;
    let count = 0;
    for (const row of rows) {
      const v = row.features[j];
      if (v != null) {
        sum += v;
        count++;
      }
    }

    if (count === 0) {
      fill[j] = 0;
      warnings.push({
        kind: 'ALL_MISSING',
        feature,
        message: `Feature "${feature}" is missing in all ${rows.length} records; imputed with 0`,
      });
    } else {
      fill[j] = sum / count;
    }
    means[feature] = fill[j];
  });

  let imputedCells = 0;
  const X = rows.map((row) =>
    row.features.map((v, j) => {
      if (v != null) return v;
      imputedCells++;
      return fill[j];
    })
  );

  return {
    featureNames: [...featureNames],
    X,
    y: rows.map((row) => row.label),
    summary: { means, imputedCells, warnings },
  };
}
