/**
 * Correlation
 * Pearson r between chemical features and sensory scores.
 */

import {
  SENSORY_TARGETS,
  readFeature,
  readTarget,
  type BatchRecord,
} from '../contracts/batch_record.contract.js';
import { InsufficientDataError } from '../errors/sensory.errors.js';
import { DEFAULT_FEATURES } from './feature_extractor.service.js';

export const MIN_CORRELATION_RECORDS = 3;

export interface CorrelationMatrix {
  variables: string[];
  /** r[i][j], null where fewer than two pairs or zero variance */
  matrix: Array<Array<number | null>>;
  /** pairwise-complete observation counts */
  counts: number[][];
  recordCount: number;
}

export function pearson(xs: number[], ys: number[]): number | null {
  const n = xs.length;
  if (n < 2) return null;

  const mx = xs.reduce((a, b) => a + b, 0) / n;
  const my = ys.reduce((a, b) => a + b, 0) / n;

  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  for (let i = 0; i < n; i++) {
    const dx = xs[i] - mx;
    const dy = ys[i] - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  }

  if (sxx === 0 || syy === 0) return null;
  const r = sxy / Math.sqrt(sxx * syy);
  return Math.max(-1, Math.min(1, r));
}

export function computeCorrelationMatrix(
  records: BatchRecord[],
  featureNames: readonly string[] = DEFAULT_FEATURES
): CorrelationMatrix {
  if (records.length < MIN_CORRELATION_RECORDS) {
    throw new InsufficientDataError(records.length, MIN_CORRELATION_RECORDS, 'correlation');
  }

  const variables = [...featureNames, ...SENSORY_TARGETS.map((t) => `${t}Score`)];
  const columns: Array<Array<number | null>> = [
    ...featureNames.map((name) => records.map((r) => readFeature(r, name))),
    ...SENSORY_TARGETS.map((t) => records.map((r) => readTarget(r, t))),
  ];

  const size = variables.length;
  const matrix: Array<Array<number | null>> = [];
  const counts: number[][] = [];

  for (let i = 0; i < size; i++) {
    matrix.push(new Array<number | null>(size).fill(null));
    counts.push(new Array<number>(size).fill(0));
  }

  for (let i = 0; i < size; i++) {
    for (let j = i; j < size; j++) {
      const xs: number[] = [];
      const ys: number[] = [];
      columns[i].forEach((x, k) => {
        const y = columns[j][k];
        if (x != null && y != null && Number.isFinite(x) && Number.isFinite(y)) {
          xs.push(x);
          ys.push(y);
        }
      });

      const r = pearson(xs, ys);
      matrix[i][j] = r;
      matrix[j][i] = r;
      counts[i][j] = xs.length;
      counts[j][i] = xs.length;
    }
  }

  return { variables, matrix, counts, recordCount: records.length };
}
