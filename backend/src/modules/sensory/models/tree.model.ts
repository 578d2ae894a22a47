/**
 * Regression Tree
 * ===============
 * CART with squared-error splits. Base learner for the forest and boosting
 * ensembles; accumulates impurity decrease per feature while growing.
 */

import type { RegressionTreeNode } from '../contracts/sensory_model.contract.js';

export interface RegressionTreeConfig {
  maxDepth?: number;
  minSamplesLeaf?: number;
  minSamplesSplit?: number;
}

interface SplitCandidate {
  feature: number;
  threshold: number;
  gain: number;
  left: number[];
  right: number[];
}

const MIN_GAIN = 1e-12;

function sumOf(idx: number[], y: number[]): { sum: number; sumSq: number } {
  let sum = 0;
  let sumSq = 0;
  for (const i of idx) {
    sum += y[i];
    sumSq += y[i] * y[i];
  }
  return { sum, sumSq };
}

function findBestSplit(
  X: number[][],
  y: number[],
  idx: number[],
  parentSse: number,
  minLeaf: number
): SplitCandidate | null {
  const n = idx.length;
  const m = X[0]?.length ?? 0;
  let best: SplitCandidate | null = null;

  for (let f = 0; f < m; f++) {
    const sorted = [...idx].sort((a, b) => X[a][f] - X[b][f]);
    const total = sumOf(sorted, y);

    let leftSum = 0;
    let leftSq = 0;

    for (let k = 1; k < n; k++) {
      const prev = sorted[k - 1];
      leftSum += y[prev];
      leftSq += y[prev] * y[prev];

      if (k < minLeaf || n - k < minLeaf) continue;

      const lo = X[prev][f];
      const hi = X[sorted[k]][f];
      if (lo === hi) continue;

      const rightSum = total.sum - leftSum;
      const rightSq = total.sumSq - leftSq;
      const sseLeft = leftSq - (leftSum * leftSum) / k;
      const sseRight = rightSq - (rightSum * rightSum) / (n - k);
      const gain = parentSse - sseLeft - sseRight;

      if (gain > MIN_GAIN && (!best || gain > best.gain)) {
        best = {
          feature: f,
          threshold: (lo + hi) / 2,
          gain,
          left: sorted.slice(0, k),
          right: sorted.slice(k),
        };
      }
    }
  }

  return best;
}

/**
 * Grow a tree over the rows listed in idx (duplicates allowed, for bootstraps).
 * importance[f] receives the SSE reduction of every split on feature f.
 */
export function fitRegressionTree(
  X: number[][],
  y: number[],
  idx: number[],
  importance: number[],
  cfg: RegressionTreeConfig = {}
): RegressionTreeNode {
  const maxDepth = cfg.maxDepth ?? 16;
  const minLeaf = cfg.minSamplesLeaf ?? 1;
  const minSplit = cfg.minSamplesSplit ?? 2;

  const build = (rows: number[], depth: number): RegressionTreeNode => {
    const n = rows.length;
    const { sum, sumSq } = sumOf(rows, y);
    const value = n > 0 ? sum / n : 0;
    const sse = n > 0 ? sumSq - (sum * sum) / n : 0;

    if (depth >= maxDepth || n < minSplit || sse <= MIN_GAIN) {
      return { type: 'leaf', value, n };
    }

    const split = findBestSplit(X, y, rows, sse, minLeaf);
    if (!split) {
      return { type: 'leaf', value, n };
    }

    importance[split.feature] += split.gain;

    return {
      type: 'split',
      feature: split.feature,
      threshold: split.threshold,
      n,
      left: build(split.left, depth + 1),
      right: build(split.right, depth + 1),
    };
  };

  return build(idx, 0);
}

export function predictTree(root: RegressionTreeNode, x: number[]): number {
  let node = root;
  while (node.type === 'split') {
    node = x[node.feature] <= node.threshold ? node.left : node.right;
  }
  return node.value;
}

/**
 * Scale to sum 1. A tree set without any split spreads weight uniformly.
 */
export function normalizeImportance(raw: number[]): number[] {
  const total = raw.reduce((a, b) => a + b, 0);
  if (!(total > 0)) {
    return raw.map(() => 1 / Math.max(1, raw.length));
  }
  return raw.map((v) => v / total);
}
