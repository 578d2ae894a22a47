/**
 * Tree ensembles
 * ==============
 * random-forest:      100 bootstrapped trees, mean of leaves
 * gradient-boosting:  100 depth-3 trees on squared-loss residuals, lr 0.1
 */

import type { BoostingParams, ForestParams } from '../contracts/sensory_model.contract.js';
import { randomInt, type Rng } from './rng.js';
import { fitRegressionTree, normalizeImportance, predictTree } from './tree.model.js';

export interface ForestConfig {
  nEstimators?: number;
  maxDepth?: number;
}

export interface BoostingConfig {
  nEstimators?: number;
  learningRate?: number;
  maxDepth?: number;
}

export function fitRandomForest(X: number[][], y: number[], rng: Rng, cfg: ForestConfig = {}): ForestParams {
  const nEstimators = cfg.nEstimators ?? 100;
  const n = X.length;
  const m = X[0]?.length ?? 0;

  const trees: ForestParams['trees'] = [];
  const importance = new Array<number>(m).fill(0);

  for (let t = 0; t < nEstimators; t++) {
    const sample = Array.from({ length: n }, () => randomInt(rng, n));
    const treeImportance = new Array<number>(m).fill(0);

    trees.push(fitRegressionTree(X, y, sample, treeImportance, { maxDepth: cfg.maxDepth }));

    // Per-tree normalization, then averaged
    const normalized = normalizeImportance(treeImportance);
    for (let f = 0; f < m; f++) {
      importance[f] += normalized[f] / nEstimators;
    }
  }

  return { algorithm: 'random-forest', trees, importance: normalizeImportance(importance) };
}

export function predictRandomForest(params: ForestParams, x: number[]): number {
  if (!params.trees.length) return 0;
  let sum = 0;
  for (const tree of params.trees) {
    sum += predictTree(tree, x);
  }
  return sum / params.trees.length;
}

export function fitGradientBoosting(X: number[][], y: number[], cfg: BoostingConfig = {}): BoostingParams {
  const nEstimators = cfg.nEstimators ?? 100;
  const learningRate = cfg.learningRate ?? 0.1;
  const maxDepth = cfg.maxDepth ?? 3;
  const n = X.length;
  const m = X[0]?.length ?? 0;

  const init = n > 0 ? y.reduce((a, b) => a + b, 0) / n : 0;
  const current = new Array<number>(n).fill(init);
  const all = Array.from({ length: n }, (_, i) => i);

  const trees: BoostingParams['trees'] = [];
  const importance = new Array<number>(m).fill(0);

  for (let t = 0; t < nEstimators; t++) {
    const residual = y.map((v, i) => v - current[i]);
    const tree = fitRegressionTree(X, residual, all, importance, { maxDepth });
    trees.push(tree);

    for (let i = 0; i < n; i++) {
      current[i] += learningRate * predictTree(tree, X[i]);
    }
  }

  return {
    algorithm: 'gradient-boosting',
    init,
    learningRate,
    trees,
    importance: normalizeImportance(importance),
  };
}

export function predictGradientBoosting(params: BoostingParams, x: number[]): number {
  let value = params.init;
  for (const tree of params.trees) {
    value += params.learningRate * predictTree(tree, x);
  }
  return value;
}
