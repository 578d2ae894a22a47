/**
 * Regressor Tests
 */

import { describe, it, expect } from 'vitest';
import { fitLasso, fitLinear, fitRidge, predictLinear, solveLinearSystem } from '../models/linear.model.js';
import { fitRegressionTree, normalizeImportance, predictTree } from '../models/tree.model.js';
import { fitGradientBoosting, fitRandomForest, predictGradientBoosting } from '../models/ensemble.model.js';
import { familyOf, fitAlgorithm, importanceOf, predictWithParams } from '../models/algorithm.registry.js';
import { mulberry32, shuffledIndices } from '../models/rng.js';
import { fitStandardScaler, applyStandardScaler, splitHoldout } from '../services/preprocess.js';
import { computeRegressionMetrics } from '../services/metrics.js';
import { TrainingError } from '../errors/sensory.errors.js';
import { ALGORITHMS } from '../contracts/sensory_model.contract.js';

// y = 2x + 3
const X1 = [[0], [1], [2], [3]];
const Y1 = [3, 5, 7, 9];

// Feature 0 drives the label, feature 1 is a repeating pattern
const X2 = Array.from({ length: 20 }, (_, i) => [i, i % 3]);
const Y2 = X2.map(([a]) => (a < 10 ? 10 : 30));

describe('linear family', () => {
  it('should recover an exact linear relation with least squares', () => {
    const params = fitLinear(X1, Y1);
    expect(params.weights[0]).toBeCloseTo(2, 6);
    expect(params.bias).toBeCloseTo(3, 6);
    expect(predictLinear(params, [10])).toBeCloseTo(23, 5);
  });

  it('should shrink ridge weights by alpha', () => {
    // centered x: [-1.5, -0.5, 0.5, 1.5], Σx² = 5, Σxy = 10 → w = 10 / (5 + 1)
    const params = fitRidge(X1, Y1);
    expect(params.alpha).toBe(1);
    expect(params.weights[0]).toBeCloseTo(10 / 6, 10);
    expect(params.bias).toBeCloseTo(3.5, 10);
  });

  it('should soft-threshold lasso weights', () => {
    // rho = 10/4, ‖x‖²/n = 5/4 → w = (2.5 - 1) / 1.25
    const params = fitLasso(X1, Y1);
    expect(params.weights[0]).toBeCloseTo(1.2, 10);
    expect(params.bias).toBeCloseTo(4.2, 10);
  });

  it('should zero lasso weights when alpha dominates', () => {
    const params = fitLasso(X1, Y1, 100);
    expect(params.weights).toEqual([0]);
    expect(params.bias).toBe(6);
  });

  it('should solve a small linear system', () => {
    const x = solveLinearSystem(
      [
        [2, 1],
        [1, 3],
      ],
      [3, 5]
    );
    expect(x[0]).toBeCloseTo(0.8, 12);
    expect(x[1]).toBeCloseTo(1.4, 12);
  });
});

describe('regression tree', () => {
  it('should split on the midpoint that removes all squared error', () => {
    const importance = [0];
    const tree = fitRegressionTree(X1, [1, 1, 5, 5], [0, 1, 2, 3], importance);

    expect(tree).toEqual({
      type: 'split',
      feature: 0,
      threshold: 1.5,
      n: 4,
      left: { type: 'leaf', value: 1, n: 2 },
      right: { type: 'leaf', value: 5, n: 2 },
    });
    expect(importance).toEqual([16]);
    expect(predictTree(tree, [0.5])).toBe(1);
    expect(predictTree(tree, [2.5])).toBe(5);
  });

  it('should stop at maxDepth', () => {
    const tree = fitRegressionTree(X1, Y1, [0, 1, 2, 3], [0], { maxDepth: 0 });
    expect(tree).toEqual({ type: 'leaf', value: 6, n: 4 });
  });

  it('should spread importance uniformly when nothing was split', () => {
    expect(normalizeImportance([0, 0, 0, 0])).toEqual([0.25, 0.25, 0.25, 0.25]);
    expect(normalizeImportance([1, 3])).toEqual([0.25, 0.75]);
  });
});

describe('tree ensembles', () => {
  it('should produce random forest importances summing to 1', () => {
    const params = fitRandomForest(X2, Y2, mulberry32(42), { nEstimators: 20 });
    const total = params.importance.reduce((a, b) => a + b, 0);

    expect(params.trees).toHaveLength(20);
    expect(total).toBeCloseTo(1, 10);
    expect(params.importance[0]).toBeGreaterThan(params.importance[1]);
  });

  it('should be reproducible for one seed', () => {
    const a = fitRandomForest(X2, Y2, mulberry32(7), { nEstimators: 10 });
    const b = fitRandomForest(X2, Y2, mulberry32(7), { nEstimators: 10 });
    expect(a).toEqual(b);
  });

  it('should start gradient boosting from the label mean and move toward the labels', () => {
    const params = fitGradientBoosting(X2, Y2);

    expect(params.init).toBe(20);
    expect(params.trees).toHaveLength(100);
    expect(params.importance.reduce((a, b) => a + b, 0)).toBeCloseTo(1, 10);
    expect(predictGradientBoosting(params, [2, 2])).toBeCloseTo(10, 1);
    expect(predictGradientBoosting(params, [15, 0])).toBeCloseTo(30, 1);
  });
});

describe('algorithm registry', () => {
  it('should report null importance for the linear family', () => {
    for (const algorithm of ['linear', 'ridge', 'lasso'] as const) {
      const params = fitAlgorithm(algorithm, X1, Y1, mulberry32(1));
      expect(importanceOf(params)).toBeNull();
      expect(familyOf(algorithm)).toBe('linear');
    }
  });

  it('should fit and predict every algorithm', () => {
    for (const algorithm of ALGORITHMS) {
      const params = fitAlgorithm(algorithm, X2, Y2, mulberry32(3));
      expect(params.algorithm).toBe(algorithm);
      expect(Number.isFinite(predictWithParams(params, [5, 1]))).toBe(true);
    }
  });

  it('should classify tree algorithms', () => {
    expect(familyOf('random-forest')).toBe('tree');
    expect(familyOf('gradient-boosting')).toBe('tree');
  });
});

describe('preprocessing', () => {
  it('should generate the same sequence for a seed', () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    const seqA = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(seqA);
    expect(seqA.every((v) => v >= 0 && v < 1)).toBe(true);
  });

  it('should shuffle into a permutation', () => {
    const order = shuffledIndices(10, mulberry32(5));
    expect([...order].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it('should size the holdout as ceil(n * fraction)', () => {
    const split = splitHoldout(6, 0.2, mulberry32(42));
    expect(split.validIdx).toHaveLength(2);
    expect(split.trainIdx).toHaveLength(4);
    expect([...split.trainIdx, ...split.validIdx].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it('should reject a holdout that leaves fewer than two training rows', () => {
    expect(() => splitHoldout(5, 0.7, mulberry32(42))).toThrow(TrainingError);
  });

  it('should reject a holdout fraction outside (0, 1)', () => {
    expect(() => splitHoldout(10, 0, mulberry32(42))).toThrow(TrainingError);
    expect(() => splitHoldout(10, 1, mulberry32(42))).toThrow(TrainingError);
  });

  it('should standardize with population std and keep constant columns finite', () => {
    const scaler = fitStandardScaler([
      [1, 10],
      [3, 10],
    ]);
    expect(scaler).toEqual({ mean: [2, 10], std: [1, 1] });
    expect(applyStandardScaler([5, 10], scaler)).toEqual([3, 0]);
  });
});

describe('computeRegressionMetrics', () => {
  it('should compute r2, mae and rmse', () => {
    const m = computeRegressionMetrics([1, 2, 3], [1, 2, 4]);
    expect(m.r2).toBeCloseTo(0.5, 12);
    expect(m.mae).toBeCloseTo(1 / 3, 12);
    expect(m.rmse).toBeCloseTo(Math.sqrt(1 / 3), 12);
  });

  it('should leave r2 undefined for a single row or a constant holdout', () => {
    expect(computeRegressionMetrics([5], [4]).r2).toBeNull();
    expect(computeRegressionMetrics([5, 5], [4, 6]).r2).toBeNull();
  });
});
