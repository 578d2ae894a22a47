/**
 * Algorithm variants
 * ==================
 * Closed set of regressors. Each variant is a fit / predict / importance
 * triple over standardized feature matrices.
 */

import type {
  Algorithm,
  AlgorithmFamily,
  BoostingParams,
  FittedParams,
  ForestParams,
  LinearParams,
} from '../contracts/sensory_model.contract.js';
import type { Rng } from './rng.js';
import { fitLasso, fitLinear, fitRidge, predictLinear } from './linear.model.js';
import {
  fitGradientBoosting,
  fitRandomForest,
  predictGradientBoosting,
  predictRandomForest,
} from './ensemble.model.js';

export interface RegressionAlgorithm<P extends FittedParams> {
  id: P['algorithm'];
  family: AlgorithmFamily;
  fit: (X: number[][], y: number[], rng: Rng) => P;
  predict: (params: P, x: number[]) => number;
  importance: (params: P) => number[] | null;
}

const linear: RegressionAlgorithm<LinearParams<'linear'>> = {
  id: 'linear',
  family: 'linear',
  fit: (X, y) => fitLinear(X, y),
  predict: predictLinear,
  importance: () => null,
};

const ridge: RegressionAlgorithm<LinearParams<'ridge'>> = {
  id: 'ridge',
  family: 'linear',
  fit: (X, y) => fitRidge(X, y),
  predict: predictLinear,
  importance: () => null,
};

const lasso: RegressionAlgorithm<LinearParams<'lasso'>> = {
  id: 'lasso',
  family: 'linear',
  fit: (X, y) => fitLasso(X, y),
  predict: predictLinear,
  importance: () => null,
};

const randomForest: RegressionAlgorithm<ForestParams> = {
  id: 'random-forest',
  family: 'tree',
  fit: (X, y, rng) => fitRandomForest(X, y, rng),
  predict: predictRandomForest,
  importance: (params) => params.importance,
};

const gradientBoosting: RegressionAlgorithm<BoostingParams> = {
  id: 'gradient-boosting',
  family: 'tree',
  fit: (X, y) => fitGradientBoosting(X, y),
  predict: predictGradientBoosting,
  importance: (params) => params.importance,
};

const FAMILIES: Record<Algorithm, AlgorithmFamily> = {
  [linear.id]: linear.family,
  [ridge.id]: ridge.family,
  [lasso.id]: lasso.family,
  [randomForest.id]: randomForest.family,
  [gradientBoosting.id]: gradientBoosting.family,
};

export function familyOf(algorithm: Algorithm): AlgorithmFamily {
  return FAMILIES[algorithm];
}

export function fitAlgorithm(algorithm: Algorithm, X: number[][], y: number[], rng: Rng): FittedParams {
  switch (algorithm) {
    case 'linear':
      return linear.fit(X, y, rng);
    case 'ridge':
      return ridge.fit(X, y, rng);
    case 'lasso':
      return lasso.fit(X, y, rng);
    case 'random-forest':
      return randomForest.fit(X, y, rng);
    case 'gradient-boosting':
      return gradientBoosting.fit(X, y, rng);
  }
}

export function predictWithParams(params: FittedParams, x: number[]): number {
  switch (params.algorithm) {
    case 'linear':
      return linear.predict(params, x);
    case 'ridge':
      return ridge.predict(params, x);
    case 'lasso':
      return lasso.predict(params, x);
    case 'random-forest':
      return randomForest.predict(params, x);
    case 'gradient-boosting':
      return gradientBoosting.predict(params, x);
  }
}

export function importanceOf(params: FittedParams): number[] | null {
  switch (params.algorithm) {
    case 'linear':
      return linear.importance(params);
    case 'ridge':
      return ridge.importance(params);
    case 'lasso':
      return lasso.importance(params);
    case 'random-forest':
      return randomForest.importance(params);
    case 'gradient-boosting':
      return gradientBoosting.importance(params);
  }
}
