/**
 * Model Contracts
 * ===============
 * Datasets, fitted parameters, trained models and predictions.
 */

import type { AnalysisType, BatchRecord, RecordKey, SensoryTarget } from './batch_record.contract.js';

// ═══════════════════════════════════════════════════════════════
// ALGORITHMS
// ═══════════════════════════════════════════════════════════════

export const ALGORITHMS = ['random-forest', 'gradient-boosting', 'linear', 'ridge', 'lasso'] as const;

export type Algorithm = (typeof ALGORITHMS)[number];

export type AlgorithmFamily = 'tree' | 'linear';

// ═══════════════════════════════════════════════════════════════
// DATASET
// ═══════════════════════════════════════════════════════════════

export interface DatasetRow {
  key: RecordKey;
  features: Array<number | null>;
  label: number;
}

export interface TrainingDataset {
  target: SensoryTarget;
  featureNames: string[];
  rows: DatasetRow[];
}

export interface EligibilityFilter {
  analysisTypes?: AnalysisType[];
  latestPerBatch?: boolean;
  predicate?: (record: BatchRecord) => boolean;
}

export interface ExtractOptions {
  featureNames?: string[];
  /** Raises the row floor; values below 5 are ignored */
  minSamples?: number;
  eligibility?: EligibilityFilter;
}

// ═══════════════════════════════════════════════════════════════
// IMPUTATION
// ═══════════════════════════════════════════════════════════════

export interface ImputationWarning {
  kind: 'ALL_MISSING';
  feature: string;
  message: string;
}

export interface ImputationSummary {
  means: Record<string, number>;
  imputedCells: number;
  warnings: ImputationWarning[];
}

// ═══════════════════════════════════════════════════════════════
// FITTED PARAMETERS (tagged by algorithm)
// ═══════════════════════════════════════════════════════════════

export type RegressionTreeNode =
  | { type: 'leaf'; value: number; n: number }
  | { type: 'split'; feature: number; threshold: number; n: number; left: RegressionTreeNode; right: RegressionTreeNode };

export type LinearAlgorithm = 'linear' | 'ridge' | 'lasso';

export interface LinearParams<A extends LinearAlgorithm = LinearAlgorithm> {
  algorithm: A;
  weights: number[];
  bias: number;
  alpha: number;
}

export interface ForestParams {
  algorithm: 'random-forest';
  trees: RegressionTreeNode[];
  importance: number[];
}

export interface BoostingParams {
  algorithm: 'gradient-boosting';
  init: number;
  learningRate: number;
  trees: RegressionTreeNode[];
  importance: number[];
}

export type FittedParams =
  | LinearParams<'linear'>
  | LinearParams<'ridge'>
  | LinearParams<'lasso'>
  | ForestParams
  | BoostingParams;

export interface StandardScaler {
  mean: number[];
  std: number[];
}

// ═══════════════════════════════════════════════════════════════
// TRAINED MODEL
// ═══════════════════════════════════════════════════════════════

export interface ValidationMetrics {
  r2: number | null;     // null when the holdout cannot define it
  mae: number;
  rmse: number;
}

export interface DatasetSnapshot {
  fingerprint: string;   // sha256 of the imputed rows
  recordKeys: RecordKey[];
}

export interface TrainedModel {
  modelId: string;
  target: SensoryTarget;
  algorithm: Algorithm;
  featureNames: string[];
  trainingSize: number;
  validationSize: number;
  metrics: ValidationMetrics;
  featureImportance: Record<string, number> | null;
  imputation: ImputationSummary;
  scaler: StandardScaler;
  params: FittedParams;
  seed: number;
  holdoutFraction: number;
  snapshot: DatasetSnapshot;
  createdAt: string;
}

export type TrainingPhase = 'LOADING' | 'IMPUTING' | 'SPLITTING' | 'FITTING' | 'EVALUATING' | 'SAVING';

export interface TrainOptions {
  seed?: number;
  holdoutFraction?: number;
  onPhase?: (phase: TrainingPhase) => void;
}

// ═══════════════════════════════════════════════════════════════
// PREDICTION
// ═══════════════════════════════════════════════════════════════

export type ModelSelector = 'latest' | { algorithm: Algorithm };

export type FeatureInput = Record<string, number | null | undefined>;

export interface PredictionResult {
  target: SensoryTarget;
  value: number;
  algorithm: Algorithm;
  modelId: string;
  modelCreatedAt: string;
  importance: Record<string, number> | null;
}
