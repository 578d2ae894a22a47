/**
 * Model Trainer
 * =============
 * dataset → impute → seeded holdout → scale → fit → evaluate.
 * Produces a TrainedModel; persisting it is the registry's job.
 */

import * as crypto from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import type { SensoryTarget } from '../contracts/batch_record.contract.js';
import type {
  Algorithm,
  TrainedModel,
  TrainingDataset,
  TrainOptions,
} from '../contracts/sensory_model.contract.js';
import { systemClock, type Clock, type Logger } from '../contracts/host.deps.js';
import { fitAlgorithm, importanceOf, predictWithParams } from '../models/algorithm.registry.js';
import { mulberry32 } from '../models/rng.js';
import { InsufficientDataError, TrainingError } from '../errors/sensory.errors.js';
import { MIN_TRAINING_SAMPLES } from './feature_extractor.service.js';
import { imputeMeans } from './imputer.service.js';
import { applyStandardScaler, fitStandardScaler, splitHoldout } from './preprocess.js';
import { computeRegressionMetrics } from './metrics.js';

export const DEFAULT_SEED = 42;
export const DEFAULT_HOLDOUT = 0.2;

export interface TrainerDeps {
  clock?: Clock;
  logger?: Logger;
  newId?: () => string;
}

function findNonFinite(X: number[][], y: number[], featureNames: string[]): string[] {
  const bad = new Set<string>();
  for (const row of X) {
    row.forEach((v, j) => {
      if (!Number.isFinite(v)) bad.add(featureNames[j]);
    });
  }
  if (y.some((v) => !Number.isFinite(v))) bad.add('label');
  return [...bad];
}

function fingerprint(featureNames: string[], X: number[][], y: number[]): string {
  return crypto.createHash('sha256').update(JSON.stringify({ featureNames, X, y })).digest('hex');
}

export class SensoryModelTrainer {
  private readonly clock: Clock;
  private readonly newId: () => string;

  constructor(private readonly deps: TrainerDeps = {}) {
    this.clock = deps.clock ?? systemClock;
    this.newId = deps.newId ?? (() => uuidv4());
  }

  train(
    target: SensoryTarget,
    algorithm: Algorithm,
    dataset: TrainingDataset,
    options: TrainOptions = {}
  ): TrainedModel {
    const seed = options.seed ?? DEFAULT_SEED;
    const holdoutFraction = options.holdoutFraction ?? DEFAULT_HOLDOUT;
    const onPhase = options.onPhase ?? (() => undefined);
    const startedAt = Date.now();

    if (dataset.target !== target) {
      throw new TrainingError(`Dataset is labeled for ${dataset.target}, not ${target}`, {
        target,
        datasetTarget: dataset.target,
      });
    }
    if (dataset.rows.length < MIN_TRAINING_SAMPLES) {
      throw new InsufficientDataError(dataset.rows.length, MIN_TRAINING_SAMPLES);
    }

    onPhase('IMPUTING');
    const { featureNames, X, y, summary } = imputeMeans(dataset);

    for (const warning of summary.warnings) {
      this.deps.logger?.warn({ target, feature: warning.feature }, warning.message);
    }

    const nonFinite = findNonFinite(X, y, featureNames);
    if (nonFinite.length) {
      throw new TrainingError(`Non-finite values after imputation in: ${nonFinite.join(', ')}`, {
        fields: nonFinite,
      });
    }

    onPhase('SPLITTING');
    const rng = mulberry32(seed);
    const { trainIdx, validIdx } = splitHoldout(X.length, holdoutFraction, rng);

    const scaler = fitStandardScaler(trainIdx.map((i) => X[i]));
    const trainX = trainIdx.map((i) => applyStandardScaler(X[i], scaler));
    const trainY = trainIdx.map((i) => y[i]);
    const validX = validIdx.map((i) => applyStandardScaler(X[i], scaler));
    const validY = validIdx.map((i) => y[i]);

    onPhase('FITTING');
    const params = fitAlgorithm(algorithm, trainX, trainY, rng);

    onPhase('EVALUATING');
    const predictions = validX.map((x) => predictWithParams(params, x));
    if (predictions.some((p) => !Number.isFinite(p))) {
      throw new TrainingError(`${algorithm} produced non-finite predictions for ${target}`);
    }
    const metrics = computeRegressionMetrics(validY, predictions);

    const rawImportance = importanceOf(params);
    const featureImportance = rawImportance
      ? Object.fromEntries(featureNames.map((name, j) => [name, rawImportance[j]]))
      : null;

    this.deps.logger?.info(
      {
        target,
        algorithm,
        trainSize: trainIdx.length,
        validSize: validIdx.length,
        r2: metrics.r2,
        mae: metrics.mae,
        ms: Date.now() - startedAt,
      },
      '[SensoryTrainer] model fitted'
    );

    return {
      modelId: this.newId(),
      target,
      algorithm,
      featureNames,
      trainingSize: trainIdx.length,
      validationSize: validIdx.length,
      metrics,
      featureImportance,
      imputation: summary,
      scaler,
      params,
      seed,
      holdoutFraction,
      snapshot: {
        fingerprint: fingerprint(featureNames, X, y),
        recordKeys: dataset.rows.map((row) => ({ ...row.key })),
      },
      createdAt: this.clock.now().toISOString(),
    };
  }
}
