/**
 * Predictor
 * =========
 * Applies a stored model to a feature vector. Inputs are never imputed:
 * a missing feature is the caller's problem to fix.
 */

import { SENSORY_TARGETS, type SensoryTarget } from '../contracts/batch_record.contract.js';
import type {
  FeatureInput,
  ModelSelector,
  PredictionResult,
  TrainedModel,
} from '../contracts/sensory_model.contract.js';
import type { Logger } from '../contracts/host.deps.js';
import { predictWithParams } from '../models/algorithm.registry.js';
import type { ModelRegistry } from '../storage/model_registry.js';
import { ModelNotFoundError, SchemaMismatchError } from '../errors/sensory.errors.js';
import { applyStandardScaler } from './preprocess.js';

/**
 * Order the input by the model's schema or throw SchemaMismatchError.
 */
export function alignFeatures(model: Pick<TrainedModel, 'featureNames'>, input: FeatureInput): number[] {
  const missing: string[] = [];
  const invalid: string[] = [];
  const vector: number[] = [];

  for (const name of model.featureNames) {
    const v = input[name];
    if (v == null) {
      missing.push(name);
    } else if (!Number.isFinite(v)) {
      invalid.push(name);
    } else {
      vector.push(v);
    }
  }

  if (missing.length || invalid.length) {
    throw new SchemaMismatchError(missing, invalid);
  }
  return vector;
}

export function predictWithModel(model: TrainedModel, input: FeatureInput): PredictionResult {
  const x = applyStandardScaler(alignFeatures(model, input), model.scaler);
  return {
    target: model.target,
    value: predictWithParams(model.params, x),
    algorithm: model.algorithm,
    modelId: model.modelId,
    modelCreatedAt: model.createdAt,
    importance: model.featureImportance ? { ...model.featureImportance } : null,
  };
}

export class SensoryPredictor {
  constructor(
    private readonly registry: ModelRegistry,
    private readonly logger?: Logger
  ) {}

  async resolveModel(target: SensoryTarget, selector: ModelSelector): Promise<TrainedModel> {
    const model =
      selector === 'latest'
        ? await this.registry.latest(target)
        : await this.registry.load(target, selector.algorithm);

    if (!model) {
      throw new ModelNotFoundError(target, selector === 'latest' ? 'latest' : selector.algorithm);
    }
    return model;
  }

  async predict(target: SensoryTarget, features: FeatureInput, selector: ModelSelector = 'latest'): Promise<PredictionResult> {
    const model = await this.resolveModel(target, selector);
    const result = predictWithModel(model, features);

    this.logger?.debug?.(
      { target, algorithm: model.algorithm, modelId: model.modelId, value: result.value },
      '[SensoryPredictor] prediction served'
    );
    return result;
  }

  /**
   * Several targets from one feature vector. Fails on the first error.
   */
  async predictProfile(
    features: FeatureInput,
    selector: ModelSelector = 'latest',
    targets: readonly SensoryTarget[] = SENSORY_TARGETS
  ): Promise<PredictionResult[]> {
    const results: PredictionResult[] = [];
    for (const target of targets) {
      results.push(await this.predict(target, features, selector));
    }
    return results;
  }
}
