/**
 * Sensory Prediction Module
 *
 * Chemical batch measurements → regression models → sensory score estimates.
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from './contracts/host.deps.js';
import type { BatchRecordStore } from './storage/batch_record.store.js';
import type { ModelRegistry } from './storage/model_registry.js';
import { SensoryPipeline } from './services/sensory_pipeline.service.js';
import { SensoryPredictor } from './services/predictor.service.js';
import { DEFAULT_FEATURES } from './services/feature_extractor.service.js';
import { registerSensoryRoutes, type TrainDefaults } from './routes/sensory.routes.js';

export * from './contracts/batch_record.contract.js';
export * from './contracts/sensory_model.contract.js';
export * from './contracts/host.deps.js';
export * from './errors/sensory.errors.js';
export * from './services/feature_extractor.service.js';
export * from './services/imputer.service.js';
export * from './services/trainer.service.js';
export * from './services/predictor.service.js';
export * from './services/sensory_pipeline.service.js';
export * from './services/training_run.tracker.js';
export * from './services/correlation.service.js';
export * from './storage/batch_record.store.js';
export * from './storage/batch_record.model.js';
export * from './storage/model_registry.js';
export * from './storage/file_model.registry.js';
export * from './storage/mongo_model.registry.js';
export { registerSensoryRoutes, describeModel, type TrainDefaults } from './routes/sensory.routes.js';

export interface SensoryModuleDeps {
  store: BatchRecordStore;
  registry: ModelRegistry;
  logger: Logger;
  /** Measurement codes appended to the base feature schema */
  extraFeatures?: string[];
  /** Applied to training requests that leave these unset */
  trainDefaults?: TrainDefaults;
}

export interface SensoryModule {
  pipeline: SensoryPipeline;
  predictor: SensoryPredictor;
  featureNames: string[];
}

export function createSensoryModule(deps: SensoryModuleDeps): SensoryModule {
  const featureNames = [...DEFAULT_FEATURES, ...(deps.extraFeatures ?? [])];
  return {
    pipeline: new SensoryPipeline({ source: deps.store, registry: deps.registry, logger: deps.logger }),
    predictor: new SensoryPredictor(deps.registry, deps.logger),
    featureNames,
  };
}

export async function registerSensoryModule(app: FastifyInstance, deps: SensoryModuleDeps): Promise<SensoryModule> {
  const sensory = createSensoryModule(deps);
  await registerSensoryRoutes(app, {
    store: deps.store,
    registry: deps.registry,
    pipeline: sensory.pipeline,
    predictor: sensory.predictor,
    featureNames: sensory.featureNames,
    trainDefaults: deps.trainDefaults ?? {},
  });
  app.log.info({ features: sensory.featureNames.length }, '[Sensory] module registered at /api/sensory/*');
  return sensory;
}
