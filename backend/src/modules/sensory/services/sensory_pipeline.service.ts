/**
 * Pipeline
 * ========
 * Extractor → Trainer → Registry, with each run visible in the tracker.
 * Everything the pipeline touches arrives through the constructor.
 */

import { SENSORY_TARGETS, type RecordKey, type SensoryTarget } from '../contracts/batch_record.contract.js';
import type {
  Algorithm,
  ExtractOptions,
  TrainedModel,
  TrainOptions,
} from '../contracts/sensory_model.contract.js';
import type { Logger } from '../contracts/host.deps.js';
import type { BatchRecordSource } from '../storage/batch_record.store.js';
import type { ModelRegistry } from '../storage/model_registry.js';
import { AppError } from '../../../common/errors.js';
import { InsufficientDataError } from '../errors/sensory.errors.js';
import { FeatureExtractor } from './feature_extractor.service.js';
import { SensoryModelTrainer } from './trainer.service.js';
import { TrainingRunTracker } from './training_run.tracker.js';

export type PipelineTrainOptions = ExtractOptions & Omit<TrainOptions, 'onPhase'>;

export interface SkippedTarget {
  target: SensoryTarget;
  found: number;
  required: number;
}

export interface TrainAllResult {
  models: TrainedModel[];
  skipped: SkippedTarget[];
}

export interface SensoryPipelineDeps {
  source: BatchRecordSource;
  registry: ModelRegistry;
  logger: Logger;
  tracker?: TrainingRunTracker;
  trainer?: SensoryModelTrainer;
}

export class SensoryPipeline {
  private readonly extractor: FeatureExtractor;
  private readonly trainer: SensoryModelTrainer;
  readonly tracker: TrainingRunTracker;

  constructor(private readonly deps: SensoryPipelineDeps) {
    this.extractor = new FeatureExtractor(deps.source);
    this.trainer = deps.trainer ?? new SensoryModelTrainer({ logger: deps.logger });
    this.tracker = deps.tracker ?? new TrainingRunTracker();
  }

  async train(
    target: SensoryTarget,
    algorithm: Algorithm,
    options: PipelineTrainOptions = {}
  ): Promise<TrainedModel> {
    const run = this.tracker.start(target, algorithm);
    const { featureNames, minSamples, eligibility, seed, holdoutFraction } = options;

    try {
      const dataset = await this.extractor.extract(target, { featureNames, minSamples, eligibility });

      const model = this.trainer.train(target, algorithm, dataset, {
        seed,
        holdoutFraction,
        onPhase: (phase) => this.tracker.phase(run.runId, phase),
      });

      this.tracker.phase(run.runId, 'SAVING');
      await this.deps.registry.save(model);

      this.tracker.complete(run.runId, model.modelId);
      this.deps.logger.info(
        { runId: run.runId, target, algorithm, modelId: model.modelId, r2: model.metrics.r2 },
        '[SensoryPipeline] training run completed'
      );
      return model;
    } catch (err) {
      const code = err instanceof AppError ? err.code : 'INTERNAL_ERROR';
      const message = err instanceof Error ? err.message : String(err);
      this.tracker.fail(run.runId, { code, message });
      this.deps.logger.error({ runId: run.runId, target, algorithm, code }, `[SensoryPipeline] training run failed: ${message}`);
      throw err;
    }
  }

  /**
   * Trains every target that has enough labeled records. Targets short
   * of data are reported, any other failure aborts the sweep.
   */
  async trainAll(algorithm: Algorithm, options: PipelineTrainOptions = {}): Promise<TrainAllResult> {
    const models: TrainedModel[] = [];
    const skipped: SkippedTarget[] = [];

    for (const target of SENSORY_TARGETS) {
      try {
        models.push(await this.train(target, algorithm, options));
      } catch (err) {
        if (!(err instanceof InsufficientDataError)) throw err;
        skipped.push({ target, found: err.found, required: err.required });
      }
    }

    return { models, skipped };
  }

  async modelsReferencing(batchId: string): Promise<TrainedModel[]> {
    const models = await this.deps.registry.list();
    return models.filter((m) => m.snapshot.recordKeys.some((key) => key.batchId === batchId));
  }

  /** Models whose snapshot includes this exact analysis */
  async modelsReferencingRecord(record: RecordKey): Promise<TrainedModel[]> {
    const models = await this.deps.registry.list();
    return models.filter((m) =>
      m.snapshot.recordKeys.some((key) => key.batchId === record.batchId && key.analyzedAt === record.analyzedAt)
    );
  }
}
