/**
 * Mongo Model Registry
 * ====================
 * sensory_models collection, one document per (target, algorithm).
 * save() is a single-document replace with upsert, atomic for readers.
 */

import mongoose, { Schema } from 'mongoose';
import type { SensoryTarget } from '../contracts/batch_record.contract.js';
import type { Algorithm, TrainedModel } from '../contracts/sensory_model.contract.js';
import type { Logger } from '../contracts/host.deps.js';
import { fromArtifact, toArtifact, type ModelArtifact } from './model_artifact.js';
import type { ModelRegistry } from './model_registry.js';
import { ModelArtifactError } from '../errors/sensory.errors.js';

export interface ISensoryModelDoc {
  target: string;
  algorithm: string;
  createdAt: Date;
  artifact: ModelArtifact;
}

const SensoryModelSchema = new Schema<ISensoryModelDoc>(
  {
    target: { type: String, required: true },
    algorithm: { type: String, required: true },
    createdAt: { type: Date, required: true, index: true },
    artifact: { type: Schema.Types.Mixed, required: true },
  },
  {
    collection: 'sensory_models',
    minimize: false,
  }
);

SensoryModelSchema.index({ target: 1, algorithm: 1 }, { unique: true });
SensoryModelSchema.index({ target: 1, createdAt: -1 });

export const SensoryModelModel: mongoose.Model<ISensoryModelDoc> =
  mongoose.models.SensoryModel || mongoose.model<ISensoryModelDoc>('SensoryModel', SensoryModelSchema);

function sourceOf(doc: ISensoryModelDoc): string {
  return `sensory_models/${doc.target}/${doc.algorithm}`;
}

export class MongoModelRegistry implements ModelRegistry {
  constructor(
    private readonly model: mongoose.Model<ISensoryModelDoc> = SensoryModelModel,
    private readonly logger?: Logger
  ) {}

  async ensureIndexes(): Promise<void> {
    await this.model.syncIndexes();
    this.logger?.info({ collection: 'sensory_models' }, '[MongoModelRegistry] indexes ensured');
  }

  async save(trained: TrainedModel): Promise<void> {
    await this.model.replaceOne(
      { target: trained.target, algorithm: trained.algorithm },
      {
        target: trained.target,
        algorithm: trained.algorithm,
        createdAt: new Date(trained.createdAt),
        artifact: toArtifact(trained),
      },
      { upsert: true }
    );

    this.logger?.info(
      { target: trained.target, algorithm: trained.algorithm, modelId: trained.modelId },
      '[MongoModelRegistry] model saved'
    );
  }

  async load(target: SensoryTarget, algorithm: Algorithm): Promise<TrainedModel | null> {
    const doc = await this.model.findOne({ target, algorithm }, { _id: 0 }).lean<ISensoryModelDoc>();
    return doc ? fromArtifact(doc.artifact, sourceOf(doc)) : null;
  }

  async latest(target: SensoryTarget): Promise<TrainedModel | null> {
    const doc = await this.model
      .findOne({ target }, { _id: 0 })
      .sort({ createdAt: -1, algorithm: 1 })
      .lean<ISensoryModelDoc>();
    return doc ? fromArtifact(doc.artifact, sourceOf(doc)) : null;
  }

  async list(): Promise<TrainedModel[]> {
    const docs = await this.model.find({}, { _id: 0 }).sort({ createdAt: -1 }).lean<ISensoryModelDoc[]>();
    const models: TrainedModel[] = [];
    for (const doc of docs) {
      try {
        models.push(fromArtifact(doc.artifact, sourceOf(doc)));
      } catch (err) {
        if (!(err instanceof ModelArtifactError)) throw err;
        this.logger?.warn({ source: sourceOf(doc), err: err.message }, '[MongoModelRegistry] skipping unreadable artifact');
      }
    }
    return models;
  }
}
