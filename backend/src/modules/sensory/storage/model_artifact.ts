/**
 * Model artifact format
 * =====================
 * Self-describing envelope around a TrainedModel. Readers validate the whole
 * document, so metadata is recoverable without outside schema knowledge.
 */

import { z } from 'zod';
import { SENSORY_TARGETS } from '../contracts/batch_record.contract.js';
import {
  ALGORITHMS,
  type RegressionTreeNode,
  type TrainedModel,
} from '../contracts/sensory_model.contract.js';
import { ModelArtifactError } from '../errors/sensory.errors.js';

export const ARTIFACT_FORMAT = 'sensory-model';
export const ARTIFACT_FORMAT_VERSION = 1;

const targetSchema = z.enum(SENSORY_TARGETS);
const algorithmSchema = z.enum(ALGORITHMS);

const treeSchema: z.ZodType<RegressionTreeNode> = z.lazy(() =>
  z.union([
    z.object({ type: z.literal('leaf'), value: z.number(), n: z.number() }),
    z.object({
      type: z.literal('split'),
      feature: z.number().int().nonnegative(),
      threshold: z.number(),
      n: z.number(),
      left: treeSchema,
      right: treeSchema,
    }),
  ])
);

const linearParams = <A extends 'linear' | 'ridge' | 'lasso'>(algorithm: A) =>
  z.object({
    algorithm: z.literal(algorithm),
    weights: z.array(z.number()),
    bias: z.number(),
    alpha: z.number(),
  });

const paramsSchema = z.discriminatedUnion('algorithm', [
  linearParams('linear'),
  linearParams('ridge'),
  linearParams('lasso'),
  z.object({
    algorithm: z.literal('random-forest'),
    trees: z.array(treeSchema),
    importance: z.array(z.number()),
  }),
  z.object({
    algorithm: z.literal('gradient-boosting'),
    init: z.number(),
    learningRate: z.number(),
    trees: z.array(treeSchema),
    importance: z.array(z.number()),
  }),
]);

export const trainedModelSchema = z.object({
  modelId: z.string().min(1),
  target: targetSchema,
  algorithm: algorithmSchema,
  featureNames: z.array(z.string()),
  trainingSize: z.number().int().nonnegative(),
  validationSize: z.number().int().nonnegative(),
  metrics: z.object({
    r2: z.number().nullable(),
    mae: z.number(),
    rmse: z.number(),
  }),
  featureImportance: z.record(z.number()).nullable(),
  imputation: z.object({
    means: z.record(z.number()),
    imputedCells: z.number().int().nonnegative(),
    warnings: z.array(
      z.object({
        kind: z.literal('ALL_MISSING'),
        feature: z.string(),
        message: z.string(),
      })
    ),
  }),
  scaler: z.object({
    mean: z.array(z.number()),
    std: z.array(z.number()),
  }),
  params: paramsSchema,
  seed: z.number(),
  holdoutFraction: z.number(),
  snapshot: z.object({
    fingerprint: z.string(),
    recordKeys: z.array(z.object({ batchId: z.string(), analyzedAt: z.string() })),
  }),
  createdAt: z.string().datetime(),
});

export const modelArtifactSchema = z.object({
  format: z.literal(ARTIFACT_FORMAT),
  formatVersion: z.literal(ARTIFACT_FORMAT_VERSION),
  model: trainedModelSchema,
});

export type ModelArtifact = z.infer<typeof modelArtifactSchema>;

export function toArtifact(model: TrainedModel): ModelArtifact {
  return { format: ARTIFACT_FORMAT, formatVersion: ARTIFACT_FORMAT_VERSION, model };
}

/**
 * Validate a stored artifact and check it belongs where it was found.
 */
export function fromArtifact(raw: unknown, source: string): TrainedModel {
  const parsed = modelArtifactSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ModelArtifactError(source, parsed.error.issues[0]?.message ?? 'invalid document');
  }

  const model = parsed.data.model;
  if (model.params.algorithm !== model.algorithm) {
    throw new ModelArtifactError(source, `params are for ${model.params.algorithm}, model says ${model.algorithm}`);
  }
  return model;
}
