/**
 * Routes
 *
 * Thin HTTP surface over records, training, the registry and prediction.
 * Bodies and params are parsed with zod; a ZodError or AppError thrown
 * here is rendered by the app error handler.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { NotFoundError } from '../../../common/errors.js';
import {
  ANALYSIS_TYPES,
  SENSORY_TARGETS,
  type BatchRecord,
} from '../contracts/batch_record.contract.js';
import { ALGORITHMS, type ModelSelector, type TrainedModel } from '../contracts/sensory_model.contract.js';
import type { BatchRecordStore } from '../storage/batch_record.store.js';
import type { ModelRegistry } from '../storage/model_registry.js';
import type { SensoryPipeline } from '../services/sensory_pipeline.service.js';
import type { SensoryPredictor } from '../services/predictor.service.js';
import { computeCorrelationMatrix } from '../services/correlation.service.js';
import { ModelNotFoundError, RecordLockedError } from '../errors/sensory.errors.js';
import { MIN_TRAINING_SAMPLES } from '../services/feature_extractor.service.js';

export interface SensoryRouteDeps {
  store: BatchRecordStore;
  registry: ModelRegistry;
  pipeline: SensoryPipeline;
  predictor: SensoryPredictor;
  /** Feature schema used when a request names none */
  featureNames: string[];
  trainDefaults: TrainDefaults;
}

export interface TrainDefaults {
  seed?: number;
  holdoutFraction?: number;
  minSamples?: number;
}

// ═══════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════

const score = z.number().min(0).max(100).nullable().default(null);
const chem = z.number().finite().nullable().default(null);
const isoDate = z.string().datetime({ offset: true });

const batchRecordBody = z.object({
  batchId: z.string().min(1),
  analysisType: z.enum(ANALYSIS_TYPES),
  analyzedAt: isoDate,
  productName: z.string().optional(),
  alcoholContent: chem,
  acidity: chem,
  sugarContent: chem,
  tanninLevel: chem,
  esterConcentration: chem,
  aldehydeLevel: chem,
  measurements: z.record(z.number().finite().nullable()).optional(),
  aromaScore: score,
  tasteScore: score,
  finishScore: score,
  overallScore: score,
  productionDate: isoDate.nullable().default(null),
  entryDate: isoDate.nullable().default(null),
  notes: z.string().optional(),
});

const targetSchema = z.enum(SENSORY_TARGETS);
const algorithmSchema = z.enum(ALGORITHMS);

const trainBody = z.object({
  target: z.union([targetSchema, z.literal('all')]).default('all'),
  algorithm: algorithmSchema.default('random-forest'),
  featureNames: z.array(z.string().min(1)).min(1).optional(),
  minSamples: z.number().int().min(MIN_TRAINING_SAMPLES).optional(),
  seed: z.number().int().optional(),
  holdoutFraction: z.number().gt(0).lt(1).optional(),
  eligibility: z
    .object({
      analysisTypes: z.array(z.enum(ANALYSIS_TYPES)).optional(),
      latestPerBatch: z.boolean().optional(),
    })
    .optional(),
});

const predictBody = z.object({
  target: z.union([targetSchema, z.literal('all')]),
  algorithm: z.union([algorithmSchema, z.literal('latest')]).default('latest'),
  features: z.record(z.number().nullable()),
});

const recordsQuery = z.object({
  batchId: z.string().min(1).optional(),
});

const upsertQuery = z.object({
  correction: z.enum(['true', 'false']).default('false'),
});

const deleteQuery = z.object({
  analyzedAt: isoDate.optional(),
});

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

function modelRefs(models: TrainedModel[]) {
  return models.map((m) => ({ modelId: m.modelId, target: m.target, algorithm: m.algorithm }));
}

/** Everything except fitted parameters */
export function describeModel(model: TrainedModel) {
  const { params: _params, scaler: _scaler, snapshot, ...meta } = model;
  return {
    ...meta,
    snapshot: { fingerprint: snapshot.fingerprint, recordCount: snapshot.recordKeys.length },
  };
}

// ═══════════════════════════════════════════════════════════════
// ROUTES
// ═══════════════════════════════════════════════════════════════

export async function registerSensoryRoutes(app: FastifyInstance, deps: SensoryRouteDeps): Promise<void> {
  const { store, registry, pipeline, predictor } = deps;

  /**
   * GET /api/sensory/records
   * Query: ?batchId=LOT-001
   */
  app.get('/api/sensory/records', async (req) => {
    const { batchId } = recordsQuery.parse(req.query);
    const records = batchId ? await store.listByBatch(batchId) : await store.listRecords();
    return { ok: true, data: { count: records.length, records } };
  });

  /**
   * POST /api/sensory/records
   * Insert or replace one analysis, keyed by (batchId, analyzedAt).
   * Query: ?correction=true to replace an analysis a stored model was trained on.
   */
  app.post('/api/sensory/records', async (req, reply) => {
    const { correction } = upsertQuery.parse(req.query);
    const record: BatchRecord = batchRecordBody.parse(req.body);

    const referencing = await pipeline.modelsReferencingRecord(record);
    if (referencing.length && correction !== 'true') {
      throw new RecordLockedError(record, referencing.map((m) => m.modelId));
    }

    await store.upsert(record);
    if (referencing.length) {
      req.log.warn(
        { batchId: record.batchId, analyzedAt: record.analyzedAt, models: referencing.length },
        '[Sensory] corrected a record used by trained models'
      );
    }
    return reply.status(201).send({ ok: true, data: { record, referencedBy: modelRefs(referencing) } });
  });

  /**
   * DELETE /api/sensory/records/:batchId
   * Query: ?analyzedAt=ISO to remove a single analysis.
   * Models trained on the batch are kept and reported back.
   */
  app.delete<{ Params: { batchId: string } }>('/api/sensory/records/:batchId', async (req) => {
    const { analyzedAt } = deleteQuery.parse(req.query);
    const { batchId } = req.params;

    const removed = await store.remove(batchId, analyzedAt);
    if (removed === 0) {
      throw new NotFoundError(`No records for batch ${batchId}`, { batchId, analyzedAt });
    }

    const referencing = await pipeline.modelsReferencing(batchId);
    return {
      ok: true,
      data: {
        removed,
        referencedBy: modelRefs(referencing),
      },
    };
  });

  /**
   * POST /api/sensory/train
   * Body: { target: 'aroma' | ... | 'all', algorithm, ... }
   */
  app.post('/api/sensory/train', async (req) => {
    const body = trainBody.parse(req.body ?? {});
    const options = {
      featureNames: body.featureNames ?? deps.featureNames,
      minSamples: body.minSamples ?? deps.trainDefaults.minSamples,
      seed: body.seed ?? deps.trainDefaults.seed,
      holdoutFraction: body.holdoutFraction ?? deps.trainDefaults.holdoutFraction,
      eligibility: body.eligibility,
    };

    if (body.target === 'all') {
      const { models, skipped } = await pipeline.trainAll(body.algorithm, options);
      return { ok: true, data: { models: models.map(describeModel), skipped } };
    }

    const model = await pipeline.train(body.target, body.algorithm, options);
    return { ok: true, data: { models: [describeModel(model)], skipped: [] } };
  });

  /**
   * GET /api/sensory/runs
   */
  app.get('/api/sensory/runs', async () => {
    return { ok: true, data: { runs: pipeline.tracker.list(), running: pipeline.tracker.isRunning() } };
  });

  /**
   * GET /api/sensory/runs/:runId
   */
  app.get<{ Params: { runId: string } }>('/api/sensory/runs/:runId', async (req) => {
    const run = pipeline.tracker.get(req.params.runId);
    if (!run) {
      throw new NotFoundError(`Training run ${req.params.runId} not found`);
    }
    return { ok: true, data: run };
  });

  /**
   * GET /api/sensory/models
   */
  app.get('/api/sensory/models', async () => {
    const models = await registry.list();
    return { ok: true, data: { count: models.length, models: models.map(describeModel) } };
  });

  /**
   * GET /api/sensory/models/:target/latest
   */
  app.get<{ Params: { target: string } }>('/api/sensory/models/:target/latest', async (req) => {
    const target = targetSchema.parse(req.params.target);
    const model = await registry.latest(target);
    if (!model) throw new ModelNotFoundError(target, 'latest');
    return { ok: true, data: describeModel(model) };
  });

  /**
   * GET /api/sensory/models/:target/:algorithm
   */
  app.get<{ Params: { target: string; algorithm: string } }>(
    '/api/sensory/models/:target/:algorithm',
    async (req) => {
      const target = targetSchema.parse(req.params.target);
      const algorithm = algorithmSchema.parse(req.params.algorithm);
      const model = await registry.load(target, algorithm);
      if (!model) throw new ModelNotFoundError(target, algorithm);
      return { ok: true, data: describeModel(model) };
    }
  );

  /**
   * POST /api/sensory/predict
   * Body: { target: 'aroma' | ... | 'all', algorithm?: Algorithm | 'latest', features }
   */
  app.post('/api/sensory/predict', async (req) => {
    const body = predictBody.parse(req.body);
    const selector: ModelSelector = body.algorithm === 'latest' ? 'latest' : { algorithm: body.algorithm };

    const predictions =
      body.target === 'all'
        ? await predictor.predictProfile(body.features, selector)
        : [await predictor.predict(body.target, body.features, selector)];

    return { ok: true, data: { predictions } };
  });

  /**
   * GET /api/sensory/correlation
   */
  app.get('/api/sensory/correlation', async () => {
    const records = await store.listRecords();
    return { ok: true, data: computeCorrelationMatrix(records, deps.featureNames) };
  });
}
