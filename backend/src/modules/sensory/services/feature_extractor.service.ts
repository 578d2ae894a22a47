/**
 * Feature/Label Extractor
 * =======================
 * BatchRecords → rectangular dataset for one target.
 */

import {
  BASE_FEATURES,
  readFeature,
  readTarget,
  recordKeyOf,
  type BatchRecord,
  type SensoryTarget,
} from '../contracts/batch_record.contract.js';
import type { EligibilityFilter, ExtractOptions, TrainingDataset } from '../contracts/sensory_model.contract.js';
import type { BatchRecordSource } from '../storage/batch_record.store.js';
import { InsufficientDataError } from '../errors/sensory.errors.js';

export const MIN_TRAINING_SAMPLES = 5;

export const DEFAULT_FEATURES: readonly string[] = BASE_FEATURES;

/**
 * Records a training run may use. No filter = every record.
 */
export function applyEligibility(records: BatchRecord[], filter: EligibilityFilter = {}): BatchRecord[] {
  let eligible = records;

  if (filter.analysisTypes?.length) {
    const allowed = new Set(filter.analysisTypes);
    eligible = eligible.filter((r) => allowed.has(r.analysisType));
  }

  if (filter.predicate) {
    eligible = eligible.filter(filter.predicate);
  }

  if (filter.latestPerBatch) {
    const latest = new Map<string, BatchRecord>();
    for (const r of eligible) {
      const current = latest.get(r.batchId);
      if (!current || Date.parse(r.analyzedAt) > Date.parse(current.analyzedAt)) {
        latest.set(r.batchId, r);
      }
    }
    const keep = new Set(latest.values());
    eligible = eligible.filter((r) => keep.has(r));
  }

  return eligible;
}

export function buildTrainingDataset(
  records: BatchRecord[],
  target: SensoryTarget,
  options: ExtractOptions = {}
): TrainingDataset {
  const featureNames = [...(options.featureNames ?? DEFAULT_FEATURES)];
  // minSamples can raise the floor, never lower it
  const minSamples = Math.max(options.minSamples ?? MIN_TRAINING_SAMPLES, MIN_TRAINING_SAMPLES);

  const rows: TrainingDataset['rows'] = [];
  for (const record of applyEligibility(records, options.eligibility)) {
    const label = readTarget(record, target);
    if (label == null) continue;

    rows.push({
      key: recordKeyOf(record),
      features: featureNames.map((name) => readFeature(record, name)),
      label,
    });
  }

  if (rows.length < minSamples) {
    throw new InsufficientDataError(rows.length, minSamples);
  }

  return { target, featureNames, rows };
}

export class FeatureExtractor {
  constructor(private readonly source: BatchRecordSource) {}

  async extract(target: SensoryTarget, options: ExtractOptions = {}): Promise<TrainingDataset> {
    const records = await this.source.listRecords();
    return buildTrainingDataset(records, target, options);
  }
}
