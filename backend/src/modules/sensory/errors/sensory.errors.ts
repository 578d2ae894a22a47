/**
 * Pipeline errors
 * All recoverable: surfaced to the caller, never retried.
 */

import { AppError } from '../../../common/errors.js';
import type { Algorithm } from '../contracts/sensory_model.contract.js';
import type { RecordKey, SensoryTarget } from '../contracts/batch_record.contract.js';

export class InsufficientDataError extends AppError {
  constructor(
    public readonly found: number,
    public readonly required: number,
    context = 'training'
  ) {
    super(
      'INSUFFICIENT_DATA',
      `Not enough labeled records for ${context}: ${found} found, ${required} required`,
      422,
      { found, required }
    );
  }
}

export class TrainingError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('TRAINING_ERROR', message, 422, details);
  }
}

export class SchemaMismatchError extends AppError {
  constructor(
    public readonly missing: string[],
    public readonly invalid: string[] = []
  ) {
    const parts: string[] = [];
    if (missing.length) parts.push(`missing: ${missing.join(', ')}`);
    if (invalid.length) parts.push(`non-finite: ${invalid.join(', ')}`);
    super('SCHEMA_MISMATCH', `Feature vector does not match model schema (${parts.join('; ')})`, 400, {
      missing,
      invalid,
    });
  }
}

export class ModelNotFoundError extends AppError {
  constructor(target: SensoryTarget, algorithm: Algorithm | 'latest') {
    super('MODEL_NOT_FOUND', `No trained model for ${target}/${algorithm}`, 404, { target, algorithm });
  }
}

export class RecordLockedError extends AppError {
  constructor(key: RecordKey, modelIds: string[]) {
    super(
      'RECORD_LOCKED',
      `Record ${key.batchId}@${key.analyzedAt} is part of ${modelIds.length} trained model(s); resubmit as a correction to replace it`,
      409,
      { batchId: key.batchId, analyzedAt: key.analyzedAt, modelIds }
    );
  }
}

export class ModelArtifactError extends AppError {
  constructor(source: string, reason: string) {
    super('MODEL_ARTIFACT_INVALID', `Model artifact ${source} is unreadable: ${reason}`, 500, { source });
  }
}
