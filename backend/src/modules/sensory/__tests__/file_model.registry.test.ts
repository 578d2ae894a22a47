/**
 * File Model Registry Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import path from 'path';
import { FileModelRegistry } from '../storage/file_model.registry.js';
import { SensoryModelTrainer } from '../services/trainer.service.js';
import { buildTrainingDataset } from '../services/feature_extractor.service.js';
import { ModelArtifactError } from '../errors/sensory.errors.js';
import type { SensoryTarget } from '../contracts/batch_record.contract.js';
import type { Algorithm, TrainedModel } from '../contracts/sensory_model.contract.js';
import { fixedClock, mockLogger, sampleRecords } from './fixtures.js';

function trainAt(iso: string, target: SensoryTarget, algorithm: Algorithm, scores?: number[]): TrainedModel {
  const trainer = new SensoryModelTrainer({ clock: fixedClock(iso) });
  return trainer.train(target, algorithm, buildTrainingDataset(sampleRecords(scores), target));
}

describe('FileModelRegistry', () => {
  let dir: string;
  let registry: FileModelRegistry;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sensory-models-'));
    registry = new FileModelRegistry(dir);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should return null for a key that was never saved', async () => {
    expect(await registry.load('aroma', 'ridge')).toBeNull();
    expect(await registry.latest('aroma')).toBeNull();
    expect(await registry.list()).toEqual([]);
  });

  it('should load a saved model with matching target and algorithm', async () => {
    const model = trainAt('2024-03-01T00:00:00.000Z', 'aroma', 'ridge');
    await registry.save(model);

    const loaded = await registry.load('aroma', 'ridge');

    expect(loaded).toEqual(model);
    expect(loaded?.target).toBe('aroma');
    expect(loaded?.algorithm).toBe('ridge');
  });

  it('should round-trip tree parameters', async () => {
    const model = trainAt('2024-03-01T00:00:00.000Z', 'finish', 'gradient-boosting');
    await registry.save(model);

    expect(await registry.load('finish', 'gradient-boosting')).toEqual(model);
  });

  it('should keep only the newer model after saving twice under one key', async () => {
    const older = trainAt('2024-03-01T00:00:00.000Z', 'aroma', 'linear');
    const newer = trainAt('2024-04-01T00:00:00.000Z', 'aroma', 'linear', [30, 50, 45, 90, 60, 75, 20]);
    await registry.save(older);
    await registry.save(newer);

    const loaded = await registry.load('aroma', 'linear');

    expect(loaded?.modelId).toBe(newer.modelId);
    expect(loaded?.metrics).toEqual(newer.metrics);
    expect(loaded?.trainingSize).toBe(5);
    expect(await registry.list()).toHaveLength(1);
  });

  it('should leave no temporary files behind', async () => {
    await registry.save(trainAt('2024-03-01T00:00:00.000Z', 'taste', 'lasso'));

    expect(await fs.readdir(dir)).toEqual(['taste__lasso.model.json']);
  });

  it('should pick the newest model for a target as latest', async () => {
    await registry.save(trainAt('2024-03-01T00:00:00.000Z', 'aroma', 'linear'));
    await registry.save(trainAt('2024-05-01T00:00:00.000Z', 'aroma', 'ridge'));
    await registry.save(trainAt('2024-06-01T00:00:00.000Z', 'taste', 'lasso'));

    const latest = await registry.latest('aroma');

    expect(latest?.algorithm).toBe('ridge');
    expect((await registry.list()).map((m) => `${m.target}/${m.algorithm}`)).toEqual([
      'taste/lasso',
      'aroma/ridge',
      'aroma/linear',
    ]);
  });

  it('should log saves through the injected logger', async () => {
    const logger = mockLogger();
    const logged = new FileModelRegistry(dir, logger);
    const model = trainAt('2024-03-01T00:00:00.000Z', 'overall', 'ridge');

    await logged.save(model);

    expect(logger.info).toHaveBeenCalledWith(
      expect.objectContaining({ target: 'overall', algorithm: 'ridge', modelId: model.modelId }),
      '[FileModelRegistry] model saved'
    );
  });

  it('should reject an artifact that is not JSON', async () => {
    await fs.writeFile(path.join(dir, 'aroma__ridge.model.json'), 'not json', 'utf-8');

    await expect(registry.load('aroma', 'ridge')).rejects.toBeInstanceOf(ModelArtifactError);
  });

  it('should reject an artifact with the wrong format', async () => {
    await fs.writeFile(
      path.join(dir, 'aroma__ridge.model.json'),
      JSON.stringify({ format: 'something-else', formatVersion: 1, model: {} }),
      'utf-8'
    );

    await expect(registry.load('aroma', 'ridge')).rejects.toBeInstanceOf(ModelArtifactError);
  });

  it('should serve latest and list past a corrupt artifact for another target', async () => {
    const logger = mockLogger();
    const tolerant = new FileModelRegistry(dir, logger);
    const model = trainAt('2024-03-01T00:00:00.000Z', 'aroma', 'ridge');
    await tolerant.save(model);
    await fs.writeFile(path.join(dir, 'taste__lasso.model.json'), '{broken', 'utf-8');

    expect((await tolerant.latest('aroma'))?.modelId).toBe(model.modelId);
    expect((await tolerant.list()).map((m) => m.modelId)).toEqual([model.modelId]);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ path: path.join(dir, 'taste__lasso.model.json') }),
      '[FileModelRegistry] skipping unreadable artifact'
    );
    await expect(tolerant.load('taste', 'lasso')).rejects.toBeInstanceOf(ModelArtifactError);
  });

  it('should fall back to an older model when the newest artifact of a target is corrupt', async () => {
    const older = trainAt('2024-03-01T00:00:00.000Z', 'aroma', 'linear');
    await registry.save(older);
    await fs.writeFile(path.join(dir, 'aroma__lasso.model.json'), '{broken', 'utf-8');

    expect((await registry.latest('aroma'))?.modelId).toBe(older.modelId);
  });

  it('should reject an artifact stored under another key', async () => {
    const model = trainAt('2024-03-01T00:00:00.000Z', 'aroma', 'ridge');
    await registry.save(model);
    await fs.rename(path.join(dir, 'aroma__ridge.model.json'), path.join(dir, 'taste__ridge.model.json'));

    await expect(registry.load('taste', 'ridge')).rejects.toBeInstanceOf(ModelArtifactError);
  });
});
