/**
 * File Model Registry
 * ===================
 * One JSON artifact per (target, algorithm) under a models directory.
 * Writes go to a temp file that is renamed over the artifact, so readers
 * see either the old model or the new one, never a partial file.
 */

import * as fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { SensoryTarget } from '../contracts/batch_record.contract.js';
import { ALGORITHMS, type Algorithm, type TrainedModel } from '../contracts/sensory_model.contract.js';
import type { Logger } from '../contracts/host.deps.js';
import { ModelArtifactError } from '../errors/sensory.errors.js';
import { fromArtifact, toArtifact } from './model_artifact.js';
import { newestFirst, type ModelRegistry } from './model_registry.js';

const ARTIFACT_SUFFIX = '.model.json';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FileModelRegistry implements ModelRegistry {
  constructor(
    private readonly dir: string,
    private readonly logger?: Logger
  ) {}

  private artifactPath(target: SensoryTarget, algorithm: Algorithm): string {
    return path.join(this.dir, `${target}__${algorithm}${ARTIFACT_SUFFIX}`);
  }

  async save(model: TrainedModel): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });

    const finalPath = this.artifactPath(model.target, model.algorithm);
    const tmpPath = `${finalPath}.${uuidv4()}.tmp`;

    try {
      await fs.writeFile(tmpPath, JSON.stringify(toArtifact(model), null, 2), 'utf-8');
      await fs.rename(tmpPath, finalPath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw err;
    }

    this.logger?.info(
      { target: model.target, algorithm: model.algorithm, modelId: model.modelId, path: finalPath },
      '[FileModelRegistry] model saved'
    );
  }

  private async readArtifact(filePath: string): Promise<TrainedModel | null> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw new ModelArtifactError(filePath, err instanceof Error ? err.message : 'invalid JSON');
    }
    return fromArtifact(raw, filePath);
  }

  async load(target: SensoryTarget, algorithm: Algorithm): Promise<TrainedModel | null> {
    const model = await this.readArtifact(this.artifactPath(target, algorithm));
    if (model && (model.target !== target || model.algorithm !== algorithm)) {
      throw new ModelArtifactError(
        this.artifactPath(target, algorithm),
        `stored under ${target}/${algorithm} but describes ${model.target}/${model.algorithm}`
      );
    }
    return model;
  }

  async list(): Promise<TrainedModel[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    const models: TrainedModel[] = [];
    for (const entry of entries.filter((e) => e.endsWith(ARTIFACT_SUFFIX)).sort()) {
      const model = await this.readOrSkip(path.join(this.dir, entry));
      if (model) models.push(model);
    }
    return models.sort(newestFirst);
  }

  private async readOrSkip(filePath: string): Promise<TrainedModel | null> {
    try {
      return await this.readArtifact(filePath);
    } catch (err) {
      if (!(err instanceof ModelArtifactError)) throw err;
      this.logger?.warn({ path: filePath, err: err.message }, '[FileModelRegistry] skipping unreadable artifact');
      return null;
    }
  }

  /** Reads only this target's artifacts; a broken one is logged and passed over */
  async latest(target: SensoryTarget): Promise<TrainedModel | null> {
    const models: TrainedModel[] = [];
    for (const algorithm of ALGORITHMS) {
      try {
        const model = await this.load(target, algorithm);
        if (model) models.push(model);
      } catch (err) {
        if (!(err instanceof ModelArtifactError)) throw err;
        this.logger?.warn({ target, algorithm, err: err.message }, '[FileModelRegistry] skipping unreadable artifact');
      }
    }
    return models.sort(newestFirst)[0] ?? null;
  }
}
