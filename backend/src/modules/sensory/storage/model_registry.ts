/**
 * Model Registry contract
 *
 * One model per (target, algorithm). save() overwrites, no history is kept.
 * load()/latest() return null when nothing is stored for the key.
 * load() raises on an unreadable artifact; latest() and list() log it and skip it.
 */

import type { SensoryTarget } from '../contracts/batch_record.contract.js';
import type { Algorithm, TrainedModel } from '../contracts/sensory_model.contract.js';

export interface ModelRegistry {
  save(model: TrainedModel): Promise<void>;
  load(target: SensoryTarget, algorithm: Algorithm): Promise<TrainedModel | null>;
  latest(target: SensoryTarget): Promise<TrainedModel | null>;
  list(): Promise<TrainedModel[]>;
}

export function newestFirst(a: TrainedModel, b: TrainedModel): number {
  return Date.parse(b.createdAt) - Date.parse(a.createdAt);
}
