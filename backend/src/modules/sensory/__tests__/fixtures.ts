/**
 * Shared test data. In sampleRecords() chemistry is an affine function of
 * the aroma score, so a least-squares fit on any subset reproduces aroma
 * exactly; scatteredRecords() has no such relation.
 */

import { vi } from 'vitest';
import type { BatchRecord, SensoryTarget } from '../contracts/batch_record.contract.js';
import type { Clock } from '../contracts/host.deps.js';
import type { Algorithm, TrainedModel } from '../contracts/sensory_model.contract.js';
import { newestFirst, type ModelRegistry } from '../storage/model_registry.js';

export const AROMA_SCORES = [40, 55, 60, 70, 65, 80];

export function makeRecord(overrides: Partial<BatchRecord> & { batchId: string }): BatchRecord {
  return {
    analysisType: 'initial',
    analyzedAt: '2024-01-15T00:00:00.000Z',
    alcoholContent: null,
    acidity: null,
    sugarContent: null,
    tanninLevel: null,
    esterConcentration: null,
    aldehydeLevel: null,
    aromaScore: null,
    tasteScore: null,
    finishScore: null,
    overallScore: null,
    productionDate: null,
    entryDate: null,
    ...overrides,
  };
}

export function chemistryFor(aroma: number) {
  return {
    alcoholContent: 10 + 0.05 * aroma,
    acidity: 4 - 0.01 * aroma,
    sugarContent: 2 + 0.1 * aroma,
    tanninLevel: 100 + aroma,
    esterConcentration: 20 + 0.5 * aroma,
    aldehydeLevel: 5 + 0.02 * aroma,
  };
}

export function sampleRecords(scores: number[] = AROMA_SCORES): BatchRecord[] {
  return scores.map((aroma, i) =>
    makeRecord({
      batchId: `LOT-00${i + 1}`,
      analyzedAt: `2024-0${i + 1}-15T00:00:00.000Z`,
      ...chemistryFor(aroma),
      aromaScore: aroma,
      tasteScore: aroma - 5,
      finishScore: aroma + 5,
      overallScore: aroma,
    })
  );
}

/**
 * Records whose chemistry is not a function of the score: each feature
 * moves independently, so no feature or combination reproduces aroma.
 */
export function scatteredRecords(): BatchRecord[] {
  const rows: Array<[number, number, number, number, number, number, number]> = [
    // aroma, alcohol, acidity, sugar, tannin, ester, aldehyde
    [40, 13.1, 3.2, 6.0, 140, 30, 6.1],
    [72, 11.4, 3.9, 2.5, 115, 48, 5.2],
    [55, 12.8, 3.1, 4.4, 160, 22, 5.9],
    [80, 12.0, 3.6, 7.3, 120, 35, 4.8],
    [63, 13.5, 3.4, 3.1, 150, 41, 6.4],
    [48, 11.9, 3.8, 5.6, 105, 27, 5.0],
    [69, 12.4, 3.3, 4.9, 135, 44, 6.0],
    [58, 11.6, 3.7, 6.7, 145, 33, 5.5],
  ];
  return rows.map(([aroma, alcoholContent, acidity, sugarContent, tanninLevel, esterConcentration, aldehydeLevel], i) =>
    makeRecord({
      batchId: `LOT-1${i}`,
      analyzedAt: `2024-0${i + 1}-20T00:00:00.000Z`,
      alcoholContent,
      acidity,
      sugarContent,
      tanninLevel,
      esterConcentration,
      aldehydeLevel,
      aromaScore: aroma,
    })
  );
}

/** Column means of the base features over the given records */
export function featureMeans(records: BatchRecord[]): Record<string, number> {
  const keys = ['alcoholContent', 'acidity', 'sugarContent', 'tanninLevel', 'esterConcentration', 'aldehydeLevel'] as const;
  return Object.fromEntries(
    keys.map((key) => [key, records.reduce((sum, r) => sum + (r[key] ?? 0), 0) / records.length])
  );
}

/** Mean of each base feature across sampleRecords() */
export function meanChemistry(scores: number[] = AROMA_SCORES): Record<string, number> {
  const mean = scores.reduce((a, b) => a + b, 0) / scores.length;
  return chemistryFor(mean);
}

export function fixedClock(iso: string): Clock {
  return { now: () => new Date(iso) };
}

export function mockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

/**
 * Map-backed registry for tests that don't care about persistence.
 */
export class MemoryModelRegistry implements ModelRegistry {
  private readonly models = new Map<string, TrainedModel>();

  async save(model: TrainedModel): Promise<void> {
    this.models.set(`${model.target}/${model.algorithm}`, model);
  }

  async load(target: SensoryTarget, algorithm: Algorithm): Promise<TrainedModel | null> {
    return this.models.get(`${target}/${algorithm}`) ?? null;
  }

  async latest(target: SensoryTarget): Promise<TrainedModel | null> {
    const models = await this.list();
    return models.find((m) => m.target === target) ?? null;
  }

  async list(): Promise<TrainedModel[]> {
    return [...this.models.values()].sort(newestFirst);
  }
}
