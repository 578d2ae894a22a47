import { describe, it, expect } from 'vitest';
import { imputeMeans } from '../services/imputer.service.js';
import type { TrainingDataset } from '../contracts/sensory_model.contract.js';

function dataset(features: Array<Array<number | null>>, featureNames = ['a', 'b']): TrainingDataset {
  return {
    target: 'aroma',
    featureNames,
    rows: features.map((f, i) => ({
      key: { batchId: `LOT-${i}`, analyzedAt: '2024-01-01T00:00:00.000Z' },
      features: f,
      label: 50 + i,
    })),
  };
}

describe('imputeMeans', () => {
  it('should leave a complete dataset unchanged', () => {
    const input = dataset([
      [1, 2],
      [3, 4],
      [5, 6],
    ]);
    const result = imputeMeans(input);

    expect(result.X).toEqual([
      [1, 2],
      [3, 4],
      [5, 6],
    ]);
    expect(result.y).toEqual([50, 51, 52]);
    expect(result.summary.imputedCells).toBe(0);
    expect(result.summary.warnings).toEqual([]);
  });

  it('should be idempotent', () => {
    const first = imputeMeans(dataset([[1, null], [3, 4], [null, 8]]));
    const again = imputeMeans(dataset(first.X));

    expect(again.X).toEqual(first.X);
    expect(again.summary.imputedCells).toBe(0);
  });

  it('should fill gaps with the column mean of present values', () => {
    const result = imputeMeans(dataset([[1, null], [3, 4], [null, 8]]));

    expect(result.X).toEqual([
      [1, 6],
      [3, 4],
      [2, 8],
    ]);
    expect(result.summary.means).toEqual({ a: 2, b: 6 });
    expect(result.summary.imputedCells).toBe(2);
  });

  it('should compute statistics from each call, not a previous one', () => {
    imputeMeans(dataset([[100, 100], [null, null]]));
    const result = imputeMeans(dataset([[1, 1], [null, null]]));

    expect(result.X[1]).toEqual([1, 1]);
  });

  it('should zero-fill a feature missing everywhere and warn', () => {
    const result = imputeMeans(dataset([[1, null], [3, null]]));

    expect(result.X).toEqual([
      [1, 0],
      [3, 0],
    ]);
    expect(result.summary.warnings).toEqual([
      {
        kind: 'ALL_MISSING',
        feature: 'b',
        message: 'Feature "b" is missing in all 2 records; imputed with 0',
      },
    ]);
  });

  it('should not mutate the input rows', () => {
    const input = dataset([[1, null], [3, 4]]);
    imputeMeans(input);
    expect(input.rows[0].features).toEqual([1, null]);
  });
});
