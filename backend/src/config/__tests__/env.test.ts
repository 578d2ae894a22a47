/**
 * Env Tests
 */

import { describe, it, expect } from 'vitest';
import { parseEnv } from '../env.js';

describe('parseEnv', () => {
  it('should apply defaults to an empty environment', () => {
    const env = parseEnv({});

    expect(env.PORT).toBe(8010);
    expect(env.MODEL_REGISTRY).toBe('file');
    expect(env.TRAIN_MIN_SAMPLES).toBe(5);
    expect(env.EXTRA_FEATURES).toEqual([]);
  });

  it('should split extra features on commas', () => {
    expect(parseEnv({ EXTRA_FEATURES: 'idx_a, idx_b,,' }).EXTRA_FEATURES).toEqual(['idx_a', 'idx_b']);
  });

  it('should refuse a training floor below five samples', () => {
    expect(() => parseEnv({ TRAIN_MIN_SAMPLES: '3' })).toThrow(/TRAIN_MIN_SAMPLES/);
    expect(parseEnv({ TRAIN_MIN_SAMPLES: '8' }).TRAIN_MIN_SAMPLES).toBe(8);
  });
});
