/**
 * SENSORY MODEL TRAINING SCRIPT
 *
 * Trains one algorithm for every sensory target from the batch records in
 * MongoDB and stores the models in the configured registry.
 *
 * Run: npx tsx scripts/train-sensory-models.ts --algorithm=ridge [--target=aroma]
 */

import 'dotenv/config';
import path from 'path';
import pino from 'pino';
import { parseEnv } from '../src/config/env.js';
import { connectMongo, disconnectMongo } from '../src/db/mongoose.js';
import {
  ALGORITHMS,
  DEFAULT_FEATURES,
  FileModelRegistry,
  MongoBatchRecordStore,
  MongoModelRegistry,
  SENSORY_TARGETS,
  SensoryPipeline,
  type Algorithm,
  type ModelRegistry,
  type SensoryTarget,
} from '../src/modules/sensory/index.js';

function readFlag(name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = process.argv.find((a) => a.startsWith(prefix));
  return arg ? arg.slice(prefix.length) : undefined;
}

function isAlgorithm(value: string): value is Algorithm {
  return ALGORITHMS.some((a) => a === value);
}

function isTarget(value: string): value is SensoryTarget {
  return SENSORY_TARGETS.some((t) => t === value);
}

async function run() {
  const env = parseEnv();
  const logger = pino({ level: env.LOG_LEVEL });

  const algorithm = readFlag('algorithm') ?? 'random-forest';
  const target = readFlag('target') ?? 'all';

  if (!isAlgorithm(algorithm)) {
    throw new Error(`--algorithm must be one of ${ALGORITHMS.join(', ')}`);
  }
  if (target !== 'all' && !isTarget(target)) {
    throw new Error(`--target must be "all" or one of ${SENSORY_TARGETS.join(', ')}`);
  }

  await connectMongo(env.MONGO_URL, env.MONGO_DB);

  const registry: ModelRegistry =
    env.MODEL_REGISTRY === 'mongo'
      ? new MongoModelRegistry(undefined, logger)
      : new FileModelRegistry(path.resolve(env.MODEL_DIR), logger);

  const pipeline = new SensoryPipeline({ source: new MongoBatchRecordStore(), registry, logger });
  const options = {
    featureNames: [...DEFAULT_FEATURES, ...env.EXTRA_FEATURES],
    minSamples: env.TRAIN_MIN_SAMPLES,
    seed: env.TRAIN_SEED,
    holdoutFraction: env.TRAIN_HOLDOUT,
  };

  try {
    if (target === 'all') {
      const { models, skipped } = await pipeline.trainAll(algorithm, options);
      for (const m of models) {
        console.log(`  ${m.target.padEnd(8)} r2=${m.metrics.r2 ?? 'n/a'} mae=${m.metrics.mae.toFixed(3)}`);
      }
      for (const s of skipped) {
        console.log(`  ${s.target.padEnd(8)} skipped (${s.found}/${s.required} labeled records)`);
      }
    } else {
      const m = await pipeline.train(target, algorithm, options);
      console.log(`  ${m.target.padEnd(8)} r2=${m.metrics.r2 ?? 'n/a'} mae=${m.metrics.mae.toFixed(3)}`);
    }
  } finally {
    await disconnectMongo();
  }
}

run().catch((err) => {
  console.error('Training failed:', err);
  process.exit(1);
});
