/**
 * Environment configuration, validated once at startup.
 * Importers are expected to have loaded .env already (`import 'dotenv/config'`).
 */

import { z } from 'zod';

const csv = z
  .string()
  .default('')
  .transform((raw) =>
    raw
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean)
  );

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8010),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  MONGO_URL: z.string().default('mongodb://localhost:27017'),
  MONGO_DB: z.string().default('sensory'),

  MODEL_REGISTRY: z.enum(['file', 'mongo']).default('file'),
  MODEL_DIR: z.string().default('./data/models'),

  TRAIN_SEED: z.coerce.number().int().default(42),
  TRAIN_HOLDOUT: z.coerce.number().gt(0).lt(1).default(0.2),
  TRAIN_MIN_SAMPLES: z.coerce.number().int().min(5).default(5),
  EXTRA_FEATURES: csv,
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`[Config] Invalid environment: ${issues}`);
  }
  return result.data;
}
