/**
 * Sensory Backend Entrypoint
 *
 * Run: npx tsx src/server.ts
 */

import 'dotenv/config';
import path from 'path';
import { parseEnv } from './config/env.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { buildApp } from './app.js';
import { MongoBatchRecordStore } from './modules/sensory/storage/batch_record.model.js';
import { FileModelRegistry } from './modules/sensory/storage/file_model.registry.js';
import { MongoModelRegistry } from './modules/sensory/storage/mongo_model.registry.js';
import type { ModelRegistry } from './modules/sensory/storage/model_registry.js';

async function main() {
  console.log('═══════════════════════════════════════════════════════════════');
  console.log('  SENSORY BACKEND');
  console.log('═══════════════════════════════════════════════════════════════');

  const env = parseEnv();

  console.log('[Sensory] Connecting to MongoDB...');
  await connectMongo(env.MONGO_URL, env.MONGO_DB);

  const store = new MongoBatchRecordStore();

  let registry: ModelRegistry;
  if (env.MODEL_REGISTRY === 'mongo') {
    const mongoRegistry = new MongoModelRegistry();
    await mongoRegistry.ensureIndexes();
    registry = mongoRegistry;
  } else {
    registry = new FileModelRegistry(path.resolve(env.MODEL_DIR));
  }
  console.log(`[Sensory] Model registry: ${env.MODEL_REGISTRY}`);

  const app = buildApp({ config: env, store, registry });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`[Sensory] Received ${signal}, shutting down...`);
    await app.close();
    await disconnectMongo();
    console.log('[Sensory] Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err) => {
      console.error('[Sensory] Shutdown failed:', err);
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });
  console.log('═══════════════════════════════════════════════════════════════');
  console.log(`  ✅ Sensory Backend started on port ${env.PORT}`);
  console.log('═══════════════════════════════════════════════════════════════');
}

main().catch((err) => {
  console.error('[Sensory] Fatal error:', err);
  process.exit(1);
});
