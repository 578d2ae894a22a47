import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { ZodError } from 'zod';
import type { Env } from './config/env.js';
import { AppError } from './common/errors.js';
import { registerSensoryModule } from './modules/sensory/index.js';
import type { BatchRecordStore } from './modules/sensory/storage/batch_record.store.js';
import type { ModelRegistry } from './modules/sensory/storage/model_registry.js';

export type AppConfig = Pick<
  Env,
  'NODE_ENV' | 'LOG_LEVEL' | 'CORS_ORIGINS' | 'EXTRA_FEATURES' | 'TRAIN_SEED' | 'TRAIN_HOLDOUT' | 'TRAIN_MIN_SAMPLES'
>;

export interface AppDeps {
  config: AppConfig;
  store: BatchRecordStore;
  registry: ModelRegistry;
}

/**
 * Build Fastify Application
 */
export function buildApp(deps: AppDeps): FastifyInstance {
  const { config } = deps;

  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
    },
    trustProxy: true,
  });

  // CORS
  app.register(cors, {
    origin: config.CORS_ORIGINS === '*' ? true : config.CORS_ORIGINS.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof ZodError) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '),
      });
    }

    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        app.log.error(err);
      } else {
        app.log.warn({ code: err.code, details: err.details }, err.message);
      }
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
        ...(err.details ? { details: err.details } : {}),
      });
    }

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    app.log.error(err);
    const statusCode = err.statusCode ?? 500;
    return reply.status(statusCode).send({
      ok: false,
      error: statusCode === 500 ? 'INTERNAL_ERROR' : err.code,
      message: config.NODE_ENV === 'production' && statusCode === 500 ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    service: 'sensory-backend',
    timestamp: new Date().toISOString(),
  }));

  app.register(async (fastify) => {
    await registerSensoryModule(fastify, {
      store: deps.store,
      registry: deps.registry,
      logger: fastify.log,
      extraFeatures: config.EXTRA_FEATURES,
      trainDefaults: {
        seed: config.TRAIN_SEED,
        holdoutFraction: config.TRAIN_HOLDOUT,
        minSamples: config.TRAIN_MIN_SAMPLES,
      },
    });
  });

  return app;
}
