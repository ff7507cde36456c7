import fp from 'fastify-plugin';
import type { FastifyPluginAsync } from 'fastify';
import { Redis } from 'ioredis';
import { env } from '../config/env.js';
import { runMigrations } from '../db/migrator.js';
import { closePool, getPool } from '../db/pool.js';
import { createAudioAssetStore } from '../pipeline/audioAssetStore.js';
import type { ProviderCapabilities } from '../pipeline/capabilities.js';
import { createDocumentGenerationStage } from '../pipeline/documentGenerationStage.js';
import { createConsultationOrchestrator } from '../pipeline/orchestrator.js';
import { createSoapExtractionStage } from '../pipeline/soapExtractionStage.js';
import { createTranscriptionStage } from '../pipeline/transcriptionStage.js';
import { createProviderCapabilities } from '../providers/index.js';
import { createConsultationQueue } from '../queue/consultationQueue.js';
import { createRepositories } from '../repositories/index.js';
import { createConsultationWorker } from '../workers/consultationWorker.js';

export type DataLayerOptions = {
  capabilities?: Partial<ProviderCapabilities>;
};

async function canReachRedis(redisUrl: string): Promise<boolean> {
  const client = new Redis(redisUrl, {
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 0,
    connectTimeout: 500
  });
  client.on('error', () => {
    // handled by fallback decision
  });

  try {
    await client.connect();
    await client.ping();
    return true;
  } catch {
    return false;
  } finally {
    client.disconnect();
  }
}

const dataLayer: FastifyPluginAsync<DataLayerOptions> = async (app, options) => {
  let pool = getPool();
  let migrationResult: { ran: boolean; applied: string[] } = { ran: false, applied: [] };

  if (pool) {
    try {
      migrationResult = await runMigrations();
    } catch (error) {
      if (env.NODE_ENV === 'development' || env.NODE_ENV === 'test') {
        app.log.warn(
          {
            error: error instanceof Error ? error.message : String(error)
          },
          'database unavailable; falling back to in-memory repositories for this runtime'
        );
        await closePool();
        pool = null;
      } else {
        throw error;
      }
    }
  }

  const repositories = createRepositories(pool);
  const redisReachable = env.REDIS_URL ? await canReachRedis(env.REDIS_URL) : false;
  const consultationQueue = createConsultationQueue({
    logger: app.log,
    forceInMemory: Boolean(env.REDIS_URL) && !redisReachable
  });

  const capabilities = createProviderCapabilities(app.log, options.capabilities);
  const timeoutMs = env.PROVIDER_TIMEOUT_MS;
  const pipelineStages = {
    transcription: createTranscriptionStage(capabilities.transcription, {
      timeoutMs,
      pollIntervalMs: env.TRANSCRIPTION_POLL_INTERVAL_MS
    }),
    extraction: createSoapExtractionStage(capabilities.extraction, { timeoutMs }),
    document: createDocumentGenerationStage(capabilities.document, { timeoutMs })
  };
  const audioAssets = createAudioAssetStore(repositories.audioAssets, { maxBytes: env.MAX_AUDIO_BYTES });
  const orchestrator = createConsultationOrchestrator({
    repositories,
    audioAssets,
    stages: pipelineStages,
    policy: { maxAttempts: env.STAGE_MAX_ATTEMPTS, retryDelayMs: env.STAGE_RETRY_DELAY_MS },
    logger: app.log
  });
  consultationQueue.registerProcessor(createConsultationWorker(orchestrator, app.log));

  if (!pool) {
    if (!env.DATABASE_URL) {
      app.log.warn('DATABASE_URL is not configured; running with in-memory repositories (non-persistent)');
    } else {
      app.log.warn('DATABASE_URL is configured but unavailable; running with in-memory repositories');
    }
  } else if (migrationResult.applied.length > 0) {
    app.log.info({ applied: migrationResult.applied }, 'database migrations applied');
  } else {
    app.log.info('database ready; no new migrations');
  }

  if (consultationQueue.mode === 'in_memory') {
    if (!env.REDIS_URL) {
      app.log.warn('REDIS_URL is not configured; processing consultations in-process');
    } else {
      app.log.warn('REDIS_URL is configured but unavailable; processing consultations in-process');
    }
  } else {
    app.log.info('consultation queue initialized with BullMQ');
  }

  app.decorate('repositories', repositories);
  app.decorate('consultationQueue', consultationQueue);
  app.decorate('audioAssets', audioAssets);
  app.decorate('pipelineStages', pipelineStages);
  app.decorate('orchestrator', orchestrator);

  app.addHook('onClose', async () => {
    await consultationQueue.close();
    await closePool();
  });
};

export const dataLayerPlugin = fp(dataLayer);
