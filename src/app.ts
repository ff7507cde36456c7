import Fastify from 'fastify';
import type { FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import { env } from './config/env.js';
import { correlationIdPlugin } from './plugins/correlationId.js';
import { securityLoggingPlugin } from './plugins/securityLogging.js';
import { errorEnvelopePlugin } from './plugins/errorEnvelope.js';
import { dataLayerPlugin } from './plugins/dataLayer.js';
import type { DataLayerOptions } from './plugins/dataLayer.js';
import { audioAssetRoutes } from './modules/audio-assets/index.js';
import { consultationRoutes } from './modules/consultations/index.js';
import { soapExtractionRoutes } from './modules/soap-extraction/index.js';
import { transcriptionRoutes } from './modules/transcriptions/index.js';

export type BuildAppOptions = DataLayerOptions;

export function buildApp(options: BuildAppOptions = {}) {
  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
      transport:
        env.NODE_ENV === 'development'
          ? {
              target: 'pino-pretty',
              options: { colorize: true }
            }
          : undefined
    }
  });

  // audio uploads arrive as raw bodies
  const passRawBody = async (_req: FastifyRequest, body: Buffer) => body;
  const rawBodyOptions = { parseAs: 'buffer' as const, bodyLimit: env.MAX_AUDIO_BYTES };
  app.addContentTypeParser('application/octet-stream', rawBodyOptions, passRawBody);
  app.addContentTypeParser(/^audio\/[\w.+-]+$/, rawBodyOptions, passRawBody);

  app.register(cors);
  app.register(correlationIdPlugin);
  app.register(securityLoggingPlugin);
  app.register(errorEnvelopePlugin);
  app.register(dataLayerPlugin, options);

  app.get('/health', async () => ({ ok: true, service: 'consult-scribe-api' }));

  app.register(audioAssetRoutes, { prefix: '/api/v1' });
  app.register(consultationRoutes, { prefix: '/api/v1' });
  app.register(soapExtractionRoutes, { prefix: '/api/v1' });
  app.register(transcriptionRoutes, { prefix: '/api/v1' });

  return app;
}
