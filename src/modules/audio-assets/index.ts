import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { sendApiError } from '../../lib/apiError.js';
import { requireApiKey } from '../../plugins/apiKeyAuth.js';

export const uploadQuerySchema = z.object({
  format: z.string().min(1, 'format query parameter is required')
});

const paramsSchema = z.object({
  assetId: z.string().min(1)
});

/** The raw upload; null when the body was parsed as something other than audio. */
export function audioBodyOf(req: FastifyRequest): Buffer | null {
  if (req.body === undefined || req.body === null) {
    return Buffer.alloc(0);
  }

  return Buffer.isBuffer(req.body) ? req.body : null;
}

export function rejectNonAudioBody(req: FastifyRequest, reply: FastifyReply) {
  return sendApiError(
    req,
    reply,
    'UNSUPPORTED_MEDIA_TYPE',
    'audio must be sent as a raw audio/* or application/octet-stream body'
  );
}

export const audioAssetRoutes: FastifyPluginAsync = async (app) => {
  app.post('/audio-assets', { preHandler: requireApiKey }, async (req, reply) => {
    const { format } = uploadQuerySchema.parse(req.query);
    const content = audioBodyOf(req);
    if (!content) {
      return rejectNonAudioBody(req, reply);
    }

    const asset = await app.audioAssets.store(content, format);
    req.log.info({ assetId: asset.assetId, format: asset.format, sizeBytes: asset.sizeBytes }, 'audio.asset_stored');

    return reply.code(201).send({
      ok: true,
      data: asset
    });
  });

  app.get('/audio-assets/:assetId', { preHandler: requireApiKey }, async (req, reply) => {
    const { assetId } = paramsSchema.parse(req.params);
    const asset = await app.audioAssets.retrieve(assetId);

    return reply.send({
      ok: true,
      data: asset
    });
  });
};
