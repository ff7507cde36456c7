import type { FastifyPluginAsync } from 'fastify';
import { requireApiKey } from '../../plugins/apiKeyAuth.js';
import { audioBodyOf, rejectNonAudioBody, uploadQuerySchema } from '../audio-assets/index.js';

/** Stores a recording and runs only the transcription stage; no session is created. */
export const transcriptionRoutes: FastifyPluginAsync = async (app) => {
  app.post('/transcriptions', { preHandler: requireApiKey }, async (req, reply) => {
    const { format } = uploadQuerySchema.parse(req.query);
    const content = audioBodyOf(req);
    if (!content) {
      return rejectNonAudioBody(req, reply);
    }

    const asset = await app.audioAssets.store(content, format);
    const transcript = await app.pipelineStages.transcription.transcribe(asset, content);
    req.log.info(
      { assetId: asset.assetId, segments: transcript.segments.length, wordCount: transcript.wordCount },
      'transcription.completed'
    );

    return reply.send({
      ok: true,
      data: {
        asset,
        transcript
      }
    });
  });
};
