import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { sendApiError } from '../../lib/apiError.js';
import { normalizeTranscription } from '../../pipeline/transcriptionStage.js';
import { requireApiKey } from '../../plugins/apiKeyAuth.js';

const schema = z.object({
  transcript: z.string()
});

export const soapExtractionRoutes: FastifyPluginAsync = async (app) => {
  app.post('/soap-extraction', { preHandler: requireApiKey }, async (req, reply) => {
    const parsed = schema.parse(req.body);
    // pasted text carries no speaker labels or timings and becomes a single segment
    const transcript = normalizeTranscription({ status: 'completed', text: parsed.transcript });

    if (transcript.segments.length === 0) {
      return sendApiError(req, reply, 'TRANSCRIPT_REQUIRED', 'transcript text must not be empty');
    }

    const soapNote = await app.pipelineStages.extraction.extract(transcript);

    return reply.send({
      ok: true,
      data: {
        soapNote,
        structured: app.pipelineStages.document.exportStructured(soapNote)
      }
    });
  });
};
