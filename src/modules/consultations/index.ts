import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { sendApiError } from '../../lib/apiError.js';
import { serializeStructuredExport } from '../../pipeline/documentGenerationStage.js';
import { sessionProducts, toSessionView } from '../../pipeline/sessionState.js';
import type { ConsultationSession } from '../../repositories/contracts.js';
import { requireApiKey } from '../../plugins/apiKeyAuth.js';
import { audioBodyOf, rejectNonAudioBody } from '../audio-assets/index.js';

const optionalText = z.string().trim().max(200).optional();

const createSchema = z.object({
  assetId: z.string().min(1),
  patientName: optionalText,
  title: optionalText
});

const processAudioQuerySchema = z.object({
  format: z.string().min(1, 'format query parameter is required'),
  patientName: optionalText,
  title: optionalText
});

const paramsSchema = z.object({
  sessionId: z.string().min(1)
});

async function enqueueProcessing(app: FastifyInstance, session: ConsultationSession) {
  const queued = await app.consultationQueue.enqueue({ sessionId: session.sessionId, version: session.version });
  // the in-memory queue processes inline, so the stored session may already be terminal
  const latest = await app.orchestrator.getSession(session.sessionId);
  return { jobId: queued.jobId, session: latest };
}

export const consultationRoutes: FastifyPluginAsync = async (app) => {
  app.post('/consultations', { preHandler: requireApiKey }, async (req, reply) => {
    const parsed = createSchema.parse(req.body);
    const session = await app.orchestrator.createSession(parsed);
    const { jobId, session: latest } = await enqueueProcessing(app, session);

    return reply.code(202).send({
      ok: true,
      data: {
        jobId,
        session: toSessionView(latest)
      }
    });
  });

  app.post('/consultations/process-audio', { preHandler: requireApiKey }, async (req, reply) => {
    const query = processAudioQuerySchema.parse(req.query);
    const content = audioBodyOf(req);
    if (!content) {
      return rejectNonAudioBody(req, reply);
    }

    const asset = await app.audioAssets.store(content, query.format);
    const session = await app.orchestrator.createSession({
      assetId: asset.assetId,
      patientName: query.patientName,
      title: query.title
    });
    const { jobId, session: latest } = await enqueueProcessing(app, session);

    return reply.code(202).send({
      ok: true,
      data: {
        jobId,
        asset,
        session: toSessionView(latest)
      }
    });
  });

  app.get('/consultations/:sessionId', { preHandler: requireApiKey }, async (req, reply) => {
    const { sessionId } = paramsSchema.parse(req.params);
    const session = await app.orchestrator.getSession(sessionId);

    return reply.send({
      ok: true,
      data: toSessionView(session)
    });
  });

  app.get('/consultations/:sessionId/transcript', { preHandler: requireApiKey }, async (req, reply) => {
    const { sessionId } = paramsSchema.parse(req.params);
    const session = await app.orchestrator.getSession(sessionId);
    const { transcript } = sessionProducts(session.state);

    if (!transcript) {
      return sendApiError(
        req,
        reply,
        'TRANSCRIPT_NOT_READY',
        `session ${sessionId} has no transcript yet (status ${session.state.status})`
      );
    }

    return reply.send({
      ok: true,
      data: {
        sessionId,
        transcript
      }
    });
  });

  app.get('/consultations/:sessionId/export', { preHandler: requireApiKey }, async (req, reply) => {
    const { sessionId } = paramsSchema.parse(req.params);
    const session = await app.orchestrator.getSession(sessionId);
    const { soapNote } = sessionProducts(session.state);

    if (!soapNote) {
      return sendApiError(
        req,
        reply,
        'SOAP_NOTE_NOT_READY',
        `session ${sessionId} has no SOAP note yet (status ${session.state.status})`
      );
    }

    return reply
      .header('content-type', 'application/json; charset=utf-8')
      .header('content-disposition', `attachment; filename="consultation_${sessionId}.json"`)
      .send(serializeStructuredExport(soapNote));
  });

  app.get('/consultations/:sessionId/events', { preHandler: requireApiKey }, async (req, reply) => {
    const { sessionId } = paramsSchema.parse(req.params);
    await app.orchestrator.getSession(sessionId);
    const events = await app.repositories.audit.listBySession(sessionId);

    return reply.send({
      ok: true,
      data: {
        sessionId,
        events
      }
    });
  });

  app.post('/consultations/:sessionId/retry', { preHandler: requireApiKey }, async (req, reply) => {
    const { sessionId } = paramsSchema.parse(req.params);
    const session = await app.orchestrator.requestRetry(sessionId);
    const { jobId, session: latest } = await enqueueProcessing(app, session);

    return reply.code(202).send({
      ok: true,
      data: {
        jobId,
        session: toSessionView(latest)
      }
    });
  });

  app.post('/consultations/:sessionId/cancel', { preHandler: requireApiKey }, async (req, reply) => {
    const { sessionId } = paramsSchema.parse(req.params);
    const session = await app.orchestrator.cancel(sessionId);

    return reply.code(202).send({
      ok: true,
      data: toSessionView(session)
    });
  });
};
