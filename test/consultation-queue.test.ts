import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { randomUUID } from 'node:crypto';
import { consultationJobId, createConsultationQueue } from '../src/queue/consultationQueue.js';
import { createConsultationWorker } from '../src/workers/consultationWorker.js';
import { recordingDocuments, reply, scriptedExtraction, scriptedTranscription, SOAP_RESPONSE } from './helpers/fakeCapabilities.js';
import { createTestPipeline, silentLogger } from './helpers/pipeline.js';

describe('consultation queue', () => {
  beforeEach(() => {
    delete process.env.REDIS_URL;
  });

  afterEach(() => {
    delete process.env.REDIS_URL;
  });

  it('names jobs by session and version', () => {
    expect(consultationJobId({ sessionId: 'sess-1', version: 4 })).toBe('sess-1-v4');
  });

  it('builds job ids BullMQ accepts as custom ids', () => {
    const jobId = consultationJobId({ sessionId: randomUUID(), version: 1 });

    // custom ids may only contain ':' when they split into exactly three parts
    expect(jobId.split(':')).toHaveLength(1);
    expect(jobId).toMatch(/^[0-9a-f-]{36}-v1$/);
  });

  it('processes sessions inline without Redis', async () => {
    const pipeline = createTestPipeline({
      transcription: scriptedTranscription(reply({ status: 'completed', text: 'Tos seca' })).capability,
      extraction: scriptedExtraction(reply(SOAP_RESPONSE)).capability,
      document: recordingDocuments().capability
    });
    const queue = createConsultationQueue({ logger: silentLogger });
    queue.registerProcessor(createConsultationWorker(pipeline.orchestrator, silentLogger));
    const created = await pipeline.sessionFor();

    const result = await queue.enqueue({ sessionId: created.sessionId, version: created.version });

    expect(queue.mode).toBe('in_memory');
    expect(result).toEqual({ queued: true, jobId: `${created.sessionId}-v1` });
    await expect(pipeline.orchestrator.getSession(created.sessionId)).resolves.toMatchObject({
      state: { status: 'completed' }
    });
    await queue.close();
  });

  it('stays in-process when forced even with REDIS_URL set', () => {
    process.env.REDIS_URL = 'redis://127.0.0.1:6399';

    expect(createConsultationQueue({ logger: silentLogger, forceInMemory: true }).mode).toBe('in_memory');
  });

  it('propagates worker failures for unknown sessions', async () => {
    const pipeline = createTestPipeline({
      transcription: scriptedTranscription(reply({ status: 'completed', text: '' })).capability,
      extraction: scriptedExtraction(reply(SOAP_RESPONSE)).capability,
      document: recordingDocuments().capability
    });
    const worker = createConsultationWorker(pipeline.orchestrator, silentLogger);

    await expect(worker({ sessionId: 'missing', version: 1 })).rejects.toMatchObject({ code: 'SESSION_NOT_FOUND' });
  });
});
