import { describe, expect, it } from 'vitest';
import { reentryState, toSessionView } from '../src/pipeline/sessionState.js';
import { parseSessionState, parseStageAttempts } from '../src/repositories/schemas.js';
import type { ConsultationSession, SoapNote, Transcript } from '../src/repositories/contracts.js';

const transcript: Transcript = {
  language: 'es',
  text: 'Dolor lumbar',
  segments: [{ index: 0, text: 'Dolor lumbar', speaker: null, confidence: null, startMs: null, endMs: null }],
  confidence: null,
  audioDurationMs: 3000,
  wordCount: 2
};

const soapNote: SoapNote = { subjective: 'Dolor lumbar', objective: '', assessment: '', plan: '' };

describe('session state', () => {
  it('reads stored states back as tagged variants', () => {
    const stored = {
      status: 'failed',
      stage: 'generating_document',
      transcript,
      soapNote,
      failure: { stage: 'generating_document', code: 'TIMEOUT', reason: 'slow', attempts: 3, transient: true }
    };

    expect(parseSessionState(JSON.parse(JSON.stringify(stored)))).toEqual(stored);
  });

  it('refuses stored states that skip a product', () => {
    expect(() => parseSessionState({ status: 'completed', transcript, document: {} })).toThrow();
    expect(() => parseSessionState({ status: 'generating_document', soapNote })).toThrow();
    expect(() => parseSessionState({ status: 'cancelled', stage: 'extracting' })).toThrow();
  });

  it('defaults missing attempt counters to an empty record', () => {
    expect(parseStageAttempts(undefined)).toEqual({});
  });

  it('re-enters the stage a session stopped at with its earlier products', () => {
    expect(reentryState({ stage: 'transcribing' })).toEqual({ status: 'created' });
    expect(reentryState({ stage: 'generating_document', transcript, soapNote })).toEqual({
      status: 'generating_document',
      transcript,
      soapNote
    });
  });

  it('summarizes the transcript and names the stopped stage in the session view', () => {
    const session: ConsultationSession = {
      sessionId: 'sess-1',
      assetId: 'asset-1',
      title: 'Nota',
      patientName: null,
      state: { status: 'cancelled', stage: 'extracting', transcript },
      stageTimestamps: {},
      stageAttempts: { transcribing: 1 },
      cancelRequestedAt: '2026-03-14T09:05:00.000Z',
      version: 4,
      createdAt: '2026-03-14T09:00:00.000Z',
      updatedAt: '2026-03-14T09:05:00.000Z'
    };

    expect(toSessionView(session)).toMatchObject({
      status: 'cancelled',
      stage: 'extracting',
      failure: null,
      transcript: { segmentCount: 1, wordCount: 2, confidence: null, audioDurationMs: 3000 },
      soapNote: null,
      document: null
    });
  });
});
