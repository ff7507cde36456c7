import { z } from 'zod';
import { ACCEPTED_AUDIO_FORMATS, PIPELINE_STAGES } from './contracts.js';
import type { ConsultationSession, SessionState } from './contracts.js';

export const audioFormatSchema = z.enum(ACCEPTED_AUDIO_FORMATS);
export const pipelineStageSchema = z.enum(PIPELINE_STAGES);

export const transcriptSchema = z.object({
  language: z.literal('es'),
  text: z.string(),
  segments: z.array(
    z.object({
      index: z.number().int(),
      text: z.string(),
      speaker: z.string().nullable(),
      confidence: z.number().nullable(),
      startMs: z.number().nullable(),
      endMs: z.number().nullable()
    })
  ),
  confidence: z.number().nullable(),
  audioDurationMs: z.number().nullable(),
  wordCount: z.number().int()
});

export const soapNoteSchema = z.object({
  subjective: z.string(),
  objective: z.string(),
  assessment: z.string(),
  plan: z.string()
});

const documentArtifactSchema = z.object({
  documentId: z.string(),
  link: z.string(),
  title: z.string(),
  generatedAt: z.string()
});

const stageFailureSchema = z.object({
  stage: pipelineStageSchema,
  code: z.string(),
  reason: z.string(),
  attempts: z.number().int(),
  transient: z.boolean()
});

const stoppedAt = <S extends 'failed' | 'cancelled'>(status: S) => [
  z.object({ status: z.literal(status), stage: z.literal('transcribing') }),
  z.object({ status: z.literal(status), stage: z.literal('extracting'), transcript: transcriptSchema }),
  z.object({
    status: z.literal(status),
    stage: z.literal('generating_document'),
    transcript: transcriptSchema,
    soapNote: soapNoteSchema
  })
] as const;

const [failedAtTranscribing, failedAtExtracting, failedAtGenerating] = stoppedAt('failed');

export const sessionStateSchema = z.union([
  z.object({ status: z.literal('created') }),
  z.object({ status: z.literal('transcribing') }),
  z.object({ status: z.literal('extracting'), transcript: transcriptSchema }),
  z.object({ status: z.literal('generating_document'), transcript: transcriptSchema, soapNote: soapNoteSchema }),
  z.object({
    status: z.literal('completed'),
    transcript: transcriptSchema,
    soapNote: soapNoteSchema,
    document: documentArtifactSchema
  }),
  failedAtTranscribing.extend({ failure: stageFailureSchema }),
  failedAtExtracting.extend({ failure: stageFailureSchema }),
  failedAtGenerating.extend({ failure: stageFailureSchema }),
  ...stoppedAt('cancelled')
]);

const stageTimingSchema = z.object({
  startedAt: z.string(),
  finishedAt: z.string().nullable()
});

export const stageTimestampsSchema = z
  .object({
    transcribing: stageTimingSchema.optional(),
    extracting: stageTimingSchema.optional(),
    generating_document: stageTimingSchema.optional()
  })
  .default({});

export const stageAttemptsSchema = z
  .object({
    transcribing: z.number().int().optional(),
    extracting: z.number().int().optional(),
    generating_document: z.number().int().optional()
  })
  .default({});

export function parseSessionState(value: unknown): SessionState {
  return sessionStateSchema.parse(value);
}

export function parseStageTimestamps(value: unknown): ConsultationSession['stageTimestamps'] {
  return stageTimestampsSchema.parse(value);
}

export function parseStageAttempts(value: unknown): ConsultationSession['stageAttempts'] {
  return stageAttemptsSchema.parse(value);
}
