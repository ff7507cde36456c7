import { z } from 'zod';
import { describeError, isPipelineError, PipelineError } from '../lib/pipelineErrors.js';
import type { AudioAsset, Transcript, TranscriptSegment } from '../repositories/contracts.js';
import { boundedCall, waitFor } from './boundedCall.js';
import type { StageCallOptions } from './boundedCall.js';
import type { RawTranscriptionResult, TranscriptionCapability, TranscriptionRequest } from './capabilities.js';

const completedResultSchema = z.object({
  status: z.literal('completed'),
  text: z.string({ required_error: 'is missing' }),
  confidence: z.number().nullish(),
  audioDurationMs: z.number().nonnegative().nullish(),
  wordCount: z.number().int().nonnegative().nullish(),
  utterances: z
    .array(
      z.object({
        text: z.string({ required_error: 'is missing' }),
        speaker: z.string().nullish(),
        confidence: z.number().nullish(),
        startMs: z.number().nullish(),
        endMs: z.number().nullish()
      })
    )
    .nullish()
});

type CompletedResult = z.infer<typeof completedResultSchema>;

export type TranscriptionStageOptions = {
  timeoutMs: number;
  pollIntervalMs: number;
};

export interface TranscriptionStage {
  transcribe(asset: AudioAsset, content: Buffer, options?: StageCallOptions): Promise<Transcript>;
}

function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}

function toSegments(result: CompletedResult): TranscriptSegment[] {
  const utterances = result.utterances ?? [];
  if (utterances.length === 0) {
    const text = result.text.trim();
    return text
      ? [{ index: 0, text, speaker: null, confidence: result.confidence ?? null, startMs: null, endMs: null }]
      : [];
  }

  const kept = utterances
    .map((utterance) => ({ ...utterance, text: utterance.text.trim() }))
    .filter((utterance) => utterance.text.length > 0);

  if (kept.every((utterance) => typeof utterance.startMs === 'number')) {
    kept.sort((a, b) => (a.startMs ?? 0) - (b.startMs ?? 0));
  }

  return kept.map((utterance, index) => ({
    index,
    text: utterance.text,
    speaker: utterance.speaker ?? null,
    confidence: utterance.confidence ?? null,
    startMs: utterance.startMs ?? null,
    endMs: utterance.endMs ?? null
  }));
}

export function normalizeTranscription(raw: RawTranscriptionResult): Transcript {
  if (raw.status === 'error') {
    throw new PipelineError(
      'TRANSCRIPTION_FAILED',
      `transcription provider reported an error: ${raw.error ?? 'no details'}`,
      { stage: 'transcribing' }
    );
  }

  const parsed = completedResultSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new PipelineError(
      'TRANSCRIPTION_FAILED',
      `incomplete transcription response: ${issue.path.join('.') || 'result'} ${issue.message}`,
      { stage: 'transcribing' }
    );
  }

  const segments = toSegments(parsed.data);
  const text = parsed.data.text.trim() || segments.map((segment) => segment.text).join(' ');

  return {
    language: 'es',
    text,
    segments,
    confidence: parsed.data.confidence ?? null,
    audioDurationMs: parsed.data.audioDurationMs ?? null,
    wordCount: parsed.data.wordCount ?? countWords(text)
  };
}

export function createTranscriptionStage(
  capability: TranscriptionCapability,
  options: TranscriptionStageOptions
): TranscriptionStage {
  const run = async (request: TranscriptionRequest): Promise<RawTranscriptionResult> => {
    if (capability.kind === 'sync') {
      return capability.transcribe(request);
    }

    const { jobId } = await capability.submit(request);
    for (;;) {
      const result = await capability.poll(jobId, { signal: request.signal });
      if (result.status !== 'pending') {
        return result;
      }
      await waitFor(options.pollIntervalMs, 'transcribing', request.signal);
    }
  };

  return {
    async transcribe(asset, content, callOptions) {
      let raw: RawTranscriptionResult;
      try {
        raw = await boundedCall(
          (signal) =>
            run({
              audio: content,
              format: asset.format,
              mimeType: asset.mimeType,
              language: 'es',
              signal
            }),
          {
            stage: 'transcribing',
            timeoutMs: options.timeoutMs,
            signal: callOptions?.signal,
            label: `transcription via ${capability.name}`
          }
        );
      } catch (error) {
        if (isPipelineError(error)) {
          throw error.withStage('transcribing');
        }
        throw new PipelineError('TRANSCRIPTION_FAILED', `transcription failed: ${describeError(error)}`, {
          stage: 'transcribing',
          cause: error
        });
      }

      return normalizeTranscription(raw);
    }
  };
}
