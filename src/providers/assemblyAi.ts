import { z } from 'zod';
import { PipelineError } from '../lib/pipelineErrors.js';
import type {
  AsyncTranscriptionCapability,
  TranscriptionPoll,
  TranscriptionRequest
} from '../pipeline/capabilities.js';
import { requestJson } from './http.js';

const PROVIDER = 'AssemblyAI';

const uploadResponseSchema = z.object({ upload_url: z.string().url() });
const submitResponseSchema = z.object({ id: z.string().min(1) });

const transcriptResponseSchema = z.object({
  status: z.enum(['queued', 'processing', 'completed', 'error']),
  text: z.string().nullish(),
  error: z.string().nullish(),
  confidence: z.number().nullish(),
  audio_duration: z.number().nullish(),
  words: z.array(z.unknown()).nullish(),
  utterances: z
    .array(
      z.object({
        speaker: z.string().nullish(),
        text: z.string().nullish(),
        confidence: z.number().nullish(),
        start: z.number().nullish(),
        end: z.number().nullish()
      })
    )
    .nullish()
});

type TranscriptResponse = z.infer<typeof transcriptResponseSchema>;

export type AssemblyAiOptions = {
  apiKey: string;
  baseUrl: string;
};

function parseResponse<S extends z.ZodTypeAny>(schema: S, body: unknown, what: string): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new PipelineError('TRANSCRIPTION_FAILED', `${PROVIDER} returned an unexpected ${what} response`);
  }
  return parsed.data;
}

export function toTranscriptionPoll(response: TranscriptResponse): TranscriptionPoll {
  switch (response.status) {
    case 'queued':
    case 'processing':
      return { status: 'pending' };
    case 'error':
      return { status: 'error', error: response.error ?? null };
    case 'completed':
      return {
        status: 'completed',
        text: response.text,
        confidence: response.confidence,
        audioDurationMs: typeof response.audio_duration === 'number' ? Math.round(response.audio_duration * 1000) : null,
        wordCount: response.words ? response.words.length : null,
        utterances: response.utterances?.map((utterance) => ({
          speaker: utterance.speaker,
          text: utterance.text,
          confidence: utterance.confidence,
          startMs: utterance.start,
          endMs: utterance.end
        }))
      };
  }
}

/** AssemblyAI's upload + submit + poll flow. */
export function createAssemblyAiTranscription(options: AssemblyAiOptions): AsyncTranscriptionCapability {
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const headers = { authorization: options.apiKey };

  return {
    kind: 'async',
    name: PROVIDER,

    async submit(request: TranscriptionRequest) {
      const uploaded = parseResponse(
        uploadResponseSchema,
        await requestJson(
          `${baseUrl}/v2/upload`,
          {
            method: 'POST',
            headers: { ...headers, 'content-type': 'application/octet-stream' },
            body: new Blob([new Uint8Array(request.audio)], { type: request.mimeType }),
            signal: request.signal
          },
          { provider: PROVIDER, failureCode: 'TRANSCRIPTION_FAILED' }
        ),
        'upload'
      );

      const submitted = parseResponse(
        submitResponseSchema,
        await requestJson(
          `${baseUrl}/v2/transcript`,
          {
            method: 'POST',
            headers: { ...headers, 'content-type': 'application/json' },
            body: JSON.stringify({
              audio_url: uploaded.upload_url,
              language_code: request.language,
              punctuate: true,
              format_text: true,
              speaker_labels: true
            }),
            signal: request.signal
          },
          { provider: PROVIDER, failureCode: 'TRANSCRIPTION_FAILED' }
        ),
        'submit'
      );

      return { jobId: submitted.id };
    },

    async poll(jobId, { signal }) {
      const body = await requestJson(
        `${baseUrl}/v2/transcript/${encodeURIComponent(jobId)}`,
        { method: 'GET', headers, signal },
        { provider: PROVIDER, failureCode: 'TRANSCRIPTION_FAILED' }
      );
      return toTranscriptionPoll(parseResponse(transcriptResponseSchema, body, 'transcript'));
    }
  };
}
