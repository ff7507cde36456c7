import type { AudioFormat } from '../repositories/contracts.js';

export type TranscriptionRequest = {
  audio: Buffer;
  format: AudioFormat;
  mimeType: string;
  language: 'es';
  signal: AbortSignal;
};

export type RawUtterance = {
  text?: string | null;
  speaker?: string | null;
  confidence?: number | null;
  startMs?: number | null;
  endMs?: number | null;
};

export type RawTranscriptionResult = {
  status: 'completed' | 'error';
  text?: string | null;
  error?: string | null;
  confidence?: number | null;
  audioDurationMs?: number | null;
  wordCount?: number | null;
  utterances?: RawUtterance[] | null;
};

export type TranscriptionPoll = RawTranscriptionResult | { status: 'pending' };

export interface SyncTranscriptionCapability {
  readonly kind: 'sync';
  readonly name: string;
  transcribe(request: TranscriptionRequest): Promise<RawTranscriptionResult>;
}

export interface AsyncTranscriptionCapability {
  readonly kind: 'async';
  readonly name: string;
  submit(request: TranscriptionRequest): Promise<{ jobId: string }>;
  poll(jobId: string, options: { signal: AbortSignal }): Promise<TranscriptionPoll>;
}

export type TranscriptionCapability = SyncTranscriptionCapability | AsyncTranscriptionCapability;

export type ExtractionRequest = {
  instruction: string;
  transcript: string;
  signal: AbortSignal;
};

export interface ExtractionCapability {
  readonly name: string;
  complete(request: ExtractionRequest): Promise<string>;
}

export type RenderedSection = {
  key: 'subjective' | 'objective' | 'assessment' | 'plan';
  heading: string;
  body: string;
};

export type DocumentRequest = {
  title: string;
  sessionId: string;
  sections: RenderedSection[];
  signal: AbortSignal;
};

export type DocumentReference = {
  documentId: string;
  link: string;
};

export interface DocumentCapability {
  readonly name: string;
  createDocument(request: DocumentRequest): Promise<DocumentReference>;
}

export type ProviderCapabilities = {
  transcription: TranscriptionCapability;
  extraction: ExtractionCapability;
  document: DocumentCapability;
};
