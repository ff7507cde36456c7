import type { PipelineStage } from '../repositories/contracts.js';

export type PipelineErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'AUDIO_CONTENT_REQUIRED'
  | 'AUDIO_TOO_LARGE'
  | 'AUDIO_ASSET_NOT_FOUND'
  | 'SESSION_NOT_FOUND'
  | 'SESSION_NOT_RETRYABLE'
  | 'SESSION_TERMINAL'
  | 'SESSION_CONFLICT'
  | 'PROVIDER_UNAVAILABLE'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'TRANSCRIPTION_FAILED'
  | 'EXTRACTION_FAILED'
  | 'MALFORMED_MODEL_OUTPUT'
  | 'GENERATION_FAILED';

const TRANSIENT_CODES = new Set<PipelineErrorCode>(['PROVIDER_UNAVAILABLE', 'TIMEOUT']);

const HTTP_STATUS_BY_CODE: Record<PipelineErrorCode, number> = {
  UNSUPPORTED_FORMAT: 400,
  AUDIO_CONTENT_REQUIRED: 400,
  AUDIO_TOO_LARGE: 413,
  AUDIO_ASSET_NOT_FOUND: 404,
  SESSION_NOT_FOUND: 404,
  SESSION_NOT_RETRYABLE: 409,
  SESSION_TERMINAL: 409,
  SESSION_CONFLICT: 409,
  PROVIDER_UNAVAILABLE: 503,
  TIMEOUT: 504,
  CANCELLED: 409,
  TRANSCRIPTION_FAILED: 502,
  EXTRACTION_FAILED: 502,
  MALFORMED_MODEL_OUTPUT: 502,
  GENERATION_FAILED: 502
};

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly stage: PipelineStage | null;

  constructor(code: PipelineErrorCode, message: string, options?: { stage?: PipelineStage; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PipelineError';
    this.code = code;
    this.stage = options?.stage ?? null;
  }

  get transient(): boolean {
    return TRANSIENT_CODES.has(this.code);
  }

  get statusCode(): number {
    return HTTP_STATUS_BY_CODE[this.code];
  }

  withStage(stage: PipelineStage): PipelineError {
    if (this.stage === stage) {
      return this;
    }
    return new PipelineError(this.code, this.message, { stage, cause: this.cause });
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
