import type { PipelineErrorCode } from '../lib/pipelineErrors.js';

export const DEFAULT_MAX_STAGE_ATTEMPTS = 3;

export type StageFailureClassification = 'retryable' | 'non_retryable' | 'cancelled';
export type StageFailureTransition = 'retry' | 'failed' | 'cancelled';

const RETRYABLE_CODES = new Set<PipelineErrorCode>(['PROVIDER_UNAVAILABLE', 'TIMEOUT']);

export function classifyStageFailure(code: PipelineErrorCode): StageFailureClassification {
  if (code === 'CANCELLED') {
    return 'cancelled';
  }

  return RETRYABLE_CODES.has(code) ? 'retryable' : 'non_retryable';
}

export function resolveStageFailure(
  attemptsSoFar: number,
  code: PipelineErrorCode,
  maxAttempts = DEFAULT_MAX_STAGE_ATTEMPTS
): { transition: StageFailureTransition; attempts: number } {
  const attempts = attemptsSoFar + 1;
  const classification = classifyStageFailure(code);

  if (classification === 'cancelled') {
    return { transition: 'cancelled', attempts };
  }

  if (classification === 'non_retryable' || attempts >= maxAttempts) {
    return { transition: 'failed', attempts };
  }

  return { transition: 'retry', attempts };
}
