import { describe, expect, it } from 'vitest';
import { classifyStageFailure, resolveStageFailure } from '../src/pipeline/stageRetryPolicy.js';

describe('stage retry policy', () => {
  it('classifies provider outages and timeouts as retryable', () => {
    expect(classifyStageFailure('PROVIDER_UNAVAILABLE')).toBe('retryable');
    expect(classifyStageFailure('TIMEOUT')).toBe('retryable');
    expect(classifyStageFailure('MALFORMED_MODEL_OUTPUT')).toBe('non_retryable');
    expect(classifyStageFailure('TRANSCRIPTION_FAILED')).toBe('non_retryable');
    expect(classifyStageFailure('CANCELLED')).toBe('cancelled');
  });

  it('retries transient failures until the attempt budget is spent', () => {
    expect(resolveStageFailure(0, 'TIMEOUT')).toEqual({ transition: 'retry', attempts: 1 });
    expect(resolveStageFailure(1, 'TIMEOUT')).toEqual({ transition: 'retry', attempts: 2 });
    expect(resolveStageFailure(2, 'TIMEOUT')).toEqual({ transition: 'failed', attempts: 3 });
    expect(resolveStageFailure(0, 'PROVIDER_UNAVAILABLE', 1)).toEqual({ transition: 'failed', attempts: 1 });
  });

  it('fails definitive errors at once and never retries a cancellation', () => {
    expect(resolveStageFailure(0, 'EXTRACTION_FAILED')).toEqual({ transition: 'failed', attempts: 1 });
    expect(resolveStageFailure(1, 'CANCELLED')).toEqual({ transition: 'cancelled', attempts: 2 });
  });
});
