import { setTimeout as sleep } from 'node:timers/promises';
import { isPipelineError, PipelineError } from '../lib/pipelineErrors.js';
import type { PipelineStage } from '../repositories/contracts.js';

export type StageCallOptions = {
  signal?: AbortSignal;
};

type BoundedCallOptions = {
  stage: PipelineStage;
  timeoutMs: number;
  signal?: AbortSignal;
  label: string;
};

function cancelledError(stage: PipelineStage, label: string) {
  return new PipelineError('CANCELLED', `${label} cancelled`, { stage });
}

/**
 * Runs `operation` with its own abort signal that fires when `timeoutMs` elapses or when
 * the caller's signal aborts. The returned promise settles as soon as either happens, even
 * if the operation ignores its signal.
 */
export async function boundedCall<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: BoundedCallOptions
): Promise<T> {
  const { stage, timeoutMs, signal, label } = options;
  if (signal?.aborted) {
    throw cancelledError(stage, label);
  }

  const controller = new AbortController();
  const abortReason = (): PipelineError | null => {
    const reason: unknown = controller.signal.reason;
    return controller.signal.aborted && isPipelineError(reason) ? reason : null;
  };

  const abortWith = (error: PipelineError) => {
    if (!controller.signal.aborted) {
      controller.abort(error);
    }
  };

  const onParentAbort = () => abortWith(cancelledError(stage, label));
  signal?.addEventListener('abort', onParentAbort, { once: true });

  const timer = setTimeout(() => {
    abortWith(new PipelineError('TIMEOUT', `${label} did not finish within ${timeoutMs}ms`, { stage }));
  }, timeoutMs);

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(abortReason()), { once: true });
  });

  try {
    return await Promise.race([operation(controller.signal), aborted]);
  } catch (error) {
    throw abortReason() ?? error;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onParentAbort);
  }
}

/** Waits `ms`, rejecting with CANCELLED when the signal aborts first. */
export async function waitFor(ms: number, stage: PipelineStage, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    if (signal?.aborted) {
      throw cancelledError(stage, 'wait');
    }
    return;
  }

  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw cancelledError(stage, 'wait');
    }
    throw error;
  }
}
