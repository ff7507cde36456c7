import { describeError, PipelineError } from '../lib/pipelineErrors.js';
import type { PipelineErrorCode } from '../lib/pipelineErrors.js';

export type ProviderRequestOptions = {
  provider: string;
  failureCode: PipelineErrorCode;
};

const MAX_ERROR_DETAIL_LENGTH = 200;

export async function requestJson(
  url: string,
  init: RequestInit & { signal: AbortSignal },
  options: ProviderRequestOptions
): Promise<unknown> {
  const { provider, failureCode } = options;

  let response: Response;
  try {
    response = await fetch(url, init);
  } catch (error) {
    if (init.signal.aborted) {
      throw error;
    }
    throw new PipelineError('PROVIDER_UNAVAILABLE', `${provider} is unreachable: ${describeError(error)}`, {
      cause: error
    });
  }

  if (response.status === 429 || response.status >= 500) {
    throw new PipelineError('PROVIDER_UNAVAILABLE', `${provider} responded with status ${response.status}`);
  }

  if (!response.ok) {
    const detail = await response.text().catch(() => 'no response body');
    throw new PipelineError(
      failureCode,
      `${provider} rejected the request (${response.status}): ${detail.slice(0, MAX_ERROR_DETAIL_LENGTH)}`
    );
  }

  try {
    return await response.json();
  } catch (error) {
    throw new PipelineError(failureCode, `${provider} returned a body that is not JSON`, { cause: error });
  }
}
