import { GoogleGenAI } from '@google/genai';
import type { GenerateContentParameters, GenerateContentResponse } from '@google/genai';
import { describeError, PipelineError } from '../lib/pipelineErrors.js';
import type { ExtractionCapability } from '../pipeline/capabilities.js';

const PROVIDER = 'Gemini';

export type GeminiClient = {
  models: {
    generateContent(params: GenerateContentParameters): Promise<GenerateContentResponse>;
  };
};

export type GeminiOptions = {
  apiKey: string;
  model: string;
  client?: GeminiClient;
};

function statusOf(error: unknown): number | undefined {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function toExtractionError(error: unknown): PipelineError {
  const status = statusOf(error);
  if (status === 429 || (status !== undefined && status >= 500)) {
    return new PipelineError('PROVIDER_UNAVAILABLE', `${PROVIDER} responded with status ${status}`, { cause: error });
  }
  if (status === undefined && error instanceof TypeError) {
    return new PipelineError('PROVIDER_UNAVAILABLE', `${PROVIDER} is unreachable: ${describeError(error)}`, {
      cause: error
    });
  }
  return new PipelineError('EXTRACTION_FAILED', `${PROVIDER} rejected the request: ${describeError(error)}`, {
    cause: error
  });
}

export function createGeminiExtraction(options: GeminiOptions): ExtractionCapability {
  const client = options.client ?? new GoogleGenAI({ apiKey: options.apiKey });

  return {
    name: `${PROVIDER} ${options.model}`,

    async complete({ instruction, transcript, signal }) {
      let response: GenerateContentResponse;
      try {
        response = await client.models.generateContent({
          model: options.model,
          contents: `TRANSCRIPCIÓN:\n${transcript}`,
          config: {
            systemInstruction: instruction,
            temperature: 0.1,
            topP: 0.95,
            topK: 40,
            maxOutputTokens: 2048,
            responseMimeType: 'application/json',
            abortSignal: signal
          }
        });
      } catch (error) {
        if (signal.aborted) {
          throw error;
        }
        throw toExtractionError(error);
      }

      const blockReason = response.promptFeedback?.blockReason;
      if (blockReason) {
        throw new PipelineError('EXTRACTION_FAILED', `${PROVIDER} blocked the request: ${blockReason}`);
      }

      const text = response.text ?? '';
      if (!text.trim()) {
        throw new PipelineError('EXTRACTION_FAILED', `${PROVIDER} returned no text`);
      }
      return text;
    }
  };
}
