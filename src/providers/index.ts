import { env } from '../config/env.js';
import { PipelineError } from '../lib/pipelineErrors.js';
import type { PipelineErrorCode } from '../lib/pipelineErrors.js';
import type {
  ExtractionCapability,
  ProviderCapabilities,
  SyncTranscriptionCapability
} from '../pipeline/capabilities.js';
import type { PipelineLogger } from '../pipeline/orchestrator.js';
import { createAssemblyAiTranscription } from './assemblyAi.js';
import { createGeminiExtraction } from './gemini.js';
import { createLocalDocumentWriter } from './localDocuments.js';

function notConfigured(variable: string, code: PipelineErrorCode) {
  return () => Promise.reject(new PipelineError(code, `${variable} is not configured`));
}

function unconfiguredTranscription(): SyncTranscriptionCapability {
  return { kind: 'sync', name: 'unconfigured', transcribe: notConfigured('ASSEMBLYAI_API_KEY', 'TRANSCRIPTION_FAILED') };
}

function unconfiguredExtraction(): ExtractionCapability {
  return { name: 'unconfigured', complete: notConfigured('GEMINI_API_KEY', 'EXTRACTION_FAILED') };
}

export function createProviderCapabilities(
  logger: PipelineLogger,
  overrides: Partial<ProviderCapabilities> = {}
): ProviderCapabilities {
  let transcription = overrides.transcription;
  if (!transcription) {
    if (env.ASSEMBLYAI_API_KEY) {
      transcription = createAssemblyAiTranscription({
        apiKey: env.ASSEMBLYAI_API_KEY,
        baseUrl: env.ASSEMBLYAI_BASE_URL
      });
    } else {
      logger.warn('ASSEMBLYAI_API_KEY is not configured; transcription stages will fail');
      transcription = unconfiguredTranscription();
    }
  }

  let extraction = overrides.extraction;
  if (!extraction) {
    if (env.GEMINI_API_KEY) {
      extraction = createGeminiExtraction({
        apiKey: env.GEMINI_API_KEY,
        model: env.GEMINI_MODEL
      });
    } else {
      logger.warn('GEMINI_API_KEY is not configured; SOAP extraction stages will fail');
      extraction = unconfiguredExtraction();
    }
  }

  return {
    transcription,
    extraction,
    document: overrides.document ?? createLocalDocumentWriter({ directory: env.DOCUMENTS_DIR })
  };
}
