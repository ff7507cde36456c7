import pino from 'pino';
import { createAudioAssetStore } from '../../src/pipeline/audioAssetStore.js';
import type { ProviderCapabilities } from '../../src/pipeline/capabilities.js';
import { createDocumentGenerationStage } from '../../src/pipeline/documentGenerationStage.js';
import { createConsultationOrchestrator } from '../../src/pipeline/orchestrator.js';
import type { RetryPolicy } from '../../src/pipeline/orchestrator.js';
import { createSoapExtractionStage } from '../../src/pipeline/soapExtractionStage.js';
import { createTranscriptionStage } from '../../src/pipeline/transcriptionStage.js';
import { createRepositories } from '../../src/repositories/index.js';

export const silentLogger = pino({ level: 'silent' });

export const FIXED_NOW = new Date('2026-03-14T09:05:00.000Z');

export type TestPipelineOptions = {
  timeoutMs?: number;
  policy?: Partial<RetryPolicy>;
};

export function createTestPipeline(capabilities: ProviderCapabilities, options: TestPipelineOptions = {}) {
  const timeoutMs = options.timeoutMs ?? 1_000;
  const now = () => FIXED_NOW;
  const repositories = createRepositories(null);
  const audioAssets = createAudioAssetStore(repositories.audioAssets, { maxBytes: 1024 });
  const stages = {
    transcription: createTranscriptionStage(capabilities.transcription, { timeoutMs, pollIntervalMs: 1 }),
    extraction: createSoapExtractionStage(capabilities.extraction, { timeoutMs }),
    document: createDocumentGenerationStage(capabilities.document, { timeoutMs, now })
  };
  const orchestrator = createConsultationOrchestrator({
    repositories,
    audioAssets,
    stages,
    policy: { maxAttempts: 3, retryDelayMs: 0, ...options.policy },
    logger: silentLogger,
    now
  });

  async function sessionFor(patientName?: string) {
    const asset = await audioAssets.store(Buffer.from('RIFF-test-audio'), 'wav');
    return orchestrator.createSession({ assetId: asset.assetId, patientName });
  }

  return { repositories, audioAssets, stages, orchestrator, sessionFor };
}
