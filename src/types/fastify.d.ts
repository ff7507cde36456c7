import 'fastify';
import type { AudioAssetStore } from '../pipeline/audioAssetStore.js';
import type { ConsultationOrchestrator, PipelineStages } from '../pipeline/orchestrator.js';
import type { ConsultationQueue } from '../queue/consultationQueue.js';
import type { RepositoryBundle } from '../repositories/contracts.js';

declare module 'fastify' {
  interface FastifyInstance {
    repositories: RepositoryBundle;
    consultationQueue: ConsultationQueue;
    audioAssets: AudioAssetStore;
    pipelineStages: PipelineStages;
    orchestrator: ConsultationOrchestrator;
  }
}
