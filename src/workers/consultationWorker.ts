import type { ConsultationOrchestrator, PipelineLogger } from '../pipeline/orchestrator.js';
import type { ConsultationJob } from '../queue/consultationQueue.js';
import type { SessionStatus } from '../repositories/contracts.js';

export type ConsultationOutcome = {
  sessionId: string;
  status: SessionStatus;
};

export function createConsultationWorker(orchestrator: ConsultationOrchestrator, logger: PipelineLogger) {
  return async (job: ConsultationJob): Promise<ConsultationOutcome> => {
    try {
      const session = await orchestrator.process(job.sessionId);
      return { sessionId: session.sessionId, status: session.state.status };
    } catch (error) {
      logger.error(
        {
          sessionId: job.sessionId,
          error: error instanceof Error ? error.message : 'unknown error'
        },
        'pipeline.worker_failed'
      );
      throw error;
    }
  };
}
