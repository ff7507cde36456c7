import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import { describeError, isPipelineError, PipelineError } from '../lib/pipelineErrors.js';
import type { PipelineErrorCode } from '../lib/pipelineErrors.js';
import type {
  ConsultationSession,
  PipelineStage,
  RepositoryBundle,
  SessionTransition,
  StageFailure,
  StageProducts
} from '../repositories/contracts.js';
import type { AudioAssetStore } from './audioAssetStore.js';
import { waitFor } from './boundedCall.js';
import type { DocumentGenerationStage } from './documentGenerationStage.js';
import { defaultDocumentTitle } from './documentGenerationStage.js';
import { currentStage, isTerminal, productsOf, reentryState } from './sessionState.js';
import type { ActiveState } from './sessionState.js';
import type { SoapExtractionStage } from './soapExtractionStage.js';
import { resolveStageFailure } from './stageRetryPolicy.js';
import type { StageFailureTransition } from './stageRetryPolicy.js';
import type { TranscriptionStage } from './transcriptionStage.js';

export type PipelineLogger = Pick<FastifyBaseLogger, 'info' | 'warn' | 'error'>;

export type PipelineStages = {
  transcription: TranscriptionStage;
  extraction: SoapExtractionStage;
  document: DocumentGenerationStage;
};

export type RetryPolicy = {
  maxAttempts: number;
  retryDelayMs: number;
};

export type ConsultationOrchestratorDeps = {
  repositories: RepositoryBundle;
  audioAssets: AudioAssetStore;
  stages: PipelineStages;
  policy: RetryPolicy;
  logger: PipelineLogger;
  now?: () => Date;
};

export type CreateSessionInput = {
  assetId: string;
  patientName?: string | null;
  title?: string | null;
};

export interface ConsultationOrchestrator {
  createSession(input: CreateSessionInput): Promise<ConsultationSession>;
  getSession(sessionId: string): Promise<ConsultationSession>;
  /** Drives the session from its current state to a terminal one. */
  process(sessionId: string): Promise<ConsultationSession>;
  /** Re-enters the stage a failed or cancelled session stopped at. Processing is left to the caller. */
  requestRetry(sessionId: string): Promise<ConsultationSession>;
  cancel(sessionId: string): Promise<ConsultationSession>;
  isProcessing(sessionId: string): boolean;
}

type StageOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; transition: Exclude<StageFailureTransition, 'retry'>; error: PipelineError; attempts: number };

const STAGE_FAILURE_CODES: Record<PipelineStage, PipelineErrorCode> = {
  transcribing: 'TRANSCRIPTION_FAILED',
  extracting: 'EXTRACTION_FAILED',
  generating_document: 'GENERATION_FAILED'
};

const MAX_COMMIT_ATTEMPTS = 3;

function toStageError(error: unknown, stage: PipelineStage): PipelineError {
  if (isPipelineError(error)) {
    return error.withStage(stage);
  }
  return new PipelineError(STAGE_FAILURE_CODES[stage], describeError(error), { stage, cause: error });
}

export function createConsultationOrchestrator(deps: ConsultationOrchestratorDeps): ConsultationOrchestrator {
  const { repositories, audioAssets, stages, policy, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const inflight = new Map<string, AbortController>();

  const timestamp = () => now().toISOString();

  async function load(sessionId: string): Promise<ConsultationSession> {
    const session = await repositories.sessions.getById(sessionId);
    if (!session) {
      throw new PipelineError('SESSION_NOT_FOUND', `session not found: ${sessionId}`);
    }
    return session;
  }

  async function audit(sessionId: string, eventType: string, payload: Record<string, unknown>) {
    await repositories.audit.insert({
      eventId: randomUUID(),
      sessionId,
      eventType,
      actor: 'system',
      payload
    });
  }

  /**
   * Writes `next` as one compare-and-set. A concurrent cancellation request only sets
   * `cancelRequestedAt`, so a conflict whose stored status is unchanged is re-applied on top of it.
   */
  async function commit(
    session: ConsultationSession,
    build: (current: ConsultationSession) => SessionTransition
  ): Promise<ConsultationSession> {
    let current = session;
    for (let attempt = 0; attempt < MAX_COMMIT_ATTEMPTS; attempt += 1) {
      const updated = await repositories.sessions.transition(current.sessionId, current.version, build(current));
      if (updated) {
        return updated;
      }

      const latest = await load(current.sessionId);
      if (latest.state.status !== current.state.status) {
        break;
      }
      current = latest;
    }

    throw new PipelineError(
      'SESSION_CONFLICT',
      `session ${session.sessionId} was modified concurrently while in ${session.state.status}`
    );
  }

  function finishStage(
    current: ConsultationSession,
    stage: PipelineStage,
    attempts: number
  ): Pick<SessionTransition, 'stageTimestamps' | 'stageAttempts'> {
    const at = timestamp();
    return {
      stageTimestamps: {
        ...current.stageTimestamps,
        [stage]: { startedAt: current.stageTimestamps[stage]?.startedAt ?? at, finishedAt: at }
      },
      stageAttempts: { ...current.stageAttempts, [stage]: attempts }
    };
  }

  async function runStage<T>(
    session: ConsultationSession,
    stage: PipelineStage,
    signal: AbortSignal,
    call: (signal: AbortSignal) => Promise<T>
  ): Promise<StageOutcome<T>> {
    let attempts = session.stageAttempts[stage] ?? 0;

    for (;;) {
      try {
        const value = await call(signal);
        return { ok: true, value, attempts: attempts + 1 };
      } catch (caught) {
        const error = toStageError(caught, stage);
        const resolution = resolveStageFailure(attempts, error.code, policy.maxAttempts);
        attempts = resolution.attempts;

        if (resolution.transition !== 'retry') {
          return { ok: false, transition: resolution.transition, error, attempts };
        }

        logger.warn(
          { sessionId: session.sessionId, stage, code: error.code, attempt: attempts, maxAttempts: policy.maxAttempts },
          'pipeline.stage_attempt_failed'
        );
        await audit(session.sessionId, 'stage_attempt_failed', {
          stage,
          attempt: attempts,
          code: error.code,
          reason: error.message
        });

        try {
          await waitFor(policy.retryDelayMs, stage, signal);
        } catch (waitError) {
          return { ok: false, transition: 'cancelled', error: toStageError(waitError, stage), attempts };
        }
      }
    }
  }

  async function stopAt(
    session: ConsultationSession,
    products: StageProducts,
    outcome: Extract<StageOutcome<unknown>, { ok: false }>
  ): Promise<ConsultationSession> {
    const { stage } = products;

    if (outcome.transition === 'cancelled') {
      const updated = await commit(session, (current) => ({
        ...finishStage(current, stage, outcome.attempts),
        state: { status: 'cancelled', ...products },
        cancelRequestedAt: current.cancelRequestedAt ?? timestamp()
      }));
      logger.info({ sessionId: session.sessionId, stage }, 'pipeline.session_cancelled');
      await audit(session.sessionId, 'session_cancelled', { stage });
      return updated;
    }

    const failure: StageFailure = {
      stage,
      code: outcome.error.code,
      reason: outcome.error.message,
      attempts: outcome.attempts,
      transient: outcome.error.transient
    };
    const updated = await commit(session, (current) => ({
      ...finishStage(current, stage, outcome.attempts),
      state: { status: 'failed', failure, ...products },
      cancelRequestedAt: current.cancelRequestedAt
    }));
    logger.error({ sessionId: session.sessionId, failure }, 'pipeline.session_failed');
    await audit(session.sessionId, 'session_failed', { ...failure });
    return updated;
  }

  async function cancelBeforeStage(session: ConsultationSession, state: ActiveState): Promise<ConsultationSession> {
    const products = productsOf(state);
    const updated = await commit(session, (current) => ({
      state: { status: 'cancelled', ...products },
      stageTimestamps: current.stageTimestamps,
      stageAttempts: current.stageAttempts,
      cancelRequestedAt: current.cancelRequestedAt ?? timestamp()
    }));
    logger.info({ sessionId: session.sessionId, stage: products.stage }, 'pipeline.session_cancelled');
    await audit(session.sessionId, 'session_cancelled', { stage: products.stage, beforeStageStarted: true });
    return updated;
  }

  function stageIsOpen(session: ConsultationSession, stage: PipelineStage) {
    const timing = session.stageTimestamps[stage];
    return timing !== undefined && timing.finishedAt === null;
  }

  async function beginStage(session: ConsultationSession, stage: PipelineStage): Promise<ConsultationSession> {
    const updated = await commit(session, (current) => ({
      state: current.state,
      stageTimestamps: { ...current.stageTimestamps, [stage]: { startedAt: timestamp(), finishedAt: null } },
      stageAttempts: current.stageAttempts,
      cancelRequestedAt: current.cancelRequestedAt
    }));
    logger.info({ sessionId: session.sessionId, stage }, 'pipeline.stage_started');
    await audit(session.sessionId, 'stage_started', { stage });
    return updated;
  }

  async function enterTranscription(session: ConsultationSession): Promise<ConsultationSession> {
    return commit(session, (current) => ({
      state: { status: 'transcribing' },
      stageTimestamps: current.stageTimestamps,
      stageAttempts: current.stageAttempts,
      cancelRequestedAt: current.cancelRequestedAt
    }));
  }

  async function runTranscription(session: ConsultationSession, signal: AbortSignal) {
    const outcome = await runStage(session, 'transcribing', signal, async (stageSignal) => {
      const asset = await audioAssets.retrieve(session.assetId);
      const content = await audioAssets.readContent(session.assetId);
      return stages.transcription.transcribe(asset, content, { signal: stageSignal });
    });

    if (!outcome.ok) {
      return stopAt(session, { stage: 'transcribing' }, outcome);
    }

    const transcript = outcome.value;
    const updated = await commit(session, (current) => ({
      ...finishStage(current, 'transcribing', outcome.attempts),
      state: { status: 'extracting', transcript },
      cancelRequestedAt: current.cancelRequestedAt
    }));
    logger.info(
      { sessionId: session.sessionId, stage: 'transcribing', segments: transcript.segments.length },
      'pipeline.stage_succeeded'
    );
    await audit(session.sessionId, 'stage_succeeded', {
      stage: 'transcribing',
      attempts: outcome.attempts,
      segmentCount: transcript.segments.length,
      wordCount: transcript.wordCount
    });
    return updated;
  }

  async function runExtraction(
    session: ConsultationSession,
    state: Extract<ActiveState, { status: 'extracting' }>,
    signal: AbortSignal
  ) {
    const { transcript } = state;
    const outcome = await runStage(session, 'extracting', signal, (stageSignal) =>
      stages.extraction.extract(transcript, { signal: stageSignal })
    );

    if (!outcome.ok) {
      return stopAt(session, { stage: 'extracting', transcript }, outcome);
    }

    const soapNote = outcome.value;
    const updated = await commit(session, (current) => ({
      ...finishStage(current, 'extracting', outcome.attempts),
      state: { status: 'generating_document', transcript, soapNote },
      cancelRequestedAt: current.cancelRequestedAt
    }));
    logger.info({ sessionId: session.sessionId, stage: 'extracting' }, 'pipeline.stage_succeeded');
    await audit(session.sessionId, 'stage_succeeded', { stage: 'extracting', attempts: outcome.attempts });
    return updated;
  }

  async function runDocumentGeneration(
    session: ConsultationSession,
    state: Extract<ActiveState, { status: 'generating_document' }>,
    signal: AbortSignal
  ) {
    const { transcript, soapNote } = state;
    const outcome = await runStage(session, 'generating_document', signal, (stageSignal) =>
      stages.document.generate(soapNote, { sessionId: session.sessionId, title: session.title }, { signal: stageSignal })
    );

    if (!outcome.ok) {
      return stopAt(session, { stage: 'generating_document', transcript, soapNote }, outcome);
    }

    const document = outcome.value;
    const updated = await commit(session, (current) => ({
      ...finishStage(current, 'generating_document', outcome.attempts),
      state: { status: 'completed', transcript, soapNote, document },
      cancelRequestedAt: current.cancelRequestedAt
    }));
    logger.info(
      { sessionId: session.sessionId, stage: 'generating_document', documentId: document.documentId },
      'pipeline.session_completed'
    );
    await audit(session.sessionId, 'session_completed', { documentId: document.documentId, link: document.link });
    return updated;
  }

  async function drive(sessionId: string, signal: AbortSignal): Promise<ConsultationSession> {
    let session = await load(sessionId);

    for (;;) {
      const { state } = session;
      if (isTerminal(state)) {
        return session;
      }

      // a stage whose result is already recorded is never undone; cancellation takes effect here
      if (session.cancelRequestedAt || signal.aborted) {
        return cancelBeforeStage(session, state);
      }

      if (state.status === 'created') {
        session = await enterTranscription(session);
        continue;
      }

      // stamped after the cancellation check; a stage cancelled before it runs has no start
      const stage = currentStage(state);
      if (!stageIsOpen(session, stage)) {
        session = await beginStage(session, stage);
      }

      switch (state.status) {
        case 'transcribing':
          session = await runTranscription(session, signal);
          break;
        case 'extracting':
          session = await runExtraction(session, state, signal);
          break;
        case 'generating_document':
          session = await runDocumentGeneration(session, state, signal);
          break;
      }
    }
  }

  return {
    async createSession(input) {
      const asset = await audioAssets.retrieve(input.assetId);
      const patientName = input.patientName?.trim() || null;
      const session = await repositories.sessions.insert({
        sessionId: randomUUID(),
        assetId: asset.assetId,
        title: input.title?.trim() || defaultDocumentTitle(patientName, now()),
        patientName
      });

      logger.info({ sessionId: session.sessionId, assetId: asset.assetId }, 'pipeline.session_created');
      await audit(session.sessionId, 'session_created', { assetId: asset.assetId, format: asset.format });
      return session;
    },

    getSession: load,

    async process(sessionId) {
      if (inflight.has(sessionId)) {
        return load(sessionId);
      }

      const controller = new AbortController();
      inflight.set(sessionId, controller);
      try {
        return await drive(sessionId, controller.signal);
      } finally {
        inflight.delete(sessionId);
      }
    },

    async requestRetry(sessionId) {
      const session = await load(sessionId);
      const { state } = session;
      if (state.status !== 'failed' && state.status !== 'cancelled') {
        throw new PipelineError(
          'SESSION_NOT_RETRYABLE',
          `session ${sessionId} is ${state.status}; only failed or cancelled sessions can be retried`
        );
      }

      const { stage } = state;
      const next = reentryState(state);
      const updated = await repositories.sessions.transition(sessionId, session.version, {
        state: next,
        stageTimestamps: session.stageTimestamps,
        stageAttempts: { ...session.stageAttempts, [stage]: 0 },
        cancelRequestedAt: null
      });
      if (!updated) {
        throw new PipelineError('SESSION_CONFLICT', `session ${sessionId} was modified concurrently`);
      }

      logger.info({ sessionId, stage, from: state.status }, 'pipeline.session_retry_requested');
      await audit(sessionId, 'session_retry_requested', { stage, from: state.status });
      return updated;
    },

    async cancel(sessionId) {
      for (let attempt = 0; attempt < MAX_COMMIT_ATTEMPTS; attempt += 1) {
        const session = await load(sessionId);
        const { state } = session;
        if (isTerminal(state)) {
          throw new PipelineError('SESSION_TERMINAL', `session ${sessionId} is already ${state.status}`);
        }

        const controller = inflight.get(sessionId);
        const cancelRequestedAt = session.cancelRequestedAt ?? timestamp();

        if (state.status === 'created' && !controller) {
          const updated = await repositories.sessions.transition(sessionId, session.version, {
            state: { status: 'cancelled', stage: 'transcribing' },
            stageTimestamps: session.stageTimestamps,
            stageAttempts: session.stageAttempts,
            cancelRequestedAt
          });
          if (!updated) {
            continue;
          }
          logger.info({ sessionId, stage: 'transcribing' }, 'pipeline.session_cancelled');
          await audit(sessionId, 'session_cancelled', { stage: 'transcribing', beforeStageStarted: true });
          return updated;
        }

        const updated = await repositories.sessions.transition(sessionId, session.version, {
          state,
          stageTimestamps: session.stageTimestamps,
          stageAttempts: session.stageAttempts,
          cancelRequestedAt
        });
        if (!updated) {
          continue;
        }

        logger.info({ sessionId, stage: currentStage(state) }, 'pipeline.session_cancel_requested');
        await audit(sessionId, 'session_cancel_requested', { stage: currentStage(state) });
        controller?.abort();
        return updated;
      }

      throw new PipelineError('SESSION_CONFLICT', `session ${sessionId} was modified concurrently`);
    },

    isProcessing(sessionId) {
      return inflight.has(sessionId);
    }
  };
}
