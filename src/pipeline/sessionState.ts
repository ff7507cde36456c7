import type {
  ConsultationSession,
  DocumentArtifact,
  PipelineStage,
  SessionState,
  SoapNote,
  StageProducts,
  Transcript
} from '../repositories/contracts.js';

export type TerminalState = Extract<SessionState, { status: 'completed' | 'failed' | 'cancelled' }>;
export type ActiveState = Exclude<SessionState, TerminalState>;

export function isTerminal(state: SessionState): state is TerminalState {
  return state.status === 'completed' || state.status === 'failed' || state.status === 'cancelled';
}

/** The stage an active session is about to run or is running. */
export function currentStage(state: ActiveState): PipelineStage {
  switch (state.status) {
    case 'created':
    case 'transcribing':
      return 'transcribing';
    case 'extracting':
      return 'extracting';
    case 'generating_document':
      return 'generating_document';
  }
}

/** What an active session has produced so far, keyed by the stage it has reached. */
export function productsOf(state: ActiveState): StageProducts {
  switch (state.status) {
    case 'created':
    case 'transcribing':
      return { stage: 'transcribing' };
    case 'extracting':
      return { stage: 'extracting', transcript: state.transcript };
    case 'generating_document':
      return { stage: 'generating_document', transcript: state.transcript, soapNote: state.soapNote };
  }
}

/** The state a failed or cancelled session re-enters on an explicit retry. */
export function reentryState(products: StageProducts): ActiveState {
  switch (products.stage) {
    case 'transcribing':
      return { status: 'created' };
    case 'extracting':
      return { status: 'extracting', transcript: products.transcript };
    case 'generating_document':
      return { status: 'generating_document', transcript: products.transcript, soapNote: products.soapNote };
  }
}

export type SessionProducts = {
  transcript: Transcript | null;
  soapNote: SoapNote | null;
  document: DocumentArtifact | null;
};

export function sessionProducts(state: SessionState): SessionProducts {
  switch (state.status) {
    case 'created':
    case 'transcribing':
      return { transcript: null, soapNote: null, document: null };
    case 'extracting':
      return { transcript: state.transcript, soapNote: null, document: null };
    case 'generating_document':
      return { transcript: state.transcript, soapNote: state.soapNote, document: null };
    case 'completed':
      return { transcript: state.transcript, soapNote: state.soapNote, document: state.document };
    case 'failed':
    case 'cancelled':
      if (state.stage === 'transcribing') {
        return { transcript: null, soapNote: null, document: null };
      }
      if (state.stage === 'extracting') {
        return { transcript: state.transcript, soapNote: null, document: null };
      }
      return { transcript: state.transcript, soapNote: state.soapNote, document: null };
  }
}

export function toSessionView(session: ConsultationSession) {
  const { state } = session;
  const products = sessionProducts(state);
  const stage = state.status === 'completed' ? null : isTerminal(state) ? state.stage : currentStage(state);

  return {
    sessionId: session.sessionId,
    assetId: session.assetId,
    title: session.title,
    patientName: session.patientName,
    status: state.status,
    stage,
    failure: state.status === 'failed' ? state.failure : null,
    cancelRequestedAt: session.cancelRequestedAt,
    stageTimestamps: session.stageTimestamps,
    stageAttempts: session.stageAttempts,
    transcript: products.transcript
      ? {
          segmentCount: products.transcript.segments.length,
          wordCount: products.transcript.wordCount,
          confidence: products.transcript.confidence,
          audioDurationMs: products.transcript.audioDurationMs
        }
      : null,
    soapNote: products.soapNote,
    document: products.document,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt
  };
}

export type SessionView = ReturnType<typeof toSessionView>;
