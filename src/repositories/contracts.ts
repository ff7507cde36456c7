export const ACCEPTED_AUDIO_FORMATS = ['wav', 'mp3', 'webm', 'ogg', 'm4a'] as const;
export type AudioFormat = (typeof ACCEPTED_AUDIO_FORMATS)[number];

export const PIPELINE_STAGES = ['transcribing', 'extracting', 'generating_document'] as const;
export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export type AudioAsset = {
  assetId: string;
  format: AudioFormat;
  mimeType: string;
  sizeBytes: number;
  durationMs: number | null;
  createdAt: string;
};

export type TranscriptSegment = {
  index: number;
  text: string;
  speaker: string | null;
  confidence: number | null;
  startMs: number | null;
  endMs: number | null;
};

export type Transcript = {
  language: 'es';
  text: string;
  segments: TranscriptSegment[];
  confidence: number | null;
  audioDurationMs: number | null;
  wordCount: number;
};

export type SoapNote = {
  subjective: string;
  objective: string;
  assessment: string;
  plan: string;
};

export type DocumentArtifact = {
  documentId: string;
  link: string;
  title: string;
  generatedAt: string;
};

export type StageFailure = {
  stage: PipelineStage;
  code: string;
  reason: string;
  attempts: number;
  transient: boolean;
};

// Products retained by a session that stopped at a given stage. Later products only
// exist alongside every earlier one.
export type StageProducts =
  | { stage: 'transcribing' }
  | { stage: 'extracting'; transcript: Transcript }
  | { stage: 'generating_document'; transcript: Transcript; soapNote: SoapNote };

export type SessionState =
  | { status: 'created' }
  | { status: 'transcribing' }
  | { status: 'extracting'; transcript: Transcript }
  | { status: 'generating_document'; transcript: Transcript; soapNote: SoapNote }
  | { status: 'completed'; transcript: Transcript; soapNote: SoapNote; document: DocumentArtifact }
  | ({ status: 'failed'; failure: StageFailure } & StageProducts)
  | ({ status: 'cancelled' } & StageProducts);

export type SessionStatus = SessionState['status'];

export type StageTiming = {
  startedAt: string;
  finishedAt: string | null;
};

export type ConsultationSession = {
  sessionId: string;
  assetId: string;
  title: string;
  patientName: string | null;
  state: SessionState;
  stageTimestamps: Partial<Record<PipelineStage, StageTiming>>;
  stageAttempts: Partial<Record<PipelineStage, number>>;
  cancelRequestedAt: string | null;
  version: number;
  createdAt: string;
  updatedAt: string;
};

export type AuditEvent = {
  eventId: string;
  sessionId: string | null;
  eventType: string;
  actor: string;
  payload: Record<string, unknown>;
  createdAt: string;
};

export type SessionTransition = {
  state: SessionState;
  stageTimestamps: ConsultationSession['stageTimestamps'];
  stageAttempts: ConsultationSession['stageAttempts'];
  cancelRequestedAt: string | null;
};

export interface AudioAssetsRepository {
  insert(asset: Omit<AudioAsset, 'createdAt'>, content: Buffer): Promise<AudioAsset>;
  getById(assetId: string): Promise<AudioAsset | null>;
  readContent(assetId: string): Promise<Buffer | null>;
}

export interface SessionsRepository {
  insert(
    session: Pick<ConsultationSession, 'sessionId' | 'assetId' | 'title' | 'patientName'>
  ): Promise<ConsultationSession>;
  getById(sessionId: string): Promise<ConsultationSession | null>;
  /**
   * Compare-and-set on `version`. Returns the stored session, or null when another writer
   * advanced the session first.
   */
  transition(
    sessionId: string,
    expectedVersion: number,
    next: SessionTransition
  ): Promise<ConsultationSession | null>;
}

export interface AuditRepository {
  insert(event: Omit<AuditEvent, 'createdAt'>): Promise<AuditEvent>;
  listBySession(sessionId: string): Promise<AuditEvent[]>;
}

export interface RepositoryBundle {
  audioAssets: AudioAssetsRepository;
  sessions: SessionsRepository;
  audit: AuditRepository;
}
