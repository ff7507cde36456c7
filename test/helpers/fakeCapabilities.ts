import type {
  AsyncTranscriptionCapability,
  DocumentCapability,
  DocumentRequest,
  ExtractionCapability,
  ExtractionRequest,
  RawTranscriptionResult,
  SyncTranscriptionCapability,
  TranscriptionPoll,
  TranscriptionRequest
} from '../../src/pipeline/capabilities.js';

type Step<T> = (signal: AbortSignal) => Promise<T>;

export const reply =
  <T>(value: T): Step<T> =>
  async () =>
    value;

export const fail =
  <T>(error: Error): Step<T> =>
  async () => {
    throw error;
  };

/** A call that only settles when its signal aborts; `started` resolves once it is entered. */
export function hang<T>() {
  let enter: () => void = () => undefined;
  const started = new Promise<void>((resolve) => {
    enter = resolve;
  });
  const step: Step<T> = (signal) =>
    new Promise<T>((_, reject) => {
      enter();
      signal.addEventListener('abort', () => reject(new Error('aborted by caller')), { once: true });
    });
  return { step, started };
}

function play<T>(steps: Step<T>[], index: number, signal: AbortSignal): Promise<T> {
  return steps[Math.min(index, steps.length - 1)](signal);
}

export function scriptedTranscription(...steps: Step<RawTranscriptionResult>[]) {
  const requests: TranscriptionRequest[] = [];
  const capability: SyncTranscriptionCapability = {
    kind: 'sync',
    name: 'fake transcription',
    transcribe(request) {
      requests.push(request);
      return play(steps, requests.length - 1, request.signal);
    }
  };
  return { capability, requests };
}

export function pollingTranscription(polls: TranscriptionPoll[]) {
  const submitted: TranscriptionRequest[] = [];
  const polled: string[] = [];
  const capability: AsyncTranscriptionCapability = {
    kind: 'async',
    name: 'fake async transcription',
    async submit(request) {
      submitted.push(request);
      return { jobId: 'job-1' };
    },
    async poll(jobId) {
      polled.push(jobId);
      return polls[Math.min(polled.length - 1, polls.length - 1)];
    }
  };
  return { capability, submitted, polled };
}

export function scriptedExtraction(...steps: Step<string>[]) {
  const requests: ExtractionRequest[] = [];
  const capability: ExtractionCapability = {
    name: 'fake extraction',
    complete(request) {
      requests.push(request);
      return play(steps, requests.length - 1, request.signal);
    }
  };
  return { capability, requests };
}

export function recordingDocuments(...failures: Error[]) {
  const requests: DocumentRequest[] = [];
  const capability: DocumentCapability = {
    name: 'fake documents',
    async createDocument(request) {
      requests.push(request);
      const failure = failures[requests.length - 1];
      if (failure) {
        throw failure;
      }
      return {
        documentId: `doc-${request.sessionId}`,
        link: `https://docs.example.test/${request.sessionId}`
      };
    }
  };
  return { capability, requests };
}

export const CONSULTATION_UTTERANCES: RawTranscriptionResult = {
  status: 'completed',
  text: 'Me duele la cabeza desde hace tres días. Tiene presión de 120/80. Cefalea tensional. Paracetamol cada 8 horas.',
  confidence: 0.92,
  audioDurationMs: 42000,
  utterances: [
    { speaker: 'B', text: 'Me duele la cabeza desde hace tres días.', startMs: 1200, endMs: 4000, confidence: 0.9 },
    { speaker: 'A', text: 'Tiene presión de 120/80.', startMs: 4200, endMs: 6000, confidence: 0.95 },
    { speaker: 'A', text: 'Cefalea tensional. Paracetamol cada 8 horas.', startMs: 6100, endMs: 9000, confidence: 0.91 }
  ]
};

export const SOAP_RESPONSE = JSON.stringify({
  subjective: 'Cefalea de tres días de evolución.',
  objective: 'Presión arterial 120/80.',
  assessment: 'Cefalea tensional.',
  plan: 'Paracetamol cada 8 horas.'
});
