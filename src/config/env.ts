import 'dotenv/config';

function readNonNegativeInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

export const env = {
  get PORT() {
    return readNonNegativeInt('PORT', 3000);
  },
  get NODE_ENV() {
    return process.env.NODE_ENV ?? 'development';
  },
  get LOG_LEVEL() {
    return process.env.LOG_LEVEL ?? 'info';
  },
  get API_KEY() {
    return process.env.API_KEY ?? '';
  },
  get DATABASE_URL() {
    return process.env.DATABASE_URL ?? '';
  },
  get REDIS_URL() {
    return process.env.REDIS_URL ?? '';
  },
  get ASSEMBLYAI_API_KEY() {
    return process.env.ASSEMBLYAI_API_KEY ?? '';
  },
  get ASSEMBLYAI_BASE_URL() {
    return process.env.ASSEMBLYAI_BASE_URL ?? 'https://api.assemblyai.com';
  },
  get GEMINI_API_KEY() {
    return process.env.GEMINI_API_KEY ?? '';
  },
  get GEMINI_MODEL() {
    return process.env.GEMINI_MODEL ?? 'gemini-flash-latest';
  },
  get DOCUMENTS_DIR() {
    return process.env.DOCUMENTS_DIR ?? './output/documents';
  },
  get PROVIDER_TIMEOUT_MS() {
    return readNonNegativeInt('PROVIDER_TIMEOUT_MS', 120_000);
  },
  get TRANSCRIPTION_POLL_INTERVAL_MS() {
    return readNonNegativeInt('TRANSCRIPTION_POLL_INTERVAL_MS', 3_000);
  },
  get STAGE_MAX_ATTEMPTS() {
    return Math.max(1, readNonNegativeInt('STAGE_MAX_ATTEMPTS', 3));
  },
  get STAGE_RETRY_DELAY_MS() {
    return readNonNegativeInt('STAGE_RETRY_DELAY_MS', 1_000);
  },
  get MAX_AUDIO_BYTES() {
    return readNonNegativeInt('MAX_AUDIO_BYTES', 50 * 1024 * 1024);
  }
};
