import type { AudioAsset, AuditEvent, ConsultationSession } from './contracts.js';

export type MemoryStore = {
  audioAssets: Map<string, { asset: AudioAsset; content: Buffer }>;
  sessions: Map<string, ConsultationSession>;
  audit: Map<string, AuditEvent>;
};

export function createMemoryStore(): MemoryStore {
  return {
    audioAssets: new Map(),
    sessions: new Map(),
    audit: new Map()
  };
}
