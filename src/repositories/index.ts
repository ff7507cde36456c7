import type { Pool } from 'pg';
import { createAudioAssetsRepository } from './audioAssets.js';
import { createAuditRepository } from './audit.js';
import type { RepositoryBundle } from './contracts.js';
import { createMemoryStore } from './memoryStore.js';
import { createSessionsRepository } from './sessions.js';

export function createRepositories(pool: Pool | null): RepositoryBundle {
  const store = createMemoryStore();
  const db = pool;

  return {
    audioAssets: createAudioAssetsRepository(db, store),
    sessions: createSessionsRepository(db, store),
    audit: createAuditRepository(db, store)
  };
}
