import type { MemoryStore } from './memoryStore.js';
import type { DbExecutor, Row } from './db.js';
import { mapTimestamps } from './db.js';
import type { ConsultationSession, SessionsRepository } from './contracts.js';
import { parseSessionState, parseStageAttempts, parseStageTimestamps } from './schemas.js';

const SESSION_COLUMNS = `session_id, asset_id, title, patient_name, state, stage_timestamps, stage_attempts,
  cancel_requested_at, version, created_at, updated_at`;

function toSession(row: Row): ConsultationSession {
  const value = mapTimestamps(row);
  return {
    sessionId: String(value.session_id),
    assetId: String(value.asset_id),
    title: String(value.title),
    patientName: value.patient_name ? String(value.patient_name) : null,
    state: parseSessionState(value.state),
    stageTimestamps: parseStageTimestamps(value.stage_timestamps),
    stageAttempts: parseStageAttempts(value.stage_attempts),
    cancelRequestedAt: value.cancel_requested_at ? String(value.cancel_requested_at) : null,
    version: Number(value.version),
    createdAt: String(value.created_at),
    updatedAt: String(value.updated_at)
  };
}

export function createSessionsRepository(db: DbExecutor | null, store: MemoryStore): SessionsRepository {
  return {
    async insert(input) {
      if (!db) {
        const now = new Date().toISOString();
        const created: ConsultationSession = {
          ...input,
          state: { status: 'created' },
          stageTimestamps: {},
          stageAttempts: {},
          cancelRequestedAt: null,
          version: 1,
          createdAt: now,
          updatedAt: now
        };
        store.sessions.set(input.sessionId, created);
        return structuredClone(created);
      }

      const result = await db.query(
        `
          INSERT INTO consultation_sessions(session_id, asset_id, title, patient_name, state)
          VALUES ($1, $2, $3, $4, $5::jsonb)
          RETURNING ${SESSION_COLUMNS}
        `,
        [input.sessionId, input.assetId, input.title, input.patientName, JSON.stringify({ status: 'created' })]
      );
      return toSession(result.rows[0]);
    },

    async getById(sessionId) {
      if (!db) {
        const stored = store.sessions.get(sessionId);
        return stored ? structuredClone(stored) : null;
      }

      const result = await db.query(
        `SELECT ${SESSION_COLUMNS}
         FROM consultation_sessions
         WHERE session_id = $1`,
        [sessionId]
      );

      if (result.rowCount === 0) {
        return null;
      }

      return toSession(result.rows[0]);
    },

    async transition(sessionId, expectedVersion, next) {
      if (!db) {
        const existing = store.sessions.get(sessionId);
        if (!existing || existing.version !== expectedVersion) {
          return null;
        }

        const updated: ConsultationSession = {
          ...existing,
          ...structuredClone(next),
          version: existing.version + 1,
          updatedAt: new Date().toISOString()
        };
        store.sessions.set(sessionId, updated);
        return structuredClone(updated);
      }

      const result = await db.query(
        `
          UPDATE consultation_sessions
          SET state = $3::jsonb,
              stage_timestamps = $4::jsonb,
              stage_attempts = $5::jsonb,
              cancel_requested_at = $6::timestamptz,
              version = version + 1,
              updated_at = NOW()
          WHERE session_id = $1 AND version = $2
          RETURNING ${SESSION_COLUMNS}
        `,
        [
          sessionId,
          expectedVersion,
          JSON.stringify(next.state),
          JSON.stringify(next.stageTimestamps),
          JSON.stringify(next.stageAttempts),
          next.cancelRequestedAt
        ]
      );

      if (result.rowCount === 0) {
        return null;
      }

      return toSession(result.rows[0]);
    }
  };
}
