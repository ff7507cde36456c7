import type { AudioAsset, AudioAssetsRepository } from './contracts.js';
import type { DbExecutor, Row } from './db.js';
import { mapTimestamps } from './db.js';
import type { MemoryStore } from './memoryStore.js';
import { audioFormatSchema } from './schemas.js';

function toAudioAsset(row: Row): AudioAsset {
  const value = mapTimestamps(row);
  return {
    assetId: String(value.asset_id),
    format: audioFormatSchema.parse(value.format),
    mimeType: String(value.mime_type),
    sizeBytes: Number(value.size_bytes),
    durationMs: value.duration_ms === null || value.duration_ms === undefined ? null : Number(value.duration_ms),
    createdAt: String(value.created_at)
  };
}

export function createAudioAssetsRepository(db: DbExecutor | null, store: MemoryStore): AudioAssetsRepository {
  return {
    async insert(asset, content) {
      if (!db) {
        const created: AudioAsset = { ...asset, createdAt: new Date().toISOString() };
        store.audioAssets.set(asset.assetId, { asset: created, content: Buffer.from(content) });
        return { ...created };
      }

      const result = await db.query(
        `
          INSERT INTO audio_assets(asset_id, format, mime_type, size_bytes, duration_ms, content)
          VALUES ($1, $2, $3, $4, $5, $6)
          RETURNING asset_id, format, mime_type, size_bytes, duration_ms, created_at
        `,
        [asset.assetId, asset.format, asset.mimeType, asset.sizeBytes, asset.durationMs, content]
      );
      return toAudioAsset(result.rows[0]);
    },

    async getById(assetId) {
      if (!db) {
        const entry = store.audioAssets.get(assetId);
        return entry ? { ...entry.asset } : null;
      }

      const result = await db.query(
        `SELECT asset_id, format, mime_type, size_bytes, duration_ms, created_at
         FROM audio_assets
         WHERE asset_id = $1`,
        [assetId]
      );

      if (result.rowCount === 0) {
        return null;
      }

      return toAudioAsset(result.rows[0]);
    },

    async readContent(assetId) {
      if (!db) {
        const entry = store.audioAssets.get(assetId);
        return entry ? Buffer.from(entry.content) : null;
      }

      const result = await db.query<{ content: Buffer }>(
        'SELECT content FROM audio_assets WHERE asset_id = $1',
        [assetId]
      );

      if (result.rowCount === 0) {
        return null;
      }

      return result.rows[0].content;
    }
  };
}
