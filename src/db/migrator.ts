import { readdir, readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { Pool, PoolClient } from 'pg';
import { getPool } from './pool.js';

const migrationsDir = fileURLToPath(new URL('./migrations/', import.meta.url));

export type MigrationResult = {
  ran: boolean;
  applied: string[];
};

async function ensureMigrationsTable(client: PoolClient) {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

export async function listMigrationFiles(): Promise<string[]> {
  return (await readdir(migrationsDir)).filter((name) => name.endsWith('.sql')).sort();
}

export async function runMigrations(pool: Pool | null = getPool()): Promise<MigrationResult> {
  if (!pool) {
    return { ran: false, applied: [] };
  }

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await ensureMigrationsTable(client);
    const files = await listMigrationFiles();

    const appliedVersionsResult = await client.query<{ version: string }>(
      'SELECT version FROM schema_migrations'
    );
    const appliedSet = new Set(appliedVersionsResult.rows.map((row) => row.version));

    const applied: string[] = [];

    for (const file of files) {
      if (appliedSet.has(file)) {
        continue;
      }

      const sql = await readFile(`${migrationsDir}${file}`, 'utf8');
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations(version) VALUES ($1)', [file]);
      applied.push(file);
    }

    await client.query('COMMIT');
    return { ran: true, applied };
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}
