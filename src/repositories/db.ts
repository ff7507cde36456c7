import type { Pool } from 'pg';

export type DbExecutor = Pick<Pool, 'query'>;
export type Row = Record<string, unknown>;

/** Copies a row with every Date column rendered as an ISO string. */
export function mapTimestamps(row: Row): Row {
  const out: Row = { ...row };
  for (const [key, value] of Object.entries(out)) {
    if (value instanceof Date) {
      out[key] = value.toISOString();
    }
  }
  return out;
}

export function readJsonObject(value: unknown): Record<string, unknown> {
  if (typeof value === 'string') {
    return readJsonObject(JSON.parse(value));
  }

  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return { ...value };
  }

  return {};
}
