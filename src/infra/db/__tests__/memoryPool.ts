import { newDb } from 'pg-mem';
import type pg from 'pg';
import { runMigrations } from '../migrations.js';

/**
 * A pg-compatible pool over an in-memory database with the vault schema applied.
 */
export async function createMemoryPool(): Promise<pg.Pool> {
  const db = newDb();
  const { Pool } = db.adapters.createPg();
  const pool: pg.Pool = new Pool();
  await runMigrations(pool);
  return pool;
}

export async function countRows(
  pool: pg.Pool,
  table: 'users' | 'folders' | 'password_entries',
  where = 'TRUE',
  params: unknown[] = []
): Promise<number> {
  const result = await pool.query<{ id: string }>(`SELECT id FROM ${table} WHERE ${where}`, params);
  return result.rows.length;
}
