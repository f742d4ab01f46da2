import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import type pg from 'pg';

export const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

interface Migration {
  filename: string;
  version: number;
}

async function getMigrations(dir: string): Promise<Migration[]> {
  const files = await readdir(dir);
  const sqlFiles = files
    .filter((f) => f.endsWith('.sql'))
    .map((filename) => {
      const match = filename.match(/^(\d+)_/);
      if (!match) {
        throw new Error(`Invalid migration filename: ${filename}`);
      }
      return {
        filename,
        version: parseInt(match[1], 10),
      };
    })
    .sort((a, b) => a.version - b.version);

  return sqlFiles;
}

async function ensureMigrationsTable(pool: pg.Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
}

async function getAppliedMigrations(pool: pg.Pool): Promise<number[]> {
  const result = await pool.query<{ version: number }>(
    'SELECT version FROM schema_migrations ORDER BY version'
  );
  return result.rows.map((row) => row.version);
}

async function applyMigration(
  pool: pg.Pool,
  dir: string,
  { filename, version }: Migration
): Promise<void> {
  const sql = await readFile(join(dir, filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [version]);
    await client.query('COMMIT');
    console.log(`✓ Applied migration ${version}: ${filename}`);
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Apply every pending migration in version order. Returns the versions applied.
 */
export async function runMigrations(
  pool: pg.Pool,
  dir: string = MIGRATIONS_DIR
): Promise<number[]> {
  await ensureMigrationsTable(pool);
  const migrations = await getMigrations(dir);
  const applied = await getAppliedMigrations(pool);

  const pending = migrations.filter((m) => !applied.includes(m.version));

  if (pending.length === 0) {
    console.log('No pending migrations.');
    return [];
  }

  console.log(`Found ${pending.length} pending migration(s)`);

  for (const migration of pending) {
    await applyMigration(pool, dir, migration);
  }

  return pending.map((m) => m.version);
}
