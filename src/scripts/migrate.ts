import { pool } from '../infra/db/pool.js';
import { runMigrations } from '../infra/db/migrations.js';

async function migrate(): Promise<void> {
  try {
    console.log('Starting migrations...');
    const applied = await runMigrations(pool);
    if (applied.length > 0) {
      console.log('All migrations applied successfully.');
    }
  } catch (error) {
    console.error('Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void migrate();
