import { randomUUID } from 'crypto';
import type { Express } from 'express';
import type pg from 'pg';
import { UserService } from '../../../application/vault/userService.js';
import { createMemoryPool } from '../../db/__tests__/memoryPool.js';
import { createApp } from '../app.js';

export interface TestApp {
  app: Express;
  pool: pg.Pool;
  ownerId: string;
}

/**
 * An app over an in-memory database whose placeholder owner already exists.
 */
export async function createTestApp(rateLimitPerMinute = 1000): Promise<TestApp> {
  const pool = await createMemoryPool();
  const ownerId = randomUUID();
  await new UserService(pool).ensureUser(ownerId, { username: 'owner', rawCredential: 'test-secret' });

  return { app: createApp({ pool, ownerId, rateLimitPerMinute }), pool, ownerId };
}
