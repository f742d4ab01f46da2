import express from 'express';
import type pg from 'pg';
import { FolderService } from '../../application/vault/folderService.js';
import { PasswordEntryService } from '../../application/vault/passwordEntryService.js';
import { UserService } from '../../application/vault/userService.js';
import { errorHandler } from './middleware/errorHandler.js';
import { ownerIdentity } from './middleware/identity.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';
import { createEntryRoutes } from './routes/entries.js';
import { createFolderRoutes } from './routes/folders.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createUserRoutes } from './routes/users.js';

export interface AppOptions {
  pool: pg.Pool;
  /** Owner every vault request acts for. */
  ownerId: string;
  rateLimitPerMinute?: number;
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp({ pool, ownerId, rateLimitPerMinute = 60 }: AppOptions) {
  const app = express();

  const users = new UserService(pool);
  const folders = new FolderService(pool);
  const entries = new PasswordEntryService(pool);

  // Middleware
  app.use(express.json());
  app.use(createApiRateLimiter(rateLimitPerMinute));

  // Health check endpoint (no identity required)
  app.get('/healthz', (_req, res) => {
    void withTimeout(pool.query('SELECT 1'), 2000)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch((error: unknown) => {
        console.error('Health check failed:', error);
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      });
  });

  // Swagger/OpenAPI docs
  app.use(createSwaggerRoutes());

  // Vault routes, scoped to the resolved owner
  app.use('/api', ownerIdentity(ownerId));
  app.use('/api/users', createUserRoutes(users));
  app.use('/api/folders', createFolderRoutes(folders, entries));
  app.use('/api/entries', createEntryRoutes(entries));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
