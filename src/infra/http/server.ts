import { config } from '../config.js';
import { pool } from '../db/pool.js';
import { createApp } from './app.js';

if (!config.DATABASE_URL) {
  throw new Error('DATABASE_URL environment variable is required');
}

const app = createApp({
  pool,
  ownerId: config.OWNER_ID,
  rateLimitPerMinute: config.RATE_LIMIT_PER_MINUTE,
});

// Start server
app.listen(config.PORT, () => {
  console.log(`Server running on http://localhost:${config.PORT}`);
  console.log(`Health check: http://localhost:${config.PORT}/healthz`);
  console.log(`API docs: http://localhost:${config.PORT}/docs`);
  console.log(`Acting for owner ${config.OWNER_ID}`);
});

export default app;
