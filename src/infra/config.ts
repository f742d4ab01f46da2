import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const PLACEHOLDER_OWNER_ID = '00000000-0000-0000-0000-000000000001';

const envSchema = z.object({
  // Optional here so modules load without a database (tests use pg-mem)
  DATABASE_URL: z.string().min(1).optional(),
  PORT: z.coerce.number().int().positive().default(3000),
  // Stands in for the authenticated user until sessions exist
  OWNER_ID: z.string().uuid().default(PLACEHOLDER_OWNER_ID),
  OWNER_USERNAME: z.string().min(3).max(50).default('owner'),
  OWNER_CREDENTIAL: z.string().min(6).default('change-me'),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Parse configuration from environment variables.
 * Throws with every offending variable listed when one is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  return result.data;
}

export const config = loadConfig();
