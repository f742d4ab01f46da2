import { UserService } from '../application/vault/userService.js';
import { config } from '../infra/config.js';
import { pool } from '../infra/db/pool.js';

/**
 * Create the placeholder owner the API acts for, unless it already exists.
 */
async function seedOwner(): Promise<void> {
  try {
    const users = new UserService(pool);
    const owner = await users.ensureUser(config.OWNER_ID, {
      username: config.OWNER_USERNAME,
      rawCredential: config.OWNER_CREDENTIAL,
    });
    console.log(`Owner ready: ${owner.username} (${owner.id})`);
  } catch (error) {
    console.error('Seeding owner failed:', error);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void seedOwner();
