import { hash, verify } from 'argon2';
import { randomUUID } from 'crypto';
import type { User } from '../../domain/vault/user.js';
import { FolderRepo } from '../../infra/db/folderRepo.js';
import { PasswordEntryRepo } from '../../infra/db/passwordEntryRepo.js';
import {
  isUniqueViolation,
  withClient,
  withTransaction,
  type ConnectionSource,
} from '../../infra/db/transaction.js';
import { UserRepo } from '../../infra/db/userRepo.js';
import { ConflictError } from '../errors.js';
import { isVaultId, type UserCreate } from './contracts.js';

const USERNAME_TAKEN = 'Username is already taken';

// A stored hash argon2 cannot parse never matches
async function credentialMatches(user: User, rawCredential: string): Promise<boolean> {
  try {
    return await verify(user.credentialHash, rawCredential);
  } catch (error) {
    console.warn(`Unreadable credential hash for user ${user.id}:`, error);
    return false;
  }
}

export class UserService {
  constructor(private db: ConnectionSource) {}

  /**
   * Register a user. The raw credential is hashed before it reaches the database.
   * Throws ConflictError when the username is in use.
   */
  async createUser(input: UserCreate): Promise<User> {
    const credentialHash = await hash(input.rawCredential);

    return withTransaction(this.db, (client) =>
      this.insertUser(new UserRepo(client), randomUUID(), input.username, credentialHash)
    );
  }

  /**
   * Return the user with this id, creating it from `input` when it does not exist yet.
   * Used to provision the placeholder owner.
   */
  async ensureUser(id: string, input: UserCreate): Promise<User> {
    const existing = await this.getUserById(id);
    if (existing) {
      return existing;
    }

    const credentialHash = await hash(input.rawCredential);
    return withTransaction(this.db, (client) =>
      this.insertUser(new UserRepo(client), id, input.username, credentialHash)
    );
  }

  async getUserById(id: string): Promise<User | null> {
    if (!isVaultId(id)) {
      return null;
    }
    return withClient(this.db, (client) => new UserRepo(client).findById(id));
  }

  async getUserByUsername(username: string): Promise<User | null> {
    return withClient(this.db, (client) => new UserRepo(client).findByUsername(username));
  }

  /**
   * Look up a user by username and check the raw credential against the stored hash.
   * Unknown usernames and wrong credentials both yield null.
   */
  async verifyCredential(username: string, rawCredential: string): Promise<User | null> {
    const user = await this.getUserByUsername(username);
    if (!user) {
      return null;
    }

    return (await credentialMatches(user, rawCredential)) ? user : null;
  }

  /**
   * Delete a user together with every folder and entry it owns.
   */
  async deleteUser(id: string): Promise<boolean> {
    if (!isVaultId(id)) {
      return false;
    }
    return withTransaction(this.db, async (client) => {
      const users = new UserRepo(client);

      const user = await users.findById(id);
      if (!user) {
        return false;
      }

      await new PasswordEntryRepo(client).deleteAllForOwner(id);
      await new FolderRepo(client).deleteAllForOwner(id);
      return users.delete(id);
    });
  }

  private async insertUser(
    users: UserRepo,
    id: string,
    username: string,
    credentialHash: string
  ): Promise<User> {
    const existing = await users.findByUsername(username);
    if (existing) {
      throw new ConflictError(USERNAME_TAKEN);
    }

    try {
      return await users.create(id, username, credentialHash);
    } catch (error) {
      // Lost a race with a concurrent registration of the same name
      if (isUniqueViolation(error)) {
        throw new ConflictError(USERNAME_TAKEN);
      }
      throw error;
    }
  }
}
