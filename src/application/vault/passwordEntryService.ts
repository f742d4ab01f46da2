import { randomUUID } from 'crypto';
import type { PoolClient } from 'pg';
import type {
  EntryListFilter,
  PasswordEntry,
  PasswordEntryPatch,
} from '../../domain/vault/passwordEntry.js';
import { FolderRepo } from '../../infra/db/folderRepo.js';
import { PasswordEntryRepo } from '../../infra/db/passwordEntryRepo.js';
import {
  withClient,
  withTransaction,
  type ConnectionSource,
} from '../../infra/db/transaction.js';
import { ValidationError } from '../errors.js';
import { isVaultId, type PasswordEntryCreate } from './contracts.js';

/**
 * Password entries of one owner. Lookups and writes always match id and owner together.
 */
export class PasswordEntryService {
  constructor(private db: ConnectionSource) {}

  async createEntry(ownerId: string, input: PasswordEntryCreate): Promise<PasswordEntry> {
    return withTransaction(this.db, async (client) => {
      const folderId = input.folderId ?? null;
      if (folderId !== null) {
        await this.assertFolderOwned(client, folderId, ownerId);
      }

      return new PasswordEntryRepo(client).create({
        id: randomUUID(),
        ownerId,
        folderId,
        name: input.name,
        username: input.username ?? null,
        secret: input.secret ?? null,
        url: input.url ?? null,
        notes: input.notes ?? null,
      });
    });
  }

  async getEntry(id: string, ownerId: string): Promise<PasswordEntry | null> {
    if (!isVaultId(id) || !isVaultId(ownerId)) {
      return null;
    }
    return withClient(this.db, (client) => new PasswordEntryRepo(client).findById(id, ownerId));
  }

  /**
   * All entries of the owner, or only those in `filter.folderId`
   * (null selects entries outside any folder).
   */
  async listEntries(ownerId: string, filter: EntryListFilter = {}): Promise<PasswordEntry[]> {
    const { folderId } = filter;
    if (!isVaultId(ownerId) || (typeof folderId === 'string' && !isVaultId(folderId))) {
      return [];
    }
    return withClient(this.db, (client) => new PasswordEntryRepo(client).list(ownerId, filter));
  }

  /**
   * Apply a partial update. Only the keys present in the patch change.
   */
  async updateEntry(
    id: string,
    ownerId: string,
    patch: PasswordEntryPatch
  ): Promise<PasswordEntry | null> {
    if (!isVaultId(id) || !isVaultId(ownerId)) {
      return null;
    }
    return withTransaction(this.db, async (client) => {
      const entries = new PasswordEntryRepo(client);

      const entry = await entries.findById(id, ownerId);
      if (!entry) {
        return null;
      }

      if (typeof patch.folderId === 'string') {
        await this.assertFolderOwned(client, patch.folderId, ownerId);
      }

      return entries.update(entry.id, ownerId, patch);
    });
  }

  async deleteEntry(id: string, ownerId: string): Promise<boolean> {
    if (!isVaultId(id) || !isVaultId(ownerId)) {
      return false;
    }
    return withTransaction(this.db, (client) => new PasswordEntryRepo(client).delete(id, ownerId));
  }

  private async assertFolderOwned(
    client: PoolClient,
    folderId: string,
    ownerId: string
  ): Promise<void> {
    const folder = isVaultId(folderId)
      ? await new FolderRepo(client).findById(folderId, ownerId)
      : null;
    if (!folder) {
      throw new ValidationError('Folder not found');
    }
  }
}
