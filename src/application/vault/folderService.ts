import { randomUUID } from 'crypto';
import type { Folder } from '../../domain/vault/folder.js';
import { FolderRepo } from '../../infra/db/folderRepo.js';
import { PasswordEntryRepo } from '../../infra/db/passwordEntryRepo.js';
import {
  withClient,
  withTransaction,
  type ConnectionSource,
} from '../../infra/db/transaction.js';
import { isVaultId, type FolderCreate, type FolderUpdate } from './contracts.js';

/**
 * Folders of one owner. A folder owned by someone else reads exactly like a missing one.
 */
export class FolderService {
  constructor(private db: ConnectionSource) {}

  async createFolder(ownerId: string, input: FolderCreate): Promise<Folder> {
    return withTransaction(this.db, (client) =>
      new FolderRepo(client).create(randomUUID(), ownerId, input.name)
    );
  }

  async getFolder(id: string, ownerId: string): Promise<Folder | null> {
    if (!isVaultId(id) || !isVaultId(ownerId)) {
      return null;
    }
    return withClient(this.db, (client) => new FolderRepo(client).findById(id, ownerId));
  }

  async listFolders(ownerId: string): Promise<Folder[]> {
    if (!isVaultId(ownerId)) {
      return [];
    }
    return withClient(this.db, (client) => new FolderRepo(client).listByOwner(ownerId));
  }

  async updateFolder(id: string, ownerId: string, input: FolderUpdate): Promise<Folder | null> {
    if (!isVaultId(id) || !isVaultId(ownerId)) {
      return null;
    }
    return withTransaction(this.db, async (client) => {
      const folders = new FolderRepo(client);

      const folder = await folders.findById(id, ownerId);
      if (!folder) {
        return null;
      }

      return folders.rename(folder.id, ownerId, input.name);
    });
  }

  /**
   * Delete a folder. Its entries stay, moved out of any folder.
   */
  async deleteFolder(id: string, ownerId: string): Promise<boolean> {
    if (!isVaultId(id) || !isVaultId(ownerId)) {
      return false;
    }
    return withTransaction(this.db, async (client) => {
      const folders = new FolderRepo(client);

      const folder = await folders.findById(id, ownerId);
      if (!folder) {
        return false;
      }

      await new PasswordEntryRepo(client).clearFolder(folder.id, ownerId);
      return folders.delete(folder.id, ownerId);
    });
  }
}
