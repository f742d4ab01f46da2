import type { Folder } from '../../domain/vault/folder.js';
import type { PasswordEntry } from '../../domain/vault/passwordEntry.js';
import type { User } from '../../domain/vault/user.js';

/**
 * Response shapes. The credential hash never leaves the service and
 * the entry secret only goes out through the with-secret shape.
 */

export interface UserResponse {
  id: string;
  username: string;
}

export interface FolderResponse {
  id: string;
  ownerId: string;
  name: string;
}

export interface PasswordEntryResponse {
  id: string;
  ownerId: string;
  folderId: string | null;
  name: string;
  username: string | null;
  url: string | null;
  notes: string | null;
}

export interface PasswordEntryWithSecretResponse extends PasswordEntryResponse {
  secret: string | null;
}

export function toUserResponse(user: User): UserResponse {
  return { id: user.id, username: user.username };
}

export function toFolderResponse(folder: Folder): FolderResponse {
  return { id: folder.id, ownerId: folder.ownerId, name: folder.name };
}

export function toEntryResponse(entry: PasswordEntry): PasswordEntryResponse {
  return {
    id: entry.id,
    ownerId: entry.ownerId,
    folderId: entry.folderId,
    name: entry.name,
    username: entry.username,
    url: entry.url,
    notes: entry.notes,
  };
}

export function toEntryWithSecretResponse(entry: PasswordEntry): PasswordEntryWithSecretResponse {
  return { ...toEntryResponse(entry), secret: entry.secret };
}
