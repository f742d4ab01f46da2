import type { PoolClient } from 'pg';
import {
  suppliedFields,
  type EntryField,
  type EntryListFilter,
  type PasswordEntry,
  type PasswordEntryPatch,
} from '../../domain/vault/passwordEntry.js';

interface PasswordEntryRow {
  id: string;
  user_id: string;
  folder_id: string | null;
  name: string;
  username: string | null;
  secret: string | null;
  url: string | null;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface NewPasswordEntry {
  id: string;
  ownerId: string;
  folderId: string | null;
  name: string;
  username: string | null;
  secret: string | null;
  url: string | null;
  notes: string | null;
}

const ENTRY_COLUMNS =
  'id, user_id, folder_id, name, username, secret, url, notes, created_at, updated_at';

const COLUMN_FOR: Record<EntryField, string> = {
  name: 'name',
  username: 'username',
  secret: 'secret',
  url: 'url',
  notes: 'notes',
  folderId: 'folder_id',
};

function toEntry(row: PasswordEntryRow): PasswordEntry {
  return {
    id: row.id,
    ownerId: row.user_id,
    folderId: row.folder_id,
    name: row.name,
    username: row.username,
    secret: row.secret,
    url: row.url,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Password entry rows. Every lookup and write is filtered by the owning user.
 */
export class PasswordEntryRepo {
  constructor(private client: PoolClient) {}

  async findById(id: string, ownerId: string): Promise<PasswordEntry | null> {
    const result = await this.client.query<PasswordEntryRow>(
      `SELECT ${ENTRY_COLUMNS}
       FROM password_entries
       WHERE id = $1 AND user_id = $2`,
      [id, ownerId]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toEntry(result.rows[0]);
  }

  async list(ownerId: string, filter: EntryListFilter = {}): Promise<PasswordEntry[]> {
    let query = `SELECT ${ENTRY_COLUMNS}
                 FROM password_entries
                 WHERE user_id = $1`;

    const params: unknown[] = [ownerId];

    if (filter.folderId === null) {
      query += ' AND folder_id IS NULL';
    } else if (filter.folderId !== undefined) {
      params.push(filter.folderId);
      query += ` AND folder_id = $${params.length}`;
    }

    query += ' ORDER BY name, created_at';

    const result = await this.client.query<PasswordEntryRow>(query, params);
    return result.rows.map(toEntry);
  }

  async create(entry: NewPasswordEntry): Promise<PasswordEntry> {
    const result = await this.client.query<PasswordEntryRow>(
      `INSERT INTO password_entries (
        id, user_id, folder_id, name, username, secret, url, notes
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      RETURNING ${ENTRY_COLUMNS}`,
      [
        entry.id,
        entry.ownerId,
        entry.folderId,
        entry.name,
        entry.username,
        entry.secret,
        entry.url,
        entry.notes,
      ]
    );

    return toEntry(result.rows[0]);
  }

  /**
   * Write the supplied fields of a patch. An empty patch reads the entry back unchanged.
   */
  async update(
    id: string,
    ownerId: string,
    patch: PasswordEntryPatch
  ): Promise<PasswordEntry | null> {
    const fields = suppliedFields(patch);
    if (fields.length === 0) {
      return this.findById(id, ownerId);
    }

    const params: unknown[] = [id, ownerId];
    const assignments = fields.map((field) => {
      params.push(patch[field]);
      return `${COLUMN_FOR[field]} = $${params.length}`;
    });
    assignments.push('updated_at = NOW()');

    const result = await this.client.query<PasswordEntryRow>(
      `UPDATE password_entries
       SET ${assignments.join(', ')}
       WHERE id = $1 AND user_id = $2
       RETURNING ${ENTRY_COLUMNS}`,
      params
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toEntry(result.rows[0]);
  }

  async delete(id: string, ownerId: string): Promise<boolean> {
    const result = await this.client.query<{ id: string }>(
      'DELETE FROM password_entries WHERE id = $1 AND user_id = $2 RETURNING id',
      [id, ownerId]
    );
    return result.rows.length > 0;
  }

  /**
   * Move every entry of a folder out of it. Returns the number of entries touched.
   */
  async clearFolder(folderId: string, ownerId: string): Promise<number> {
    const result = await this.client.query<{ id: string }>(
      `UPDATE password_entries
       SET folder_id = NULL, updated_at = NOW()
       WHERE folder_id = $1 AND user_id = $2
       RETURNING id`,
      [folderId, ownerId]
    );
    return result.rows.length;
  }

  async deleteAllForOwner(ownerId: string): Promise<number> {
    const result = await this.client.query<{ id: string }>(
      'DELETE FROM password_entries WHERE user_id = $1 RETURNING id',
      [ownerId]
    );
    return result.rows.length;
  }
}
