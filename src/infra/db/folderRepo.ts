import type { PoolClient } from 'pg';
import type { Folder } from '../../domain/vault/folder.js';

interface FolderRow {
  id: string;
  user_id: string;
  name: string;
  created_at: Date;
  updated_at: Date;
}

const FOLDER_COLUMNS = 'id, user_id, name, created_at, updated_at';

function toFolder(row: FolderRow): Folder {
  return {
    id: row.id,
    ownerId: row.user_id,
    name: row.name,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Folder rows. Every lookup and write is filtered by the owning user.
 */
export class FolderRepo {
  constructor(private client: PoolClient) {}

  async findById(id: string, ownerId: string): Promise<Folder | null> {
    const result = await this.client.query<FolderRow>(
      `SELECT ${FOLDER_COLUMNS}
       FROM folders
       WHERE id = $1 AND user_id = $2`,
      [id, ownerId]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toFolder(result.rows[0]);
  }

  async listByOwner(ownerId: string): Promise<Folder[]> {
    const result = await this.client.query<FolderRow>(
      `SELECT ${FOLDER_COLUMNS}
       FROM folders
       WHERE user_id = $1
       ORDER BY name, created_at`,
      [ownerId]
    );

    return result.rows.map(toFolder);
  }

  async create(id: string, ownerId: string, name: string): Promise<Folder> {
    const result = await this.client.query<FolderRow>(
      `INSERT INTO folders (id, user_id, name)
       VALUES ($1, $2, $3)
       RETURNING ${FOLDER_COLUMNS}`,
      [id, ownerId, name]
    );

    return toFolder(result.rows[0]);
  }

  async rename(id: string, ownerId: string, name: string): Promise<Folder | null> {
    const result = await this.client.query<FolderRow>(
      `UPDATE folders
       SET name = $3, updated_at = NOW()
       WHERE id = $1 AND user_id = $2
       RETURNING ${FOLDER_COLUMNS}`,
      [id, ownerId, name]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toFolder(result.rows[0]);
  }

  async delete(id: string, ownerId: string): Promise<boolean> {
    const result = await this.client.query<{ id: string }>(
      'DELETE FROM folders WHERE id = $1 AND user_id = $2 RETURNING id',
      [id, ownerId]
    );
    return result.rows.length > 0;
  }

  /**
   * Returns the number of folders removed.
   */
  async deleteAllForOwner(ownerId: string): Promise<number> {
    const result = await this.client.query<{ id: string }>(
      'DELETE FROM folders WHERE user_id = $1 RETURNING id',
      [ownerId]
    );
    return result.rows.length;
  }
}
