import type { PoolClient } from 'pg';
import type { User } from '../../domain/vault/user.js';

interface UserRow {
  id: string;
  username: string;
  credential_hash: string;
  created_at: Date;
}

const USER_COLUMNS = 'id, username, credential_hash, created_at';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    credentialHash: row.credential_hash,
    createdAt: row.created_at,
  };
}

export class UserRepo {
  constructor(private client: PoolClient) {}

  async findById(id: string): Promise<User | null> {
    const result = await this.client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async findByUsername(username: string): Promise<User | null> {
    const result = await this.client.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
      [username]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async create(id: string, username: string, credentialHash: string): Promise<User> {
    const result = await this.client.query<UserRow>(
      `INSERT INTO users (id, username, credential_hash)
       VALUES ($1, $2, $3)
       RETURNING ${USER_COLUMNS}`,
      [id, username, credentialHash]
    );

    return toUser(result.rows[0]);
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.client.query<{ id: string }>(
      'DELETE FROM users WHERE id = $1 RETURNING id',
      [id]
    );
    return result.rows.length > 0;
  }
}
