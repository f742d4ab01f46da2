import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import request from 'supertest';
import { randomUUID } from 'crypto';
import type { Express } from 'express';
import { UserService } from '../../../application/vault/userService.js';
import { runMigrations } from '../../db/migrations.js';
import { pool } from '../../db/pool.js';
import { createApp } from '../app.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('Vault against PostgreSQL', () => {
  const ownerId = randomUUID();
  let app: Express;

  beforeAll(async () => {
    await runMigrations(pool);
    await new UserService(pool).ensureUser(ownerId, {
      username: `int-${ownerId.slice(0, 8)}`,
      rawCredential: 'test-secret',
    });
    app = createApp({ pool, ownerId, rateLimitPerMinute: 1000 });
  });

  afterAll(async () => {
    await pool.query('DELETE FROM users WHERE id = $1', [ownerId]);
    await pool.end();
  });

  it('should keep entries when their folder is deleted', async () => {
    const folder = await request(app).post('/api/folders').send({ name: 'Work' });
    expect(folder.status).toBe(201);

    const entry = await request(app)
      .post('/api/entries')
      .send({ name: 'Gmail', secret: 'test-password', folderId: folder.body.id });
    expect(entry.status).toBe(201);

    const inFolder = await request(app).get('/api/entries').query({ folderId: folder.body.id });
    expect(inFolder.body.map((e: { id: string }) => e.id)).toEqual([entry.body.id]);

    expect((await request(app).delete(`/api/folders/${folder.body.id}`)).status).toBe(204);

    const after = await request(app).get(`/api/entries/${entry.body.id}/secret`);
    expect(after.body.folderId).toBeNull();
    expect(after.body.secret).toBe('test-password');
  });

  it('should translate a duplicate username into 409', async () => {
    const username = `int-dup-${randomUUID().slice(0, 8)}`;

    const first = await request(app).post('/api/users').send({ username, rawCredential: 'test-secret' });
    const second = await request(app).post('/api/users').send({ username, rawCredential: 'test-secret' });

    expect(first.status).toBe(201);
    expect(second.status).toBe(409);

    await pool.query('DELETE FROM users WHERE id = $1', [first.body.id]);
  });

  it('should remove the vault with its owner', async () => {
    const other = await new UserService(pool).createUser({
      username: `int-del-${randomUUID().slice(0, 8)}`,
      rawCredential: 'test-secret',
    });
    await pool.query('INSERT INTO folders (id, user_id, name) VALUES ($1, $2, $3)', [
      randomUUID(),
      other.id,
      'Work',
    ]);

    expect(await new UserService(pool).deleteUser(other.id)).toBe(true);

    const left = await pool.query('SELECT id FROM folders WHERE user_id = $1', [other.id]);
    expect(left.rows).toEqual([]);
  });
});
