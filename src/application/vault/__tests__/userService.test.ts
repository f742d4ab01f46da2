import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type pg from 'pg';
import { randomUUID } from 'crypto';
import { createMemoryPool, countRows } from '../../../infra/db/__tests__/memoryPool.js';
import { UserRepo } from '../../../infra/db/userRepo.js';
import { ConflictError, StorageError } from '../../errors.js';
import { FolderService } from '../folderService.js';
import { PasswordEntryService } from '../passwordEntryService.js';
import { UserService } from '../userService.js';

describe('UserService', () => {
  let pool: pg.Pool;
  let users: UserService;

  beforeEach(async () => {
    pool = await createMemoryPool();
    users = new UserService(pool);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('createUser', () => {
    it('should create a user with a hashed credential', async () => {
      const user = await users.createUser({ username: 'alice', rawCredential: 'test-secret' });

      expect(user.username).toBe('alice');
      expect(user.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(user.credentialHash).not.toBe('test-secret');
      expect(user.credentialHash.startsWith('$argon2')).toBe(true);
      expect(user.createdAt).toBeInstanceOf(Date);
    });

    it('should generate a distinct id for every user', async () => {
      const first = await users.createUser({ username: 'alice', rawCredential: 'test-secret' });
      const second = await users.createUser({ username: 'bob', rawCredential: 'test-secret' });

      expect(first.id).not.toBe(second.id);
    });

    it('should throw ConflictError for a taken username and persist nothing', async () => {
      await users.createUser({ username: 'alice', rawCredential: 'test-secret' });

      await expect(
        users.createUser({ username: 'alice', rawCredential: 'other-secret' })
      ).rejects.toThrow(ConflictError);

      expect(await countRows(pool, 'users', 'username = $1', ['alice'])).toBe(1);
    });

    it('should throw ConflictError when the insert hits the unique username constraint', async () => {
      // The name is free at lookup time and taken by the time the row is written
      const duplicate = Object.assign(
        new Error('duplicate key value violates unique constraint "users_username_key"'),
        { code: '23505' }
      );
      const findByUsername = vi.spyOn(UserRepo.prototype, 'findByUsername');
      vi.spyOn(UserRepo.prototype, 'create').mockRejectedValueOnce(duplicate);

      await expect(
        users.createUser({ username: 'alice', rawCredential: 'test-secret' })
      ).rejects.toThrow(new ConflictError('Username is already taken'));

      expect(findByUsername).toHaveBeenCalledWith('alice');
      expect(await countRows(pool, 'users')).toBe(0);
    });

    it('should throw StorageError for any other insert failure', async () => {
      const failure = Object.assign(new Error('value too long'), { code: '22001' });
      vi.spyOn(UserRepo.prototype, 'create').mockRejectedValueOnce(failure);

      const attempt = users.createUser({ username: 'alice', rawCredential: 'test-secret' });

      await expect(attempt).rejects.toThrow(StorageError);
      await expect(attempt).rejects.toHaveProperty('cause', failure);
    });
  });

  describe('lookups', () => {
    it('should find a user by id and by username', async () => {
      const created = await users.createUser({ username: 'alice', rawCredential: 'test-secret' });

      expect(await users.getUserById(created.id)).toEqual(created);
      expect(await users.getUserByUsername('alice')).toEqual(created);
    });

    it('should return null for unknown users', async () => {
      expect(await users.getUserById(randomUUID())).toBeNull();
      expect(await users.getUserByUsername('nobody')).toBeNull();
    });

    it('should return null for an id that cannot name a user', async () => {
      expect(await users.getUserById('not-a-uuid')).toBeNull();
      expect(await users.getUserById('')).toBeNull();
    });
  });

  describe('verifyCredential', () => {
    beforeEach(async () => {
      await users.createUser({ username: 'alice', rawCredential: 'test-secret' });
    });

    it('should return the user for the right credential', async () => {
      const user = await users.verifyCredential('alice', 'test-secret');
      expect(user?.username).toBe('alice');
    });

    it('should return null for a wrong credential', async () => {
      expect(await users.verifyCredential('alice', 'wrong-secret')).toBeNull();
    });

    it('should return null for an unknown username', async () => {
      expect(await users.verifyCredential('nobody', 'test-secret')).toBeNull();
    });

    it('should return null when the stored hash is unreadable', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      await pool.query('INSERT INTO users (id, username, credential_hash) VALUES ($1, $2, $3)', [
        randomUUID(),
        'mallory',
        'not-an-argon2-hash',
      ]);

      expect(await users.verifyCredential('mallory', 'test-secret')).toBeNull();
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('ensureUser', () => {
    it('should create the user under the given id once', async () => {
      const ownerId = randomUUID();

      const first = await users.ensureUser(ownerId, { username: 'owner', rawCredential: 'test-secret' });
      const second = await users.ensureUser(ownerId, { username: 'owner', rawCredential: 'test-secret' });

      expect(first.id).toBe(ownerId);
      expect(second).toEqual(first);
      expect(await countRows(pool, 'users')).toBe(1);
    });
  });

  describe('deleteUser', () => {
    it('should delete the user with all of its folders and entries', async () => {
      const folders = new FolderService(pool);
      const entries = new PasswordEntryService(pool);

      const alice = await users.createUser({ username: 'alice', rawCredential: 'test-secret' });
      const bob = await users.createUser({ username: 'bob', rawCredential: 'test-secret' });

      const work = await folders.createFolder(alice.id, { name: 'Work' });
      await folders.createFolder(alice.id, { name: 'Home' });
      await entries.createEntry(alice.id, { name: 'Gmail', folderId: work.id });
      await entries.createEntry(alice.id, { name: 'Bank' });
      await folders.createFolder(bob.id, { name: 'Work' });
      await entries.createEntry(bob.id, { name: 'GitHub' });

      expect(await users.deleteUser(alice.id)).toBe(true);

      expect(await users.getUserById(alice.id)).toBeNull();
      expect(await countRows(pool, 'folders', 'user_id = $1', [alice.id])).toBe(0);
      expect(await countRows(pool, 'password_entries', 'user_id = $1', [alice.id])).toBe(0);

      expect(await folders.listFolders(bob.id)).toHaveLength(1);
      expect(await entries.listEntries(bob.id)).toHaveLength(1);
    });

    it('should return false for an unknown user', async () => {
      expect(await users.deleteUser(randomUUID())).toBe(false);
    });

    it('should return false for an id that cannot name a user', async () => {
      expect(await users.deleteUser('not-a-uuid')).toBe(false);
    });
  });
});
