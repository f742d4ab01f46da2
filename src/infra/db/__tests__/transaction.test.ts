import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { PoolClient } from 'pg';
import { ConflictError, StorageError } from '../../../application/errors.js';
import {
  isUniqueViolation,
  withClient,
  withTransaction,
  type ConnectionSource,
} from '../transaction.js';
import { createMemoryPool } from './memoryPool.js';

describe('transaction helpers', () => {
  let client: PoolClient;
  let source: ConnectionSource;

  beforeEach(async () => {
    const pool = await createMemoryPool();
    client = await pool.connect();
    source = { connect: async () => client };
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('withTransaction', () => {
    it('should wrap the work in BEGIN and COMMIT and release the client', async () => {
      const query = vi.spyOn(client, 'query');
      const release = vi.spyOn(client, 'release');

      const result = await withTransaction(source, async () => 'done');

      expect(result).toBe('done');
      expect(query.mock.calls.map((call) => call[0])).toEqual(['BEGIN', 'COMMIT']);
      expect(release).toHaveBeenCalledTimes(1);
    });

    it('should roll back and raise StorageError for a driver failure', async () => {
      const query = vi.spyOn(client, 'query');
      const release = vi.spyOn(client, 'release');
      const failure = new Error('connection reset');

      const attempt = withTransaction(source, async () => {
        throw failure;
      });

      await expect(attempt).rejects.toThrow(StorageError);
      await expect(attempt).rejects.toHaveProperty('cause', failure);
      expect(query.mock.calls.map((call) => call[0])).toEqual(['BEGIN', 'ROLLBACK']);
      expect(release).toHaveBeenCalledTimes(1);
    });

    it('should roll back and pass application errors through unchanged', async () => {
      const query = vi.spyOn(client, 'query');
      const conflict = new ConflictError('Username is already taken');

      await expect(
        withTransaction(source, async () => {
          throw conflict;
        })
      ).rejects.toBe(conflict);
      expect(query.mock.calls.map((call) => call[0])).toEqual(['BEGIN', 'ROLLBACK']);
    });

    it('should raise StorageError when no connection can be made', async () => {
      const refused = new Error('connect ECONNREFUSED');
      const unreachable: ConnectionSource = { connect: () => Promise.reject(refused) };

      const attempt = withTransaction(unreachable, async () => 'never');

      await expect(attempt).rejects.toThrow(StorageError);
      await expect(attempt).rejects.toHaveProperty('cause', refused);
    });
  });

  describe('withClient', () => {
    it('should run the work without a transaction and release the client', async () => {
      const query = vi.spyOn(client, 'query');
      const release = vi.spyOn(client, 'release');

      const count = await withClient(source, async (c) => {
        const result = await c.query<{ id: string }>('SELECT id FROM users');
        return result.rows.length;
      });

      expect(count).toBe(0);
      expect(query.mock.calls.map((call) => call[0])).toEqual(['SELECT id FROM users']);
      expect(release).toHaveBeenCalledTimes(1);
    });

    it('should wrap a failing statement in StorageError', async () => {
      await expect(
        withClient(source, (c) => c.query('SELECT * FROM missing_table'))
      ).rejects.toThrow(StorageError);
    });
  });
});

describe('isUniqueViolation', () => {
  it('should recognise the unique violation code', () => {
    expect(isUniqueViolation({ code: '23505' })).toBe(true);
  });

  it('should reject other errors and non-objects', () => {
    expect(isUniqueViolation({ code: '23503' })).toBe(false);
    expect(isUniqueViolation(new Error('boom'))).toBe(false);
    expect(isUniqueViolation(null)).toBe(false);
    expect(isUniqueViolation('23505')).toBe(false);
  });
});
