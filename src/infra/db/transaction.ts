import type { PoolClient } from 'pg';
import {
  ConflictError,
  NotFoundError,
  StorageError,
  UnauthorizedError,
  ValidationError,
} from '../../application/errors.js';

/**
 * Anything that hands out a pooled connection. `pg.Pool` satisfies it.
 */
export interface ConnectionSource {
  connect(): Promise<PoolClient>;
}

const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

function isApplicationError(error: unknown): boolean {
  return (
    error instanceof ConflictError ||
    error instanceof NotFoundError ||
    error instanceof UnauthorizedError ||
    error instanceof ValidationError ||
    error instanceof StorageError
  );
}

/**
 * Application errors pass through; anything else came from the driver.
 */
export function toStorageError(error: unknown): Error {
  if (isApplicationError(error) && error instanceof Error) {
    return error;
  }
  return new StorageError('Storage failure', error);
}

async function connect(source: ConnectionSource): Promise<PoolClient> {
  try {
    return await source.connect();
  } catch (error) {
    throw toStorageError(error);
  }
}

/**
 * Run read-only work on one pooled connection.
 */
export async function withClient<T>(
  source: ConnectionSource,
  work: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await connect(source);

  try {
    return await work(client);
  } catch (error) {
    throw toStorageError(error);
  } finally {
    client.release();
  }
}

/**
 * Run work inside BEGIN/COMMIT on one pooled connection.
 * Any failure rolls back before it is rethrown.
 */
export async function withTransaction<T>(
  source: ConnectionSource,
  work: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await connect(source);

  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      console.error('Rollback failed:', rollbackError);
    }
    throw toStorageError(error);
  } finally {
    client.release();
  }
}
