import { PoolClient } from 'pg';
import { database } from './connection';

/**
 * A pooled client with an open transaction.
 */
export type TransactionContext = PoolClient;

/**
 * Executes a callback within a database transaction.
 * * The callback MUST use the provided `tx` context for all database operations.
 * * Automatically commits on success, rolls back on error.
 */
export async function withTransaction<T>(operation: (tx: TransactionContext) => Promise<T>): Promise<T> {
  const client = await database.getClient();

  try {
    await client.query('BEGIN');
    const result = await operation(client);
    await client.query('COMMIT');
    return result;
  } catch (e) {
    await client.query('ROLLBACK');
    throw e;
  } finally {
    client.release();
  }
}
