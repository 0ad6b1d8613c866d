import { QueryResult, QueryResultRow } from 'pg';
import { database } from './connection';
import { ConflictError, DatabaseError } from '../../shared/errors/database.error';
import { ValidationError } from '../../shared/errors/validation.error';
import { logger } from '../logger';
import { TransactionContext } from './transaction';

const PG_UNIQUE_VIOLATION = '23505';
const PG_FOREIGN_KEY_VIOLATION = '23503';

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Abstract Base Repository Class.
 */
export abstract class BaseRepository {
  /**
   * Executes a parameterized SQL statement.
   * @param tx - TransactionContext (mandatory for writes, optional for reads).
   */
  protected async query<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = [],
    tx?: TransactionContext
  ): Promise<QueryResult<T>> {
    try {
      if (tx) {
        return await tx.query<T>(text, params);
      }
      return await database.query<T>(text, params);
    } catch (error) {
      if (error instanceof DatabaseError) {
        throw this.translate(error.originalError ?? error, text);
      }
      throw this.translate(error, text);
    }
  }

  protected async queryOne<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = [],
    tx?: TransactionContext
  ): Promise<T | null> {
    const result = await this.query<T>(text, params, tx);
    return result.rows[0] ?? null;
  }

  /**
   * Like `queryOne`, for statements that must yield a row (INSERT ... RETURNING).
   */
  protected async queryOneOrFail<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = [],
    tx?: TransactionContext
  ): Promise<T> {
    const row = await this.queryOne<T>(text, params, tx);
    if (!row) {
      throw new DatabaseError(`${this.constructor.name}: statement returned no row`);
    }
    return row;
  }

  protected async queryMany<T extends QueryResultRow = QueryResultRow>(
    text: string,
    params: unknown[] = [],
    tx?: TransactionContext
  ): Promise<T[]> {
    const result = await this.query<T>(text, params, tx);
    return result.rows;
  }

  private translate(error: unknown, text: string): Error {
    const err = error instanceof Error ? error : new Error(String(error));
    const code = errorCode(error);

    logger.error('Repository query error', {
      repository: this.constructor.name,
      code,
      error: err.message,
    });

    if (code === PG_UNIQUE_VIOLATION) {
      return new ConflictError('A record with the same unique value already exists');
    }
    if (code === PG_FOREIGN_KEY_VIOLATION) {
      // A failing DELETE is blocked by dependents; a failing write points at a missing row.
      return /^\s*DELETE\b/i.test(text)
        ? new ConflictError('The record is referenced by another record')
        : new ValidationError('The record references a row that does not exist');
    }
    return new DatabaseError(err.message, err);
  }
}
