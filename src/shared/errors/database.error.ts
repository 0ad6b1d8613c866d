// src/shared/errors/database.error.ts
import { AppError } from './base.error';

/**
 * Wraps low-level driver exceptions (connection failures, query errors)
 * into the application error format.
 */
export class DatabaseError extends AppError {
  constructor(message: string, public readonly originalError?: Error) {
    super(message, 'DATABASE_ERROR', 500);
  }
}

/**
 * Raised when a lookup by id or unique key returns no row.
 */
export class RecordNotFoundError extends AppError {
  /**
   * @param entity - The name of the entity being searched for (e.g., 'Farmer').
   * @param identifier - The identifier value used in the failed lookup.
   */
  constructor(entity: string, identifier: string) {
    super(`${entity} with identifier '${identifier}' not found`, 'RECORD_NOT_FOUND', 404);
  }
}

/**
 * Raised when a write collides with a uniqueness or reference constraint.
 */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 'CONFLICT', 409);
  }
}
