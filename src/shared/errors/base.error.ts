// src/shared/errors/base.error.ts

/**
 * Abstract base class for all application-specific errors.
 * * Carries a stable error code and the HTTP status the error maps to.
 */
export abstract class AppError extends Error {
  /**
   * @param message - Human-readable description of the error.
   * @param code - Unique string identifier for the error type (e.g., 'DATABASE_ERROR').
   * @param statusCode - HTTP status associated with the error (default: 500).
   */
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}
