// src/shared/errors/auth.error.ts
import { AppError } from './base.error';

export class AuthenticationError extends AppError {
  constructor(message = 'Authentication required') {
    super(message, 'UNAUTHORIZED', 401);
  }
}
