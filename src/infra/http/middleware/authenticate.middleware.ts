import { NextFunction, Request, RequestHandler, Response } from 'express';
import { AuthService } from '../../../modules/auth/application/auth.service';
import { AuthenticationError } from '../../../shared/errors/auth.error';

/**
 * API authentication: a session principal, or else an
 * `Authorization: Bearer <jwt>` header.
 */
export function createApiAuthentication(authService: AuthService): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const sessionUser = req.session?.user;
    if (sessionUser) {
      req.principal = sessionUser;
      return next();
    }

    const header = req.get('authorization');
    const match = header ? /^Bearer\s+(\S+)$/i.exec(header) : null;
    if (!match) {
      return next(new AuthenticationError());
    }

    try {
      req.principal = authService.verifyToken(match[1]);
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Page guard: anonymous visitors are sent to the login form.
 */
export function requireSession(req: Request, res: Response, next: NextFunction): void {
  const sessionUser = req.session?.user;
  if (!sessionUser) {
    res.redirect('/simple-login');
    return;
  }
  req.principal = sessionUser;
  next();
}
