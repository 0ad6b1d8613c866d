import { Request, Router } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../../../../infra/http/async-handler';
import { logger } from '../../../../infra/logger';
import { AuthenticationError } from '../../../../shared/errors/auth.error';
import { DEFAULT_CULTURE } from '../../../../shared/i18n/cultures';
import { parseInput } from '../../../../shared/utils/validation';
import { AuthService } from '../../application/auth.service';
import { Principal } from '../../domain/principal';
import { renderLoginPage } from './views/login.view';

const credentialsSchema = z.object({
  username: z.string().default(''),
  password: z.string().default(''),
});

function regenerateSession(req: Request, principal: Principal): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.regenerate((regenerateError: unknown) => {
      if (regenerateError) return reject(regenerateError);
      req.session.user = principal;
      req.session.save((saveError: unknown) => (saveError ? reject(saveError) : resolve()));
    });
  });
}

function destroySession(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.destroy((error: unknown) => (error ? reject(error) : resolve()));
  });
}

/**
 * Cookie-session pages (`/simple-login`, `/login`, `/logout`).
 */
export function createSessionAuthRouter(authService: AuthService): Router {
  const router = Router();

  router.get('/simple-login', (req, res) => {
    if (req.session.user) {
      res.redirect('/dashboard');
      return;
    }
    res.type('html').send(renderLoginPage({ culture: req.culture ?? DEFAULT_CULTURE }));
  });

  router.post(
    '/login',
    asyncHandler(async (req, res) => {
      const { username, password } = parseInput(credentialsSchema, req.body ?? {});
      const principal = authService.verifyCredentials(username, password);

      if (!principal) {
        logger.warn('Rejected login attempt', { requestId: req.requestId, username });
        res
          .status(401)
          .type('html')
          .send(renderLoginPage({ culture: req.culture ?? DEFAULT_CULTURE, username, failed: true }));
        return;
      }

      await regenerateSession(req, principal);
      logger.info('User signed in', { requestId: req.requestId, username: principal.username });
      res.redirect('/dashboard');
    })
  );

  router.get(
    '/logout',
    asyncHandler(async (req, res) => {
      const username = req.session.user?.username;
      await destroySession(req);
      if (username) {
        logger.info('User signed out', { requestId: req.requestId, username });
      }
      res.redirect('/simple-login');
    })
  );

  return router;
}

/**
 * `POST /token`: exchanges the operator credentials for a bearer token.
 */
export function createTokenRouter(authService: AuthService): Router {
  const router = Router();

  router.post('/token', (req, res) => {
    const { username, password } = parseInput(credentialsSchema, req.body ?? {});
    const principal = authService.verifyCredentials(username, password);
    if (!principal) {
      throw new AuthenticationError('Invalid username or password');
    }
    res.json(authService.issueToken(principal));
  });

  return router;
}
