import { NextFunction, Request, Response } from 'express';
import { CULTURE_COOKIE, isCulture, matchCulture, negotiateCulture } from '../../../shared/i18n/cultures';

const ONE_YEAR_MS = 365 * 24 * 60 * 60 * 1000;

/**
 * Negotiates the request culture and exposes it as `req.culture`.
 * A valid `?culture=` value is persisted in a cookie. Expects `cookie-parser`
 * to run first; a cookie that fails to decode is kept raw and matches nothing.
 */
export function cultureNegotiation(req: Request, res: Response, next: NextFunction): void {
  const query = typeof req.query.culture === 'string' ? req.query.culture : undefined;
  const cookie: unknown = req.cookies?.[CULTURE_COOKIE];
  const culture = negotiateCulture({
    query,
    cookie: typeof cookie === 'string' ? cookie : undefined,
    acceptLanguage: req.get('accept-language'),
  });

  const requested = query ? matchCulture(query) : null;
  if (isCulture(requested)) {
    res.cookie(CULTURE_COOKIE, requested, { maxAge: ONE_YEAR_MS, sameSite: 'lax' });
  }

  req.culture = culture;
  res.setHeader('Content-Language', culture);
  next();
}
