import { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../logger';

/**
 * Tags each request with an id (echoed as X-Request-Id) and logs its outcome.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  const incoming = req.get('x-request-id');
  const requestId = incoming && incoming.length <= 100 ? incoming : uuidv4();

  req.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  res.on('finish', () => {
    const meta = {
      requestId,
      method: req.method,
      path: req.originalUrl.split('?')[0],
      status: res.statusCode,
      duration: `${Date.now() - start}ms`,
    };
    const message = `HTTP ${meta.method} ${meta.path} responded ${meta.status}`;

    if (res.statusCode >= 500) {
      logger.error(message, meta);
    } else if (res.statusCode >= 400) {
      logger.warn(message, meta);
    } else {
      logger.info(message, meta);
    }
  });

  next();
}
