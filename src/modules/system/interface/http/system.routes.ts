import { Router } from 'express';
import { asyncHandler } from '../../../../infra/http/async-handler';
import { database } from '../../../../infra/database/connection';
import { logger } from '../../../../infra/logger';
import { APP_VERSION } from '../../../../shared/constants';
import { todayIso } from '../../../../shared/utils/values';

export interface SystemInfo {
  environment: string;
}

/**
 * `GET /health` and `GET /version`. Neither touches the database, so they
 * also back the fallback server.
 */
export function createHealthRouter(info: SystemInfo): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString(), environment: info.environment });
  });

  // `build` is the date the answer was produced, in UTC.
  router.get('/version', (_req, res) => {
    res.json({ version: APP_VERSION, build: todayIso() });
  });

  return router;
}

/**
 * `GET /api/test-db` (alias `/db-test`): runs `SELECT 1` and reports the result.
 */
export function createDatabaseCheckRouter(): Router {
  const router = Router();

  const handler = asyncHandler(async (req, res) => {
    try {
      const result = await database.ping();
      res.json({ success: true, result });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Database check failed', { requestId: req.requestId, error: message });
      res.status(500).json({ success: false, error: `Database error: ${message}` });
    }
  });

  router.get('/api/test-db', handler);
  router.get('/db-test', handler);

  return router;
}
