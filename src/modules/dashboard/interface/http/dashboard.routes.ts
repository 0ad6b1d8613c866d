import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../../../../infra/http/async-handler';
import { requireSession } from '../../../../infra/http/middleware/authenticate.middleware';
import { DEFAULT_CULTURE } from '../../../../shared/i18n/cultures';
import { isoDateSchema, parseInput } from '../../../../shared/utils/validation';
import { todayIso } from '../../../../shared/utils/values';
import { DashboardService } from '../../application/dashboard.service';
import { renderDashboardPage } from './views/dashboard.view';

const summaryQuerySchema = z.object({
  date: isoDateSchema.optional(),
});

/** `GET /dashboard`, the signed-in landing page. */
export function createDashboardPageRouter(service: DashboardService): Router {
  const router = Router();

  router.get(
    '/dashboard',
    requireSession,
    asyncHandler(async (req, res) => {
      const summary = await service.getSummary(todayIso());
      res.type('html').send(
        renderDashboardPage({
          culture: req.culture ?? DEFAULT_CULTURE,
          username: req.principal?.username ?? '',
          summary,
        })
      );
    })
  );

  return router;
}

/** `GET /summary?date=YYYY-MM-DD`, defaulting to today. */
export function createDashboardApiRouter(service: DashboardService): Router {
  const router = Router();

  router.get(
    '/summary',
    asyncHandler(async (req, res) => {
      const { date } = parseInput(summaryQuerySchema, req.query);
      res.json(await service.getSummary(date ?? todayIso()));
    })
  );

  return router;
}
