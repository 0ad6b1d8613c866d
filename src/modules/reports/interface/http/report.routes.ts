import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../../../../infra/http/async-handler';
import { logger } from '../../../../infra/logger';
import { DEFAULT_CULTURE } from '../../../../shared/i18n/cultures';
import { isoDateSchema, parseInput } from '../../../../shared/utils/validation';
import { firstDayOfMonthIso, todayIso } from '../../../../shared/utils/values';
import { ReportService } from '../../application/report.service';
import { REPORT_FORMATS, reportFileName, reportKindSchema } from '../../domain/tabular-report';
import { ReportRenderer } from '../../ports/report-renderer.port';

const reportQuerySchema = z.object({
  format: z.enum(REPORT_FORMATS).default('xlsx'),
  from: isoDateSchema.optional(),
  to: isoDateSchema.optional(),
});

/**
 * `GET /:kind?format=xlsx|pdf&from=&to=`, answered as a file download.
 * The range defaults to the first of the current month through today.
 */
export function createReportRouter(service: ReportService, renderers: ReportRenderer[]): Router {
  const router = Router();

  router.get(
    '/:kind',
    asyncHandler(async (req, res) => {
      const kind = parseInput(reportKindSchema, req.params.kind);
      const query = parseInput(reportQuerySchema, req.query);
      const renderer = renderers.find((candidate) => candidate.format === query.format);
      if (!renderer) {
        throw new Error(`No renderer registered for ${query.format}`);
      }

      const now = new Date();
      const range = { from: query.from ?? firstDayOfMonthIso(now), to: query.to ?? todayIso(now) };
      const report = await service.build(kind, range, req.culture ?? DEFAULT_CULTURE);
      const body = await renderer.render(report);

      logger.info('Report generated', {
        requestId: req.requestId,
        kind,
        format: renderer.format,
        rows: report.rows.length,
      });

      res.attachment(reportFileName(kind, range, renderer.extension));
      res.type(renderer.contentType);
      res.send(body);
    })
  );

  return router;
}
