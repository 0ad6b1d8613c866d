import { Router } from 'express';
import { asyncHandler } from '../../../../infra/http/async-handler';
import { parseInput } from '../../../../shared/utils/validation';
import { AuditLogService } from '../../application/audit-log.service';
import { auditLogFilterSchema } from '../../domain/audit-log.entity';

export function createAuditLogRouter(service: AuditLogService): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      res.json(await service.list(parseInput(auditLogFilterSchema, req.query)));
    })
  );

  return router;
}
