import { Router } from 'express';
import { createCrudRouter } from '../../../../infra/http/crud.router';
import { ShiftService } from '../../application/shift.service';
import { shiftFilterSchema, shiftInputSchema } from '../../domain/shift.entity';

export function createShiftRouter(service: ShiftService): Router {
  return createCrudRouter(service, {
    inputSchema: shiftInputSchema,
    filterSchema: shiftFilterSchema,
  });
}
