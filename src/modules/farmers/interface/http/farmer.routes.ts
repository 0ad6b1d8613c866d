import { Router } from 'express';
import { createCrudRouter } from '../../../../infra/http/crud.router';
import { FarmerService } from '../../application/farmer.service';
import { farmerFilterSchema, farmerInputSchema } from '../../domain/farmer.entity';

export function createFarmerRouter(service: FarmerService): Router {
  return createCrudRouter(service, {
    inputSchema: farmerInputSchema,
    filterSchema: farmerFilterSchema,
  });
}
