import { Router } from 'express';
import { createCrudRouter } from '../../../../infra/http/crud.router';
import { SaleService } from '../../application/sale.service';
import { saleFilterSchema, saleInputSchema } from '../../domain/sale.entity';

export function createSaleRouter(service: SaleService): Router {
  return createCrudRouter(service, {
    inputSchema: saleInputSchema,
    filterSchema: saleFilterSchema,
  });
}
