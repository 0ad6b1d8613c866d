import { Router } from 'express';
import { createCrudRouter } from '../../../../infra/http/crud.router';
import { MilkCollectionService } from '../../application/milk-collection.service';
import { milkCollectionFilterSchema, milkCollectionInputSchema } from '../../domain/milk-collection.entity';

export function createMilkCollectionRouter(service: MilkCollectionService): Router {
  return createCrudRouter(service, {
    inputSchema: milkCollectionInputSchema,
    filterSchema: milkCollectionFilterSchema,
  });
}
