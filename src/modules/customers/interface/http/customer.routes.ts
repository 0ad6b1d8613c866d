import { Router } from 'express';
import { createCrudRouter } from '../../../../infra/http/crud.router';
import { CustomerService } from '../../application/customer.service';
import { customerFilterSchema, customerInputSchema } from '../../domain/customer.entity';

export function createCustomerRouter(service: CustomerService): Router {
  return createCrudRouter(service, {
    inputSchema: customerInputSchema,
    filterSchema: customerFilterSchema,
  });
}
