import { Router } from 'express';
import { createCrudRouter } from '../../../../infra/http/crud.router';
import { BranchService } from '../../application/branch.service';
import { branchFilterSchema, branchInputSchema } from '../../domain/branch.entity';

export function createBranchRouter(service: BranchService): Router {
  return createCrudRouter(service, {
    inputSchema: branchInputSchema,
    filterSchema: branchFilterSchema,
  });
}
