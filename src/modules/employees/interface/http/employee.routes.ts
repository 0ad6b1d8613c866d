import { Router } from 'express';
import { createCrudRouter } from '../../../../infra/http/crud.router';
import { EmployeeService } from '../../application/employee.service';
import { employeeFilterSchema, employeeInputSchema } from '../../domain/employee.entity';

export function createEmployeeRouter(service: EmployeeService): Router {
  return createCrudRouter(service, {
    inputSchema: employeeInputSchema,
    filterSchema: employeeFilterSchema,
  });
}
