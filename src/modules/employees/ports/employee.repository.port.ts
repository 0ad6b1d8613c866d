import { CrudRepositoryPort } from '../../../shared/application/audited-crud.service';
import { Employee, EmployeeFilter, EmployeeInput } from '../domain/employee.entity';

export type EmployeeRepositoryPort = CrudRepositoryPort<Employee, EmployeeInput, EmployeeFilter>;
