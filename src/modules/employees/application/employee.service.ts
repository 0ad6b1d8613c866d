import { TransactionContext } from '../../../infra/database/transaction';
import { AuditedCrudService, RecordLookup } from '../../../shared/application/audited-crud.service';
import { AuditLogRepositoryPort } from '../../audit/ports/audit-log.repository.port';
import { Employee, EmployeeFilter, EmployeeInput } from '../domain/employee.entity';
import { EmployeeRepositoryPort } from '../ports/employee.repository.port';

export class EmployeeService extends AuditedCrudService<Employee, EmployeeInput, EmployeeInput, EmployeeFilter> {
  protected readonly entity = 'employee';
  protected readonly label = 'Employee';

  constructor(
    repo: EmployeeRepositoryPort,
    private readonly branches: RecordLookup,
    audit: AuditLogRepositoryPort
  ) {
    super(repo, audit);
  }

  protected async prepare(input: EmployeeInput, _currentId: number | null, tx: TransactionContext): Promise<EmployeeInput> {
    await this.assertReferences(tx, [{ field: 'branchId', label: 'branch', id: input.branchId, lookup: this.branches }]);
    return input;
  }
}
