import { TransactionContext } from '../../../infra/database/transaction';
import { AuditedCrudService, RecordLookup } from '../../../shared/application/audited-crud.service';
import { AuditLogRepositoryPort } from '../../audit/ports/audit-log.repository.port';
import { Customer, CustomerFilter, CustomerInput } from '../domain/customer.entity';
import { CustomerRepositoryPort } from '../ports/customer.repository.port';

export class CustomerService extends AuditedCrudService<Customer, CustomerInput, CustomerInput, CustomerFilter> {
  protected readonly entity = 'customer';
  protected readonly label = 'Customer';

  constructor(
    repo: CustomerRepositoryPort,
    private readonly branches: RecordLookup,
    audit: AuditLogRepositoryPort
  ) {
    super(repo, audit);
  }

  protected async prepare(input: CustomerInput, _currentId: number | null, tx: TransactionContext): Promise<CustomerInput> {
    await this.assertReferences(tx, [{ field: 'branchId', label: 'branch', id: input.branchId, lookup: this.branches }]);
    return input;
  }
}
