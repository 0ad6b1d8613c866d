import { TransactionContext } from '../../../infra/database/transaction';
import { AuditedCrudService, RecordLookup } from '../../../shared/application/audited-crud.service';
import { AuditLogRepositoryPort } from '../../audit/ports/audit-log.repository.port';
import { computeSaleAmounts, Sale, SaleDraft, SaleFilter, SaleInput } from '../domain/sale.entity';
import { SaleRepositoryPort } from '../ports/sale.repository.port';

export interface SaleReferences {
  customers: RecordLookup;
  shifts: RecordLookup;
  employees: RecordLookup;
}

export class SaleService extends AuditedCrudService<Sale, SaleInput, SaleDraft, SaleFilter> {
  protected readonly entity = 'sale';
  protected readonly label = 'Sale';

  constructor(
    repo: SaleRepositoryPort,
    private readonly references: SaleReferences,
    audit: AuditLogRepositoryPort
  ) {
    super(repo, audit);
  }

  protected async prepare(input: SaleInput, _currentId: number | null, tx: TransactionContext): Promise<SaleDraft> {
    const { due } = computeSaleAmounts(input.quantityLitres, input.unitPrice, input.discount, input.paidAmount);

    await this.assertReferences(tx, [
      { field: 'customerId', label: 'customer', id: input.customerId, lookup: this.references.customers },
      { field: 'shiftId', label: 'shift', id: input.shiftId, lookup: this.references.shifts },
      { field: 'createdBy', label: 'employee', id: input.createdBy, lookup: this.references.employees },
    ]);

    return { ...input, dueAmount: due };
  }
}
