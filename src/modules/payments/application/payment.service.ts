import { TransactionContext } from '../../../infra/database/transaction';
import { AuditedCrudService, RecordLookup } from '../../../shared/application/audited-crud.service';
import { AuditEntity } from '../../audit/domain/audit-log.entity';
import { AuditLogRepositoryPort } from '../../audit/ports/audit-log.repository.port';
import { PartyType, Payment, PaymentFilter, PaymentInput } from '../domain/payment.entity';
import { PaymentRepositoryPort } from '../ports/payment.repository.port';

export interface PaymentReferences {
  parties: RecordLookup;
  employees: RecordLookup;
}

export class PaymentService extends AuditedCrudService<Payment, PaymentInput, PaymentInput, PaymentFilter> {
  protected readonly entity: AuditEntity;
  protected readonly label: string;

  constructor(
    repo: PaymentRepositoryPort,
    private readonly references: PaymentReferences,
    audit: AuditLogRepositoryPort,
    private readonly partyType: PartyType
  ) {
    super(repo, audit);
    this.entity = partyType === 'farmer' ? 'payment_farmer' : 'payment_customer';
    this.label = partyType === 'farmer' ? 'Farmer payment' : 'Customer payment';
  }

  protected async prepare(input: PaymentInput, _currentId: number | null, tx: TransactionContext): Promise<PaymentInput> {
    await this.assertReferences(tx, [
      { field: 'partyId', label: this.partyType, id: input.partyId, lookup: this.references.parties },
      { field: 'createdBy', label: 'employee', id: input.createdBy, lookup: this.references.employees },
    ]);
    return input;
  }
}
