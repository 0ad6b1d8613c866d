import { TransactionContext } from '../../../infra/database/transaction';
import { CrudRepositoryPort } from '../../../shared/application/audited-crud.service';
import { Payment, PaymentFilter, PaymentInput } from '../domain/payment.entity';

export interface PaymentRepositoryPort extends CrudRepositoryPort<Payment, PaymentInput, PaymentFilter> {
  totalPaid(partyId: number, tx?: TransactionContext): Promise<number>;
}
