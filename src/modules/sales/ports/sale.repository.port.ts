import { TransactionContext } from '../../../infra/database/transaction';
import { CrudRepositoryPort } from '../../../shared/application/audited-crud.service';
import { DailySummary } from '../../collections/domain/milk-collection.entity';
import { Sale, SaleDetail, SaleDraft, SaleFilter } from '../domain/sale.entity';

export interface SaleRepositoryPort extends CrudRepositoryPort<Sale, SaleDraft, SaleFilter> {
  summarize(from: string, to: string, tx?: TransactionContext): Promise<DailySummary>;
  totalDueForCustomer(customerId: number, tx?: TransactionContext): Promise<number>;
  findDetailed(from: string, to: string, tx?: TransactionContext): Promise<SaleDetail[]>;
}
