import { TransactionContext } from '../../../infra/database/transaction';
import { CrudRepositoryPort } from '../../../shared/application/audited-crud.service';
import {
  DailySummary,
  MilkCollection,
  MilkCollectionDetail,
  MilkCollectionDraft,
  MilkCollectionFilter,
} from '../domain/milk-collection.entity';

export interface MilkCollectionRepositoryPort
  extends CrudRepositoryPort<MilkCollection, MilkCollectionDraft, MilkCollectionFilter> {
  summarize(from: string, to: string, tx?: TransactionContext): Promise<DailySummary>;
  totalDueForFarmer(farmerId: number, tx?: TransactionContext): Promise<number>;
  findDetailed(from: string, to: string, tx?: TransactionContext): Promise<MilkCollectionDetail[]>;
}
