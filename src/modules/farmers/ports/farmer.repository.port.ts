import { CrudRepositoryPort } from '../../../shared/application/audited-crud.service';
import { TransactionContext } from '../../../infra/database/transaction';
import { Farmer, FarmerFilter, FarmerInput } from '../domain/farmer.entity';

export interface FarmerRepositoryPort extends CrudRepositoryPort<Farmer, FarmerInput, FarmerFilter> {
  findByCode(code: string, tx?: TransactionContext): Promise<Farmer | null>;
}
