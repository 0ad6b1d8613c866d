import { TransactionContext } from '../../../infra/database/transaction';
import { AuditedCrudService, RecordLookup } from '../../../shared/application/audited-crud.service';
import { ConflictError } from '../../../shared/errors/database.error';
import { AuditLogRepositoryPort } from '../../audit/ports/audit-log.repository.port';
import { Farmer, FarmerFilter, FarmerInput } from '../domain/farmer.entity';
import { FarmerRepositoryPort } from '../ports/farmer.repository.port';

export class FarmerService extends AuditedCrudService<Farmer, FarmerInput, FarmerInput, FarmerFilter> {
  protected readonly entity = 'farmer';
  protected readonly label = 'Farmer';

  constructor(
    private readonly farmers: FarmerRepositoryPort,
    private readonly branches: RecordLookup,
    audit: AuditLogRepositoryPort
  ) {
    super(farmers, audit);
  }

  /**
   * Farmer codes are unique; the database constraint backs this check up.
   */
  protected async prepare(input: FarmerInput, currentId: number | null, tx: TransactionContext): Promise<FarmerInput> {
    const existing = await this.farmers.findByCode(input.code, tx);
    if (existing && existing.id !== currentId) {
      throw new ConflictError(`Farmer code '${input.code}' is already in use`);
    }

    await this.assertReferences(tx, [{ field: 'branchId', label: 'branch', id: input.branchId, lookup: this.branches }]);
    return input;
  }
}
