import { TransactionContext } from '../../../infra/database/transaction';
import { AuditedCrudService, RecordLookup } from '../../../shared/application/audited-crud.service';
import { AuditLogRepositoryPort } from '../../audit/ports/audit-log.repository.port';
import {
  collectionDue,
  MilkCollection,
  MilkCollectionDraft,
  MilkCollectionFilter,
  MilkCollectionInput,
} from '../domain/milk-collection.entity';
import { MilkCollectionRepositoryPort } from '../ports/milk-collection.repository.port';

export interface CollectionReferences {
  farmers: RecordLookup;
  shifts: RecordLookup;
  employees: RecordLookup;
}

export class MilkCollectionService extends AuditedCrudService<
  MilkCollection,
  MilkCollectionInput,
  MilkCollectionDraft,
  MilkCollectionFilter
> {
  protected readonly entity = 'milk_collection';
  protected readonly label = 'Milk collection';

  constructor(
    repo: MilkCollectionRepositoryPort,
    private readonly references: CollectionReferences,
    audit: AuditLogRepositoryPort
  ) {
    super(repo, audit);
  }

  protected async prepare(
    input: MilkCollectionInput,
    _currentId: number | null,
    tx: TransactionContext
  ): Promise<MilkCollectionDraft> {
    const dueAmount = collectionDue(input.quantityLitres, input.pricePerLitre);

    await this.assertReferences(tx, [
      { field: 'farmerId', label: 'farmer', id: input.farmerId, lookup: this.references.farmers },
      { field: 'shiftId', label: 'shift', id: input.shiftId, lookup: this.references.shifts },
      { field: 'createdBy', label: 'employee', id: input.createdBy, lookup: this.references.employees },
    ]);

    return { ...input, dueAmount };
  }
}
