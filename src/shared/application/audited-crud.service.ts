import { TransactionContext, withTransaction } from '../../infra/database/transaction';
import { RecordNotFoundError } from '../errors/database.error';
import { ValidationError } from '../errors/validation.error';
import { AuditEntity } from '../../modules/audit/domain/audit-log.entity';
import { AuditLogRepositoryPort } from '../../modules/audit/ports/audit-log.repository.port';

export interface CrudRepositoryPort<TRecord, TDraft, TFilter> {
  findAll(filter: TFilter, tx?: TransactionContext): Promise<TRecord[]>;
  findById(id: number, tx?: TransactionContext): Promise<TRecord | null>;
  insert(draft: TDraft, tx: TransactionContext): Promise<TRecord>;
  update(id: number, draft: TDraft, tx: TransactionContext): Promise<TRecord | null>;
  delete(id: number, tx: TransactionContext): Promise<boolean>;
}

export interface RecordLookup {
  findById(id: number, tx?: TransactionContext): Promise<{ id: number } | null>;
}

/** A foreign key on the input; a null id is an absent optional reference. */
export interface ReferenceCheck {
  field: string;
  label: string;
  id: number | null;
  lookup: RecordLookup;
}

/**
 * List/get/create/update/delete over a repository, with every write wrapped
 * in a transaction that also records an audit entry.
 *
 * Subclasses turn validated input into the persisted draft in `prepare`,
 * which is where derived amounts and cross-row checks live.
 */
export abstract class AuditedCrudService<TRecord extends { id: number }, TInput, TDraft, TFilter> {
  protected abstract readonly entity: AuditEntity;
  protected abstract readonly label: string;

  constructor(
    protected readonly repo: CrudRepositoryPort<TRecord, TDraft, TFilter>,
    protected readonly audit: AuditLogRepositoryPort
  ) {}

  protected abstract prepare(input: TInput, currentId: number | null, tx: TransactionContext): Promise<TDraft>;

  /**
   * Rejects input whose foreign keys point at rows that do not exist.
   *
   * @throws {ValidationError} With one entry per unknown reference.
   */
  protected async assertReferences(tx: TransactionContext, checks: ReferenceCheck[]): Promise<void> {
    const fields: Record<string, string> = {};
    const labels: string[] = [];

    for (const check of checks) {
      if (check.id === null) continue;
      if (!(await check.lookup.findById(check.id, tx))) {
        fields[check.field] = `No ${check.label} with id ${check.id}`;
        labels.push(check.label);
      }
    }

    if (labels.length > 0) {
      throw new ValidationError(`Unknown ${labels.join(', ')}`, fields);
    }
  }

  async list(filter: TFilter): Promise<TRecord[]> {
    return this.repo.findAll(filter);
  }

  async get(id: number): Promise<TRecord> {
    const record = await this.repo.findById(id);
    if (!record) {
      throw new RecordNotFoundError(this.label, String(id));
    }
    return record;
  }

  async create(input: TInput, actor: string): Promise<TRecord> {
    return withTransaction(async (tx) => {
      const draft = await this.prepare(input, null, tx);
      const record = await this.repo.insert(draft, tx);
      await this.audit.record(
        { entity: this.entity, entityId: record.id, action: 'create', actor, details: record },
        tx
      );
      return record;
    });
  }

  async update(id: number, input: TInput, actor: string): Promise<TRecord> {
    return withTransaction(async (tx) => {
      const before = await this.repo.findById(id, tx);
      if (!before) {
        throw new RecordNotFoundError(this.label, String(id));
      }

      const draft = await this.prepare(input, id, tx);
      const after = await this.repo.update(id, draft, tx);
      if (!after) {
        throw new RecordNotFoundError(this.label, String(id));
      }

      await this.audit.record(
        { entity: this.entity, entityId: id, action: 'update', actor, details: { before, after } },
        tx
      );
      return after;
    });
  }

  async remove(id: number, actor: string): Promise<void> {
    await withTransaction(async (tx) => {
      const before = await this.repo.findById(id, tx);
      if (!before || !(await this.repo.delete(id, tx))) {
        throw new RecordNotFoundError(this.label, String(id));
      }

      await this.audit.record(
        { entity: this.entity, entityId: id, action: 'delete', actor, details: { before } },
        tx
      );
    });
  }
}
