import { BaseRepository } from '../../../infra/database/base.repository';
import { TransactionContext } from '../../../infra/database/transaction';
import { DbFarmerRow } from '../../../shared/types/database.types';
import { Farmer, FarmerFilter, FarmerInput } from '../domain/farmer.entity';
import { FarmerRepositoryPort } from '../ports/farmer.repository.port';

export class FarmerRepository extends BaseRepository implements FarmerRepositoryPort {
  async findAll(filter: FarmerFilter, tx?: TransactionContext): Promise<Farmer[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.branchId !== undefined) {
      params.push(filter.branchId);
      conditions.push(`branch_id = $${params.length}`);
    }
    if (filter.search) {
      params.push(`%${filter.search}%`);
      conditions.push(`(name ILIKE $${params.length} OR code ILIKE $${params.length})`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = await this.queryMany<DbFarmerRow>(`SELECT * FROM farmer ${where} ORDER BY code ASC`, params, tx);
    return rows.map(this.mapRowToEntity);
  }

  async findById(id: number, tx?: TransactionContext): Promise<Farmer | null> {
    const row = await this.queryOne<DbFarmerRow>('SELECT * FROM farmer WHERE id = $1', [id], tx);
    return row ? this.mapRowToEntity(row) : null;
  }

  async findByCode(code: string, tx?: TransactionContext): Promise<Farmer | null> {
    const row = await this.queryOne<DbFarmerRow>('SELECT * FROM farmer WHERE code = $1', [code], tx);
    return row ? this.mapRowToEntity(row) : null;
  }

  async insert(draft: FarmerInput, tx: TransactionContext): Promise<Farmer> {
    const row = await this.queryOneOrFail<DbFarmerRow>(
      `
      INSERT INTO farmer (name, code, contact, bank_id, branch_id)
      VALUES ($1, $2, $3, $4, $5)
      RETURNING *
      `,
      [draft.name, draft.code, draft.contact, draft.bankId, draft.branchId],
      tx
    );
    return this.mapRowToEntity(row);
  }

  async update(id: number, draft: FarmerInput, tx: TransactionContext): Promise<Farmer | null> {
    const row = await this.queryOne<DbFarmerRow>(
      `
      UPDATE farmer
      SET name = $1, code = $2, contact = $3, bank_id = $4, branch_id = $5
      WHERE id = $6
      RETURNING *
      `,
      [draft.name, draft.code, draft.contact, draft.bankId, draft.branchId, id],
      tx
    );
    return row ? this.mapRowToEntity(row) : null;
  }

  async delete(id: number, tx: TransactionContext): Promise<boolean> {
    const result = await this.query('DELETE FROM farmer WHERE id = $1', [id], tx);
    return (result.rowCount ?? 0) > 0;
  }

  private mapRowToEntity(row: DbFarmerRow): Farmer {
    return {
      id: row.id,
      name: row.name,
      code: row.code,
      contact: row.contact,
      bankId: row.bank_id,
      branchId: row.branch_id,
    };
  }
}
