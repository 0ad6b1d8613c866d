import { BaseRepository } from '../../../infra/database/base.repository';
import { TransactionContext } from '../../../infra/database/transaction';
import { DbBranchRow } from '../../../shared/types/database.types';
import { Branch, BranchFilter, BranchInput } from '../domain/branch.entity';
import { BranchRepositoryPort } from '../ports/branch.repository.port';

export class BranchRepository extends BaseRepository implements BranchRepositoryPort {
  async findAll(filter: BranchFilter, tx?: TransactionContext): Promise<Branch[]> {
    const rows = filter.search
      ? await this.queryMany<DbBranchRow>(
          'SELECT * FROM branch WHERE name ILIKE $1 ORDER BY name ASC',
          [`%${filter.search}%`],
          tx
        )
      : await this.queryMany<DbBranchRow>('SELECT * FROM branch ORDER BY name ASC', [], tx);
    return rows.map(this.mapRowToEntity);
  }

  async findById(id: number, tx?: TransactionContext): Promise<Branch | null> {
    const row = await this.queryOne<DbBranchRow>('SELECT * FROM branch WHERE id = $1', [id], tx);
    return row ? this.mapRowToEntity(row) : null;
  }

  async insert(draft: BranchInput, tx: TransactionContext): Promise<Branch> {
    const row = await this.queryOneOrFail<DbBranchRow>(
      'INSERT INTO branch (name, address, contact) VALUES ($1, $2, $3) RETURNING *',
      [draft.name, draft.address, draft.contact],
      tx
    );
    return this.mapRowToEntity(row);
  }

  async update(id: number, draft: BranchInput, tx: TransactionContext): Promise<Branch | null> {
    const row = await this.queryOne<DbBranchRow>(
      'UPDATE branch SET name = $1, address = $2, contact = $3 WHERE id = $4 RETURNING *',
      [draft.name, draft.address, draft.contact, id],
      tx
    );
    return row ? this.mapRowToEntity(row) : null;
  }

  async delete(id: number, tx: TransactionContext): Promise<boolean> {
    const result = await this.query('DELETE FROM branch WHERE id = $1', [id], tx);
    return (result.rowCount ?? 0) > 0;
  }

  private mapRowToEntity(row: DbBranchRow): Branch {
    return {
      id: row.id,
      name: row.name,
      address: row.address,
      contact: row.contact,
    };
  }
}
