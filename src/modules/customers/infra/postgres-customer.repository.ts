import { BaseRepository } from '../../../infra/database/base.repository';
import { TransactionContext } from '../../../infra/database/transaction';
import { DbCustomerRow } from '../../../shared/types/database.types';
import { Customer, CustomerFilter, CustomerInput } from '../domain/customer.entity';
import { CustomerRepositoryPort } from '../ports/customer.repository.port';

export class CustomerRepository extends BaseRepository implements CustomerRepositoryPort {
  async findAll(filter: CustomerFilter, tx?: TransactionContext): Promise<Customer[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.branchId !== undefined) {
      params.push(filter.branchId);
      conditions.push(`branch_id = $${params.length}`);
    }
    if (filter.search) {
      params.push(`%${filter.search}%`);
      conditions.push(`name ILIKE $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = await this.queryMany<DbCustomerRow>(`SELECT * FROM customer ${where} ORDER BY name ASC`, params, tx);
    return rows.map(this.mapRowToEntity);
  }

  async findById(id: number, tx?: TransactionContext): Promise<Customer | null> {
    const row = await this.queryOne<DbCustomerRow>('SELECT * FROM customer WHERE id = $1', [id], tx);
    return row ? this.mapRowToEntity(row) : null;
  }

  async insert(draft: CustomerInput, tx: TransactionContext): Promise<Customer> {
    const row = await this.queryOneOrFail<DbCustomerRow>(
      'INSERT INTO customer (name, contact, branch_id) VALUES ($1, $2, $3) RETURNING *',
      [draft.name, draft.contact, draft.branchId],
      tx
    );
    return this.mapRowToEntity(row);
  }

  async update(id: number, draft: CustomerInput, tx: TransactionContext): Promise<Customer | null> {
    const row = await this.queryOne<DbCustomerRow>(
      'UPDATE customer SET name = $1, contact = $2, branch_id = $3 WHERE id = $4 RETURNING *',
      [draft.name, draft.contact, draft.branchId, id],
      tx
    );
    return row ? this.mapRowToEntity(row) : null;
  }

  async delete(id: number, tx: TransactionContext): Promise<boolean> {
    const result = await this.query('DELETE FROM customer WHERE id = $1', [id], tx);
    return (result.rowCount ?? 0) > 0;
  }

  private mapRowToEntity(row: DbCustomerRow): Customer {
    return {
      id: row.id,
      name: row.name,
      contact: row.contact,
      branchId: row.branch_id,
    };
  }
}
