import { BaseRepository } from '../../../infra/database/base.repository';
import { TransactionContext } from '../../../infra/database/transaction';
import { DbEmployeeRow } from '../../../shared/types/database.types';
import { Employee, EmployeeFilter, EmployeeInput } from '../domain/employee.entity';
import { EmployeeRepositoryPort } from '../ports/employee.repository.port';

export class EmployeeRepository extends BaseRepository implements EmployeeRepositoryPort {
  async findAll(filter: EmployeeFilter, tx?: TransactionContext): Promise<Employee[]> {
    const rows =
      filter.branchId !== undefined
        ? await this.queryMany<DbEmployeeRow>(
            'SELECT * FROM employee WHERE branch_id = $1 ORDER BY name ASC',
            [filter.branchId],
            tx
          )
        : await this.queryMany<DbEmployeeRow>('SELECT * FROM employee ORDER BY name ASC', [], tx);
    return rows.map(this.mapRowToEntity);
  }

  async findById(id: number, tx?: TransactionContext): Promise<Employee | null> {
    const row = await this.queryOne<DbEmployeeRow>('SELECT * FROM employee WHERE id = $1', [id], tx);
    return row ? this.mapRowToEntity(row) : null;
  }

  async insert(draft: EmployeeInput, tx: TransactionContext): Promise<Employee> {
    const row = await this.queryOneOrFail<DbEmployeeRow>(
      `
      INSERT INTO employee (name, contact, branch_id, role)
      VALUES ($1, $2, $3, $4)
      RETURNING *
      `,
      [draft.name, draft.contact, draft.branchId, draft.role],
      tx
    );
    return this.mapRowToEntity(row);
  }

  async update(id: number, draft: EmployeeInput, tx: TransactionContext): Promise<Employee | null> {
    const row = await this.queryOne<DbEmployeeRow>(
      `
      UPDATE employee
      SET name = $1, contact = $2, branch_id = $3, role = $4
      WHERE id = $5
      RETURNING *
      `,
      [draft.name, draft.contact, draft.branchId, draft.role, id],
      tx
    );
    return row ? this.mapRowToEntity(row) : null;
  }

  async delete(id: number, tx: TransactionContext): Promise<boolean> {
    const result = await this.query('DELETE FROM employee WHERE id = $1', [id], tx);
    return (result.rowCount ?? 0) > 0;
  }

  private mapRowToEntity(row: DbEmployeeRow): Employee {
    return {
      id: row.id,
      name: row.name,
      contact: row.contact,
      branchId: row.branch_id,
      role: row.role,
    };
  }
}
