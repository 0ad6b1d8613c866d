import { BaseRepository } from '../../../infra/database/base.repository';
import { TransactionContext } from '../../../infra/database/transaction';
import { DbShiftRow } from '../../../shared/types/database.types';
import { toTime } from '../../../shared/utils/values';
import { Shift, ShiftFilter, ShiftInput } from '../domain/shift.entity';
import { ShiftRepositoryPort } from '../ports/shift.repository.port';

export class ShiftRepository extends BaseRepository implements ShiftRepositoryPort {
  async findAll(_filter: ShiftFilter, tx?: TransactionContext): Promise<Shift[]> {
    const rows = await this.queryMany<DbShiftRow>('SELECT * FROM shift ORDER BY start_time ASC, id ASC', [], tx);
    return rows.map(this.mapRowToEntity);
  }

  async findById(id: number, tx?: TransactionContext): Promise<Shift | null> {
    const row = await this.queryOne<DbShiftRow>('SELECT * FROM shift WHERE id = $1', [id], tx);
    return row ? this.mapRowToEntity(row) : null;
  }

  async insert(draft: ShiftInput, tx: TransactionContext): Promise<Shift> {
    const row = await this.queryOneOrFail<DbShiftRow>(
      'INSERT INTO shift (name, start_time, end_time) VALUES ($1, $2, $3) RETURNING *',
      [draft.name, draft.startTime, draft.endTime],
      tx
    );
    return this.mapRowToEntity(row);
  }

  async update(id: number, draft: ShiftInput, tx: TransactionContext): Promise<Shift | null> {
    const row = await this.queryOne<DbShiftRow>(
      'UPDATE shift SET name = $1, start_time = $2, end_time = $3 WHERE id = $4 RETURNING *',
      [draft.name, draft.startTime, draft.endTime, id],
      tx
    );
    return row ? this.mapRowToEntity(row) : null;
  }

  async delete(id: number, tx: TransactionContext): Promise<boolean> {
    const result = await this.query('DELETE FROM shift WHERE id = $1', [id], tx);
    return (result.rowCount ?? 0) > 0;
  }

  private mapRowToEntity(row: DbShiftRow): Shift {
    return {
      id: row.id,
      name: row.name,
      startTime: toTime(row.start_time),
      endTime: toTime(row.end_time),
    };
  }
}
