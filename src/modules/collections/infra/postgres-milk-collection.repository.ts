import { BaseRepository } from '../../../infra/database/base.repository';
import { TransactionContext } from '../../../infra/database/transaction';
import { DbMilkCollectionRow, DbSummaryRow, DbTotalRow } from '../../../shared/types/database.types';
import { roundMoney, toIsoDate, toNumber } from '../../../shared/utils/values';
import {
  DailySummary,
  MilkCollection,
  MilkCollectionDetail,
  MilkCollectionDraft,
  MilkCollectionFilter,
} from '../domain/milk-collection.entity';
import { MilkCollectionRepositoryPort } from '../ports/milk-collection.repository.port';

type DbMilkCollectionDetailRow = DbMilkCollectionRow & {
  farmer_code: string | null;
  farmer_name: string | null;
  shift_name: string | null;
};

export class CollectionRepository extends BaseRepository implements MilkCollectionRepositoryPort {
  async findAll(filter: MilkCollectionFilter, tx?: TransactionContext): Promise<MilkCollection[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.from) {
      params.push(filter.from);
      conditions.push(`date >= $${params.length}`);
    }
    if (filter.to) {
      params.push(filter.to);
      conditions.push(`date <= $${params.length}`);
    }
    if (filter.farmerId !== undefined) {
      params.push(filter.farmerId);
      conditions.push(`farmer_id = $${params.length}`);
    }
    if (filter.shiftId !== undefined) {
      params.push(filter.shiftId);
      conditions.push(`shift_id = $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(filter.limit, filter.offset);
    const rows = await this.queryMany<DbMilkCollectionRow>(
      `
      SELECT * FROM milk_collection
      ${where}
      ORDER BY date DESC, id DESC
      LIMIT $${params.length - 1} OFFSET $${params.length}
      `,
      params,
      tx
    );
    return rows.map((row) => this.mapRowToEntity(row));
  }

  async findById(id: number, tx?: TransactionContext): Promise<MilkCollection | null> {
    const row = await this.queryOne<DbMilkCollectionRow>('SELECT * FROM milk_collection WHERE id = $1', [id], tx);
    return row ? this.mapRowToEntity(row) : null;
  }

  async insert(draft: MilkCollectionDraft, tx: TransactionContext): Promise<MilkCollection> {
    const row = await this.queryOneOrFail<DbMilkCollectionRow>(
      `
      INSERT INTO milk_collection
        (farmer_id, shift_id, date, qty_ltr, fat_pct, price_per_ltr, due_amt, notes, created_by)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      RETURNING *
      `,
      this.toParams(draft),
      tx
    );
    return this.mapRowToEntity(row);
  }

  async update(id: number, draft: MilkCollectionDraft, tx: TransactionContext): Promise<MilkCollection | null> {
    const row = await this.queryOne<DbMilkCollectionRow>(
      `
      UPDATE milk_collection
      SET farmer_id = $1, shift_id = $2, date = $3, qty_ltr = $4, fat_pct = $5,
          price_per_ltr = $6, due_amt = $7, notes = $8, created_by = $9
      WHERE id = $10
      RETURNING *
      `,
      [...this.toParams(draft), id],
      tx
    );
    return row ? this.mapRowToEntity(row) : null;
  }

  async delete(id: number, tx: TransactionContext): Promise<boolean> {
    const result = await this.query('DELETE FROM milk_collection WHERE id = $1', [id], tx);
    return (result.rowCount ?? 0) > 0;
  }

  async summarize(from: string, to: string, tx?: TransactionContext): Promise<DailySummary> {
    const row = await this.queryOne<DbSummaryRow>(
      `
      SELECT COUNT(*) AS count,
             COALESCE(SUM(qty_ltr), 0) AS litres,
             COALESCE(SUM(due_amt), 0) AS amount
      FROM milk_collection
      WHERE date >= $1 AND date <= $2
      `,
      [from, to],
      tx
    );
    return {
      count: toNumber(row?.count),
      litres: roundMoney(toNumber(row?.litres)),
      amount: roundMoney(toNumber(row?.amount)),
    };
  }

  async totalDueForFarmer(farmerId: number, tx?: TransactionContext): Promise<number> {
    const row = await this.queryOne<DbTotalRow>(
      'SELECT COALESCE(SUM(due_amt), 0) AS total FROM milk_collection WHERE farmer_id = $1',
      [farmerId],
      tx
    );
    return roundMoney(toNumber(row?.total));
  }

  async findDetailed(from: string, to: string, tx?: TransactionContext): Promise<MilkCollectionDetail[]> {
    const rows = await this.queryMany<DbMilkCollectionDetailRow>(
      `
      SELECT mc.*, f.code AS farmer_code, f.name AS farmer_name, s.name AS shift_name
      FROM milk_collection mc
      LEFT JOIN farmer f ON f.id = mc.farmer_id
      LEFT JOIN shift s ON s.id = mc.shift_id
      WHERE mc.date >= $1 AND mc.date <= $2
      ORDER BY mc.date ASC, mc.id ASC
      `,
      [from, to],
      tx
    );
    return rows.map((row) => ({
      ...this.mapRowToEntity(row),
      farmerCode: row.farmer_code,
      farmerName: row.farmer_name,
      shiftName: row.shift_name,
    }));
  }

  private toParams(draft: MilkCollectionDraft): unknown[] {
    return [
      draft.farmerId,
      draft.shiftId,
      draft.date,
      draft.quantityLitres,
      draft.fatPercent,
      draft.pricePerLitre,
      draft.dueAmount,
      draft.notes,
      draft.createdBy,
    ];
  }

  private mapRowToEntity(row: DbMilkCollectionRow): MilkCollection {
    return {
      id: row.id,
      farmerId: row.farmer_id,
      shiftId: row.shift_id,
      date: toIsoDate(row.date),
      quantityLitres: toNumber(row.qty_ltr),
      fatPercent: toNumber(row.fat_pct),
      pricePerLitre: toNumber(row.price_per_ltr),
      dueAmount: toNumber(row.due_amt),
      notes: row.notes,
      createdBy: row.created_by,
    };
  }
}
