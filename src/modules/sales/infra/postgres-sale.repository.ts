import { BaseRepository } from '../../../infra/database/base.repository';
import { TransactionContext } from '../../../infra/database/transaction';
import { DbSaleRow, DbSummaryRow, DbTotalRow } from '../../../shared/types/database.types';
import { roundMoney, toIsoDate, toNumber } from '../../../shared/utils/values';
import { DailySummary } from '../../collections/domain/milk-collection.entity';
import { Sale, SaleDetail, SaleDraft, SaleFilter } from '../domain/sale.entity';
import { SaleRepositoryPort } from '../ports/sale.repository.port';

type DbSaleDetailRow = DbSaleRow & {
  customer_name: string | null;
  shift_name: string | null;
};

export class SaleRepository extends BaseRepository implements SaleRepositoryPort {
  async findAll(filter: SaleFilter, tx?: TransactionContext): Promise<Sale[]> {
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
    if (filter.customerId !== undefined) {
      params.push(filter.customerId);
      conditions.push(`customer_id = $${params.length}`);
    }
    if (filter.shiftId !== undefined) {
      params.push(filter.shiftId);
      conditions.push(`shift_id = $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(filter.limit, filter.offset);
    const rows = await this.queryMany<DbSaleRow>(
      `
      SELECT * FROM sale
      ${where}
      ORDER BY date DESC, id DESC
      LIMIT $${params.length - 1} OFFSET $${params.length}
      `,
      params,
      tx
    );
    return rows.map((row) => this.mapRowToEntity(row));
  }

  async findById(id: number, tx?: TransactionContext): Promise<Sale | null> {
    const row = await this.queryOne<DbSaleRow>('SELECT * FROM sale WHERE id = $1', [id], tx);
    return row ? this.mapRowToEntity(row) : null;
  }

  async insert(draft: SaleDraft, tx: TransactionContext): Promise<Sale> {
    const row = await this.queryOneOrFail<DbSaleRow>(
      `
      INSERT INTO sale
        (customer_id, shift_id, date, qty_ltr, unit_price, discount, paid_amt, due_amt, created_by)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      RETURNING *
      `,
      this.toParams(draft),
      tx
    );
    return this.mapRowToEntity(row);
  }

  async update(id: number, draft: SaleDraft, tx: TransactionContext): Promise<Sale | null> {
    const row = await this.queryOne<DbSaleRow>(
      `
      UPDATE sale
      SET customer_id = $1, shift_id = $2, date = $3, qty_ltr = $4, unit_price = $5,
          discount = $6, paid_amt = $7, due_amt = $8, created_by = $9
      WHERE id = $10
      RETURNING *
      `,
      [...this.toParams(draft), id],
      tx
    );
    return row ? this.mapRowToEntity(row) : null;
  }

  async delete(id: number, tx: TransactionContext): Promise<boolean> {
    const result = await this.query('DELETE FROM sale WHERE id = $1', [id], tx);
    return (result.rowCount ?? 0) > 0;
  }

  async summarize(from: string, to: string, tx?: TransactionContext): Promise<DailySummary> {
    const row = await this.queryOne<DbSummaryRow>(
      `
      SELECT COUNT(*) AS count,
             COALESCE(SUM(qty_ltr), 0) AS litres,
             COALESCE(SUM(paid_amt + due_amt), 0) AS amount
      FROM sale
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

  async totalDueForCustomer(customerId: number, tx?: TransactionContext): Promise<number> {
    const row = await this.queryOne<DbTotalRow>(
      'SELECT COALESCE(SUM(due_amt), 0) AS total FROM sale WHERE customer_id = $1',
      [customerId],
      tx
    );
    return roundMoney(toNumber(row?.total));
  }

  async findDetailed(from: string, to: string, tx?: TransactionContext): Promise<SaleDetail[]> {
    const rows = await this.queryMany<DbSaleDetailRow>(
      `
      SELECT s.*, c.name AS customer_name, sh.name AS shift_name
      FROM sale s
      LEFT JOIN customer c ON c.id = s.customer_id
      LEFT JOIN shift sh ON sh.id = s.shift_id
      WHERE s.date >= $1 AND s.date <= $2
      ORDER BY s.date ASC, s.id ASC
      `,
      [from, to],
      tx
    );
    return rows.map((row) => ({
      ...this.mapRowToEntity(row),
      customerName: row.customer_name,
      shiftName: row.shift_name,
    }));
  }

  private toParams(draft: SaleDraft): unknown[] {
    return [
      draft.customerId,
      draft.shiftId,
      draft.date,
      draft.quantityLitres,
      draft.unitPrice,
      draft.discount,
      draft.paidAmount,
      draft.dueAmount,
      draft.createdBy,
    ];
  }

  private mapRowToEntity(row: DbSaleRow): Sale {
    return {
      id: row.id,
      customerId: row.customer_id,
      shiftId: row.shift_id,
      date: toIsoDate(row.date),
      quantityLitres: toNumber(row.qty_ltr),
      unitPrice: toNumber(row.unit_price),
      discount: toNumber(row.discount),
      paidAmount: toNumber(row.paid_amt),
      dueAmount: toNumber(row.due_amt),
      createdBy: row.created_by,
    };
  }
}
