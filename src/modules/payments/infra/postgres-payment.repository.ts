import { BaseRepository } from '../../../infra/database/base.repository';
import { TransactionContext } from '../../../infra/database/transaction';
import { DbPaymentRow, DbTotalRow } from '../../../shared/types/database.types';
import { roundMoney, toIsoDate, toIsoTimestamp, toNumber } from '../../../shared/utils/values';
import { PartyType, Payment, PaymentFilter, PaymentInput } from '../domain/payment.entity';
import { PaymentRepositoryPort } from '../ports/payment.repository.port';

/**
 * `payment_farmer` and `payment_customer` share one shape and differ only in
 * the table and the party column, which subclasses fix.
 */
abstract class PostgresPaymentRepository extends BaseRepository implements PaymentRepositoryPort {
  protected abstract readonly table: 'payment_farmer' | 'payment_customer';
  protected abstract readonly partyColumn: 'farmer_id' | 'customer_id';
  protected abstract readonly partyType: PartyType;

  private get columns(): string {
    return `id, ${this.partyColumn} AS party_id, date, amount, mode, reference, notes, created_by, created_at`;
  }

  async findAll(filter: PaymentFilter, tx?: TransactionContext): Promise<Payment[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.partyId !== undefined) {
      params.push(filter.partyId);
      conditions.push(`${this.partyColumn} = $${params.length}`);
    }
    if (filter.from) {
      params.push(filter.from);
      conditions.push(`date >= $${params.length}`);
    }
    if (filter.to) {
      params.push(filter.to);
      conditions.push(`date <= $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(filter.limit, filter.offset);
    const rows = await this.queryMany<DbPaymentRow>(
      `
      SELECT ${this.columns} FROM ${this.table}
      ${where}
      ORDER BY date DESC, id DESC
      LIMIT $${params.length - 1} OFFSET $${params.length}
      `,
      params,
      tx
    );
    return rows.map((row) => this.mapRowToEntity(row));
  }

  async findById(id: number, tx?: TransactionContext): Promise<Payment | null> {
    const row = await this.queryOne<DbPaymentRow>(
      `SELECT ${this.columns} FROM ${this.table} WHERE id = $1`,
      [id],
      tx
    );
    return row ? this.mapRowToEntity(row) : null;
  }

  async insert(draft: PaymentInput, tx: TransactionContext): Promise<Payment> {
    const row = await this.queryOneOrFail<DbPaymentRow>(
      `
      INSERT INTO ${this.table} (${this.partyColumn}, date, amount, mode, reference, notes, created_by)
      VALUES ($1, $2, $3, $4, $5, $6, $7)
      RETURNING ${this.columns}
      `,
      this.toParams(draft),
      tx
    );
    return this.mapRowToEntity(row);
  }

  async update(id: number, draft: PaymentInput, tx: TransactionContext): Promise<Payment | null> {
    const row = await this.queryOne<DbPaymentRow>(
      `
      UPDATE ${this.table}
      SET ${this.partyColumn} = $1, date = $2, amount = $3, mode = $4,
          reference = $5, notes = $6, created_by = $7
      WHERE id = $8
      RETURNING ${this.columns}
      `,
      [...this.toParams(draft), id],
      tx
    );
    return row ? this.mapRowToEntity(row) : null;
  }

  async delete(id: number, tx: TransactionContext): Promise<boolean> {
    const result = await this.query(`DELETE FROM ${this.table} WHERE id = $1`, [id], tx);
    return (result.rowCount ?? 0) > 0;
  }

  async totalPaid(partyId: number, tx?: TransactionContext): Promise<number> {
    const row = await this.queryOne<DbTotalRow>(
      `SELECT COALESCE(SUM(amount), 0) AS total FROM ${this.table} WHERE ${this.partyColumn} = $1`,
      [partyId],
      tx
    );
    return roundMoney(toNumber(row?.total));
  }

  private toParams(draft: PaymentInput): unknown[] {
    return [draft.partyId, draft.date, draft.amount, draft.mode, draft.reference, draft.notes, draft.createdBy];
  }

  private mapRowToEntity(row: DbPaymentRow): Payment {
    return {
      id: row.id,
      partyType: this.partyType,
      partyId: row.party_id,
      date: toIsoDate(row.date),
      amount: toNumber(row.amount),
      mode: row.mode,
      reference: row.reference,
      notes: row.notes,
      createdBy: row.created_by,
      createdAt: toIsoTimestamp(row.created_at),
    };
  }
}

export class PaymentFarmerRepository extends PostgresPaymentRepository {
  protected readonly table = 'payment_farmer';
  protected readonly partyColumn = 'farmer_id';
  protected readonly partyType = 'farmer';
}

export class PaymentCustomerRepository extends PostgresPaymentRepository {
  protected readonly table = 'payment_customer';
  protected readonly partyColumn = 'customer_id';
  protected readonly partyType = 'customer';
}
