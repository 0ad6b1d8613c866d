import { BaseRepository } from '../../../infra/database/base.repository';
import { TransactionContext } from '../../../infra/database/transaction';
import { DbAuditLogRow } from '../../../shared/types/database.types';
import { toIsoTimestamp } from '../../../shared/utils/values';
import { AuditAction, AuditLogEntry, AuditLogFilter, NewAuditEntry } from '../domain/audit-log.entity';
import { AuditLogRepositoryPort } from '../ports/audit-log.repository.port';

function toAction(value: string): AuditAction {
  return value === 'create' || value === 'update' ? value : 'delete';
}

function parseDetails(value: unknown): unknown {
  if (typeof value !== 'string') return value ?? null;
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

export class AuditLogRepository extends BaseRepository implements AuditLogRepositoryPort {
  async record(entry: NewAuditEntry, tx: TransactionContext): Promise<AuditLogEntry> {
    const row = await this.queryOneOrFail<DbAuditLogRow>(
      `
      INSERT INTO audit_log (entity, entity_id, action, actor, details)
      VALUES ($1, $2, $3, $4, $5::jsonb)
      RETURNING *
      `,
      [
        entry.entity,
        entry.entityId,
        entry.action,
        entry.actor,
        entry.details === undefined ? null : JSON.stringify(entry.details),
      ],
      tx
    );
    return this.mapRowToEntry(row);
  }

  async list(filter: AuditLogFilter, tx?: TransactionContext): Promise<AuditLogEntry[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.entity) {
      params.push(filter.entity);
      conditions.push(`entity = $${params.length}`);
    }
    if (filter.entityId !== undefined) {
      params.push(filter.entityId);
      conditions.push(`entity_id = $${params.length}`);
    }

    params.push(filter.limit);
    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = await this.queryMany<DbAuditLogRow>(
      `SELECT * FROM audit_log ${where} ORDER BY id DESC LIMIT $${params.length}`,
      params,
      tx
    );
    return rows.map((row) => this.mapRowToEntry(row));
  }

  private mapRowToEntry(row: DbAuditLogRow): AuditLogEntry {
    return {
      id: row.id,
      entity: row.entity,
      entityId: row.entity_id,
      action: toAction(row.action),
      actor: row.actor,
      details: parseDetails(row.details),
      createdAt: toIsoTimestamp(row.created_at),
    };
  }
}
