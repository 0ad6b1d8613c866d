import { AuditLogEntry, AuditLogFilter, NewAuditEntry } from '../domain/audit-log.entity';
import { TransactionContext } from '../../../infra/database/transaction';

export interface AuditLogRepositoryPort {
  record(entry: NewAuditEntry, tx: TransactionContext): Promise<AuditLogEntry>;
  list(filter: AuditLogFilter, tx?: TransactionContext): Promise<AuditLogEntry[]>;
}
