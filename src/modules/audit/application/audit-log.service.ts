import { AuditLogEntry, AuditLogFilter } from '../domain/audit-log.entity';
import { AuditLogRepositoryPort } from '../ports/audit-log.repository.port';

export class AuditLogService {
  constructor(private readonly repo: AuditLogRepositoryPort) {}

  /** Newest first. */
  async list(filter: AuditLogFilter): Promise<AuditLogEntry[]> {
    return this.repo.list(filter);
  }
}
