import { z } from 'zod';
import { HTTP_DEFAULTS } from '../../../shared/constants';

export type AuditAction = 'create' | 'update' | 'delete';

export const AUDIT_ENTITIES = [
  'branch',
  'employee',
  'farmer',
  'customer',
  'shift',
  'milk_collection',
  'sale',
  'payment_farmer',
  'payment_customer',
] as const;

export type AuditEntity = (typeof AUDIT_ENTITIES)[number];

export interface AuditLogEntry {
  id: number;
  entity: string;
  entityId: number;
  action: AuditAction;
  actor: string;
  details: unknown;
  createdAt: string;
}

export interface NewAuditEntry {
  entity: AuditEntity;
  entityId: number;
  action: AuditAction;
  actor: string;
  details?: unknown;
}

export interface AuditLogFilter {
  entity?: AuditEntity;
  entityId?: number;
  limit: number;
}

export const auditLogFilterSchema = z.object({
  entity: z.enum(AUDIT_ENTITIES).optional(),
  entityId: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().positive().max(HTTP_DEFAULTS.MAX_LIST_LIMIT).default(HTTP_DEFAULTS.LIST_LIMIT),
});
