import { z } from 'zod';
import { optionalIdSchema } from '../../../shared/utils/validation';

export interface Customer {
  id: number;
  name: string;
  contact: string;
  branchId: number | null;
}

export const customerInputSchema = z.object({
  name: z.string().trim().min(1).max(100),
  contact: z.string().trim().min(1).max(50),
  branchId: optionalIdSchema,
});

export type CustomerInput = z.infer<typeof customerInputSchema>;

export const customerFilterSchema = z.object({
  branchId: z.coerce.number().int().positive().optional(),
  search: z.string().trim().min(1).optional(),
});

export type CustomerFilter = z.infer<typeof customerFilterSchema>;
