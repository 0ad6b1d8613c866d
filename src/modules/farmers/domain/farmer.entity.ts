import { z } from 'zod';
import { optionalIdSchema } from '../../../shared/utils/validation';

export interface Farmer {
  id: number;
  name: string;
  code: string;
  contact: string;
  bankId: number | null;
  branchId: number | null;
}

export const farmerInputSchema = z.object({
  name: z.string().trim().min(1).max(100),
  code: z.string().trim().min(1).max(20),
  contact: z.string().trim().min(1).max(50),
  bankId: optionalIdSchema,
  branchId: optionalIdSchema,
});

export type FarmerInput = z.infer<typeof farmerInputSchema>;

export const farmerFilterSchema = z.object({
  branchId: z.coerce.number().int().positive().optional(),
  search: z.string().trim().min(1).optional(),
});

export type FarmerFilter = z.infer<typeof farmerFilterSchema>;
