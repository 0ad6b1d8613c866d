import { z } from 'zod';
import { optionalTextSchema } from '../../../shared/utils/validation';

export interface Branch {
  id: number;
  name: string;
  address: string | null;
  contact: string | null;
}

export const branchInputSchema = z.object({
  name: z.string().trim().min(1).max(100),
  address: optionalTextSchema(10000),
  contact: optionalTextSchema(50),
});

export type BranchInput = z.infer<typeof branchInputSchema>;

export const branchFilterSchema = z.object({
  search: z.string().trim().min(1).optional(),
});

export type BranchFilter = z.infer<typeof branchFilterSchema>;
