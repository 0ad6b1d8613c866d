import { z } from 'zod';
import { optionalIdSchema } from '../../../shared/utils/validation';

export interface Employee {
  id: number;
  name: string;
  contact: string;
  branchId: number | null;
  role: string;
}

export const employeeInputSchema = z.object({
  name: z.string().trim().min(1).max(100),
  contact: z.string().trim().min(1).max(50),
  branchId: optionalIdSchema,
  role: z.string().trim().min(1).max(30),
});

export type EmployeeInput = z.infer<typeof employeeInputSchema>;

export const employeeFilterSchema = z.object({
  branchId: z.coerce.number().int().positive().optional(),
});

export type EmployeeFilter = z.infer<typeof employeeFilterSchema>;
