import { z } from 'zod';
import { timeSchema } from '../../../shared/utils/validation';

export interface Shift {
  id: number;
  name: string;
  /** 'HH:MM' */
  startTime: string | null;
  endTime: string | null;
}

export const shiftInputSchema = z.object({
  name: z.string().trim().min(1).max(50),
  startTime: timeSchema.nullish().transform((value) => value ?? null),
  endTime: timeSchema.nullish().transform((value) => value ?? null),
});

export type ShiftInput = z.infer<typeof shiftInputSchema>;

export const shiftFilterSchema = z.object({});

export type ShiftFilter = z.infer<typeof shiftFilterSchema>;
