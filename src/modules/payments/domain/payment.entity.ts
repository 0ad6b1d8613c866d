import { z } from 'zod';
import {
  amountSchema,
  idSchema,
  isoDateSchema,
  listWindowSchema,
  optionalIdSchema,
  optionalTextSchema,
} from '../../../shared/utils/validation';

export type PartyType = 'farmer' | 'customer';

/**
 * Money paid to a farmer, or received from a customer.
 */
export interface Payment {
  id: number;
  partyType: PartyType;
  partyId: number;
  date: string;
  amount: number;
  mode: string;
  reference: string | null;
  notes: string | null;
  createdBy: number | null;
  createdAt: string;
}

export const paymentInputSchema = z.object({
  partyId: idSchema,
  date: isoDateSchema,
  amount: amountSchema.refine((value) => value > 0, 'Must be greater than 0'),
  mode: z.string().trim().min(1).max(20),
  reference: optionalTextSchema(100),
  notes: optionalTextSchema(2000),
  createdBy: optionalIdSchema,
});

export type PaymentInput = z.infer<typeof paymentInputSchema>;

export const paymentFilterSchema = listWindowSchema.extend({
  partyId: z.coerce.number().int().positive().optional(),
  from: isoDateSchema.optional(),
  to: isoDateSchema.optional(),
});

export type PaymentFilter = z.infer<typeof paymentFilterSchema>;

export interface PartyBalance {
  partyType: PartyType;
  partyId: number;
  totalDue: number;
  totalPaid: number;
  balance: number;
}
