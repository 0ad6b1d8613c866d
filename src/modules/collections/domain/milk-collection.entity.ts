import { z } from 'zod';
import {
  decimalSchema,
  idSchema,
  isoDateSchema,
  listWindowSchema,
  moneySchema,
  optionalIdSchema,
  optionalTextSchema,
} from '../../../shared/utils/validation';
import { NUMERIC_LIMITS } from '../../../shared/constants';
import { ValidationError } from '../../../shared/errors/validation.error';
import { roundMoney } from '../../../shared/utils/values';

export interface MilkCollection {
  id: number;
  farmerId: number | null;
  shiftId: number | null;
  date: string;
  quantityLitres: number;
  fatPercent: number;
  pricePerLitre: number;
  dueAmount: number;
  notes: string | null;
  createdBy: number | null;
}

export const milkCollectionInputSchema = z.object({
  farmerId: idSchema,
  shiftId: optionalIdSchema,
  date: isoDateSchema,
  quantityLitres: moneySchema,
  fatPercent: decimalSchema(NUMERIC_LIMITS.PERCENT),
  pricePerLitre: moneySchema,
  notes: optionalTextSchema(2000),
  createdBy: optionalIdSchema,
});

export type MilkCollectionInput = z.infer<typeof milkCollectionInputSchema>;

export type MilkCollectionDraft = MilkCollectionInput & { dueAmount: number };

export const milkCollectionFilterSchema = listWindowSchema.extend({
  from: isoDateSchema.optional(),
  to: isoDateSchema.optional(),
  farmerId: z.coerce.number().int().positive().optional(),
  shiftId: z.coerce.number().int().positive().optional(),
});

export type MilkCollectionFilter = z.infer<typeof milkCollectionFilterSchema>;

/** A collection row joined with the farmer and shift it references. */
export interface MilkCollectionDetail extends MilkCollection {
  farmerCode: string | null;
  farmerName: string | null;
  shiftName: string | null;
}

export interface DailySummary {
  count: number;
  litres: number;
  amount: number;
}

/**
 * What the cooperative owes for one delivery.
 *
 * @throws {ValidationError} When the amount does not fit the due column.
 */
export function collectionDue(quantityLitres: number, pricePerLitre: number): number {
  const due = roundMoney(quantityLitres * pricePerLitre);
  if (due > NUMERIC_LIMITS.AMOUNT) {
    throw new ValidationError('Due amount is out of range', {
      quantityLitres: `Quantity × price must not exceed ${NUMERIC_LIMITS.AMOUNT.toFixed(2)}`,
    });
  }
  return due;
}
