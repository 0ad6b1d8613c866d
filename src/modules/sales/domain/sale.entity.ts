import { z } from 'zod';
import {
  amountSchema,
  idSchema,
  isoDateSchema,
  listWindowSchema,
  moneySchema,
  optionalIdSchema,
} from '../../../shared/utils/validation';
import { ValidationError } from '../../../shared/errors/validation.error';
import { NUMERIC_LIMITS } from '../../../shared/constants';
import { roundMoney } from '../../../shared/utils/values';

export interface Sale {
  id: number;
  customerId: number | null;
  shiftId: number | null;
  date: string;
  quantityLitres: number;
  unitPrice: number;
  discount: number;
  paidAmount: number;
  dueAmount: number;
  createdBy: number | null;
}

export const saleInputSchema = z.object({
  customerId: idSchema,
  shiftId: optionalIdSchema,
  date: isoDateSchema,
  quantityLitres: moneySchema,
  unitPrice: moneySchema,
  discount: moneySchema.default(0),
  paidAmount: amountSchema.default(0),
  createdBy: optionalIdSchema,
});

export type SaleInput = z.infer<typeof saleInputSchema>;

export type SaleDraft = SaleInput & { dueAmount: number };

export const saleFilterSchema = listWindowSchema.extend({
  from: isoDateSchema.optional(),
  to: isoDateSchema.optional(),
  customerId: z.coerce.number().int().positive().optional(),
  shiftId: z.coerce.number().int().positive().optional(),
});

export type SaleFilter = z.infer<typeof saleFilterSchema>;

export interface SaleDetail extends Sale {
  customerName: string | null;
  shiftName: string | null;
}

export interface SaleAmounts {
  gross: number;
  net: number;
  due: number;
}

/**
 * gross = quantity × unit price; net = gross − discount; due = net − paid.
 *
 * @throws {ValidationError} When the gross amount overflows its column, or a
 * deduction exceeds the amount it is taken from.
 */
export function computeSaleAmounts(
  quantityLitres: number,
  unitPrice: number,
  discount: number,
  paidAmount: number
): SaleAmounts {
  const gross = roundMoney(quantityLitres * unitPrice);
  if (gross > NUMERIC_LIMITS.AMOUNT) {
    throw new ValidationError('Gross amount is out of range', {
      quantityLitres: `Quantity × unit price must not exceed ${NUMERIC_LIMITS.AMOUNT.toFixed(2)}`,
    });
  }
  if (discount > gross) {
    throw new ValidationError('Discount exceeds the gross amount', {
      discount: `Must not exceed ${gross.toFixed(2)}`,
    });
  }

  const net = roundMoney(gross - discount);
  if (paidAmount > net) {
    throw new ValidationError('Paid amount exceeds the net amount', {
      paidAmount: `Must not exceed ${net.toFixed(2)}`,
    });
  }

  return { gross, net, due: roundMoney(net - paidAmount) };
}
