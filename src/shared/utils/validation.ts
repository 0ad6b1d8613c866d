import { z } from 'zod';
import { ValidationError } from '../errors/validation.error';
import { HTTP_DEFAULTS, NUMERIC_LIMITS } from '../constants';
import { roundMoney } from './values';

/**
 * Parses `input` with a zod schema, turning issues into a ValidationError
 * whose `fields` map the issue path to its message.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const fields: Record<string, string> = {};
  for (const issue of result.error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : '_';
    if (!(key in fields)) {
      fields[key] = issue.message;
    }
  }

  throw new ValidationError('Request validation failed', fields);
}

export const idSchema = z.coerce.number().int().positive();

export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format')
  .refine((value) => {
    // Date rolls impossible days over: 2026-02-30 becomes 2026-03-02.
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
  }, 'Invalid calendar date');

export const timeSchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/, 'Expected a time in HH:MM format');

/** A non-negative value with at most two decimals, bounded by its column. */
export const decimalSchema = (max: number) =>
  z.coerce
    .number()
    .finite()
    .nonnegative()
    .max(max)
    .refine((value) => roundMoney(value) === value, 'At most 2 decimal places');

export const moneySchema = decimalSchema(NUMERIC_LIMITS.MEASURE);

export const amountSchema = decimalSchema(NUMERIC_LIMITS.AMOUNT);

/** Optional foreign key: absent, null or empty string all mean "none". */
export const optionalIdSchema = z
  .union([idSchema, z.literal(''), z.null()])
  .optional()
  .transform((value) => (typeof value === 'number' ? value : null));

/** Optional free text: blank or missing values are stored as null. */
export const optionalTextSchema = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .nullish()
    .transform((value) => (value ? value : null));

export const listWindowSchema = z.object({
  limit: z.coerce.number().int().positive().max(HTTP_DEFAULTS.MAX_LIST_LIMIT).default(HTTP_DEFAULTS.LIST_LIMIT),
  offset: z.coerce.number().int().nonnegative().default(0),
});
