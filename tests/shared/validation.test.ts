import { describe, expect, it } from 'vitest';
import { amountSchema, isoDateSchema, moneySchema, parseInput } from '../../src/shared/utils/validation';
import { ValidationError } from '../../src/shared/errors/validation.error';

describe('isoDateSchema', () => {
  it.each(['2026-02-28', '2024-02-29', '2026-12-31'])('accepts %s', (value) => {
    expect(isoDateSchema.safeParse(value).success).toBe(true);
  });

  it.each(['2026-02-30', '2026-02-29', '2026-04-31', '2026-13-01', '2026-1-01'])('rejects %s', (value) => {
    expect(isoDateSchema.safeParse(value).success).toBe(false);
  });
});

describe('moneySchema', () => {
  it('accepts two decimals up to the column maximum', () => {
    expect(moneySchema.parse('10.25')).toBe(10.25);
    expect(moneySchema.parse(999999.99)).toBe(999999.99);
  });

  it('rejects a third decimal', () => {
    try {
      parseInput(moneySchema, 10.004);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ fields: { _: 'At most 2 decimal places' } });
    }
  });

  it('rejects values above the column maximum', () => {
    expect(moneySchema.safeParse(1000000).success).toBe(false);
    expect(amountSchema.safeParse(1000000).success).toBe(true);
    expect(amountSchema.safeParse(10000000000).success).toBe(false);
  });
});
