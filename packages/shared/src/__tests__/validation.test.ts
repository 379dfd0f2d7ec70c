import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { moneyAmountSchema, parseInput } from '../validation';
import { InvalidEnumValueError, ValidationError } from '../errors';
import { PAYMENT_METHODS } from '../constants/gym';

const schema = z.object({
  method: z.enum(PAYMENT_METHODS),
  amount: z.number().nonnegative(),
});

describe('parseInput', () => {
  it('returns parsed data', () => {
    expect(parseInput(schema, { method: 'CASH', amount: 10 })).toEqual({ method: 'CASH', amount: 10 });
  });

  it('reports out-of-set enum values as InvalidEnumValueError', () => {
    try {
      parseInput(schema, { method: 'CHEQUE', amount: 10 });
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof InvalidEnumValueError)) throw err;
      const e = err;
      expect(e.code).toBe('INVALID_ENUM_VALUE');
      expect(e.message).toBe('Invalid method: CHEQUE');
      expect(e.details).toEqual([
        { field: 'method', message: 'Expected one of CASH, DEBIT_CARD, BANK_TRANSFER, E_WALLET' },
      ]);
    }
  });

  it('does not coerce case variants', () => {
    expect(() => parseInput(schema, { method: 'cash', amount: 10 })).toThrow(InvalidEnumValueError);
  });

  it('reports other problems as ValidationError', () => {
    expect(() => parseInput(schema, { method: 'CASH', amount: -1 })).toThrow(ValidationError);
  });
});

describe('moneyAmountSchema', () => {
  const amount = moneyAmountSchema('Amount');

  it('accepts numbers and plain decimal strings', () => {
    expect(amount.parse(150000)).toBe(150000);
    expect(amount.parse('99.50')).toBe(99.5);
    expect(amount.parse(' 12 ')).toBe(12);
    expect(amount.parse(0)).toBe(0);
  });

  it.each([
    ['an empty string', ''],
    ['a blank string', '   '],
    ['null', null],
    ['false', false],
    ['an empty array', []],
    ['a signed string', '-5'],
    ['an exponent string', '1e3'],
  ])('rejects %s instead of reading it as a number', (_label, value) => {
    expect(amount.safeParse(value).success).toBe(false);
  });

  it('rejects more than two decimals', () => {
    const parsed = amount.safeParse(10.005);
    expect(parsed.success).toBe(false);
    if (parsed.success) return;
    expect(parsed.error.issues[0]?.message).toBe('Amount may have at most two decimals');
  });

  it('rejects negative numbers', () => {
    expect(amount.safeParse(-1).success).toBe(false);
  });
});
