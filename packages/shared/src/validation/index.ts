import { z } from 'zod';
import { InvalidEnumValueError, ValidationError } from '../errors';
import { isCalendarDate } from '../utils/date';
import { hasAtMostTwoDecimals } from '../utils/money';

export const calendarDateSchema = z
  .string()
  .refine(isCalendarDate, 'Expected a YYYY-MM-DD date');

const DECIMAL_AMOUNT = /^\d+(\.\d{1,2})?$/;

/**
 * A non-negative money amount with at most two decimals, given as a number or
 * a plain decimal string ("150000", "99.50"). Empty strings, null and booleans
 * are rejected rather than read as zero.
 */
export function moneyAmountSchema(label: string) {
  return z
    .union([z.number(), z.string().trim().regex(DECIMAL_AMOUNT, `${label} must be a decimal amount`).transform(Number)])
    .pipe(
      z
        .number()
        .nonnegative()
        .max(9_999_999_999.99)
        .refine(hasAtMostTwoDecimals, `${label} may have at most two decimals`),
    );
}

/**
 * Parse command input. An out-of-set enum value is reported as
 * InvalidEnumValueError (never coerced); every other issue as ValidationError.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;

  for (const issue of parsed.error.issues) {
    if (issue.code === z.ZodIssueCode.invalid_enum_value) {
      throw new InvalidEnumValueError(
        issue.path.join('.'),
        issue.received,
        issue.options.map(String),
      );
    }
  }
  throw new ValidationError(
    'Validation failed',
    parsed.error.issues.map((i) => ({ field: i.path.join('.'), message: i.message })),
  );
}
