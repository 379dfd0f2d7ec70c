export { generateUlid } from './ulid';
export {
  toCents,
  toDollars,
  toAmountString,
  amountToCents,
  hasAtMostTwoDecimals,
} from './money';
export { toCalendarDate, isCalendarDate, addDays } from './date';
export { normalizePhone, containsPattern } from './format';
export { firstOrThrow } from './rows';
