function toCents(amount: number): number {
  return Math.round(amount * 100);
}

function toDollars(cents: number): number {
  return cents / 100;
}

/** Fixed-point string as stored in numeric(12,2) columns. */
function toAmountString(amount: number): string {
  return toDollars(toCents(amount)).toFixed(2);
}

function amountToCents(amount: string): number {
  const parsed = Number(amount);
  if (!Number.isFinite(parsed)) {
    throw new RangeError(`Not a monetary amount: ${amount}`);
  }
  return toCents(parsed);
}

function hasAtMostTwoDecimals(amount: number): boolean {
  return Math.abs(toCents(amount) - amount * 100) < 1e-6;
}

export {
  toCents,
  toDollars,
  toAmountString,
  amountToCents,
  hasAtMostTwoDecimals,
};
