/**
 * Canonical phone form used for identity comparison.
 * "+62 812-3456 (7890)" → "+6281234567890"
 */
export function normalizePhone(phone: string): string {
  const trimmed = phone.trim();
  const digits = trimmed.replace(/\D/g, '');
  return trimmed.startsWith('+') ? `+${digits}` : digits;
}

/** `%term%` for LIKE/ILIKE, with `%`, `_` and backslashes in the term matched literally. */
export function containsPattern(term: string): string {
  return `%${term.replace(/[\\%_]/g, '\\$&')}%`;
}
