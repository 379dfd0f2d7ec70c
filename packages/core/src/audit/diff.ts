import type { AuditChanges } from './index';

/**
 * Fields that differ between two versions of a row, for the audit trail.
 *
 *   computeChanges({ name: 'Monthly', price: '250000.00' }, { name: 'Monthly', price: '275000.00' })
 *   // { price: { old: '250000.00', new: '275000.00' } }
 */
export function computeChanges(
  oldObj: Record<string, unknown>,
  newObj: Record<string, unknown>,
  ignoreFields: string[] = ['updatedAt', 'createdAt'],
): AuditChanges | undefined {
  const changes: AuditChanges = {};

  for (const key of Object.keys(newObj)) {
    if (ignoreFields.includes(key)) continue;

    const oldVal = oldObj[key];
    const newVal = newObj[key];

    if (JSON.stringify(oldVal) !== JSON.stringify(newVal)) {
      changes[key] = { old: oldVal, new: newVal };
    }
  }

  return Object.keys(changes).length > 0 ? changes : undefined;
}
