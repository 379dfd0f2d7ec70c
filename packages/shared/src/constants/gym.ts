// ── Staff ────────────────────────────────────────────────────────
export const STAFF_ROLES = ['OWNER', 'STAFF'] as const;
export type StaffRole = (typeof STAFF_ROLES)[number];

export const ACCOUNT_STATUSES = ['ACTIVE', 'INACTIVE'] as const;
export type AccountStatus = (typeof ACCOUNT_STATUSES)[number];

// ── Members ──────────────────────────────────────────────────────
export const GENDERS = ['M', 'F', 'O'] as const;
export type Gender = (typeof GENDERS)[number];

export const MEMBER_STATUSES = ACCOUNT_STATUSES;
export type MemberStatus = AccountStatus;

// ── Memberships ──────────────────────────────────────────────────
export const MEMBERSHIP_STATUSES = ['ACTIVE', 'PENDING_RENEWAL', 'EXPIRED', 'CANCELLED'] as const;
export type MembershipStatus = (typeof MEMBERSHIP_STATUSES)[number];

/** Statuses under which a membership still grants gym access. */
export const ACCESS_GRANTING_STATUSES = ['ACTIVE', 'PENDING_RENEWAL'] as const satisfies readonly MembershipStatus[];

export const TERMINAL_MEMBERSHIP_STATUSES = ['EXPIRED', 'CANCELLED'] as const satisfies readonly MembershipStatus[];

export const DEFAULT_RENEWAL_WINDOW_DAYS = 7;

// ── Payments ─────────────────────────────────────────────────────
export const PAYMENT_PURPOSES = ['MEMBERSHIP', 'CLASS', 'RETAIL'] as const;
export type PaymentPurpose = (typeof PAYMENT_PURPOSES)[number];

export const PAYMENT_METHODS = ['CASH', 'DEBIT_CARD', 'BANK_TRANSFER', 'E_WALLET'] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const PAYMENT_STATUSES = ['PAID', 'PENDING', 'REFUNDED', 'CANCELLED'] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

// ── Check-ins ────────────────────────────────────────────────────
export const CHECK_IN_REJECTION_REASONS = ['MEMBER_DELETED', 'MEMBER_INACTIVE', 'NO_ACTIVE_MEMBERSHIP'] as const;
export type CheckInRejectionReason = (typeof CHECK_IN_REJECTION_REASONS)[number];

export function isOneOf<T extends string>(allowed: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && allowed.some((a) => a === value);
}
