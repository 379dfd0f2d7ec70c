export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public statusCode: number = 400,
    public details?: Array<{ field: string; message: string }>,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication required') {
    super('AUTHENTICATION_REQUIRED', message, 401);
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string = 'Permission denied') {
    super('AUTHORIZATION_DENIED', message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id?: string) {
    super('NOT_FOUND', id ? `${entity} ${id} not found` : `${entity} not found`, 404);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string = 'Validation failed',
    details?: Array<{ field: string; message: string }>,
  ) {
    super('VALIDATION_ERROR', message, 400, details);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super('CONFLICT', message, 409);
  }
}

/**
 * A write referenced a row owned by another gym. The message deliberately
 * names only the entity kind, never the foreign row or its tenant.
 */
export class TenantIsolationViolationError extends AppError {
  constructor(entity: string) {
    super(
      'TENANT_ISOLATION_VIOLATION',
      `${entity} does not belong to this gym`,
      403,
    );
  }
}

export type BlockerKind = 'membership' | 'payment' | 'plan';

export interface BusinessRuleBlocker {
  kind: BlockerKind;
  id: string;
  status: string;
}

export class BusinessRuleViolationError extends AppError {
  constructor(
    message: string,
    public blockers: BusinessRuleBlocker[] = [],
  ) {
    super(
      'BUSINESS_RULE_VIOLATION',
      message,
      409,
      blockers.map((b) => ({ field: b.kind, message: `${b.kind} ${b.id} is ${b.status}` })),
    );
  }
}

export type MemberIneligibility = 'deleted' | 'inactive';

export class MemberNotEligibleError extends AppError {
  constructor(
    memberId: string,
    public reason: MemberIneligibility,
  ) {
    super(
      'MEMBER_NOT_ELIGIBLE',
      reason === 'deleted'
        ? `Member ${memberId} is deleted and cannot be assigned a plan`
        : `Member ${memberId} is inactive; staff override required to assign a plan`,
      409,
    );
  }
}

export class InvalidEnumValueError extends AppError {
  constructor(field: string, value: unknown, allowed: readonly string[]) {
    super(
      'INVALID_ENUM_VALUE',
      `Invalid ${field}: ${String(value)}`,
      400,
      [{ field, message: `Expected one of ${allowed.join(', ')}` }],
    );
  }
}

export class InvalidStatusTransitionError extends AppError {
  constructor(entity: string, from: string, to: string) {
    super(
      'INVALID_STATUS_TRANSITION',
      `Cannot move ${entity} from ${from} to ${to}`,
      409,
    );
  }
}

export type IdentityField = 'phone' | 'email';

export class DuplicateIdentityError extends AppError {
  constructor(
    public field: IdentityField,
    public conflictingMemberId: string | null,
    public restorableMemberId: string | null,
  ) {
    super(
      'DUPLICATE_IDENTITY',
      restorableMemberId
        ? `A deleted member with this ${field} exists and can be restored`
        : `Another member already uses this ${field}`,
      409,
      [{ field, message: restorableMemberId ? 'restorable' : 'taken' }],
    );
  }
}

export class StorageError extends AppError {
  constructor(
    operation: string,
    public override cause?: unknown,
  ) {
    super('STORAGE_ERROR', `Storage operation failed: ${operation}`, 503);
  }
}
