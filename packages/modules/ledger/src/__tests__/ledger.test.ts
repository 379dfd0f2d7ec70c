import { describe, it, expect, vi, beforeEach } from 'vitest';

// ── Hoisted mocks ─────────────────────────────────────────────
const {
  mockInsert,
  mockSelect,
  mockUpdate,
  mockPublishWithOutbox,
  mockBuildEvent,
  mockAuditLog,
} = vi.hoisted(() => {
  const mockInsert = vi.fn();
  const mockSelect = vi.fn();
  const mockUpdate = vi.fn();

  const mockPublishWithOutbox = vi.fn(
    async (_ctx: unknown, fn: (tx: unknown) => Promise<{ result: unknown }>) => {
      const tx = { insert: mockInsert, select: mockSelect, update: mockUpdate };
      const { result } = await fn(tx);
      return result;
    },
  );

  const mockBuildEvent = vi.fn((_ctx: unknown, eventType: string, data: unknown) => ({
    eventId: 'EVT_001',
    eventType,
    data,
  }));
  const mockAuditLog = vi.fn();

  return { mockInsert, mockSelect, mockUpdate, mockPublishWithOutbox, mockBuildEvent, mockAuditLog };
});

// ── Chain helpers ─────────────────────────────────────────────

function makeSelectChain(result: unknown[]) {
  const chain: Record<string, ReturnType<typeof vi.fn>> = {};
  chain.from = vi.fn().mockReturnValue(chain);
  chain.innerJoin = vi.fn().mockReturnValue(chain);
  chain.where = vi.fn().mockReturnValue(chain);
  chain.orderBy = vi.fn().mockReturnValue(chain);
  chain.limit = vi.fn().mockReturnValue(chain);
  chain.for = vi.fn().mockReturnValue(chain);
  chain.then = vi.fn((resolve: (v: unknown) => void) => resolve(result));
  return chain;
}

function mockSelectReturns(data: unknown[]) {
  const chain = makeSelectChain(data);
  mockSelect.mockReturnValueOnce(chain);
  return chain;
}

function mockInsertReturns(data: unknown[]) {
  const values = vi.fn().mockReturnValue({ returning: vi.fn().mockResolvedValue(data) });
  mockInsert.mockReturnValueOnce({ values });
  return values;
}

function mockUpdateReturns(data: unknown[]) {
  const set = vi.fn().mockReturnValue({
    where: vi.fn().mockReturnValue({ returning: vi.fn().mockResolvedValue(data) }),
  });
  mockUpdate.mockReturnValueOnce({ set });
  return set;
}

// ── Module mocks ──────────────────────────────────────────────

vi.mock('@gymledger/core/events/publish-with-outbox', () => ({
  publishWithOutbox: mockPublishWithOutbox,
}));
vi.mock('@gymledger/core/events/build-event', () => ({
  buildEventFromContext: mockBuildEvent,
}));
vi.mock('@gymledger/core/audit/helpers', () => ({
  auditLog: mockAuditLog,
}));
vi.mock('@gymledger/db', () => ({
  withTenant: vi.fn(async (_tid: string, fn: (tx: unknown) => Promise<unknown>) =>
    fn({ select: mockSelect, insert: mockInsert, update: mockUpdate }),
  ),
  members: Symbol('members'),
  memberships: Symbol('memberships'),
  payments: Symbol('payments'),
  users: Symbol('users'),
}));

import {
  InvalidEnumValueError,
  InvalidStatusTransitionError,
  NotFoundError,
  ValidationError,
} from '@gymledger/shared';
import type { RequestContext } from '@gymledger/core/auth/context';
import { recordPayment } from '../commands/record-payment';
import { transitionPaymentStatus } from '../commands/transition-payment-status';
import { listPayments } from '../queries/list-payments';
import { getPayment } from '../queries/get-payment';
import { getRevenueSummary } from '../queries/get-revenue-summary';

// ── Test data ─────────────────────────────────────────────────

const GYM_A = 'gym_A';
const STAFF_ID = 'usr_desk';

function staffCtx(): RequestContext {
  return { tenantId: GYM_A, requestId: 'req_1', user: { id: STAFF_ID, role: 'STAFF' } };
}

function actingStaff() {
  return {
    id: STAFF_ID,
    gymId: GYM_A,
    name: 'Front Desk',
    email: 'desk@gym-a.test',
    passwordHash: 'scrypt$salt$digest',
    role: 'STAFF',
    phone: null,
    status: 'ACTIVE',
    createdAt: new Date('2026-01-01T00:00:00.000Z'),
    updatedAt: new Date('2026-01-01T00:00:00.000Z'),
    deletedAt: null,
  };
}

function memberRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 'mbr_1',
    gymId: GYM_A,
    memberCode: 'MBR-0001',
    fullName: 'Budi Santoso',
    phone: '+6281234567890',
    email: null,
    gender: 'M',
    dateOfBirth: null,
    status: 'ACTIVE',
    createdBy: STAFF_ID,
    createdAt: new Date('2026-01-01T00:00:00.000Z'),
    updatedAt: new Date('2026-01-01T00:00:00.000Z'),
    deletedAt: null,
    ...overrides,
  };
}

function paymentRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 'pay_1',
    gymId: GYM_A,
    memberId: 'mbr_1',
    membershipId: null,
    amount: '250000.00',
    paymentFor: 'MEMBERSHIP',
    method: 'CASH',
    status: 'PENDING',
    notes: null,
    createdAt: new Date('2026-01-05T10:00:00.000Z'),
    updatedAt: new Date('2026-01-05T10:00:00.000Z'),
    deletedAt: null,
    ...overrides,
  };
}

beforeEach(() => {
  vi.clearAllMocks();
  mockSelect.mockReset();
  mockInsert.mockReset();
  mockUpdate.mockReset();
});

describe('recordPayment', () => {
  it('stores 250000 as a two-decimal amount', async () => {
    mockSelectReturns([actingStaff()]);
    mockSelectReturns([memberRow()]);
    const values = mockInsertReturns([paymentRow()]);

    const payment = await recordPayment(staffCtx(), {
      memberId: 'mbr_1',
      amount: 250000,
      paymentFor: 'MEMBERSHIP',
      method: 'CASH',
      status: 'PENDING',
    });

    expect(payment.amount).toBe('250000.00');
    expect(values).toHaveBeenCalledWith({
      gymId: GYM_A,
      memberId: 'mbr_1',
      membershipId: null,
      amount: '250000.00',
      paymentFor: 'MEMBERSHIP',
      method: 'CASH',
      status: 'PENDING',
      notes: null,
    });
    expect(mockAuditLog).toHaveBeenCalledWith(expect.anything(), 'payment.recorded', 'payment', 'pay_1', undefined, {
      memberId: 'mbr_1',
      amount: '250000.00',
      status: 'PENDING',
    });
  });

  it('rejects an unknown method as an invalid enum value', async () => {
    const input = { memberId: 'mbr_1', amount: 10, paymentFor: 'MEMBERSHIP', method: 'CHEQUE', status: 'PAID' };

    await expect(recordPayment(staffCtx(), input as never)).rejects.toThrow('Invalid method: CHEQUE');
    await expect(recordPayment(staffCtx(), input as never)).rejects.toThrow(InvalidEnumValueError);
    expect(mockPublishWithOutbox).not.toHaveBeenCalled();
  });

  it('rejects a negative amount', async () => {
    await expect(
      recordPayment(staffCtx(), {
        memberId: 'mbr_1',
        amount: -5,
        paymentFor: 'RETAIL',
        method: 'CASH',
        status: 'PAID',
      }),
    ).rejects.toThrow(ValidationError);
  });

  it.each([
    ['an empty string', ''],
    ['null', null],
  ])('rejects %s as the amount instead of recording zero', async (_label, amount) => {
    const input = { memberId: 'mbr_1', amount, paymentFor: 'RETAIL', method: 'CASH', status: 'PAID' };
    await expect(recordPayment(staffCtx(), input as never)).rejects.toThrow(ValidationError);
    expect(mockPublishWithOutbox).not.toHaveBeenCalled();
  });

  it('rejects a non-numeric string amount', async () => {
    const input = { memberId: 'mbr_1', amount: 'abc', paymentFor: 'RETAIL', method: 'CASH', status: 'PAID' } as const;
    await expect(recordPayment(staffCtx(), input)).rejects.toThrow(ValidationError);
  });

  it('only links memberships to membership payments', async () => {
    await expect(
      recordPayment(staffCtx(), {
        memberId: 'mbr_1',
        amount: 50000,
        paymentFor: 'CLASS',
        method: 'CASH',
        status: 'PAID',
        membershipId: 'ms_1',
      }),
    ).rejects.toThrow(ValidationError);
  });

  it('refuses a membership of another member', async () => {
    mockSelectReturns([actingStaff()]);
    mockSelectReturns([memberRow()]);
    mockSelectReturns([{ id: 'ms_9', gymId: GYM_A, memberId: 'mbr_2' }]);

    await expect(
      recordPayment(staffCtx(), {
        memberId: 'mbr_1',
        amount: 250000,
        paymentFor: 'MEMBERSHIP',
        method: 'BANK_TRANSFER',
        status: 'PAID',
        membershipId: 'ms_9',
      }),
    ).rejects.toThrow('Membership belongs to another member');
  });

  it('does not charge a tombstoned member', async () => {
    mockSelectReturns([actingStaff()]);
    mockSelectReturns([memberRow({ deletedAt: new Date('2026-01-10T00:00:00.000Z') })]);

    await expect(
      recordPayment(staffCtx(), {
        memberId: 'mbr_1',
        amount: 1000,
        paymentFor: 'RETAIL',
        method: 'CASH',
        status: 'PAID',
      }),
    ).rejects.toThrow(NotFoundError);
  });
});

describe('transitionPaymentStatus', () => {
  it('moves PENDING to PAID without touching the amount', async () => {
    mockSelectReturns([actingStaff()]);
    mockSelectReturns([paymentRow()]);
    const set = mockUpdateReturns([paymentRow({ status: 'PAID' })]);

    const payment = await transitionPaymentStatus(staffCtx(), { paymentId: 'pay_1', status: 'PAID' });

    expect(payment.status).toBe('PAID');
    expect(payment.amount).toBe('250000.00');
    expect(set).toHaveBeenCalledWith({ status: 'PAID', updatedAt: expect.any(Date) });
    expect(mockAuditLog).toHaveBeenCalledWith(expect.anything(), 'payment.status_changed', 'payment', 'pay_1', {
      status: { old: 'PENDING', new: 'PAID' },
    });
  });

  it('refuses PAID back to PENDING', async () => {
    mockSelectReturns([actingStaff()]);
    mockSelectReturns([paymentRow({ status: 'PAID' })]);

    await expect(
      transitionPaymentStatus(staffCtx(), { paymentId: 'pay_1', status: 'PENDING' }),
    ).rejects.toThrow(InvalidStatusTransitionError);
    expect(mockUpdate).not.toHaveBeenCalled();
  });
});

describe('listPayments', () => {
  it('includes payments of tombstoned members and flags them', async () => {
    mockSelectReturns([
      {
        payment: paymentRow({ id: 'pay_2', status: 'PAID' }),
        memberCode: 'MBR-0002',
        memberName: 'Former Member',
        memberDeletedAt: new Date('2026-02-01T00:00:00.000Z'),
      },
      { payment: paymentRow(), memberCode: 'MBR-0001', memberName: 'Budi Santoso', memberDeletedAt: null },
    ]);

    const page = await listPayments(GYM_A);

    expect(page.items.map((p) => [p.id, p.memberDeleted])).toEqual([
      ['pay_2', true],
      ['pay_1', false],
    ]);
    expect(page.items[0]?.memberCode).toBe('MBR-0002');
    expect(page.hasMore).toBe(false);
    expect(page.cursor).toBeNull();
  });
});

describe('getPayment', () => {
  it('returns the payment', async () => {
    mockSelectReturns([paymentRow({ status: 'PAID' })]);

    const payment = await getPayment(GYM_A, 'pay_1');

    expect(payment.status).toBe('PAID');
    expect(payment.amount).toBe('250000.00');
  });

  it('throws NotFoundError for an unknown id', async () => {
    mockSelectReturns([]);

    await expect(getPayment(GYM_A, 'pay_404')).rejects.toThrow('Payment pay_404 not found');
  });
});

describe('getRevenueSummary', () => {
  it('summarizes the money moved in the range', async () => {
    mockSelectReturns([
      { amount: '250000.00', paymentFor: 'MEMBERSHIP', method: 'CASH', status: 'PAID' },
      { amount: '50000.00', paymentFor: 'CLASS', method: 'E_WALLET', status: 'REFUNDED' },
    ]);

    const summary = await getRevenueSummary(GYM_A, { from: '2026-01-01', to: '2026-01-31' });

    expect(summary.totals).toEqual({ paid: '300000.00', refunded: '50000.00', net: '250000.00', count: 2 });
  });

  it('rejects an inverted range', async () => {
    await expect(getRevenueSummary(GYM_A, { from: '2026-02-01', to: '2026-01-01' })).rejects.toThrow(
      ValidationError,
    );
  });
});
