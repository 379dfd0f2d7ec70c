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
  checkIns: Symbol('checkIns'),
  members: Symbol('members'),
  memberships: Symbol('memberships'),
  users: Symbol('users'),
}));

import { NotFoundError, TenantIsolationViolationError } from '@gymledger/shared';
import type { RequestContext, TenantContext } from '@gymledger/core/auth/context';
import { logger } from '@gymledger/core/observability/logger';
import { checkIn } from '../commands/check-in';
import { voidCheckIn } from '../commands/void-check-in';
import { listCheckIns } from '../queries/list-check-ins';

// ── Test data ─────────────────────────────────────────────────

const GYM_A = 'gym_A';
const STAFF_ID = 'usr_desk';

const kioskCtx: TenantContext = { tenantId: GYM_A, requestId: 'req_kiosk' };

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
    fullName: 'Siti Rahma',
    phone: '+6281111111111',
    email: null,
    gender: 'F',
    dateOfBirth: null,
    status: 'ACTIVE',
    createdBy: STAFF_ID,
    createdAt: new Date('2026-01-01T00:00:00.000Z'),
    updatedAt: new Date('2026-01-01T00:00:00.000Z'),
    deletedAt: null,
    ...overrides,
  };
}

function membershipRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 'ms_1',
    gymId: GYM_A,
    memberId: 'mbr_1',
    membershipPlanId: 'pln_monthly',
    startDate: '2026-01-01',
    endDate: '2026-01-31',
    status: 'ACTIVE',
    autoRenew: false,
    renewedFromId: null,
    renewedAt: null,
    cancelledAt: null,
    cancelReason: null,
    createdAt: new Date('2026-01-01T00:00:00.000Z'),
    updatedAt: new Date('2026-01-01T00:00:00.000Z'),
    deletedAt: null,
    ...overrides,
  };
}

function checkInRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 'chk_1',
    gymId: GYM_A,
    memberId: 'mbr_1',
    checkedInAt: new Date('2026-01-15T07:30:00.000Z'),
    admittedBy: 'kiosk-lobby',
    voidReason: null,
    createdAt: new Date('2026-01-15T07:30:00.000Z'),
    updatedAt: new Date('2026-01-15T07:30:00.000Z'),
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

describe('checkIn', () => {
  it('admits a member with a covering membership and stamps asOf', async () => {
    const memberQuery = mockSelectReturns([memberRow()]);
    const membershipQuery = mockSelectReturns([membershipRow()]);
    const values = mockInsertReturns([checkInRow()]);
    const asOf = new Date('2026-01-15T07:30:00.000Z');

    const result = await checkIn(kioskCtx, { memberId: 'mbr_1', admittedBy: 'kiosk-lobby', asOf });

    expect(result.admitted).toBe(true);
    expect(memberQuery.for).toHaveBeenCalledWith('share');
    expect(membershipQuery.for).toHaveBeenCalledWith('share');
    expect(values).toHaveBeenCalledWith({
      gymId: GYM_A,
      memberId: 'mbr_1',
      checkedInAt: asOf,
      admittedBy: 'kiosk-lobby',
    });
    expect(mockAuditLog).toHaveBeenCalledWith(kioskCtx, 'check_in.admitted', 'check_in', 'chk_1', undefined, {
      memberId: 'mbr_1',
      admittedBy: 'kiosk-lobby',
    });
  });

  it('rejects with NO_ACTIVE_MEMBERSHIP once the membership has expired', async () => {
    const infoSpy = vi.spyOn(logger, 'info').mockImplementation(() => undefined);
    mockSelectReturns([memberRow()]);
    mockSelectReturns([]); // the sweep moved the only membership to EXPIRED

    const result = await checkIn(staffCtx(), {
      memberId: 'mbr_1',
      admittedBy: 'Front Desk',
      asOf: new Date('2026-02-01T08:00:00.000Z'),
    });

    expect(result).toEqual({ admitted: false, reason: 'NO_ACTIVE_MEMBERSHIP' });
    expect(mockInsert).not.toHaveBeenCalled();
    expect(infoSpy).toHaveBeenCalledWith('Check-in rejected', {
      tenantId: GYM_A,
      requestId: 'req_1',
      userId: STAFF_ID,
      memberId: 'mbr_1',
      reason: 'NO_ACTIVE_MEMBERSHIP',
    });
    expect(mockBuildEvent).toHaveBeenCalledWith(
      expect.anything(),
      'attendance.check_in.rejected.v1',
      expect.objectContaining({ memberId: 'mbr_1', reason: 'NO_ACTIVE_MEMBERSHIP' }),
    );
    infoSpy.mockRestore();
  });

  it('rejects past the end date even before the sweep runs', async () => {
    const infoSpy = vi.spyOn(logger, 'info').mockImplementation(() => undefined);
    mockSelectReturns([memberRow()]);
    mockSelectReturns([membershipRow()]);

    const result = await checkIn(kioskCtx, {
      memberId: 'mbr_1',
      admittedBy: 'kiosk-lobby',
      asOf: new Date('2026-02-01T08:00:00.000Z'),
    });

    expect(result).toEqual({ admitted: false, reason: 'NO_ACTIVE_MEMBERSHIP' });
    infoSpy.mockRestore();
  });

  it('rejects a tombstoned member', async () => {
    const infoSpy = vi.spyOn(logger, 'info').mockImplementation(() => undefined);
    mockSelectReturns([memberRow({ deletedAt: new Date('2026-01-10T00:00:00.000Z') })]);
    mockSelectReturns([membershipRow()]);

    const result = await checkIn(kioskCtx, {
      memberId: 'mbr_1',
      admittedBy: 'kiosk-lobby',
      asOf: new Date('2026-01-15T08:00:00.000Z'),
    });

    expect(result).toEqual({ admitted: false, reason: 'MEMBER_DELETED' });
    expect(mockAuditLog).toHaveBeenCalledWith(kioskCtx, 'check_in.rejected', 'member', 'mbr_1', undefined, {
      reason: 'MEMBER_DELETED',
      admittedBy: 'kiosk-lobby',
    });
    infoSpy.mockRestore();
  });

  it('rejects an INACTIVE member even with a covering membership', async () => {
    const infoSpy = vi.spyOn(logger, 'info').mockImplementation(() => undefined);
    mockSelectReturns([memberRow({ status: 'INACTIVE' })]);
    mockSelectReturns([membershipRow()]);

    const result = await checkIn(kioskCtx, {
      memberId: 'mbr_1',
      admittedBy: 'kiosk-lobby',
      asOf: new Date('2026-01-15T08:00:00.000Z'),
    });

    expect(result).toEqual({ admitted: false, reason: 'MEMBER_INACTIVE' });
    expect(mockInsert).not.toHaveBeenCalled();
    expect(mockBuildEvent).toHaveBeenCalledWith(
      expect.anything(),
      'attendance.check_in.rejected.v1',
      expect.objectContaining({ memberId: 'mbr_1', reason: 'MEMBER_INACTIVE' }),
    );
    expect(mockAuditLog).toHaveBeenCalledWith(kioskCtx, 'check_in.rejected', 'member', 'mbr_1', undefined, {
      reason: 'MEMBER_INACTIVE',
      admittedBy: 'kiosk-lobby',
    });
    infoSpy.mockRestore();
  });

  it('refuses a member of another gym', async () => {
    const warnSpy = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    mockSelectReturns([memberRow({ gymId: 'gym_B' })]);

    await expect(
      checkIn(kioskCtx, { memberId: 'mbr_1', admittedBy: 'kiosk-lobby', asOf: new Date('2026-01-15T08:00:00.000Z') }),
    ).rejects.toThrow(TenantIsolationViolationError);
    warnSpy.mockRestore();
  });

  it('records repeated check-ins as separate rows', async () => {
    for (const id of ['chk_1', 'chk_2']) {
      mockSelectReturns([memberRow()]);
      mockSelectReturns([membershipRow()]);
      mockInsertReturns([checkInRow({ id })]);
    }
    const asOf = new Date('2026-01-15T07:30:00.000Z');

    const first = await checkIn(kioskCtx, { memberId: 'mbr_1', admittedBy: 'kiosk-lobby', asOf });
    const second = await checkIn(kioskCtx, { memberId: 'mbr_1', admittedBy: 'kiosk-lobby', asOf });

    expect(first.admitted && first.checkIn.id).toBe('chk_1');
    expect(second.admitted && second.checkIn.id).toBe('chk_2');
  });
});

describe('voidCheckIn', () => {
  it('tombstones the check-in with a reason', async () => {
    mockSelectReturns([actingStaff()]);
    mockSelectReturns([checkInRow()]);
    const set = mockUpdateReturns([checkInRow({ deletedAt: new Date(), voidReason: 'Scanned twice' })]);

    const voided = await voidCheckIn(staffCtx(), { checkInId: 'chk_1', reason: 'Scanned twice' });

    expect(voided.voidReason).toBe('Scanned twice');
    expect(set).toHaveBeenCalledWith(
      expect.objectContaining({ voidReason: 'Scanned twice', deletedAt: expect.any(Date) }),
    );
  });

  it('treats an already voided check-in as not found', async () => {
    mockSelectReturns([actingStaff()]);
    mockSelectReturns([checkInRow({ deletedAt: new Date() })]);

    await expect(voidCheckIn(staffCtx(), { checkInId: 'chk_1', reason: 'Again' })).rejects.toThrow(NotFoundError);
  });
});

describe('listCheckIns', () => {
  it('returns the rows of the gym', async () => {
    const query = mockSelectReturns([checkInRow({ id: 'chk_2' }), checkInRow()]);

    const rows = await listCheckIns(GYM_A, { memberId: 'mbr_1', limit: 10 });

    expect(rows.map((r) => r.id)).toEqual(['chk_2', 'chk_1']);
    expect(query.limit).toHaveBeenCalledWith(10);
  });
});
