import { and, eq, inArray, isNull } from 'drizzle-orm';
import { publishWithOutbox } from '@gymledger/core/events/publish-with-outbox';
import { buildEventFromContext } from '@gymledger/core/events/build-event';
import { auditLogSystem } from '@gymledger/core/audit/helpers';
import { getConfig } from '@gymledger/core/config';
import { logger } from '@gymledger/core/observability/logger';
import type { TenantContext } from '@gymledger/core/auth/context';
import { ACCESS_GRANTING_STATUSES, generateUlid, parseInput, toCalendarDate } from '@gymledger/shared';
import type { EventEnvelope } from '@gymledger/shared';
import { memberships } from '@gymledger/db';
import { recomputeStatusesOptionsSchema } from '../validation';
import type { RecomputeStatusesOptions } from '../validation';
import type { StatusSweepResult } from '../types';
import { MEMBERSHIP_EVENTS } from '../events';
import { nextStatus } from '../helpers/lifecycle';

/**
 * Status sweep for one gym, invoked by an external scheduler. Each update is
 * conditional on the status that was read, and statuses only move forward,
 * so re-running with the same `asOf` changes nothing.
 */
export async function recomputeStatuses(
  tenantId: string,
  asOf: Date,
  options: RecomputeStatusesOptions = {},
): Promise<StatusSweepResult> {
  const opts = parseInput(recomputeStatusesOptionsSchema, options);
  const windowDays = opts.renewalWindowDays ?? getConfig().RENEWAL_WINDOW_DAYS;
  const asOfDate = toCalendarDate(asOf);
  const ctx: TenantContext = { tenantId, requestId: generateUlid() };
  const startedAt = Date.now();

  const counts = await publishWithOutbox(ctx, async (tx) => {
    const candidates = await tx
      .select({
        id: memberships.id,
        memberId: memberships.memberId,
        status: memberships.status,
        endDate: memberships.endDate,
        autoRenew: memberships.autoRenew,
        renewedAt: memberships.renewedAt,
      })
      .from(memberships)
      .where(
        and(
          eq(memberships.gymId, tenantId),
          isNull(memberships.deletedAt),
          inArray(memberships.status, [...ACCESS_GRANTING_STATUSES]),
        ),
      )
      .for('update');

    const tally: StatusSweepResult = { transitioned: 0, toPendingRenewal: 0, toExpired: 0 };
    const events: EventEnvelope[] = [];

    for (const row of candidates) {
      const target = nextStatus(row, asOfDate, windowDays);
      if (target === row.status) continue;

      const updated = await tx
        .update(memberships)
        .set({ status: target, updatedAt: new Date() })
        .where(
          and(
            eq(memberships.id, row.id),
            eq(memberships.gymId, tenantId),
            eq(memberships.status, row.status),
          ),
        )
        .returning({ id: memberships.id });
      if (updated.length === 0) continue;

      tally.transitioned += 1;
      if (target === 'PENDING_RENEWAL') tally.toPendingRenewal += 1;
      if (target === 'EXPIRED') tally.toExpired += 1;

      events.push(
        buildEventFromContext(ctx, MEMBERSHIP_EVENTS.STATUS_CHANGED, {
          membershipId: row.id,
          memberId: row.memberId,
          from: row.status,
          to: target,
          asOf: asOfDate,
        }),
      );
    }

    return { result: tally, events };
  });

  logger.info('Membership status sweep completed', {
    tenantId,
    requestId: ctx.requestId,
    asOf: asOfDate,
    renewalWindowDays: windowDays,
    ...counts,
    durationMs: Date.now() - startedAt,
  });

  if (counts.transitioned > 0) {
    await auditLogSystem(tenantId, 'membership.status_sweep', 'gym', tenantId, {
      requestId: ctx.requestId,
      asOf: asOfDate,
      ...counts,
    });
  }
  return counts;
}
