import { and, eq, isNull } from 'drizzle-orm';
import { users } from '@gymledger/db';
import { ConflictError, firstOrThrow, parseInput } from '@gymledger/shared';
import type { RequestContext } from '../../auth/context';
import { publishWithOutbox } from '../../events/publish-with-outbox';
import { buildEventFromContext } from '../../events/build-event';
import { auditLog } from '../../audit/helpers';
import { requireRole, resolveActingStaff } from '../acting-staff';
import { hashSecret } from '../password';
import { toStaffProfile } from '../types';
import type { StaffProfile } from '../types';
import { createStaffSchema } from '../validation';
import type { CreateStaffInput } from '../validation';

export async function createStaff(ctx: RequestContext, input: CreateStaffInput): Promise<StaffProfile> {
  requireRole(ctx, 'OWNER');
  const data = parseInput(createStaffSchema, input);
  const passwordHash = hashSecret(data.password);

  const result = await publishWithOutbox(ctx, async (tx) => {
    await resolveActingStaff(tx, ctx, 'OWNER');

    // Emails are unique across live accounts of every gym.
    const [existing] = await tx
      .select({ id: users.id })
      .from(users)
      .where(and(eq(users.email, data.email), isNull(users.deletedAt)))
      .limit(1);
    if (existing) throw new ConflictError('A staff account with this email already exists');

    const created = firstOrThrow(
      await tx
        .insert(users)
        .values({
          gymId: ctx.tenantId,
          name: data.name,
          email: data.email,
          passwordHash,
          role: data.role,
          phone: data.phone ?? null,
          status: data.status,
        })
        .returning(),
      'createStaff',
    );

    const event = buildEventFromContext(ctx, 'identity.staff.created.v1', {
      userId: created.id,
      role: created.role,
      status: created.status,
    });

    return { result: toStaffProfile(created), events: [event] };
  });

  await auditLog(ctx, 'staff.created', 'user', result.id);
  return result;
}
