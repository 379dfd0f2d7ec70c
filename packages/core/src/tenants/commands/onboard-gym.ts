import { and, eq, isNull } from 'drizzle-orm';
import { withTransaction, gyms, users } from '@gymledger/db';
import { ConflictError, firstOrThrow, parseInput } from '@gymledger/shared';
import { publishEventsOnly } from '../../events/publish-with-outbox';
import { buildEvent } from '../../events/build-event';
import { auditLogSystem } from '../../audit/helpers';
import { logger } from '../../observability/logger';
import { hashSecret } from '../../staff/password';
import { toStaffProfile } from '../../staff/types';
import type { StaffProfile } from '../../staff/types';
import type { Gym } from '../types';
import { onboardGymSchema } from '../validation';
import type { OnboardGymInput } from '../validation';

/** Create a gym together with its first OWNER account. */
export async function onboardGym(input: OnboardGymInput): Promise<{ gym: Gym; owner: StaffProfile }> {
  const data = parseInput(onboardGymSchema, input);
  const passwordHash = hashSecret(data.owner.password);

  const result = await withTransaction('onboardGym', async (tx) => {
    const [emailTaken] = await tx
      .select({ id: users.id })
      .from(users)
      .where(and(eq(users.email, data.owner.email), isNull(users.deletedAt)))
      .limit(1);
    if (emailTaken) throw new ConflictError('A staff account with this email already exists');

    const gym = firstOrThrow(await tx.insert(gyms).values(data.gym).returning(), 'onboardGym');

    const owner = firstOrThrow(
      await tx
        .insert(users)
        .values({
          gymId: gym.id,
          name: data.owner.name,
          email: data.owner.email,
          passwordHash,
          role: 'OWNER',
          phone: data.owner.phone ?? null,
          status: 'ACTIVE',
        })
        .returning(),
      'onboardGym',
    );

    await publishEventsOnly(tx, [
      buildEvent({
        eventType: 'tenant.gym.created.v1',
        tenantId: gym.id,
        data: { gymId: gym.id, name: gym.name },
      }),
      buildEvent({
        eventType: 'identity.staff.created.v1',
        tenantId: gym.id,
        data: { userId: owner.id, role: owner.role, status: owner.status },
      }),
    ]);

    return { gym, owner: toStaffProfile(owner) };
  });

  logger.info('Gym onboarded', { tenantId: result.gym.id, userId: result.owner.id });
  await auditLogSystem(result.gym.id, 'gym.onboarded', 'gym', result.gym.id, {
    ownerUserId: result.owner.id,
  });
  return result;
}
