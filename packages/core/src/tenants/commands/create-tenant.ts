import { withTransaction, gyms } from '@gymledger/db';
import { firstOrThrow, parseInput } from '@gymledger/shared';
import { publishEventsOnly } from '../../events/publish-with-outbox';
import { buildEvent } from '../../events/build-event';
import { auditLogSystem } from '../../audit/helpers';
import { logger } from '../../observability/logger';
import type { Gym } from '../types';
import { createTenantSchema } from '../validation';
import type { CreateTenantInput } from '../validation';

export async function createTenant(input: CreateTenantInput): Promise<Gym> {
  const data = parseInput(createTenantSchema, input);

  const gym = await withTransaction('createTenant', async (tx) => {
    const created = firstOrThrow(
      await tx.insert(gyms).values(data).returning(),
      'createTenant',
    );

    await publishEventsOnly(tx, [
      buildEvent({
        eventType: 'tenant.gym.created.v1',
        tenantId: created.id,
        data: { gymId: created.id, name: created.name },
      }),
    ]);
    return created;
  });

  logger.info('Gym created', { tenantId: gym.id });
  await auditLogSystem(gym.id, 'gym.created', 'gym', gym.id);
  return gym;
}
